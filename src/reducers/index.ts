export { tasksReducer, initialState } from './tasks';
export type { State as TasksState, Action as TasksAction } from './tasks';
export { filtersReducer, initialState as filtersInitialState } from './filters';
export type { State as FiltersState, Action as FiltersAction } from './filters';
