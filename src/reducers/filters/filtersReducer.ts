import type { CompletionFilter, FilterState } from '@modules/types';
import { defaultFilters, reconcileSelection } from '@modules/filters';

type State = FilterState;

const initialState: State = defaultFilters;

type SetCategoryAction = { type: "set-category"; value: string };
type SetPriorityAction = { type: "set-priority"; value: string };
type SetCompletionAction = { type: "set-completion"; value: CompletionFilter };
type SetDateAction = { type: "set-date"; value: string | null };
type SetKeywordAction = { type: "set-keyword"; value: string };
type ResetFiltersAction = { type: "reset-filters" };

/** Re-validates the selections against freshly derived option lists. */
type SyncOptionsAction = {
  type: "sync-options";
  categories: readonly string[];
  priorities: readonly string[];
};

type Action =
  | SetCategoryAction
  | SetPriorityAction
  | SetCompletionAction
  | SetDateAction
  | SetKeywordAction
  | ResetFiltersAction
  | SyncOptionsAction;

export function filtersReducer(state: State, action: Action): State {
  switch (action.type) {
    case "set-category":
      return { ...state, category: action.value };
    case "set-priority":
      return { ...state, priority: action.value };
    case "set-completion":
      return { ...state, completion: action.value };
    case "set-date":
      return { ...state, date: action.value || null };
    case "set-keyword":
      return { ...state, keyword: action.value };
    case "reset-filters":
      return initialState;
    case "sync-options": {
      const category = reconcileSelection(action.categories, state.category);
      const priority = reconcileSelection(action.priorities, state.priority);
      if (category === state.category && priority === state.priority) {
        return state;
      }
      return { ...state, category, priority };
    }
    default:
      return state;
  }
}

export { initialState };
export type { State, Action };
