export * from './tasksReducer';
