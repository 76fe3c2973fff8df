export const config = {
  storageKey: import.meta.env.VITE_TASKS_STORAGE_KEY || 'smart-todo-tasks-v1',
  appTitle: import.meta.env.VITE_APP_TITLE || 'Smart ToDo'
} as const;
