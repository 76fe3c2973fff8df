export const aria = {
  input: { 'aria-label': 'Search tasks' },
  clear: { 'aria-label': 'Clear search' }
};
