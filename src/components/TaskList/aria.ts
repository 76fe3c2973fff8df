export const aria = {
  list: { 'aria-label': 'Task list' },
  empty: { role: 'status' }
};
