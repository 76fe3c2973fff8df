export const aria = {
  category: { 'aria-label': 'Filter by category' },
  priority: { 'aria-label': 'Filter by priority' },
  completion: { 'aria-label': 'Filter by status' },
  date: { 'aria-label': 'Filter by due date' }
};
