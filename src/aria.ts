export const aria = {
  header: { 'aria-label': 'Application header' },
  filters: { 'aria-label': 'Task filters' },
  main: { 'aria-label': 'Tasks' },
  footer: { 'aria-label': 'Task summary' }
};
