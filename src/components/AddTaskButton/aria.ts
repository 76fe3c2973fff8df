export const aria = {
  button: { 'aria-label': 'Add task' }
};
