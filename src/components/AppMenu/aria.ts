export const aria = {
  button: { 'aria-label': 'Open menu' }
};
