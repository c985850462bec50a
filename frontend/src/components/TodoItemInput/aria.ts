export const aria = {
  input: {
    'aria-label': 'Task'
  }
};
