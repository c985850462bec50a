export const aria = {
  root: (task: string) => ({
    'aria-label': task,
    role: 'button',
    'aria-roledescription': 'Todo item',
    tabIndex: 0
  })
};
