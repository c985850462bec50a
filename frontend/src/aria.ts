export const aria = {
  header: {
    'aria-label': 'Todo header'
  },
  main: {
    'aria-label': 'Todo list'
  }
};
