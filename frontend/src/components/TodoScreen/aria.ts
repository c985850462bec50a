export const aria = {
  entry: {
    role: 'region',
    'aria-label': 'New item'
  },
  list: {
    'aria-label': 'Todo items'
  }
};
