export const aria = {
  save: {
    'aria-label': 'Save item'
  },
  remove: {
    'aria-label': 'Remove item'
  }
};
