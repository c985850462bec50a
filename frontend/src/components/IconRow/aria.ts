import type { TodoIcon } from '@modules/types';
import { iconLabels } from '@modules/icons';

export const aria = {
  group: {
    'aria-label': 'Icon'
  },
  option: (icon: TodoIcon) => ({
    'aria-label': iconLabels[icon]
  })
};
