import {
  CalendarDaysIcon,
  CheckBadgeIcon,
  CheckCircleIcon,
  LockClosedIcon,
  StopIcon,
  TrashIcon,
} from '@heroicons/react/24/outline';
import type { TodoIcon } from './types';

type Glyph = typeof CheckCircleIcon;

export const todoIcons: readonly TodoIcon[] = [
  'default',
  'event',
  'done',
  'square',
  'privacy',
  'trash',
];

export const iconGlyphs: Record<TodoIcon, Glyph> = {
  default: CheckCircleIcon,
  event: CalendarDaysIcon,
  done: CheckBadgeIcon,
  square: StopIcon,
  privacy: LockClosedIcon,
  trash: TrashIcon,
};

export const iconLabels: Record<TodoIcon, string> = {
  default: 'Default',
  event: 'Event',
  done: 'Done',
  square: 'Square',
  privacy: 'Privacy',
  trash: 'Trash',
};
