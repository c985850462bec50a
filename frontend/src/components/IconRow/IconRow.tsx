import { RadioGroup } from '@headlessui/react';
import type { TodoIcon } from '@modules/types';
import { iconGlyphs, todoIcons } from '@modules/icons';
import { aria } from './aria';

interface Props {
  icon: TodoIcon;
  onIconChange: (icon: TodoIcon) => void;
  className?: string;
}

function classNames(...classes: Array<string | false | null | undefined>) {
  return classes.filter(Boolean).join(' ');
}

export default function IconRow({ icon, onIconChange, className }: Props) {
  return (
    <RadioGroup
      value={icon}
      onChange={onIconChange}
      {...aria.group}
      className={classNames('flex gap-2 px-4', className)}
    >
      {todoIcons.map((value) => {
        const Glyph = iconGlyphs[value];
        return (
          <RadioGroup.Option
            key={value}
            value={value}
            {...aria.option(value)}
            className={({ active, checked }) =>
              classNames(
                'flex h-10 w-10 cursor-pointer items-center justify-center rounded-full transition focus:outline-none',
                checked ? 'bg-indigo-100 text-indigo-700' : 'text-gray-400 hover:text-gray-600',
                active && 'ring-2 ring-indigo-200'
              )
            }
          >
            <Glyph aria-hidden="true" className="h-6 w-6" />
          </RadioGroup.Option>
        );
      })}
    </RadioGroup>
  );
}
