import type { KeyboardEvent, ReactNode } from 'react';
import IconRow from '@components/IconRow';
import type { TodoIcon } from '@modules/types';
import { aria } from './aria';

interface Props {
  text: string;
  onTextChange: (text: string) => void;
  icon: TodoIcon;
  onIconChange: (icon: TodoIcon) => void;
  submit: () => void;
  iconsVisible: boolean;
  /** Button slot rendered beside the text field. */
  children: ReactNode;
}

/**
 * Stateless editor for a task's text and icon. Whoever renders it owns the
 * values; this component only reports changes.
 */
export default function TodoItemInput({
  text,
  onTextChange,
  icon,
  onIconChange,
  submit,
  iconsVisible,
  children,
}: Props) {
  function handleKeyDown(ev: KeyboardEvent<HTMLInputElement>) {
    if (ev.key === 'Enter') {
      ev.preventDefault();
      submit();
    }
  }

  return (
    <div className="flex flex-col">
      <div className="flex items-center gap-2 px-4 pt-4">
        <input
          type="text"
          value={text}
          onChange={(e) => onTextChange(e.target.value)}
          onKeyDown={handleKeyDown}
          {...aria.input}
          className="flex-1 rounded-md border border-gray-300 p-2 text-sm focus:border-indigo-500 focus:ring-indigo-500"
        />
        <div className="flex items-center">{children}</div>
      </div>
      {iconsVisible ? (
        <IconRow icon={icon} onIconChange={onIconChange} className="pt-2 pb-2" />
      ) : (
        <div className="h-4" />
      )}
    </div>
  );
}
