import { memo } from 'react';
import type { KeyboardEvent } from 'react';
import type { TodoItem } from '@modules/types';
import { iconGlyphs } from '@modules/icons';
import { aria } from './aria';

interface Props {
  todo: TodoItem;
  onItemClicked: (todo: TodoItem) => void;
}

function TodoRow({ todo, onItemClicked }: Props) {
  const Glyph = iconGlyphs[todo.icon];

  function handleKeyDown(ev: KeyboardEvent<HTMLDivElement>) {
    if (ev.key === 'Enter' || ev.key === ' ') {
      ev.preventDefault();
      onItemClicked(todo);
    }
  }

  return (
    <div
      {...aria.root(todo.task)}
      onClick={() => onItemClicked(todo)}
      onKeyDown={handleKeyDown}
      className="flex w-full cursor-pointer select-none items-center justify-between px-4 py-2 text-sm text-gray-800 hover:bg-gray-50"
    >
      <span className="break-words">{todo.task}</span>
      <Glyph aria-hidden="true" className="h-6 w-6 text-gray-500" />
    </div>
  );
}

export default memo(TodoRow);
