import TodoItemInput from '@components/TodoItemInput';
import type { TodoItem } from '@modules/types';
import { aria } from './aria';

interface Props {
  item: TodoItem;
  onEditItemChange: (item: TodoItem) => void;
  onEditDone: () => void;
  onRemoveItem: () => void;
}

export default function TodoItemInlineEditor({
  item,
  onEditItemChange,
  onEditDone,
  onRemoveItem,
}: Props) {
  return (
    <TodoItemInput
      text={item.task}
      onTextChange={(task) => onEditItemChange({ ...item, task })}
      icon={item.icon}
      onIconChange={(icon) => onEditItemChange({ ...item, icon })}
      submit={onEditDone}
      iconsVisible
    >
      <div className="flex">
        <button
          type="button"
          onClick={onEditDone}
          {...aria.save}
          className="w-8 rounded-md px-1 text-right hover:bg-gray-100"
        >
          <span aria-hidden="true">💾</span>
        </button>
        <button
          type="button"
          onClick={onRemoveItem}
          {...aria.remove}
          className="w-8 rounded-md px-1 text-right hover:bg-gray-100"
        >
          <span aria-hidden="true">❌</span>
        </button>
      </div>
    </TodoItemInput>
  );
}
