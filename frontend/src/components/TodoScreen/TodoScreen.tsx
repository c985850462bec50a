import TodoItemEntryInput from '@components/TodoItemEntryInput';
import TodoItemInlineEditor from '@components/TodoItemInlineEditor';
import TodoRow from '@components/TodoRow';
import type { TodoDraft, TodoItem } from '@modules/types';
import { aria } from './aria';

interface Props {
  items: readonly TodoItem[];
  currentlyEditing: TodoItem | null;
  onAddItem: (draft: TodoDraft) => void;
  onRemoveItem: (item: TodoItem) => void;
  onStartEdit: (item: TodoItem) => void;
  onEditItemChange: (item: TodoItem) => void;
  onEditDone: () => void;
}

/**
 * Stateless component responsible for the whole to-do screen.
 *
 * @param items (state) items to display, in order
 * @param currentlyEditing (state) item open in the inline editor, if any
 * @param onAddItem (event) request an item be added
 * @param onRemoveItem (event) request an item be removed
 * @param onStartEdit (event) request an item be opened for editing
 * @param onEditItemChange (event) the edited item changed
 * @param onEditDone (event) editing finished
 */
export default function TodoScreen({
  items,
  currentlyEditing,
  onAddItem,
  onRemoveItem,
  onStartEdit,
  onEditItemChange,
  onEditDone,
}: Props) {
  const enableTopSection = currentlyEditing === null;

  return (
    <div className="flex w-full flex-1 flex-col">
      <section
        {...aria.entry}
        className={`w-full bg-white ${enableTopSection ? 'shadow' : ''}`}
      >
        {enableTopSection ? (
          <TodoItemEntryInput onItemComplete={onAddItem} />
        ) : (
          <h2 className="p-4 text-center text-lg font-semibold">Editing item</h2>
        )}
      </section>

      <ul {...aria.list} className="flex-1 overflow-auto pt-2">
        {items.map((todo) => (
          <li key={todo.id}>
            {currentlyEditing?.id === todo.id ? (
              <TodoItemInlineEditor
                item={todo}
                onEditItemChange={onEditItemChange}
                onEditDone={onEditDone}
                onRemoveItem={() => onRemoveItem(todo)}
              />
            ) : (
              <TodoRow todo={todo} onItemClicked={onStartEdit} />
            )}
          </li>
        ))}
      </ul>
    </div>
  );
}
