import TodoScreen from '@components/TodoScreen';
import { useTodos } from '@hooks';
import { aria } from './aria';

export default function App() {
  const {
    items,
    currentlyEditing,
    addItem,
    removeItem,
    startEdit,
    editItemChange,
    editDone,
  } = useTodos();

  return (
    <div className="mx-auto flex min-h-screen max-w-xl flex-col p-2 sm:p-4">
      <header {...aria.header} className="px-4 py-2">
        <h1 className="text-xl font-bold text-gray-800">Todo</h1>
      </header>

      <main {...aria.main} className="flex w-full flex-1">
        <TodoScreen
          items={items}
          currentlyEditing={currentlyEditing}
          onAddItem={addItem}
          onRemoveItem={removeItem}
          onStartEdit={startEdit}
          onEditItemChange={editItemChange}
          onEditDone={editDone}
        />
      </main>
    </div>
  );
}
