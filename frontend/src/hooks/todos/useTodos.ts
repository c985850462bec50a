import { useCallback, useSyncExternalStore } from 'react';
import type { TodoDraft, TodoItem } from '@modules/types';
import { useTodoStore } from '@context';

export function useTodos() {
  const store = useTodoStore();
  const { items, currentlyEditing } = useSyncExternalStore(
    store.subscribe,
    store.getSnapshot,
    store.getSnapshot,
  );

  const addItem = useCallback(
    ({ task, icon }: TodoDraft) => {
      store.addItem(task, icon);
    },
    [store],
  );

  const removeItem = useCallback(
    (item: TodoItem) => store.removeItem(item.id),
    [store],
  );

  const startEdit = useCallback(
    (item: TodoItem) => store.beginEdit(item.id),
    [store],
  );

  const editItemChange = useCallback(
    (item: TodoItem) => store.updateEditingItem(item),
    [store],
  );

  const editDone = useCallback(() => store.endEdit(), [store]);

  return {
    items,
    currentlyEditing,
    addItem,
    removeItem,
    startEdit,
    editItemChange,
    editDone,
  };
}
