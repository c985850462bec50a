import { v4 as uuid } from 'uuid';
import { todosReducer, todosInitialState, isBlank } from '@reducers';
import type { TodosAction, TodosState } from '@reducers';
import type { TodoIcon, TodoItem, TodoSnapshot } from '@modules/types';
import { config } from '@modules/config';

export type TodoListener = (snapshot: TodoSnapshot) => void;

export interface TodoStoreOptions {
  generateId?: () => string;
  initialItems?: readonly TodoItem[];
  debug?: boolean;
}

export interface TodoStore {
  getSnapshot(): TodoSnapshot;
  subscribe(listener: TodoListener): () => void;
  addItem(task: string, icon?: TodoIcon): TodoItem | null;
  removeItem(id: string): void;
  beginEdit(id: string): void;
  updateEditingItem(item: TodoItem): void;
  endEdit(): void;
}

function toSnapshot(state: TodosState): TodoSnapshot {
  const items = Object.freeze([...state.items]);
  const position =
    state.editingId === null
      ? -1
      : items.findIndex((t) => t.id === state.editingId);
  return Object.freeze({
    items,
    editFocus: position >= 0 ? position : null,
    currentlyEditing: position >= 0 ? items[position] : null,
  });
}

/**
 * Owns the to-do list and the inline-edit focus for one screen.
 *
 * Every state change produces a new frozen snapshot and notifies listeners
 * synchronously. Operations that change nothing (blank task, unknown id,
 * ending an edit while idle) keep the current snapshot and notify no one.
 */
export function createTodoStore(options: TodoStoreOptions = {}): TodoStore {
  const {
    generateId = () => uuid(),
    initialItems = [],
    debug = config.debugStore,
  } = options;

  let state: TodosState = todosInitialState;
  for (const item of initialItems) {
    state = todosReducer(state, { type: 'add-item', item: Object.freeze({ ...item }) });
  }
  let snapshot = toSnapshot(state);
  const listeners = new Set<TodoListener>();

  function ignored(message: string) {
    if (debug) console.debug(`[todo-store] ${message}`);
  }

  function notify() {
    for (const listener of [...listeners]) {
      try {
        listener(snapshot);
      } catch (err) {
        console.error(err);
      }
    }
  }

  function dispatch(action: TodosAction): boolean {
    const next = todosReducer(state, action);
    if (next === state) return false;
    state = next;
    snapshot = toSnapshot(state);
    notify();
    return true;
  }

  return {
    getSnapshot: () => snapshot,

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    addItem(task, icon = 'default') {
      if (isBlank(task)) {
        ignored('ignored blank task');
        return null;
      }
      const item: TodoItem = Object.freeze({ id: generateId(), task, icon });
      dispatch({ type: 'add-item', item });
      return item;
    },

    removeItem(id) {
      if (!dispatch({ type: 'remove-item', id })) {
        ignored(`remove: no item with id ${id}`);
      }
    },

    beginEdit(id) {
      if (!dispatch({ type: 'begin-edit', id }) && state.editingId !== id) {
        ignored(`beginEdit: no item with id ${id}`);
      }
    },

    updateEditingItem(item) {
      dispatch({ type: 'update-editing-item', item: Object.freeze({ ...item }) });
    },

    endEdit() {
      dispatch({ type: 'end-edit' });
    },
  };
}
