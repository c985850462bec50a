import type { TodoItem } from '@modules/types';
import {
  DuplicateItemId,
  IdentityMismatch,
  PreconditionViolation,
} from '@modules/store/errors';

type State = {
  items: readonly TodoItem[];
  editingId: string | null;
};

const initialState: State = {
  items: [],
  editingId: null,
};

type AddItemAction = { type: 'add-item'; item: TodoItem };

type RemoveItemAction = { type: 'remove-item'; id: string };

type BeginEditAction = { type: 'begin-edit'; id: string };

type UpdateEditingItemAction = { type: 'update-editing-item'; item: TodoItem };

type EndEditAction = { type: 'end-edit' };

type Action =
  | AddItemAction
  | RemoveItemAction
  | BeginEditAction
  | UpdateEditingItemAction
  | EndEditAction;

export function isBlank(task: string) {
  return task.trim() === '';
}

// Returns `state` itself whenever the action leaves nothing to change, so
// callers can skip notifying on identity.
export function todosReducer(state: State = initialState, action: Action): State {
  switch (action.type) {
    case 'add-item': {
      const { item } = action;
      if (isBlank(item.task)) return state;
      if (state.items.some((t) => t.id === item.id)) {
        throw new DuplicateItemId(item.id);
      }
      return { ...state, items: [...state.items, item] };
    }
    case 'remove-item': {
      const items = state.items.filter((t) => t.id !== action.id);
      if (items.length === state.items.length) return state;
      return {
        items,
        editingId: state.editingId === action.id ? null : state.editingId,
      };
    }
    case 'begin-edit': {
      if (state.editingId === action.id) return state;
      if (!state.items.some((t) => t.id === action.id)) return state;
      return { ...state, editingId: action.id };
    }
    case 'update-editing-item': {
      const { editingId } = state;
      if (editingId === null) throw new PreconditionViolation();
      if (action.item.id !== editingId) {
        throw new IdentityMismatch(editingId, action.item.id);
      }
      const items = state.items.map((t) => (t.id === editingId ? action.item : t));
      return { ...state, items };
    }
    case 'end-edit':
      return state.editingId === null ? state : { ...state, editingId: null };
    default:
      return state;
  }
}

export { initialState };
export type { State, Action };
