import { renderHook, act } from '@testing-library/react';
import type { ReactNode } from 'react';
import { describe, it, expect, vi } from 'vitest';
import { useTodos } from './useTodos';
import { TodoStoreProvider } from '@context';
import { createTodoStore } from '@modules/store';

function setup() {
  let n = 0;
  const store = createTodoStore({ generateId: () => `t${++n}` });
  const wrapper = ({ children }: { children: ReactNode }) => (
    <TodoStoreProvider store={store}>{children}</TodoStoreProvider>
  );
  return { store, ...renderHook(() => useTodos(), { wrapper }) };
}

describe('useTodos', () => {
  it('re-renders with each new snapshot', () => {
    const { result } = setup();
    act(() => {
      result.current.addItem({ task: 'Buy milk', icon: 'default' });
    });
    act(() => {
      result.current.addItem({ task: 'Walk dog', icon: 'event' });
    });
    expect(result.current.items).toEqual([
      { id: 't1', task: 'Buy milk', icon: 'default' },
      { id: 't2', task: 'Walk dog', icon: 'event' },
    ]);
  });

  it('routes edits through the focused item', () => {
    const { result } = setup();
    act(() => {
      result.current.addItem({ task: 'Buy milk', icon: 'default' });
    });
    const [item] = result.current.items;
    act(() => {
      result.current.startEdit(item);
    });
    expect(result.current.currentlyEditing).toEqual(item);

    act(() => {
      result.current.editItemChange({ ...item, task: 'Buy bread' });
    });
    expect(result.current.currentlyEditing?.task).toBe('Buy bread');

    act(() => {
      result.current.editDone();
    });
    expect(result.current.currentlyEditing).toBeNull();
    expect(result.current.items[0].task).toBe('Buy bread');
  });

  it('reflects changes made directly on the store', () => {
    const { store, result } = setup();
    act(() => {
      store.addItem('From elsewhere', 'trash');
    });
    expect(result.current.items).toEqual([
      { id: 't1', task: 'From elsewhere', icon: 'trash' },
    ]);
    act(() => {
      result.current.removeItem(result.current.items[0]);
    });
    expect(store.getSnapshot().items).toEqual([]);
  });

  it('requires a provider', () => {
    const errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => renderHook(() => useTodos())).toThrow(
      'useTodoStore must be used within a TodoStoreProvider'
    );
    errSpy.mockRestore();
  });
});
