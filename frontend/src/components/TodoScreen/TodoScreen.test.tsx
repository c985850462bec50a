import { render, screen, fireEvent, within } from '@testing-library/react';
import { describe, it, expect, vi } from 'vitest';
import TodoScreen, { aria } from '.';
import type { TodoItem } from '@modules/types';

const items: TodoItem[] = [
  { id: 'a', task: 'x', icon: 'default' },
  { id: 'b', task: 'y', icon: 'event' },
  { id: 'c', task: 'z', icon: 'done' },
];

function renderScreen(currentlyEditing: TodoItem | null) {
  const handlers = {
    onAddItem: vi.fn(),
    onRemoveItem: vi.fn(),
    onStartEdit: vi.fn(),
    onEditItemChange: vi.fn(),
    onEditDone: vi.fn(),
  };
  render(<TodoScreen items={items} currentlyEditing={currentlyEditing} {...handlers} />);
  return handlers;
}

describe('TodoScreen', () => {
  it('renders the entry panel and one row per item in order', () => {
    renderScreen(null);
    const entry = screen.getByRole('region', { name: aria.entry['aria-label'] });
    expect(within(entry).getByRole('button', { name: 'Add' })).toBeTruthy();
    const list = screen.getByRole('list', { name: aria.list['aria-label'] });
    expect(within(list).getAllByRole('listitem').map((li) => li.textContent)).toEqual([
      'x',
      'y',
      'z',
    ]);
  });

  it('starts editing the clicked row', () => {
    const { onStartEdit } = renderScreen(null);
    fireEvent.click(screen.getByRole('button', { name: 'y' }));
    expect(onStartEdit).toHaveBeenCalledWith(items[1]);
  });

  it('swaps the focused row for the inline editor', () => {
    const { onRemoveItem, onAddItem } = renderScreen(items[1]);
    expect(screen.getByText('Editing item')).toBeTruthy();
    expect(screen.queryByRole('button', { name: 'Add' })).toBeNull();
    expect(screen.queryByRole('button', { name: 'y' })).toBeNull();
    expect(screen.getByRole('button', { name: 'x' })).toBeTruthy();
    expect((screen.getByRole('textbox') as HTMLInputElement).value).toBe('y');

    fireEvent.click(screen.getByRole('button', { name: 'Remove item' }));
    expect(onRemoveItem).toHaveBeenCalledWith(items[1]);
    expect(onAddItem).not.toHaveBeenCalled();
  });
});
