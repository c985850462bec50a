import { render, screen, fireEvent } from '@testing-library/react';
import { describe, it, expect, vi } from 'vitest';
import TodoItemInput, { aria } from '.';

describe('TodoItemInput', () => {
  it('shows the given text and reports changes', () => {
    const onTextChange = vi.fn();
    render(
      <TodoItemInput
        text="draft"
        onTextChange={onTextChange}
        icon="default"
        onIconChange={() => {}}
        submit={() => {}}
        iconsVisible={false}
      >
        <span>slot</span>
      </TodoItemInput>
    );
    const input = screen.getByRole('textbox', { name: aria.input['aria-label'] });
    expect((input as HTMLInputElement).value).toBe('draft');
    fireEvent.change(input, { target: { value: 'draft 2' } });
    expect(onTextChange).toHaveBeenCalledWith('draft 2');
    expect(screen.getByText('slot')).toBeTruthy();
    expect(screen.queryByRole('radiogroup')).toBeNull();
  });

  it('submits on Enter and shows icons when asked', () => {
    const submit = vi.fn();
    render(
      <TodoItemInput
        text="draft"
        onTextChange={() => {}}
        icon="event"
        onIconChange={() => {}}
        submit={submit}
        iconsVisible
      >
        {null}
      </TodoItemInput>
    );
    fireEvent.keyDown(screen.getByRole('textbox'), { key: 'Enter' });
    expect(submit).toHaveBeenCalledTimes(1);
    expect(screen.getByRole('radiogroup')).toBeTruthy();
  });
});
