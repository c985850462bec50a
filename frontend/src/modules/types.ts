export type TodoIcon =
  | 'default'
  | 'event'
  | 'done'
  | 'square'
  | 'privacy'
  | 'trash';

export interface TodoItem {
  readonly id: string;
  readonly task: string;
  readonly icon: TodoIcon;
}

export type TodoDraft = Omit<TodoItem, 'id'>;

export interface TodoSnapshot {
  readonly items: readonly TodoItem[];
  /** Position of the item open for inline editing, or null when idle. */
  readonly editFocus: number | null;
  readonly currentlyEditing: TodoItem | null;
}
