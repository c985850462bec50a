export type TodoStoreErrorCode =
  | 'precondition_violation'
  | 'identity_mismatch'
  | 'duplicate_item_id';

/**
 * Raised when the store is driven in a way only a wiring bug can produce.
 * Blank input and unknown ids are not errors; they are ignored.
 */
export class TodoStoreError extends Error {
  constructor(
    public readonly code: TodoStoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TodoStoreError';
  }

  toJSON(): { error: string; code: TodoStoreErrorCode; message: string } {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

export class PreconditionViolation extends TodoStoreError {
  constructor(message = 'no item is currently being edited') {
    super('precondition_violation', message);
    this.name = 'PreconditionViolation';
  }
}

export class IdentityMismatch extends TodoStoreError {
  constructor(
    public readonly expectedId: string,
    public readonly actualId: string,
  ) {
    super(
      'identity_mismatch',
      `can only change the item being edited (${expectedId}), got ${actualId}`,
    );
    this.name = 'IdentityMismatch';
  }
}

export class DuplicateItemId extends TodoStoreError {
  constructor(public readonly id: string) {
    super('duplicate_item_id', `an item with id ${id} already exists`);
    this.name = 'DuplicateItemId';
  }
}
