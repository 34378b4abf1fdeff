export class GroupDirectoryError extends Error {
  public constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'GroupDirectoryError';
    this.cause = cause;
  }
}

export class DuplicateNameError extends GroupDirectoryError {
  public constructor(
    public readonly groupName: string,
    cause?: unknown,
  ) {
    super(`A group named "${groupName}" already exists`, cause);
    this.name = 'DuplicateNameError';
  }
}

/**
 * Metadata that is not a flat string-to-string mapping, or a stored metadata
 * blob that does not decode into one. Always a programming error; never retried.
 */
export class SerializationError extends GroupDirectoryError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'SerializationError';
  }
}

/** Any other persistence failure. The driver error is kept as `cause`. */
export class StoreError extends GroupDirectoryError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'StoreError';
  }
}

export class ReadonlyHandleError extends StoreError {
  public constructor(public readonly operation: string) {
    super(`Cannot ${operation} a group through a read-only group directory`);
    this.name = 'ReadonlyHandleError';
  }
}

export const toStoreError = (error: unknown, message: string): GroupDirectoryError =>
  error instanceof GroupDirectoryError ? error : new StoreError(message, error);
