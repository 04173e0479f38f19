// apps/api/src/common/errors.ts

/** Failure of the underlying database: I/O, permissions, corruption, lost connection. */
export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
  }
}
