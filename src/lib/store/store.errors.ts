// src/lib/store/store.errors.ts

/** A unique index rejected the write. */
export class DuplicateKeyError extends Error {
  constructor(
    public readonly constraint: string,
    public readonly value?: string,
  ) {
    super(`Duplicate key on ${constraint}`);
    this.name = "DuplicateKeyError";
  }
}

/** Serialisation failure, deadlock or lost connection; safe to retry. */
export class TransientStoreError extends Error {
  constructor(
    message: string,
    public readonly sqlState?: string,
  ) {
    super(message);
    this.name = "TransientStoreError";
  }
}
