// src/lib/errors/domain-error.ts

export type ErrorKind =
  | "invalid_argument"
  | "not_found"
  | "conflict"
  | "invalid_state"
  | "invalid_transition"
  | "precondition_failed"
  | "forbidden"
  | "payload_too_large"
  | "deadline_exceeded"
  | "dependency_failure"
  | "internal";

export abstract class DomainError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  /** Structured payload rendered under `details` in error envelopes. */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}
