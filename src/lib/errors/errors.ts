// src/lib/errors/errors.ts
// Error taxonomy shared by every module. Module errors extend these.

import { DomainError, type ErrorKind } from "./domain-error";

export type FieldViolation = {
  field: string;
  message: string;
  value?: unknown;
};

export class InvalidArgumentError extends DomainError {
  readonly kind: ErrorKind = "invalid_argument";

  constructor(
    message: string,
    public readonly fields: FieldViolation[] = [],
    code = "INVALID_ARGUMENT",
  ) {
    super(message, 400, code);
  }

  static field(field: string, message: string, value?: unknown) {
    return new InvalidArgumentError(message, [{ field, message, value }]);
  }

  details() {
    return { fields: this.fields };
  }
}

export class NotFoundError extends DomainError {
  readonly kind: ErrorKind = "not_found";

  constructor(message: string, code = "NOT_FOUND") {
    super(message, 404, code);
  }
}

export class ConflictError extends DomainError {
  readonly kind: ErrorKind = "conflict";

  constructor(message: string, code = "CONFLICT") {
    super(message, 409, code);
  }
}

export class InvalidStateError extends DomainError {
  readonly kind: ErrorKind = "invalid_state";

  constructor(
    message: string,
    public readonly currentState: string,
    public readonly allowedActions: readonly string[],
    code = "INVALID_STATE",
  ) {
    super(message, 409, code);
  }

  details() {
    return {
      currentState: this.currentState,
      allowedActions: [...this.allowedActions],
    };
  }
}

export class InvalidTransitionError extends DomainError {
  readonly kind: ErrorKind = "invalid_transition";

  constructor(
    message: string,
    public readonly currentState: string,
    public readonly attemptedAction: string,
    public readonly allowedActions: readonly string[],
    code = "INVALID_TRANSITION",
  ) {
    super(message, 409, code);
  }

  details() {
    return {
      currentState: this.currentState,
      attemptedAction: this.attemptedAction,
      allowedActions: [...this.allowedActions],
    };
  }
}

export class PreconditionFailedError extends DomainError {
  readonly kind: ErrorKind = "precondition_failed";

  constructor(
    message: string,
    public readonly reason: string,
    code = "PRECONDITION_FAILED",
  ) {
    super(message, 412, code);
  }

  details() {
    return { reason: this.reason };
  }
}

export class ForbiddenError extends DomainError {
  readonly kind: ErrorKind = "forbidden";

  constructor(message = "Caller is not permitted to perform this operation") {
    super(message, 403, "FORBIDDEN");
  }
}

export class PayloadTooLargeError extends DomainError {
  readonly kind: ErrorKind = "payload_too_large";

  constructor(
    message: string,
    public readonly limitBytes: number,
  ) {
    super(message, 413, "PAYLOAD_TOO_LARGE");
  }

  details() {
    return { limitBytes: this.limitBytes };
  }
}

export class DeadlineExceededError extends DomainError {
  readonly kind: ErrorKind = "deadline_exceeded";

  constructor(message = "Operation exceeded its deadline") {
    super(message, 504, "DEADLINE_EXCEEDED");
  }
}

export class DependencyFailureError extends DomainError {
  readonly kind: ErrorKind = "dependency_failure";

  constructor(
    message: string,
    public readonly dependency: string,
  ) {
    super(message, 503, "DEPENDENCY_FAILURE");
  }

  details() {
    return { dependency: this.dependency };
  }
}
