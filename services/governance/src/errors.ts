/**
 * Governance Errors
 *
 * Every failed action surfaces one of these kinds to the caller. All
 * preconditions are checked before any write, so a thrown
 * GovernanceError always means state is untouched.
 */

import type { ZodError } from "zod";

export type GovernanceErrorKind =
  | "Unauthorized"
  | "NotFound"
  | "InvalidState"
  | "InvalidInput"
  | "AlreadyExists"
  | "GoalReached"
  | "GoalNotReached"
  | "InsufficientFunds"
  | "TransferFailed";

export class GovernanceError extends Error {
  constructor(
    public readonly kind: GovernanceErrorKind,
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = "GovernanceError";
  }
}

export class UnauthorizedError extends GovernanceError {
  constructor(message: string, field?: string) {
    super("Unauthorized", message, field);
    this.name = "UnauthorizedError";
  }
}

export class NotFoundError extends GovernanceError {
  constructor(message: string, field?: string) {
    super("NotFound", message, field);
    this.name = "NotFoundError";
  }
}

export class InvalidStateError extends GovernanceError {
  constructor(message: string, field?: string) {
    super("InvalidState", message, field);
    this.name = "InvalidStateError";
  }
}

export class InvalidInputError extends GovernanceError {
  constructor(message: string, field?: string) {
    super("InvalidInput", message, field);
    this.name = "InvalidInputError";
  }
}

export class AlreadyExistsError extends GovernanceError {
  constructor(message: string, field?: string) {
    super("AlreadyExists", message, field);
    this.name = "AlreadyExistsError";
  }
}

export class GoalReachedError extends GovernanceError {
  constructor(message: string, field?: string) {
    super("GoalReached", message, field);
    this.name = "GoalReachedError";
  }
}

export class GoalNotReachedError extends GovernanceError {
  constructor(message: string, field?: string) {
    super("GoalNotReached", message, field);
    this.name = "GoalNotReachedError";
  }
}

export class InsufficientFundsError extends GovernanceError {
  constructor(
    message: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super("InsufficientFunds", message, "amount");
    this.name = "InsufficientFundsError";
  }
}

export class TransferFailedError extends GovernanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TransferFailed", message);
    this.name = "TransferFailedError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Raised by the invariant checker in enforce mode. Signals a defect in
 * the ledger, never a caller mistake.
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    public readonly invariant: string,
    public readonly subject: string
  ) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export function isGovernanceError(value: unknown): value is GovernanceError {
  return value instanceof GovernanceError;
}

/**
 * Converts a zod failure into an InvalidInputError naming the first
 * failing field.
 */
export function fromZodError(error: ZodError): InvalidInputError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : undefined;
  return new InvalidInputError(issue?.message ?? "Invalid input", field);
}
