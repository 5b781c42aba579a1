import { ErrorCodes, ErrorHttpStatus, type ErrorCode } from '../../types';

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.code = code;
    this.statusCode = ErrorHttpStatus[code];
    this.isOperational = isOperational;
    this.details = details;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static notFound(resource: string, id: string): NotFoundError {
    return new NotFoundError(`${resource} with id '${id}' not found`);
  }

  static insufficientXP(required: number, available: number): InsufficientXPError {
    return new InsufficientXPError(required, available);
  }

  static conflict(message: string): TransientConflictError {
    return new TransientConflictError(message);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.VALIDATION_ERROR, true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, ErrorCodes.NOT_FOUND);
  }
}

/**
 * Spend or purchase exceeds the spendable balance. Carries the exact shortfall.
 */
export class InsufficientXPError extends AppError {
  public readonly required: number;
  public readonly available: number;
  public readonly shortfall: number;

  constructor(required: number, available: number) {
    const shortfall = required - available;
    super(
      `Insufficient XP: need ${required}, have ${available} (short by ${shortfall})`,
      ErrorCodes.INSUFFICIENT_XP,
      true,
      { required, available, shortfall }
    );
    this.required = required;
    this.available = available;
    this.shortfall = shortfall;
  }
}

export class AlreadyOwnedError extends AppError {
  constructor(featureId: string) {
    super(`Feature '${featureId}' is already owned`, ErrorCodes.ALREADY_OWNED, true, { featureId });
  }
}

export class DuplicateInteractionError extends AppError {
  constructor(commentId: string, existing: string) {
    super(
      `Comment ${commentId} already received ${existing} from this account`,
      ErrorCodes.DUPLICATE_INTERACTION,
      true,
      { commentId, existing }
    );
  }
}

export class FeatureNotFoundError extends AppError {
  constructor(featureId: string) {
    super(`Feature '${featureId}' does not exist`, ErrorCodes.FEATURE_NOT_FOUND, true, { featureId });
  }
}

export class TransientConflictError extends AppError {
  constructor(message: string = 'Account is busy, retry later') {
    super(message, ErrorCodes.TRANSIENT_CONFLICT);
  }
}

export class AccountFrozenError extends AppError {
  constructor(accountId: string, reason: string | null) {
    super(
      `Spending is frozen for account ${accountId}${reason ? `: ${reason}` : ''}`,
      ErrorCodes.ACCOUNT_FROZEN,
      true,
      { accountId, reason }
    );
  }
}

export class CommentLockedError extends AppError {
  constructor(contentId: string) {
    super(
      `Commenting on content ${contentId} requires a passed quiz attempt`,
      ErrorCodes.COMMENT_LOCKED,
      true,
      { contentId }
    );
  }
}

export class ExternalTimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCodes.EXTERNAL_TIMEOUT, true, {
      operation,
      timeoutMs,
    });
  }
}

export class AbortedError extends AppError {
  constructor(operation: string) {
    super(`${operation} aborted before commit`, ErrorCodes.ABORTED);
  }
}

/**
 * Raised by monitoring findings and by the ledger's append-only guard.
 * Never user-facing.
 */
export class InvariantViolationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVARIANT_VIOLATION, false, details);
  }
}

export class InternalError extends AppError {
  constructor(message: string = 'Internal server error') {
    super(message, ErrorCodes.INTERNAL_ERROR, false);
  }
}
