import { TRPCError } from '@trpc/server';
import { ZodError } from 'zod';
import { logger } from '../../logger';
import { ErrorCodes, type ErrorCode, type ServiceError, type ServiceResult } from '../../types';
import { AppError } from './index';

/**
 * Convert anything thrown inside a service into a ServiceError.
 * AppErrors keep their code and details; zod failures become VALIDATION_ERROR;
 * everything else is logged and reported as INTERNAL_ERROR.
 */
export function toServiceError(error: unknown): ServiceError {
  if (error instanceof AppError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    };
  }

  if (error instanceof ZodError) {
    return {
      code: ErrorCodes.VALIDATION_ERROR,
      message: error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; '),
      details: { issues: error.issues },
    };
  }

  logger.error({ err: error }, 'Unhandled error in economy service');
  return {
    code: ErrorCodes.INTERNAL_ERROR,
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}

export function failure<T>(error: unknown): ServiceResult<T> {
  return { success: false, error: toServiceError(error) };
}

const TRPC_CODES: Record<ErrorCode, TRPCError['code']> = {
  [ErrorCodes.INSUFFICIENT_XP]: 'PRECONDITION_FAILED',
  [ErrorCodes.ALREADY_OWNED]: 'CONFLICT',
  [ErrorCodes.DUPLICATE_INTERACTION]: 'CONFLICT',
  [ErrorCodes.TRANSIENT_CONFLICT]: 'CONFLICT',
  [ErrorCodes.INVARIANT_VIOLATION]: 'INTERNAL_SERVER_ERROR',
  [ErrorCodes.ACCOUNT_FROZEN]: 'FORBIDDEN',
  [ErrorCodes.COMMENT_LOCKED]: 'FORBIDDEN',
  [ErrorCodes.FEATURE_NOT_FOUND]: 'NOT_FOUND',
  [ErrorCodes.EXTERNAL_TIMEOUT]: 'TIMEOUT',
  [ErrorCodes.ABORTED]: 'CLIENT_CLOSED_REQUEST',
  [ErrorCodes.VALIDATION_ERROR]: 'BAD_REQUEST',
  [ErrorCodes.NOT_FOUND]: 'NOT_FOUND',
  [ErrorCodes.INTERNAL_ERROR]: 'INTERNAL_SERVER_ERROR',
};

/**
 * Unwrap a ServiceResult for a tRPC procedure, or throw the matching TRPCError.
 */
export function unwrapOrThrow<T>(result: ServiceResult<T>): T {
  if (result.success) {
    return result.data;
  }

  const { code, message } = result.error;
  const trpcCode = TRPC_CODES[code];
  const logMethod = trpcCode === 'INTERNAL_SERVER_ERROR' ? 'error' : 'warn';
  logger[logMethod]({ code, details: result.error.details }, `Economy error in tRPC: ${code}`);

  return throwTRPC(trpcCode, message, result.error);
}

function throwTRPC(code: TRPCError['code'], message: string, cause: ServiceError): never {
  throw new TRPCError({ code, message, cause: Object.assign(new Error(message), cause) });
}
