import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorCode } from '../../constants/error-codes';

export interface AppExceptionBody {
  code: ErrorCode;
  message: string;
  details: string | null;
}

/**
 * Application exception that includes:
 * - code: Machine-readable error code
 * - message: Message safe to show to the caller
 * - details: Optional extra information (only the JSON API exposes it)
 * - statusCode: HTTP status code
 *
 * Usage:
 * ```typescript
 * throw new AppException(
 *   ErrorCode.USER_NOT_FOUND,
 *   'User not found',
 *   HttpStatus.NOT_FOUND,
 * );
 * ```
 */
export class AppException extends HttpException {
  private readonly body: AppExceptionBody;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: HttpStatus = HttpStatus.BAD_REQUEST,
    details?: string,
  ) {
    const body: AppExceptionBody = {
      code,
      message,
      details: details ?? null,
    };
    super(body, statusCode);
    this.body = body;
  }

  getBody(): AppExceptionBody {
    return this.body;
  }
}

/**
 * Type guard to check if an error is an AppException
 */
export function isAppException(error: unknown): error is AppException {
  return error instanceof AppException;
}

/**
 * True for a MongoDB duplicate-key write error (unique index violation).
 */
export function isDuplicateKeyError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 11000
  );
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
