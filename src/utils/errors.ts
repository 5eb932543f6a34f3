/**
 * Error classification and structured error responses for the MCP tools.
 */

import { ZodError } from 'zod';

/**
 * Error codes for programmatic error handling
 */
export const ErrorCode = {
  // Client errors (4xx equivalent)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',

  // Server errors (5xx equivalent)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',

  // Tool-specific errors
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
  TOOL_EXECUTION_ERROR: 'TOOL_EXECUTION_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export const HttpStatus = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  PRECONDITION_FAILED: 412,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * Base error with code, HTTP-like status and retry hint
 */
export class EtpError extends Error {
  public readonly code: ErrorCodeType;
  public readonly httpStatus: number;
  public readonly details: Record<string, unknown> | undefined;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: ErrorCodeType,
    options?: {
      httpStatus?: number;
      details?: Record<string, unknown> | undefined;
      isRetryable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'EtpError';
    this.code = code;
    this.httpStatus = options?.httpStatus ?? this.defaultHttpStatus(code);
    this.details = options?.details;
    this.isRetryable = options?.isRetryable ?? this.defaultRetryable(code);
  }

  private defaultHttpStatus(code: ErrorCodeType): number {
    switch (code) {
      case ErrorCode.VALIDATION_ERROR:
      case ErrorCode.INVALID_ARGUMENTS:
        return HttpStatus.UNPROCESSABLE_ENTITY;
      case ErrorCode.UNKNOWN_TOOL:
        return HttpStatus.BAD_REQUEST;
      case ErrorCode.NOT_FOUND:
        return HttpStatus.NOT_FOUND;
      case ErrorCode.CONFLICT:
        return HttpStatus.CONFLICT;
      case ErrorCode.PRECONDITION_FAILED:
        return HttpStatus.PRECONDITION_FAILED;
      case ErrorCode.SERVICE_UNAVAILABLE:
      case ErrorCode.EXTERNAL_SERVICE_ERROR:
        return HttpStatus.SERVICE_UNAVAILABLE;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
  }

  private defaultRetryable(code: ErrorCodeType): boolean {
    switch (code) {
      case ErrorCode.SERVICE_UNAVAILABLE:
      case ErrorCode.EXTERNAL_SERVICE_ERROR:
        return true;
      default:
        return false;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      isRetryable: this.isRetryable,
      ...(this.details && { details: this.details }),
    };
  }
}

export class NotFoundError extends EtpError {
  constructor(
    resourceType: string,
    resourceId: string,
    details?: Record<string, unknown>
  ) {
    super(
      `${resourceType} not found: ${resourceId}`,
      ErrorCode.NOT_FOUND,
      {
        details: {
          resourceType,
          resourceId,
          ...details,
        },
      }
    );
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends EtpError {
  constructor(
    message: string,
    validationErrors?: Array<{ path: string; message: string }>
  ) {
    const details = validationErrors ? { errors: validationErrors } : undefined;
    super(message, ErrorCode.VALIDATION_ERROR, { details });
    this.name = 'ValidationError';
  }

  static fromZodError(error: ZodError): ValidationError {
    const validationErrors = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError(
      `Validation failed: ${validationErrors.map((e) => e.message).join(', ')}`,
      validationErrors
    );
  }
}

/**
 * Normalize any thrown value to an EtpError
 */
export function classifyError(error: unknown): EtpError {
  if (error instanceof EtpError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ValidationError.fromZodError(error);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('not found')) {
      return new EtpError(error.message, ErrorCode.NOT_FOUND, {
        cause: error,
      });
    }

    if (
      message.includes('invalid') ||
      message.includes('required') ||
      message.includes('must be')
    ) {
      return new EtpError(error.message, ErrorCode.VALIDATION_ERROR, {
        cause: error,
      });
    }

    if (message.includes('sqlite_busy') || message.includes('database is locked')) {
      return new EtpError(error.message, ErrorCode.SERVICE_UNAVAILABLE, {
        cause: error,
      });
    }

    return new EtpError(error.message, ErrorCode.INTERNAL_ERROR, {
      cause: error,
    });
  }

  return new EtpError(
    'An unexpected error occurred',
    ErrorCode.INTERNAL_ERROR,
    {
      details: { originalError: String(error) },
    }
  );
}

export function createErrorResponse(
  error: unknown,
  requestId?: string
): Record<string, unknown> {
  const classified = classifyError(error);
  return {
    ...classified.toJSON(),
    ...(requestId && { requestId }),
  };
}
