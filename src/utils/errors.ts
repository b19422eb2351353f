/**
 * Centralized error classification and handling for the Strategos MCP server.
 *
 * Provides:
 * - Custom error classes with error codes
 * - Error classification for appropriate HTTP-like responses
 * - Structured error responses for MCP tools
 */

import { ZodError } from 'zod';
import { YAMLParseError } from 'yaml';

/**
 * Error codes for programmatic error handling.
 * These map to categories of errors for consistent client handling.
 */
export const ErrorCode = {
  // Client errors (4xx equivalent)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  NOT_FOUND: 'NOT_FOUND',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',

  // Server errors (5xx equivalent)
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Tool-specific errors
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * HTTP-like status codes for error responses
 */
export const HttpStatus = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  PRECONDITION_FAILED: 412,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * Base error class for Strategos with error code support
 */
export class StrategosError extends Error {
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
    this.name = 'StrategosError';
    this.code = code;
    this.httpStatus = options?.httpStatus ?? this.defaultHttpStatus(code);
    this.details = options?.details;
    // Nothing in the pipeline is transient: the same input fails the same way.
    this.isRetryable = options?.isRetryable ?? false;
  }

  private defaultHttpStatus(code: ErrorCodeType): number {
    switch (code) {
      case ErrorCode.VALIDATION_ERROR:
      case ErrorCode.INVALID_ARGUMENTS:
        return HttpStatus.UNPROCESSABLE_ENTITY;
      case ErrorCode.NOT_FOUND:
        return HttpStatus.NOT_FOUND;
      case ErrorCode.PRECONDITION_FAILED:
        return HttpStatus.PRECONDITION_FAILED;
      case ErrorCode.UNKNOWN_TOOL:
        return HttpStatus.BAD_REQUEST;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
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

/**
 * Error thrown when a requested resource is not found
 */
export class NotFoundError extends StrategosError {
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

/**
 * Error thrown when validation fails
 */
export class ValidationError extends StrategosError {
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
 * A dependency identifier references a phase or task that does not exist.
 */
export class DependencyError extends StrategosError {
  public readonly ownerId: string;
  public readonly missingIds: string[];

  constructor(kind: 'phase' | 'task', ownerId: string, missingIds: string[]) {
    super(
      `Invalid dependency references in ${kind} '${ownerId}': ${missingIds.join(', ')}`,
      ErrorCode.VALIDATION_ERROR,
      { details: { kind, ownerId, missingIds } }
    );
    this.name = 'DependencyError';
    this.ownerId = ownerId;
    this.missingIds = missingIds;
  }
}

/**
 * A dependency graph contains a cycle. `cycle` lists the ids along it,
 * starting and ending with the same id.
 */
export class CycleError extends StrategosError {
  public readonly cycle: string[];

  constructor(kind: 'phase' | 'task', cycle: string[]) {
    super(
      `Circular ${kind} dependency: ${cycle.join(' -> ')}`,
      ErrorCode.VALIDATION_ERROR,
      { details: { kind, cycle } }
    );
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

/**
 * Missing, unreadable or malformed registry (templates, profiles, weights).
 */
export class ConfigurationError extends StrategosError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, ErrorCode.CONFIGURATION_ERROR, { details, cause });
    this.name = 'ConfigurationError';
  }
}

/**
 * A stage was requested without the upstream result it consumes.
 */
export class PreconditionError extends StrategosError {
  constructor(stage: string, missing: string[]) {
    super(
      `Stage '${stage}' requires: ${missing.join(', ')}`,
      ErrorCode.PRECONDITION_FAILED,
      { details: { stage, missing } }
    );
    this.name = 'PreconditionError';
  }
}

/**
 * Classify an error and return an appropriate StrategosError.
 * This normalizes all errors to a consistent format.
 */
export function classifyError(error: unknown): StrategosError {
  if (error instanceof StrategosError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ValidationError.fromZodError(error);
  }

  if (error instanceof YAMLParseError) {
    return new ConfigurationError(`Invalid YAML: ${error.message}`, { code: error.code }, error);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('not found')) {
      return new StrategosError(error.message, ErrorCode.NOT_FOUND, {
        cause: error,
      });
    }

    if (
      message.includes('invalid') ||
      message.includes('required') ||
      message.includes('must be')
    ) {
      return new StrategosError(error.message, ErrorCode.VALIDATION_ERROR, {
        cause: error,
      });
    }

    return new StrategosError(error.message, ErrorCode.INTERNAL_ERROR, {
      cause: error,
    });
  }

  return new StrategosError(
    'An unexpected error occurred',
    ErrorCode.INTERNAL_ERROR,
    {
      details: { originalError: String(error) },
    }
  );
}

/**
 * Create a structured error response for MCP tools.
 */
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
