import { ZodError } from 'zod';
import { isReviewError, type ReviewErrorKind } from '../orchestrator/errors.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | 'BAD_INPUT'
  | 'RATE_LIMITED'
  | 'GENERATION_FAILED'
  | 'VALIDATION_FAILED'
  | 'TOOL_FAILED'
  | 'CONFIGURATION'
  | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

const CODE_BY_KIND: Record<ReviewErrorKind, ErrorCode> = {
  configuration: 'CONFIGURATION',
  generation: 'GENERATION_FAILED',
  validation: 'VALIDATION_FAILED',
  tool: 'TOOL_FAILED',
};

/**
 * Raised by the rate limiter when a client exceeds its request budget
 */
export class RateLimitExceededError extends Error {
  readonly name = 'RateLimitExceededError';
  readonly statusCode = 429;

  constructor(public readonly retryAfterSeconds: number) {
    super('Too many requests');
  }
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * Strip file paths, key=value secrets and email addresses from a message
 */
export function sanitizeMessage(raw: string): string {
  let message = raw;
  // Remove file paths
  message = message.replace(/\/[\w/.@-]+/g, '[path]');
  // Remove potential secrets
  message = message.replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]');
  message = message.replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]');
  // Remove email addresses
  message = message.replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
  return message;
}

function numericStatus(error: Error): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function errorCodeOf(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 *
 * @param error The error to convert
 * @param requestId Optional request ID for correlation
 */
export function toErrorV1(error: unknown, requestId?: string): ErrorV1 {
  // Zod validation errors
  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  // Pipeline errors carry their own kind and caller-safe details
  if (isReviewError(error)) {
    return buildErrorV1(
      CODE_BY_KIND[error.kind],
      sanitizeMessage(error.message),
      { kind: error.kind, ...error.details() },
      requestId
    );
  }

  if (error instanceof RateLimitExceededError) {
    return buildErrorV1(
      'RATE_LIMITED',
      'Too many requests',
      { retry_after_seconds: error.retryAfterSeconds },
      requestId
    );
  }

  // Standard Error objects (including Fastify's own)
  if (error instanceof Error) {
    const status = numericStatus(error);

    if (status === 429) {
      return buildErrorV1('RATE_LIMITED', 'Too many requests', undefined, requestId);
    }

    if (errorCodeOf(error) === 'FST_ERR_CTP_BODY_TOO_LARGE') {
      return buildErrorV1('BAD_INPUT', 'Request body too large', undefined, requestId);
    }

    // Client errors raised by the framework (malformed JSON, bad content type)
    if (status !== undefined && status >= 400 && status < 500) {
      return buildErrorV1('BAD_INPUT', sanitizeMessage(error.message), undefined, requestId);
    }

    // Generic error - safe message only, no stack
    return buildErrorV1(
      'INTERNAL',
      sanitizeMessage(error.message || 'An unexpected error occurred'),
      undefined,
      requestId
    );
  }

  // Handle string errors
  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeMessage(error), undefined, requestId);
  }

  // Unknown error type - minimal info
  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

/**
 * Get HTTP status code for error code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'RATE_LIMITED':
      return 429;
    case 'GENERATION_FAILED':
    case 'VALIDATION_FAILED':
      return 502;
    case 'TOOL_FAILED':
    case 'CONFIGURATION':
    case 'INTERNAL':
    default:
      return 500;
  }
}
