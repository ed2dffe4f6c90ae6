/**
 * Gateway error utilities.
 *
 * Provides a consistent error type for every surface of the gateway and
 * helpers to convert lower-level failures (fetch, supervisorctl, zod) into
 * SwapError instances that callers and the HTTP layer can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers and lifecycle status.
 */
export type SwapErrorCode =
  | 'NotFound'
  | 'UpstreamUnavailable'
  | 'PromotionTimeout'
  | 'PromotionFailed'
  | 'QueueTimeout'
  | 'GatewayError'
  | 'Cancelled'
  | 'InvalidParams'
  | 'PayloadTooLarge'
  | 'InternalError';

/**
 * Plain error shape used in JSON responses and status snapshots.
 */
export interface SwapErrorShape {
  code: SwapErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class SwapError extends Error implements SwapErrorShape {
  public readonly code: SwapErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SwapErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SwapError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): SwapErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

const HTTP_STATUS: Readonly<Record<SwapErrorCode, number>> = {
  NotFound: 404,
  InvalidParams: 400,
  PayloadTooLarge: 413,
  Cancelled: 499,
  UpstreamUnavailable: 503,
  QueueTimeout: 504,
  GatewayError: 502,
  PromotionTimeout: 500,
  PromotionFailed: 500,
  InternalError: 500,
};

/**
 * HTTP status used when an error of the given code reaches a client.
 */
export function httpStatusFor(code: SwapErrorCode): number {
  return HTTP_STATUS[code];
}

export function isSwapError(error: unknown): error is SwapError {
  return error instanceof SwapError;
}

/**
 * Map unknown errors into SwapError instances.
 *
 * @param error - Error thrown by a collaborator
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toSwapError(
  error: unknown,
  fallbackCode: SwapErrorCode = 'InternalError'
): SwapError {
  if (error instanceof SwapError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return new SwapError('Cancelled', error.message || 'Operation aborted by caller', undefined, {
        cause: error,
      });
    }
    return new SwapError(fallbackCode, error.message, undefined, { cause: error });
  }

  return new SwapError(fallbackCode, `Unknown error: ${String(error)}`);
}

export function createNotFoundError(modelName: string): SwapError {
  return new SwapError('NotFound', `Model '${modelName}' not found`, { model: modelName });
}

export function createQueueTimeoutError(modelName: string, heldMs: number): SwapError {
  return new SwapError(
    'QueueTimeout',
    `Request held for model '${modelName}' timed out after ${heldMs}ms`,
    { model: modelName, heldMs }
  );
}

export function createCancelledError(reason = 'Request cancelled'): SwapError {
  return new SwapError('Cancelled', reason);
}

/**
 * Convert Zod validation error to SwapError
 *
 * @example
 * ```typescript
 * const result = ModelNameSchema.safeParse('../etc');
 * if (!result.success) {
 *   throw zodErrorToSwapError(result.error);
 * }
 * ```
 */
export function zodErrorToSwapError(error: ZodError): SwapError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new SwapError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
