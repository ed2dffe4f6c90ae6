import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  SwapError,
  createQueueTimeoutError,
  httpStatusFor,
  isSwapError,
  toSwapError,
  zodErrorToSwapError,
} from '../../../src/api/errors.js';

describe('SwapError', () => {
  it('serializes to its plain shape', () => {
    const error = new SwapError('NotFound', "Model 'greeter' not found", { model: 'greeter' });

    expect(error.toObject()).toEqual({
      code: 'NotFound',
      message: "Model 'greeter' not found",
      details: { model: 'greeter' },
    });
    expect(isSwapError(error)).toBe(true);
    expect(isSwapError(new Error('plain'))).toBe(false);
  });

  it('maps codes to HTTP statuses', () => {
    expect(httpStatusFor('NotFound')).toBe(404);
    expect(httpStatusFor('InvalidParams')).toBe(400);
    expect(httpStatusFor('PayloadTooLarge')).toBe(413);
    expect(httpStatusFor('UpstreamUnavailable')).toBe(503);
    expect(httpStatusFor('QueueTimeout')).toBe(504);
    expect(httpStatusFor('GatewayError')).toBe(502);
    expect(httpStatusFor('PromotionFailed')).toBe(500);
  });

  it('describes queue timeouts', () => {
    expect(createQueueTimeoutError('greeter', 250).message).toBe(
      "Request held for model 'greeter' timed out after 250ms"
    );
  });
});

describe('toSwapError', () => {
  it('returns SwapErrors unchanged', () => {
    const error = new SwapError('QueueTimeout', 'late');
    expect(toSwapError(error)).toBe(error);
  });

  it('maps aborts to Cancelled', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';

    expect(toSwapError(abort)).toMatchObject({ code: 'Cancelled', cause: abort });
  });

  it('wraps other errors with the fallback code', () => {
    expect(toSwapError(new Error('disk full'), 'GatewayError')).toMatchObject({
      code: 'GatewayError',
      message: 'disk full',
    });
    expect(toSwapError('weird')).toMatchObject({
      code: 'InternalError',
      message: 'Unknown error: weird',
    });
  });
});

describe('zodErrorToSwapError', () => {
  it('names the first failing field', () => {
    const result = z.object({ port: z.number().min(1, 'must be >= 1') }).safeParse({ port: 0 });
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    const error = zodErrorToSwapError(result.error);

    expect(error.code).toBe('InvalidParams');
    expect(error.message).toBe("Validation error on field 'port': must be >= 1");
    expect(error.details).toMatchObject({ field: 'port' });
  });
});
