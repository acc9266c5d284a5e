/**
 * Error taxonomy shared by every backend, so callers never branch on which
 * backend produced a failure.
 */

export type TradingErrorKind = 'validation' | 'auth' | 'network' | 'exchange' | 'not_found';

export type ExchangeErrorCode = number | string;

export abstract class TradingError extends Error {
  abstract readonly kind: TradingErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Malformed caller input. Raised before any backend is touched.
 */
export class ValidationError extends TradingError {
  readonly kind = 'validation';

  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'ValidationError';
  }
}

/**
 * Credential, signature, permission, IP-restriction or clock-skew failure
 */
export class AuthError extends TradingError {
  readonly kind = 'auth';

  constructor(
    message: string,
    public readonly code?: ExchangeErrorCode,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/**
 * Transport-level failure: timeout, DNS, refused or reset connection
 */
export class NetworkError extends TradingError {
  readonly kind = 'network';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/**
 * Structured business rejection reported by the exchange (or the mock)
 */
export class ExchangeError extends TradingError {
  readonly kind = 'exchange';

  constructor(
    public readonly code: ExchangeErrorCode,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExchangeError';
  }
}

/**
 * Referenced order or symbol is unknown to the backend
 */
export class NotFoundError extends TradingError {
  readonly kind = 'not_found';

  constructor(
    public readonly resource: 'order' | 'symbol',
    public readonly id: string,
    message: string = `${resource} not found: ${id}`,
    public readonly code?: ExchangeErrorCode
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export function isTradingError(error: unknown): error is TradingError {
  return error instanceof TradingError;
}

/**
 * Propagation policy: network failures retry, exchange errors retry only
 * when their code is allow-listed, everything else surfaces immediately.
 */
export function isRetryableTradingError(
  error: unknown,
  transientCodes: readonly ExchangeErrorCode[]
): boolean {
  if (error instanceof NetworkError) {
    return true;
  }
  if (error instanceof ExchangeError) {
    return transientCodes.includes(error.code);
  }
  return false;
}
