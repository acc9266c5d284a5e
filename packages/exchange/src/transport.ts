import { z } from 'zod';
import type { ExchangeCredentials } from '@tradegate/types';
import {
  AUTH_ERROR_CODES,
  AuthError,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_RECV_WINDOW_MS,
  DEFAULT_TRANSIENT_CODES,
  EXCHANGE_ERROR_CODES,
  ExchangeError,
  NOT_FOUND_ERROR_CODES,
  NetworkError,
  NotFoundError,
  RETRY_PROFILES,
  buildQueryString,
  createLogger,
  createSignedQuery,
  isRetryableTradingError,
  retry,
} from '@tradegate/utils';
import type { ExchangeErrorCode, Logger, QueryParams, RetryConfig } from '@tradegate/utils';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface SendOptions {
  /** Append timestamp and recvWindow, sign, and send the API key header */
  signed?: boolean;
}

export interface HttpTransportOptions {
  baseUrl: string;
  credentials: () => Promise<ExchangeCredentials>;
  recvWindowMs: number;
  timeoutMs: number;
  retry: Partial<RetryConfig>;
  transientCodes: readonly ExchangeErrorCode[];
  /** Millisecond clock used for the signed timestamp */
  clock: () => number;
  logger: Logger;
}

const ExchangeErrorBodySchema = z.object({
  code: z.number(),
  msg: z.string(),
});

const API_KEY_HEADER = 'X-MBX-APIKEY';

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Not JSON; callers classify the raw text
    return undefined;
  }
}

/**
 * Signed HTTP client for exchange REST endpoints.
 *
 * Each attempt gets a fresh timestamp and signature. Failures are mapped
 * onto the error taxonomy; only network failures and allow-listed exchange
 * codes are retried.
 */
export class HttpTransport {
  private options: HttpTransportOptions;
  private logger: Logger;

  constructor(options: Partial<HttpTransportOptions> & Pick<HttpTransportOptions, 'baseUrl' | 'credentials'>) {
    this.logger = options.logger ?? createLogger({ service: 'http-transport' });
    this.options = {
      recvWindowMs: DEFAULT_RECV_WINDOW_MS,
      timeoutMs: DEFAULT_HTTP_TIMEOUT_MS,
      transientCodes: DEFAULT_TRANSIENT_CODES,
      clock: Date.now,
      ...options,
      retry: { ...RETRY_PROFILES.EXCHANGE_API, ...options.retry },
      logger: this.logger,
    };
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  async send(method: HttpMethod, path: string, params: QueryParams = [], options: SendOptions = {}): Promise<unknown> {
    const { transientCodes } = this.options;

    return retry(() => this.attempt(method, path, params, options), {
      ...this.options.retry,
      shouldRetry: (error) => isRetryableTradingError(error, transientCodes),
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          { method, path, attempt, delayMs, err: error },
          'Retrying exchange request'
        );
      },
    });
  }

  /**
   * Perform a single request attempt
   */
  private async attempt(
    method: HttpMethod,
    path: string,
    params: QueryParams,
    options: SendOptions
  ): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    let query = buildQueryString(params);

    if (options.signed) {
      const { apiKey, apiSecret } = await this.options.credentials();
      const signed = createSignedQuery(
        [...params, ['timestamp', this.options.clock()], ['recvWindow', this.options.recvWindowMs]],
        apiSecret
      );
      query = signed.query;
      headers[API_KEY_HEADER] = apiKey;
    }

    const url = query.length > 0 ? `${this.options.baseUrl}${path}?${query}` : `${this.options.baseUrl}${path}`;
    const { status, statusText, ok, text } = await this.fetchText(method, url, path, headers);

    this.logger.debug({ method, path, status }, 'Exchange response');

    const body = parseJson(text);
    if (ok) {
      if (body === undefined) {
        throw new ExchangeError(-1, `Malformed response body from ${path}`, status);
      }
      return body;
    }

    throw this.classify(status, statusText, text, body, params);
  }

  private async fetchText(
    method: HttpMethod,
    url: string,
    path: string,
    headers: Record<string, string>
  ): Promise<{ status: number; statusText: string; ok: boolean; text: string }> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, { method, headers, signal: controller.signal });
      const text = await response.text();
      return { status: response.status, statusText: response.statusText, ok: response.ok, text };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const isTimeout = controller.signal.aborted;
      throw new NetworkError(
        isTimeout ? `${method} ${path} timed out after ${timeoutMs}ms` : `${method} ${path} failed: ${message}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private classify(
    status: number,
    statusText: string,
    text: string,
    body: unknown,
    params: QueryParams
  ): Error {
    const structured = ExchangeErrorBodySchema.safeParse(body);
    const detail = structured.success ? structured.data : undefined;

    if (status === 401 || status === 403) {
      return new AuthError(detail?.msg ?? `HTTP ${status}: ${statusText}`, detail?.code ?? status, status);
    }

    if (!detail) {
      const snippet = text.trim().slice(0, 200);
      return new ExchangeError(status, `HTTP ${status}: ${snippet || statusText}`, status);
    }

    if (AUTH_ERROR_CODES.includes(detail.code)) {
      return new AuthError(detail.msg, detail.code, status);
    }

    if (NOT_FOUND_ERROR_CODES.includes(detail.code)) {
      const resource = detail.code === EXCHANGE_ERROR_CODES.BAD_SYMBOL ? 'symbol' : 'order';
      const key = resource === 'symbol' ? 'symbol' : 'orderId';
      const id = params.find(([name]) => name === key)?.[1];
      return new NotFoundError(resource, id === undefined ? 'unknown' : String(id), detail.msg, detail.code);
    }

    return new ExchangeError(detail.code, detail.msg, status);
  }
}
