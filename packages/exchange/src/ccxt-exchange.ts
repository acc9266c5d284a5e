import { z } from 'zod';
import {
  AuthenticationError as CcxtAuthenticationError,
  BadSymbol as CcxtBadSymbol,
  BaseError as CcxtBaseError,
  DDoSProtection as CcxtDDoSProtection,
  InvalidNonce as CcxtInvalidNonce,
  NetworkError as CcxtNetworkError,
  OrderNotFound as CcxtOrderNotFound,
  PermissionDenied as CcxtPermissionDenied,
  RateLimitExceeded as CcxtRateLimitExceeded,
  binance,
  binanceusdm,
} from 'ccxt';
import type {
  Balance,
  Candle,
  CredentialProvider,
  ExchangeCredentials,
  MarketType,
  Order,
  OrderBook,
  OrderParams,
  OrderStatus,
  Ticker,
  Timeframe,
} from '@tradegate/types';
import {
  AUTH_ERROR_CODES,
  AuthError,
  DEFAULT_TRANSIENT_CODES,
  EXCHANGE_ERROR_CODES,
  ExchangeError,
  NOT_FOUND_ERROR_CODES,
  NetworkError,
  NotFoundError,
  RETRY_PROFILES,
  createLogger,
  fromSlashSymbol,
  isRetryableTradingError,
  isTradingError,
  retry,
  toSlashSymbol,
} from '@tradegate/utils';
import type { ExchangeErrorCode, Logger, RetryConfig } from '@tradegate/utils';
import type { ExchangeBackend } from './backend';
import { createCredentialResolver } from './backend';

/**
 * The slice of a ccxt exchange instance this backend calls. Results are
 * treated as unknown and validated before use.
 */
export interface CcxtClient {
  apiKey: string;
  secret: string;
  setSandboxMode(enabled: boolean): void;
  createOrder(symbol: string, type: string, side: string, amount: number, price?: number): Promise<unknown>;
  cancelOrder(id: string, symbol?: string): Promise<unknown>;
  fetchOrder(id: string, symbol?: string): Promise<unknown>;
  fetchOpenOrders(symbol?: string): Promise<unknown>;
  fetchBalance(): Promise<unknown>;
  fetchTicker(symbol: string): Promise<unknown>;
  fetchOrderBook(symbol: string, limit?: number): Promise<unknown>;
  fetchOHLCV(symbol: string, timeframe?: string, since?: number, limit?: number): Promise<unknown>;
}

export interface CcxtExchangeOptions {
  market: MarketType;
  /** Testnet unless explicitly false; never silently falls back to live */
  sandbox: boolean;
  credentials?: CredentialProvider;
  retry?: Partial<RetryConfig>;
  transientCodes?: readonly ExchangeErrorCode[];
  createClient?: (market: MarketType) => CcxtClient;
  logger?: Logger;
}

export function createCcxtClient(market: MarketType): CcxtClient {
  return market === 'futures'
    ? new binanceusdm({ enableRateLimit: true })
    : new binance({ enableRateLimit: true, options: { defaultType: 'spot' } });
}

const nullableNumber = z.number().nullish();

const CcxtOrderSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  type: z.string().nullish(),
  side: z.enum(['buy', 'sell']),
  price: nullableNumber,
  amount: z.number(),
  filled: nullableNumber,
  average: nullableNumber,
  status: z.string().nullish(),
  timestamp: nullableNumber,
  lastUpdateTimestamp: nullableNumber,
});

type CcxtOrder = z.infer<typeof CcxtOrderSchema>;

const CcxtBalanceSchema = z.object({
  free: z.record(nullableNumber).default({}),
  used: z.record(nullableNumber).default({}),
  total: z.record(nullableNumber).default({}),
});

const CcxtTickerSchema = z.object({
  bid: nullableNumber,
  ask: nullableNumber,
  last: nullableNumber,
  close: nullableNumber,
  timestamp: nullableNumber,
});

const CcxtLevelSchema = z.tuple([z.number(), z.number()]).rest(z.unknown());

const CcxtOrderBookSchema = z.object({
  bids: z.array(CcxtLevelSchema),
  asks: z.array(CcxtLevelSchema),
  timestamp: nullableNumber,
});

const CcxtOhlcvSchema = z.array(z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]));

const CCXT_STATUS_MAP: Readonly<Record<string, OrderStatus>> = {
  open: 'OPEN',
  closed: 'FILLED',
  canceled: 'CANCELED',
  cancelled: 'CANCELED',
  expired: 'EXPIRED',
  rejected: 'REJECTED',
};

const EMBEDDED_CODE_PATTERN = /"code"\s*:\s*(-?\d+)/;
const EMBEDDED_MSG_PATTERN = /"msg"\s*:\s*"([^"]*)"/;

function parseResponse<S extends z.ZodTypeAny>(schema: S, body: unknown, call: string): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ExchangeError(-1, `Unexpected ${call} result: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

/**
 * Map a ccxt exception onto the error taxonomy. A Binance code embedded in
 * the message takes precedence over the exception class.
 */
export function mapCcxtError(error: unknown, context: { symbol?: string; orderId?: number } = {}): Error {
  if (isTradingError(error)) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new ExchangeError('UNKNOWN', String(error));
  }

  const embeddedCode = EMBEDDED_CODE_PATTERN.exec(error.message)?.[1];
  const code = embeddedCode === undefined ? undefined : Number(embeddedCode);
  const message = EMBEDDED_MSG_PATTERN.exec(error.message)?.[1] ?? error.message;
  const options = { cause: error };

  const notFound = (): NotFoundError =>
    code === EXCHANGE_ERROR_CODES.BAD_SYMBOL || (code === undefined && error instanceof CcxtBadSymbol)
      ? new NotFoundError('symbol', context.symbol ?? 'unknown', message, code)
      : new NotFoundError('order', context.orderId === undefined ? 'unknown' : String(context.orderId), message, code);

  if (code !== undefined && AUTH_ERROR_CODES.includes(code)) {
    return new AuthError(message, code, undefined, options);
  }
  if (code !== undefined && NOT_FOUND_ERROR_CODES.includes(code)) {
    return notFound();
  }

  // InvalidNonce derives from NetworkError in ccxt, so it is checked first
  if (
    error instanceof CcxtAuthenticationError ||
    error instanceof CcxtPermissionDenied ||
    error instanceof CcxtInvalidNonce
  ) {
    return new AuthError(message, code ?? error.constructor.name, undefined, options);
  }
  if (error instanceof CcxtOrderNotFound || error instanceof CcxtBadSymbol) {
    return notFound();
  }
  if (error instanceof CcxtRateLimitExceeded) {
    return new ExchangeError('RateLimitExceeded', message, undefined, options);
  }
  if (error instanceof CcxtDDoSProtection) {
    return new ExchangeError('DDoSProtection', message, undefined, options);
  }
  if (error instanceof CcxtNetworkError) {
    return new NetworkError(message, options);
  }
  if (error instanceof CcxtBaseError) {
    return new ExchangeError(code ?? error.constructor.name, message, undefined, options);
  }
  return new ExchangeError('UNKNOWN', error.message, undefined, options);
}

/**
 * Backend delegating to the ccxt library's Binance adapters
 */
export class CcxtExchange implements ExchangeBackend {
  readonly mode = 'ccxt' as const;

  private client: CcxtClient;
  private market: MarketType;
  private credentials: () => Promise<ExchangeCredentials>;
  private retryConfig: Partial<RetryConfig>;
  private transientCodes: readonly ExchangeErrorCode[];
  private logger: Logger;

  constructor(options: CcxtExchangeOptions) {
    this.market = options.market;
    this.credentials = createCredentialResolver(options.credentials);
    this.retryConfig = { ...RETRY_PROFILES.EXCHANGE_LIBRARY, ...options.retry };
    this.transientCodes = options.transientCodes ?? DEFAULT_TRANSIENT_CODES;
    this.logger = options.logger ?? createLogger({ service: 'ccxt-exchange' });
    this.client = (options.createClient ?? createCcxtClient)(options.market);

    try {
      this.client.setSandboxMode(options.sandbox);
    } catch (error) {
      throw new ExchangeError(
        'SANDBOX_UNAVAILABLE',
        `ccxt refused sandbox=${options.sandbox} for ${options.market}: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { cause: error }
      );
    }

    if (!options.sandbox) {
      this.logger.warn({ market: this.market }, 'ccxt backend targets LIVE endpoints');
    }
  }

  async createOrder(params: OrderParams): Promise<Order> {
    const raw = await this.call(
      'createOrder',
      true,
      (client) =>
        client.createOrder(
          toSlashSymbol(params.symbol),
          params.type.toLowerCase(),
          params.side.toLowerCase(),
          params.quantity,
          params.type === 'LIMIT' ? params.price : undefined
        ),
      { symbol: params.symbol }
    );
    return this.toOrder(parseResponse(CcxtOrderSchema, raw, 'createOrder'));
  }

  async cancelOrder(symbol: string, orderId: number): Promise<Order> {
    const raw = await this.call(
      'cancelOrder',
      true,
      (client) => client.cancelOrder(String(orderId), toSlashSymbol(symbol)),
      { symbol, orderId }
    );
    return this.toOrder(parseResponse(CcxtOrderSchema, raw, 'cancelOrder'));
  }

  async fetchOrder(symbol: string, orderId: number): Promise<Order> {
    const raw = await this.call(
      'fetchOrder',
      true,
      (client) => client.fetchOrder(String(orderId), toSlashSymbol(symbol)),
      { symbol, orderId }
    );
    return this.toOrder(parseResponse(CcxtOrderSchema, raw, 'fetchOrder'));
  }

  async fetchOpenOrders(symbol?: string): Promise<Order[]> {
    const raw = await this.call(
      'fetchOpenOrders',
      true,
      (client) => client.fetchOpenOrders(symbol === undefined ? undefined : toSlashSymbol(symbol)),
      { symbol }
    );
    return parseResponse(z.array(CcxtOrderSchema), raw, 'fetchOpenOrders')
      .map((order) => this.toOrder(order))
      .sort((a, b) => a.id - b.id);
  }

  async fetchBalance(): Promise<Balance> {
    const raw = await this.call('fetchBalance', true, (client) => client.fetchBalance());
    const parsed = parseResponse(CcxtBalanceSchema, raw, 'fetchBalance');
    const assets = new Set([...Object.keys(parsed.free), ...Object.keys(parsed.used), ...Object.keys(parsed.total)]);
    const balance: Balance = {};

    for (const asset of assets) {
      const free = parsed.free[asset] ?? 0;
      const used = parsed.used[asset] ?? 0;
      if (free + used > 0) {
        balance[asset] = { free, used, total: free + used };
      }
    }

    return balance;
  }

  async fetchTicker(symbol: string): Promise<Ticker> {
    const raw = await this.call('fetchTicker', false, (client) => client.fetchTicker(toSlashSymbol(symbol)), {
      symbol,
    });
    const ticker = parseResponse(CcxtTickerSchema, raw, 'fetchTicker');
    const last = ticker.last ?? ticker.close;
    if (last === null || last === undefined) {
      throw new ExchangeError(-1, `Ticker for ${symbol} carries no last price`);
    }

    let bid = ticker.bid;
    let ask = ticker.ask;
    // Futures 24h tickers omit the top of book
    if (bid === null || bid === undefined || ask === null || ask === undefined) {
      const book = await this.fetchOrderBook(symbol, 5);
      bid = book.bids[0]?.price ?? last;
      ask = book.asks[0]?.price ?? last;
    }

    return { symbol, bid, ask, last, timestamp: new Date(ticker.timestamp ?? Date.now()) };
  }

  async fetchOrderBook(symbol: string, limit: number): Promise<OrderBook> {
    const raw = await this.call(
      'fetchOrderBook',
      false,
      (client) => client.fetchOrderBook(toSlashSymbol(symbol), limit),
      { symbol }
    );
    const book = parseResponse(CcxtOrderBookSchema, raw, 'fetchOrderBook');

    return {
      symbol,
      bids: book.bids.slice(0, limit).map(([price, quantity]) => ({ price, quantity })),
      asks: book.asks.slice(0, limit).map(([price, quantity]) => ({ price, quantity })),
      timestamp: new Date(book.timestamp ?? Date.now()),
    };
  }

  async fetchOhlcv(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    const raw = await this.call(
      'fetchOHLCV',
      false,
      (client) => client.fetchOHLCV(toSlashSymbol(symbol), timeframe, undefined, limit),
      { symbol }
    );

    return parseResponse(CcxtOhlcvSchema, raw, 'fetchOHLCV').map(
      ([timestamp, open, high, low, close, volume]) => ({ timestamp, open, high, low, close, volume })
    );
  }

  async testConnection(): Promise<boolean> {
    try {
      const balance = await this.fetchBalance();
      this.logger.info(
        { market: this.market, totalUsdt: balance.USDT?.total ?? 0 },
        'ccxt exchange connection successful'
      );
      return true;
    } catch (error) {
      this.logger.error({ err: error, market: this.market }, 'ccxt exchange connection failed');
      return false;
    }
  }

  /**
   * Run one library call under the retry policy, mapping every failure
   * onto the taxonomy before the policy sees it
   */
  private async call(
    name: string,
    authenticated: boolean,
    fn: (client: CcxtClient) => Promise<unknown>,
    context: { symbol?: string; orderId?: number } = {}
  ): Promise<unknown> {
    if (authenticated) {
      await this.authenticate();
    }

    return retry(
      async () => {
        try {
          return await fn(this.client);
        } catch (error) {
          throw mapCcxtError(error, context);
        }
      },
      {
        ...this.retryConfig,
        shouldRetry: (error) => isRetryableTradingError(error, this.transientCodes),
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn({ call: name, attempt, delayMs, err: error }, 'Retrying ccxt call');
        },
      }
    );
  }

  private async authenticate(): Promise<void> {
    const { apiKey, apiSecret } = await this.credentials();
    this.client.apiKey = apiKey;
    this.client.secret = apiSecret;
  }

  private toOrder(raw: CcxtOrder): Order {
    const id = Number(raw.id);
    if (!Number.isSafeInteger(id)) {
      throw new ExchangeError(-1, `Non-integer order id '${raw.id}'`);
    }
    const type = raw.type?.toUpperCase();
    if (type !== 'MARKET' && type !== 'LIMIT') {
      throw new ExchangeError(-1, `Unsupported order type '${raw.type ?? 'unknown'}' for order ${raw.id}`);
    }

    const executedQuantity = raw.filled ?? 0;
    let status: OrderStatus = raw.status ? CCXT_STATUS_MAP[raw.status] ?? 'NEW' : 'NEW';
    if (status === 'OPEN' && executedQuantity > 0) {
      status = 'PARTIALLY_FILLED';
    }
    const createdAt = raw.timestamp ?? Date.now();
    const updatedAt = raw.lastUpdateTimestamp ?? createdAt;
    const price = raw.price ?? undefined;

    return {
      id,
      symbol: fromSlashSymbol(raw.symbol),
      side: raw.side === 'buy' ? 'BUY' : 'SELL',
      type,
      quantity: raw.amount,
      ...(type === 'LIMIT' && price !== undefined ? { price } : {}),
      status,
      executedQuantity,
      avgPrice: raw.average ?? 0,
      createdAt: new Date(createdAt),
      updatedAt: new Date(updatedAt),
    };
  }
}
