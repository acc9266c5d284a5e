import type {
  AssetBalance,
  Balance,
  Candle,
  CreateOrderRequest,
  CredentialProvider,
  ExchangeMode,
  Order,
  OrderBook,
  OrderBookLevel,
  Ticker,
} from '@tradegate/types';
import {
  AMOUNT_PRECISION,
  DEFAULT_CANDLE_LIMIT,
  DEFAULT_ORDER_BOOK_LIMIT,
  DEFAULT_TIMEFRAME,
  MAX_CANDLE_LIMIT,
  MAX_ORDER_BOOK_LIMIT,
  createChildLogger,
  createLogger,
  isTradingError,
  round,
  validateLimit,
  validateOrder,
  validateOrderId,
  validateSymbol,
  validateTimeframe,
} from '@tradegate/utils';
import type { Logger, QuantityBounds, TradingConfig } from '@tradegate/utils';
import type { ExchangeBackend } from './backend';
import { CcxtExchange } from './ccxt-exchange';
import type { CcxtClient } from './ccxt-exchange';
import { MockExchange } from './mock-exchange';
import { RestExchange } from './rest-exchange';

export interface OrderManagerDeps {
  /** Supplies API credentials for live modes; falls back to the config's key pair */
  credentials?: CredentialProvider;
  /** Replaces backend construction entirely */
  createBackend?: (config: TradingConfig) => ExchangeBackend;
  /** Builds the ccxt client for ccxt mode */
  createCcxtClient?: (market: TradingConfig['market']) => CcxtClient;
  logger?: Logger;
}

/**
 * Build the backend the config's mode names
 */
export function createBackend(config: TradingConfig, deps: OrderManagerDeps = {}): ExchangeBackend {
  const logger = deps.logger ?? createLogger({ service: 'order-manager' });
  const { apiKey, apiSecret } = config;
  const credentials: CredentialProvider | undefined =
    deps.credentials ?? (apiKey && apiSecret ? () => ({ apiKey, apiSecret }) : undefined);

  switch (config.mode) {
    case 'mock':
      return new MockExchange({
        startingBalance: config.startingBalance,
        seed: config.mockSeed,
        logger: createChildLogger(logger, { backend: 'mock' }),
      });
    case 'rest':
      return new RestExchange({
        market: config.market,
        sandbox: config.sandbox,
        credentials,
        baseUrl: config.restBaseUrl,
        recvWindowMs: config.recvWindowMs,
        timeoutMs: config.httpTimeoutMs,
        retry: config.retry,
        transientCodes: config.transientCodes,
        logger: createChildLogger(logger, { backend: 'rest' }),
      });
    case 'ccxt':
      return new CcxtExchange({
        market: config.market,
        sandbox: config.sandbox,
        credentials,
        retry: config.retry,
        transientCodes: config.transientCodes,
        createClient: deps.createCcxtClient,
        logger: createChildLogger(logger, { backend: 'ccxt' }),
      });
  }
}

function normalizeOrder(order: Order): Order {
  const { price, ...rest } = order;
  return Object.freeze(order.type === 'LIMIT' && price !== undefined ? { ...rest, price } : rest);
}

function normalizeBalance(balance: Balance): Balance {
  const normalized: Balance = {};
  for (const [asset, { free, used }] of Object.entries(balance)) {
    const entry: AssetBalance = { free, used, total: round(free + used, AMOUNT_PRECISION) };
    normalized[asset] = entry;
  }
  return normalized;
}

const byPriceDescending = (a: OrderBookLevel, b: OrderBookLevel): number => b.price - a.price;
const byPriceAscending = (a: OrderBookLevel, b: OrderBookLevel): number => a.price - b.price;

/**
 * Single entry point for trading: validates every request, delegates to
 * the one backend chosen at construction, and normalizes what comes back.
 *
 * @example
 * ```typescript
 * const manager = new OrderManager(loadConfig());
 * const order = await manager.placeMarketOrder('BTCUSDT', 'BUY', 0.001);
 * ```
 */
export class OrderManager {
  private backend: ExchangeBackend;
  private bounds: QuantityBounds;
  private logger: Logger;

  constructor(config: TradingConfig, deps: OrderManagerDeps = {}) {
    this.logger = deps.logger ?? createLogger({ service: 'order-manager' });
    this.backend = deps.createBackend ? deps.createBackend(config) : createBackend(config, { ...deps, logger: this.logger });
    this.bounds = { minOrderQuantity: config.minOrderQuantity, maxOrderQuantity: config.maxOrderQuantity };

    this.logger.info({ mode: this.backend.mode, market: config.market, sandbox: config.sandbox }, 'Order manager ready');
  }

  get mode(): ExchangeMode {
    return this.backend.mode;
  }

  async createOrder(request: CreateOrderRequest): Promise<Order> {
    return this.run('createOrder', async () => {
      const params = validateOrder(request, this.bounds);
      this.logger.info({ ...params }, 'Submitting order');
      const order = normalizeOrder(await this.backend.createOrder(params));
      this.logger.info({ orderId: order.id, status: order.status, avgPrice: order.avgPrice }, 'Order accepted');
      return order;
    });
  }

  async placeMarketOrder(symbol: string, side: string, quantity: number): Promise<Order> {
    return this.createOrder({ symbol, side, type: 'MARKET', quantity });
  }

  async placeLimitOrder(symbol: string, side: string, quantity: number, price: number): Promise<Order> {
    return this.createOrder({ symbol, side, type: 'LIMIT', quantity, price });
  }

  async cancelOrder(symbol: string, orderId: number): Promise<Order> {
    return this.run('cancelOrder', async () => {
      const canonical = validateSymbol(symbol);
      const id = validateOrderId(orderId);
      const order = normalizeOrder(await this.backend.cancelOrder(canonical, id));
      this.logger.info({ orderId: id, symbol: canonical, status: order.status }, 'Order canceled');
      return order;
    });
  }

  async fetchOrder(symbol: string, orderId: number): Promise<Order> {
    return this.run('fetchOrder', async () => {
      const canonical = validateSymbol(symbol);
      const id = validateOrderId(orderId);
      return normalizeOrder(await this.backend.fetchOrder(canonical, id));
    });
  }

  async fetchOpenOrders(symbol?: string): Promise<Order[]> {
    return this.run('fetchOpenOrders', async () => {
      const canonical = symbol === undefined ? undefined : validateSymbol(symbol);
      const orders = await this.backend.fetchOpenOrders(canonical);
      return orders.map(normalizeOrder).sort((a, b) => a.id - b.id);
    });
  }

  async fetchBalance(): Promise<Balance> {
    return this.run('fetchBalance', async () => normalizeBalance(await this.backend.fetchBalance()));
  }

  async fetchTicker(symbol: string): Promise<Ticker> {
    return this.run('fetchTicker', async () => this.backend.fetchTicker(validateSymbol(symbol)));
  }

  async fetchOrderBook(symbol: string, limit: number = DEFAULT_ORDER_BOOK_LIMIT): Promise<OrderBook> {
    return this.run('fetchOrderBook', async () => {
      const canonical = validateSymbol(symbol);
      const depth = validateLimit(limit, MAX_ORDER_BOOK_LIMIT);
      const book = await this.backend.fetchOrderBook(canonical, depth);
      return {
        ...book,
        bids: [...book.bids].sort(byPriceDescending),
        asks: [...book.asks].sort(byPriceAscending),
      };
    });
  }

  async fetchOhlcv(symbol: string, timeframe: string = DEFAULT_TIMEFRAME, limit: number = DEFAULT_CANDLE_LIMIT): Promise<Candle[]> {
    return this.run('fetchOhlcv', async () => {
      const canonical = validateSymbol(symbol);
      const interval = validateTimeframe(timeframe);
      const count = validateLimit(limit, MAX_CANDLE_LIMIT);
      const candles = await this.backend.fetchOhlcv(canonical, interval, count);
      return [...candles].sort((a, b) => a.timestamp - b.timestamp);
    });
  }

  async testConnection(): Promise<boolean> {
    return this.run('testConnection', () => this.backend.testConnection());
  }

  /**
   * Log a failure once, with its taxonomy kind, and rethrow it unchanged
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const kind = isTradingError(error) ? error.kind : 'unknown';
      const level = kind === 'validation' || kind === 'not_found' ? 'warn' : 'error';
      this.logger[level]({ operation, kind, err: error }, `${operation} failed`);
      throw error;
    }
  }
}
