import { z } from 'zod';
import type {
  Balance,
  Candle,
  CredentialProvider,
  MarketType,
  Order,
  OrderBook,
  OrderBookLevel,
  OrderParams,
  OrderStatus,
  Ticker,
  Timeframe,
} from '@tradegate/types';
import { ExchangeError, createLogger, toDecimalString } from '@tradegate/utils';
import type { ExchangeErrorCode, Logger, QueryParams, QueryValue, RetryConfig } from '@tradegate/utils';
import type { ExchangeBackend } from './backend';
import { createCredentialResolver } from './backend';
import { HttpTransport } from './transport';

interface EndpointFamily {
  testnet: string;
  live: string;
  order: string;
  openOrders: string;
  balance: string;
  bookTicker: string;
  price: string;
  depth: string;
  klines: string;
  ping: string;
  /** Depth limits the endpoint accepts; undefined means any value up to the last */
  depthLimits?: readonly number[];
  maxKlines: number;
}

export const ENDPOINTS: Readonly<Record<MarketType, EndpointFamily>> = {
  futures: {
    testnet: 'https://testnet.binancefuture.com',
    live: 'https://fapi.binance.com',
    order: '/fapi/v1/order',
    openOrders: '/fapi/v1/openOrders',
    balance: '/fapi/v2/balance',
    bookTicker: '/fapi/v1/ticker/bookTicker',
    price: '/fapi/v1/ticker/price',
    depth: '/fapi/v1/depth',
    klines: '/fapi/v1/klines',
    ping: '/fapi/v1/ping',
    depthLimits: [5, 10, 20, 50, 100, 500, 1000],
    maxKlines: 1500,
  },
  spot: {
    testnet: 'https://testnet.binance.vision',
    live: 'https://api.binance.com',
    order: '/api/v3/order',
    openOrders: '/api/v3/openOrders',
    balance: '/api/v3/account',
    bookTicker: '/api/v3/ticker/bookTicker',
    price: '/api/v3/ticker/price',
    depth: '/api/v3/depth',
    klines: '/api/v3/klines',
    ping: '/api/v3/ping',
    maxKlines: 1000,
  },
};

export interface RestExchangeOptions {
  market: MarketType;
  /** Testnet endpoints unless explicitly false */
  sandbox: boolean;
  credentials?: CredentialProvider;
  /** Overrides the endpoint family's host */
  baseUrl?: string;
  recvWindowMs?: number;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  transientCodes?: readonly ExchangeErrorCode[];
  clock?: () => number;
  logger?: Logger;
}

// Binance sends decimals as strings
const decimal = z.union([z.string(), z.number()]).pipe(z.coerce.number().finite());

const RawOrderSchema = z.object({
  orderId: z.number().int(),
  symbol: z.string(),
  status: z.string(),
  type: z.string(),
  side: z.enum(['BUY', 'SELL']),
  price: decimal.optional(),
  origQty: decimal,
  executedQty: decimal,
  avgPrice: decimal.optional(),
  cumQuote: decimal.optional(),
  cummulativeQuoteQty: decimal.optional(),
  time: z.number().optional(),
  transactTime: z.number().optional(),
  updateTime: z.number().optional(),
});

type RawOrder = z.infer<typeof RawOrderSchema>;

const FuturesBalanceSchema = z.array(
  z.object({
    asset: z.string(),
    balance: decimal,
    availableBalance: decimal,
  })
);

const SpotAccountSchema = z.object({
  balances: z.array(
    z.object({
      asset: z.string(),
      free: decimal,
      locked: decimal,
    })
  ),
});

const BookTickerSchema = z.object({
  symbol: z.string(),
  bidPrice: decimal,
  askPrice: decimal,
  time: z.number().optional(),
});

const PriceTickerSchema = z.object({
  symbol: z.string(),
  price: decimal,
  time: z.number().optional(),
});

const DepthSchema = z.object({
  bids: z.array(z.tuple([decimal, decimal])),
  asks: z.array(z.tuple([decimal, decimal])),
  T: z.number().optional(),
});

// [openTime, open, high, low, close, volume, closeTime, ...]
const KlinesSchema = z.array(
  z.tuple([z.number(), decimal, decimal, decimal, decimal, decimal]).rest(z.unknown())
);

const STATUS_MAP: Readonly<Record<string, OrderStatus>> = {
  NEW: 'OPEN',
  PENDING_CANCEL: 'OPEN',
  PARTIALLY_FILLED: 'PARTIALLY_FILLED',
  FILLED: 'FILLED',
  CANCELED: 'CANCELED',
  REJECTED: 'REJECTED',
  EXPIRED: 'EXPIRED',
  EXPIRED_IN_MATCH: 'EXPIRED',
};

function parseResponse<S extends z.ZodTypeAny>(schema: S, body: unknown, path: string): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ExchangeError(-1, `Unexpected response shape from ${path}: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

/**
 * Backend issuing signed REST calls directly against Binance spot or
 * USDT-margined futures endpoints
 */
export class RestExchange implements ExchangeBackend {
  readonly mode = 'rest' as const;

  private transport: HttpTransport;
  private endpoints: EndpointFamily;
  private market: MarketType;
  private clock: () => number;
  private logger: Logger;

  constructor(options: RestExchangeOptions) {
    this.market = options.market;
    this.endpoints = ENDPOINTS[options.market];
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger({ service: 'rest-exchange' });

    const baseUrl = options.baseUrl ?? (options.sandbox ? this.endpoints.testnet : this.endpoints.live);
    this.transport = new HttpTransport({
      baseUrl,
      credentials: createCredentialResolver(options.credentials),
      clock: this.clock,
      logger: this.logger,
      ...(options.recvWindowMs !== undefined ? { recvWindowMs: options.recvWindowMs } : {}),
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
      ...(options.retry !== undefined ? { retry: options.retry } : {}),
      ...(options.transientCodes !== undefined ? { transientCodes: options.transientCodes } : {}),
    });

    if (!options.sandbox && options.baseUrl === undefined) {
      this.logger.warn({ market: this.market, baseUrl }, 'REST backend targets LIVE endpoints');
    }
  }

  async createOrder(params: OrderParams): Promise<Order> {
    const query: [string, QueryValue][] = [
      ['symbol', params.symbol],
      ['side', params.side],
      ['type', params.type],
      ['quantity', toDecimalString(params.quantity)],
    ];
    if (params.type === 'LIMIT' && params.price !== undefined) {
      query.push(['price', toDecimalString(params.price)], ['timeInForce', 'GTC']);
    }
    query.push(['newOrderRespType', 'RESULT']);

    const body = await this.transport.send('POST', this.endpoints.order, query, { signed: true });
    return this.toOrder(parseResponse(RawOrderSchema, body, this.endpoints.order));
  }

  async cancelOrder(symbol: string, orderId: number): Promise<Order> {
    const body = await this.transport.send(
      'DELETE',
      this.endpoints.order,
      [['symbol', symbol], ['orderId', orderId]],
      { signed: true }
    );
    return this.toOrder(parseResponse(RawOrderSchema, body, this.endpoints.order));
  }

  async fetchOrder(symbol: string, orderId: number): Promise<Order> {
    const body = await this.transport.send(
      'GET',
      this.endpoints.order,
      [['symbol', symbol], ['orderId', orderId]],
      { signed: true }
    );
    return this.toOrder(parseResponse(RawOrderSchema, body, this.endpoints.order));
  }

  async fetchOpenOrders(symbol?: string): Promise<Order[]> {
    const params: QueryParams = symbol === undefined ? [] : [['symbol', symbol]];
    const body = await this.transport.send('GET', this.endpoints.openOrders, params, { signed: true });
    return parseResponse(z.array(RawOrderSchema), body, this.endpoints.openOrders)
      .map((raw) => this.toOrder(raw))
      .sort((a, b) => a.id - b.id);
  }

  async fetchBalance(): Promise<Balance> {
    const path = this.endpoints.balance;
    const body = await this.transport.send('GET', path, [], { signed: true });
    const balance: Balance = {};

    if (this.market === 'futures') {
      for (const entry of parseResponse(FuturesBalanceSchema, body, path)) {
        const free = entry.availableBalance;
        // Unrealized losses can push the wallet below the available amount
        const used = Math.max(0, entry.balance - free);
        if (free + used > 0) {
          balance[entry.asset] = { free, used, total: free + used };
        }
      }
    } else {
      for (const entry of parseResponse(SpotAccountSchema, body, path).balances) {
        if (entry.free + entry.locked > 0) {
          balance[entry.asset] = { free: entry.free, used: entry.locked, total: entry.free + entry.locked };
        }
      }
    }

    return balance;
  }

  async fetchTicker(symbol: string): Promise<Ticker> {
    const [bookBody, priceBody] = await Promise.all([
      this.transport.send('GET', this.endpoints.bookTicker, [['symbol', symbol]]),
      this.transport.send('GET', this.endpoints.price, [['symbol', symbol]]),
    ]);
    const book = parseResponse(BookTickerSchema, bookBody, this.endpoints.bookTicker);
    const price = parseResponse(PriceTickerSchema, priceBody, this.endpoints.price);

    return {
      symbol,
      bid: book.bidPrice,
      ask: book.askPrice,
      last: price.price,
      timestamp: new Date(price.time ?? book.time ?? this.clock()),
    };
  }

  async fetchOrderBook(symbol: string, limit: number): Promise<OrderBook> {
    const allowed = this.endpoints.depthLimits;
    const requestLimit = allowed?.find((value) => value >= limit) ?? limit;
    const body = await this.transport.send('GET', this.endpoints.depth, [
      ['symbol', symbol],
      ['limit', requestLimit],
    ]);
    const depth = parseResponse(DepthSchema, body, this.endpoints.depth);
    const toLevel = ([price, quantity]: [number, number]): OrderBookLevel => ({ price, quantity });

    return {
      symbol,
      bids: depth.bids.slice(0, limit).map(toLevel),
      asks: depth.asks.slice(0, limit).map(toLevel),
      timestamp: new Date(depth.T ?? this.clock()),
    };
  }

  async fetchOhlcv(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    const body = await this.transport.send('GET', this.endpoints.klines, [
      ['symbol', symbol],
      ['interval', timeframe],
      ['limit', Math.min(limit, this.endpoints.maxKlines)],
    ]);

    return parseResponse(KlinesSchema, body, this.endpoints.klines).map(
      ([timestamp, open, high, low, close, volume]) => ({ timestamp, open, high, low, close, volume })
    );
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.transport.send('GET', this.endpoints.ping);
      const balance = await this.fetchBalance();
      this.logger.info(
        { baseUrl: this.transport.baseUrl, market: this.market, totalUsdt: balance.USDT?.total ?? 0 },
        'REST exchange connection successful'
      );
      return true;
    } catch (error) {
      this.logger.error({ err: error, baseUrl: this.transport.baseUrl }, 'REST exchange connection failed');
      return false;
    }
  }

  private toOrder(raw: RawOrder): Order {
    const status = STATUS_MAP[raw.status];
    if (!status) {
      throw new ExchangeError(-1, `Unrecognized order status '${raw.status}' for order ${raw.orderId}`);
    }
    if (raw.type !== 'MARKET' && raw.type !== 'LIMIT') {
      throw new ExchangeError(-1, `Unsupported order type '${raw.type}' for order ${raw.orderId}`);
    }

    const quoteFilled = raw.cumQuote ?? raw.cummulativeQuoteQty ?? 0;
    const avgPrice =
      raw.avgPrice !== undefined && raw.avgPrice > 0
        ? raw.avgPrice
        : raw.executedQty > 0
          ? quoteFilled / raw.executedQty
          : 0;
    const createdAt = raw.time ?? raw.transactTime ?? raw.updateTime ?? this.clock();
    const updatedAt = raw.updateTime ?? raw.transactTime ?? createdAt;

    return {
      id: raw.orderId,
      symbol: raw.symbol,
      side: raw.side,
      type: raw.type,
      quantity: raw.origQty,
      ...(raw.type === 'LIMIT' && raw.price !== undefined ? { price: raw.price } : {}),
      status,
      executedQuantity: raw.executedQty,
      avgPrice,
      createdAt: new Date(createdAt),
      updatedAt: new Date(updatedAt),
    };
  }
}
