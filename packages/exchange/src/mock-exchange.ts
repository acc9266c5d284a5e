import type {
  Balance,
  Candle,
  Order,
  OrderBook,
  OrderParams,
  OrderStatus,
  Ticker,
  Timeframe,
} from '@tradegate/types';
import {
  DEFAULT_MOCK_SEED,
  DEFAULT_STARTING_BALANCE,
  EXCHANGE_ERROR_CODES,
  ExchangeError,
  MOCK_SLIPPAGE,
  MOCK_SPREAD,
  MOCK_TICK_VOLATILITY,
  NotFoundError,
  createLogger,
  round,
  splitSymbol,
} from '@tradegate/utils';
import type { Logger } from '@tradegate/utils';
import type { ExchangeBackend } from './backend';
import { Ledger } from './ledger';
import { PriceModel } from './price-model';

export interface MockExchangeOptions {
  startingBalance: Readonly<Record<string, number>>;
  seed: number;
  /** Fill price offset from mid, as a fraction (buys pay more, sells receive less) */
  slippage: number;
  volatility: number;
  drift: number;
  spread: number;
  /** Starting mid per canonical symbol */
  midPrices: Readonly<Record<string, number>>;
  clock: () => Date;
  logger: Logger;
}

interface Reservation {
  asset: string;
  amount: number;
}

const TERMINAL_STATUSES: readonly OrderStatus[] = ['FILLED', 'CANCELED', 'REJECTED', 'EXPIRED'];

/**
 * Offline matching engine. Orders fill instantly against a seeded mid-price
 * model and settle against an in-memory ledger.
 *
 * Each order transition checks and applies its balance changes inside one
 * synchronous ledger transaction, so concurrent callers on the event loop
 * cannot interleave between the check and the apply.
 */
export class MockExchange implements ExchangeBackend {
  readonly mode = 'mock' as const;

  private ledger: Ledger;
  private prices: PriceModel;
  private orders: Map<number, Order> = new Map();
  private reservations: Map<number, Reservation> = new Map();
  private nextOrderId = 1;
  private slippage: number;
  private clock: () => Date;
  private logger: Logger;

  constructor(options: Partial<MockExchangeOptions> = {}) {
    this.ledger = new Ledger(options.startingBalance ?? DEFAULT_STARTING_BALANCE);
    this.prices = new PriceModel({
      seed: options.seed ?? DEFAULT_MOCK_SEED,
      volatility: options.volatility ?? MOCK_TICK_VOLATILITY,
      drift: options.drift ?? 0,
      spread: options.spread ?? MOCK_SPREAD,
      midPrices: options.midPrices ?? {},
    });
    this.slippage = options.slippage ?? MOCK_SLIPPAGE;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ service: 'mock-exchange' });
  }

  async createOrder(params: OrderParams): Promise<Order> {
    const { base, quote } = this.assets(params.symbol);
    const mid = this.prices.mid(params.symbol);
    const now = this.clock();

    const draft: Order = {
      id: this.nextOrderId++,
      symbol: params.symbol,
      side: params.side,
      type: params.type,
      quantity: params.quantity,
      ...(params.price !== undefined ? { price: params.price } : {}),
      status: 'NEW',
      executedQuantity: 0,
      avgPrice: 0,
      createdAt: now,
      updatedAt: now,
    };
    const order = Object.freeze(draft);
    this.orders.set(order.id, order);

    try {
      const result = this.ledger.transaction(() => this.match(order, mid, base, quote));
      this.logger.info(
        { orderId: result.id, symbol: result.symbol, side: result.side, type: result.type, status: result.status, avgPrice: result.avgPrice },
        'Mock order processed'
      );
      return result;
    } catch (error) {
      if (error instanceof ExchangeError && error.code === EXCHANGE_ERROR_CODES.NEW_ORDER_REJECTED) {
        this.transition(order, { status: 'REJECTED' });
        this.logger.warn({ orderId: order.id, symbol: order.symbol, reason: error.message }, 'Mock order rejected');
      }
      throw error;
    }
  }

  async cancelOrder(symbol: string, orderId: number): Promise<Order> {
    const order = this.orders.get(orderId);
    if (!order || order.symbol !== symbol || order.status !== 'OPEN') {
      const reason = order && order.symbol === symbol ? `is ${order.status}` : 'does not exist';
      throw new NotFoundError(
        'order',
        String(orderId),
        `Order ${orderId} on ${symbol} ${reason} and cannot be canceled`,
        EXCHANGE_ERROR_CODES.CANCEL_REJECTED
      );
    }

    const canceled = this.ledger.transaction(() => {
      const reservation = this.reservations.get(order.id);
      if (reservation) {
        this.ledger.release(reservation.asset, reservation.amount);
        this.reservations.delete(order.id);
      }
      return this.transition(order, { status: 'CANCELED' });
    });

    this.logger.info({ orderId, symbol }, 'Mock order canceled');
    return canceled;
  }

  async fetchOrder(symbol: string, orderId: number): Promise<Order> {
    const order = this.orders.get(orderId);
    if (!order || order.symbol !== symbol) {
      throw new NotFoundError(
        'order',
        String(orderId),
        `Order ${orderId} does not exist on ${symbol}`,
        EXCHANGE_ERROR_CODES.NO_SUCH_ORDER
      );
    }
    return order;
  }

  async fetchOpenOrders(symbol?: string): Promise<Order[]> {
    return Array.from(this.orders.values())
      .filter((order) => order.status === 'OPEN' && (symbol === undefined || order.symbol === symbol))
      .sort((a, b) => a.id - b.id);
  }

  async fetchBalance(): Promise<Balance> {
    return this.ledger.snapshot();
  }

  async fetchTicker(symbol: string): Promise<Ticker> {
    return this.prices.ticker(symbol, this.clock());
  }

  async fetchOrderBook(symbol: string, limit: number): Promise<OrderBook> {
    return this.prices.orderBook(symbol, limit, this.clock());
  }

  async fetchOhlcv(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    return this.prices.ohlcv(symbol, timeframe, limit, this.clock());
  }

  async testConnection(): Promise<boolean> {
    const usdt = this.ledger.get('USDT');
    this.logger.info({ totalUsdt: usdt.total }, 'Mock exchange connection successful');
    return true;
  }

  /**
   * Decide the order's fate and apply its ledger effects. Runs inside a
   * ledger transaction; throws ExchangeError -2010 on insufficient funds.
   */
  private match(order: Order, mid: number, base: string, quote: string): Order {
    const isBuy = order.side === 'BUY';
    const slipped = mid * (isBuy ? 1 + this.slippage : 1 - this.slippage);

    if (order.type === 'MARKET') {
      return this.fill(order, slipped, base, quote);
    }

    const limit = order.price ?? slipped;
    const crossable = isBuy ? limit >= mid : limit <= mid;
    if (crossable) {
      const fillPrice = isBuy ? Math.min(slipped, limit) : Math.max(slipped, limit);
      return this.fill(order, fillPrice, base, quote);
    }

    const reservation: Reservation = isBuy
      ? { asset: quote, amount: order.quantity * limit }
      : { asset: base, amount: order.quantity };
    this.ledger.reserve(reservation.asset, reservation.amount);
    this.reservations.set(order.id, reservation);
    return this.transition(order, { status: 'OPEN' });
  }

  private fill(order: Order, price: number, base: string, quote: string): Order {
    const fillPrice = round(price, 8);
    const cost = order.quantity * fillPrice;

    if (order.side === 'BUY') {
      this.ledger.debit(quote, cost);
      this.ledger.credit(base, order.quantity);
    } else {
      this.ledger.debit(base, order.quantity);
      this.ledger.credit(quote, cost);
    }

    return this.transition(order, {
      status: 'FILLED',
      executedQuantity: order.quantity,
      avgPrice: fillPrice,
    });
  }

  /**
   * Replace the stored snapshot with a new frozen one; terminal orders never change
   */
  private transition(order: Order, changes: Partial<Pick<Order, 'status' | 'executedQuantity' | 'avgPrice'>>): Order {
    if (TERMINAL_STATUSES.includes(order.status)) {
      return order;
    }
    const next: Order = { ...order, ...changes, updatedAt: this.clock() };
    this.orders.set(next.id, Object.freeze(next));
    return next;
  }

  private assets(symbol: string): { base: string; quote: string } {
    const parts = splitSymbol(symbol);
    if (!parts) {
      throw new NotFoundError('symbol', symbol, `Unknown symbol: ${symbol}`);
    }
    return parts;
  }
}
