import type { Candle, OrderBook, OrderBookLevel, Ticker, Timeframe } from '@tradegate/types';
import {
  MOCK_CANDLE_HISTORY,
  MOCK_MIN_PRICE,
  MOCK_SPREAD,
  MOCK_TICK_VOLATILITY,
  NotFoundError,
  REFERENCE_PRICES_USD,
  TIMEFRAME_MS,
  createRng,
  gbmNextPrice,
  hashSeed,
  round,
  splitSymbol,
} from '@tradegate/utils';

export interface PriceModelConfig {
  seed: number;
  /** Per-step GBM volatility of the ticker walk */
  volatility: number;
  /** Per-step GBM drift of the ticker walk */
  drift: number;
  /** Full bid/ask spread as a fraction of mid */
  spread: number;
  referencePricesUsd: Readonly<Record<string, number>>;
  /** Starting mid per canonical symbol, taking precedence over the reference table */
  midPrices: Readonly<Record<string, number>>;
}

const DEFAULT_CONFIG: PriceModelConfig = {
  seed: 0,
  volatility: MOCK_TICK_VOLATILITY,
  drift: 0,
  spread: MOCK_SPREAD,
  referencePricesUsd: REFERENCE_PRICES_USD,
  midPrices: {},
};

const PRICE_DECIMALS = 8;

/**
 * Seeded mid-price model for the mock backend. Every symbol owns separate
 * random streams (ticker, book, candles per timeframe) so that one call
 * never perturbs another's sequence.
 */
export class PriceModel {
  private config: PriceModelConfig;
  private mids: Map<string, number> = new Map();
  private streams: Map<string, () => number> = new Map();
  private candles: Map<string, Candle[]> = new Map();

  constructor(config: Partial<PriceModelConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Starting mid for a symbol: an explicit override, else base/quote from
   * the USD reference table
   */
  referenceMid(symbol: string): number {
    const override = this.config.midPrices[symbol];
    if (override !== undefined) {
      return override;
    }

    const parts = splitSymbol(symbol);
    const baseUsd = parts ? this.config.referencePricesUsd[parts.base] : undefined;
    const quoteUsd = parts ? this.config.referencePricesUsd[parts.quote] : undefined;
    if (baseUsd === undefined || quoteUsd === undefined) {
      throw new NotFoundError('symbol', symbol, `Unknown symbol: ${symbol}`);
    }
    return baseUsd / quoteUsd;
  }

  /**
   * Current mid, without advancing the walk
   */
  mid(symbol: string): number {
    let mid = this.mids.get(symbol);
    if (mid === undefined) {
      mid = this.referenceMid(symbol);
      this.mids.set(symbol, mid);
    }
    return mid;
  }

  /**
   * Advance the walk one GBM step and return the new mid
   */
  step(symbol: string): number {
    const current = this.mid(symbol);
    const rng = this.stream(symbol, 'ticker');
    const next = Math.max(
      MOCK_MIN_PRICE,
      gbmNextPrice(current, this.config.volatility, this.config.drift, 1, rng)
    );
    this.mids.set(symbol, next);
    return next;
  }

  ticker(symbol: string, timestamp: Date): Ticker {
    const mid = this.step(symbol);
    const halfSpread = this.config.spread / 2;
    return {
      symbol,
      bid: round(mid * (1 - halfSpread), PRICE_DECIMALS),
      ask: round(mid * (1 + halfSpread), PRICE_DECIMALS),
      last: round(mid, PRICE_DECIMALS),
      timestamp,
    };
  }

  /**
   * Synthetic depth around the current mid; level i sits i+1 half-spreads away
   */
  orderBook(symbol: string, limit: number, timestamp: Date): OrderBook {
    const mid = this.mid(symbol);
    const rng = this.stream(symbol, 'book');
    const halfSpread = this.config.spread / 2;
    const bids: OrderBookLevel[] = [];
    const asks: OrderBookLevel[] = [];

    for (let i = 0; i < limit; i++) {
      const offset = halfSpread * (i + 1);
      bids.push({ price: round(mid * (1 - offset), PRICE_DECIMALS), quantity: round(0.1 + rng() * 9.9, 4) });
      asks.push({ price: round(mid * (1 + offset), PRICE_DECIMALS), quantity: round(0.1 + rng() * 9.9, 4) });
    }

    return { symbol, bids, asks, timestamp };
  }

  /**
   * Most recent `limit` candles. History is generated on first request per
   * (symbol, timeframe) and reused afterwards.
   */
  ohlcv(symbol: string, timeframe: Timeframe, limit: number, now: Date): Candle[] {
    const key = `${symbol}:${timeframe}`;
    let history = this.candles.get(key);
    if (!history) {
      history = this.generateHistory(symbol, timeframe, now);
      this.candles.set(key, history);
    }
    return history.slice(-limit).map((candle) => ({ ...candle }));
  }

  private generateHistory(symbol: string, timeframe: Timeframe, now: Date): Candle[] {
    const intervalMs = TIMEFRAME_MS[timeframe];
    const rng = this.stream(symbol, `candles:${timeframe}`);
    // Scale the per-minute volatility to the candle length
    const volatility = this.config.volatility * Math.sqrt(intervalMs / TIMEFRAME_MS['1m']);
    const lastOpen = Math.floor(now.getTime() / intervalMs) * intervalMs;
    const history: Candle[] = [];

    let price = this.referenceMid(symbol);
    for (let i = MOCK_CANDLE_HISTORY - 1; i >= 0; i--) {
      const open = price;
      const close = Math.max(MOCK_MIN_PRICE, gbmNextPrice(open, volatility, 0, 1, rng));
      const high = Math.max(open, close) * (1 + rng() * volatility * 0.5);
      const low = Math.max(MOCK_MIN_PRICE, Math.min(open, close) * (1 - rng() * volatility * 0.5));

      history.push({
        timestamp: lastOpen - i * intervalMs,
        open: round(open, PRICE_DECIMALS),
        high: round(high, PRICE_DECIMALS),
        low: round(low, PRICE_DECIMALS),
        close: round(close, PRICE_DECIMALS),
        volume: round(100 + rng() * 900, 4),
      });
      price = close;
    }

    return history;
  }

  private stream(symbol: string, name: string): () => number {
    const key = `${symbol}:${name}`;
    let rng = this.streams.get(key);
    if (!rng) {
      rng = createRng(hashSeed(this.config.seed, symbol, name));
      this.streams.set(key, rng);
    }
    return rng;
  }
}
