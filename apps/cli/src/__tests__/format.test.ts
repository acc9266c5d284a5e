import { describe, it, expect } from 'vitest';
import type { Order } from '@tradegate/types';
import {
  formatBalance,
  formatCandles,
  formatOpenOrders,
  formatOrder,
  formatOrderBook,
  formatTicker,
} from '../format';

const NOON = new Date(Date.UTC(2024, 0, 1, 12));

const PARTIAL: Order = {
  id: 7,
  symbol: 'ETHUSDT',
  side: 'SELL',
  type: 'LIMIT',
  quantity: 2,
  price: 3100,
  status: 'PARTIALLY_FILLED',
  executedQuantity: 0.5,
  avgPrice: 3100,
  createdAt: NOON,
  updatedAt: new Date(Date.UTC(2024, 0, 1, 12, 30, 5)),
};

describe('formatOrder', () => {
  it('shows limit and fill details', () => {
    expect(formatOrder(PARTIAL)).toEqual([
      'Order 7 SELL LIMIT ETHUSDT: PARTIALLY_FILLED',
      '  quantity:  2 (executed 0.5)',
      '  limit:     3100',
      '  avg price: 3100',
      '  updated:   2024-01-01 12:30:05Z',
    ]);
  });

  it('omits the average price until something fills', () => {
    const lines = formatOrder({ ...PARTIAL, status: 'OPEN', executedQuantity: 0, avgPrice: 0 });

    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe('  quantity:  2 (executed 0)');
  });
});

describe('formatOpenOrders', () => {
  it('prints one row per order', () => {
    expect(formatOpenOrders([PARTIAL])).toEqual(['7 ETHUSDT SELL LIMIT 2 @ 3100 PARTIALLY_FILLED']);
  });

  it('says so when nothing rests', () => {
    expect(formatOpenOrders([])).toEqual(['No open orders']);
  });
});

describe('formatBalance', () => {
  it('lists assets alphabetically in aligned columns', () => {
    const lines = formatBalance({
      USDT: { free: 900.5, used: 100, total: 1000.5 },
      BTC: { free: 0.00000001, used: 0, total: 0.00000001 },
    });

    expect(lines).toHaveLength(3);
    expect(lines.map((line) => line.length)).toEqual([62, 62, 62]);
    expect(lines[0].split(/\s+/)).toEqual(['ASSET', 'FREE', 'USED', 'TOTAL']);
    expect(lines[1].split(/\s+/)).toEqual(['BTC', '0.00000001', '0', '0.00000001']);
    expect(lines[2].split(/\s+/)).toEqual(['USDT', '900.5', '100', '1000.5']);
  });

  it('says so when empty', () => {
    expect(formatBalance({})).toEqual(['No balances']);
  });
});

describe('market data formatting', () => {
  it('formats a ticker with its spread', () => {
    expect(formatTicker({ symbol: 'BTCUSDT', bid: 44990, ask: 45010, last: 45000, timestamp: NOON })).toEqual([
      'BTCUSDT',
      '  bid:    44990',
      '  ask:    45010',
      '  last:   45000',
      '  spread: 20',
      '  time:   2024-01-01 12:00:00Z',
    ]);
  });

  it('prints asks highest first so the sides meet at the spread', () => {
    expect(
      formatOrderBook({
        symbol: 'BTCUSDT',
        bids: [
          { price: 100, quantity: 1 },
          { price: 99, quantity: 2.5 },
        ],
        asks: [
          { price: 101, quantity: 0.5 },
          { price: 102, quantity: 3 },
        ],
        timestamp: NOON,
      })
    ).toEqual([
      'BTCUSDT order book at 2024-01-01 12:00:00Z',
      '  asks:',
      '    102 x 3',
      '    101 x 0.5',
      '  bids:',
      '    100 x 1',
      '    99 x 2.5',
    ]);
  });

  it('marks an empty side', () => {
    const lines = formatOrderBook({ symbol: 'BTCUSDT', bids: [], asks: [], timestamp: NOON });

    expect(lines.slice(1)).toEqual(['  asks:', '    (empty)', '  bids:', '    (empty)']);
  });

  it('formats candles', () => {
    expect(
      formatCandles([{ timestamp: Date.UTC(2024, 0, 1), open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 }])
    ).toEqual(['2024-01-01 00:00:00Z  O 1  H 2  L 0.5  C 1.5  V 100']);
    expect(formatCandles([])).toEqual(['No candles']);
  });
});
