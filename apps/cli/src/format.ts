import type { Balance, Candle, Order, OrderBook, OrderBookLevel, Ticker } from '@tradegate/types';
import { formatTimestamp, toDecimalString } from '@tradegate/utils';

export function formatOrder(order: Order): string[] {
  const lines = [
    `Order ${order.id} ${order.side} ${order.type} ${order.symbol}: ${order.status}`,
    `  quantity:  ${toDecimalString(order.quantity)} (executed ${toDecimalString(order.executedQuantity)})`,
  ];
  if (order.price !== undefined) {
    lines.push(`  limit:     ${toDecimalString(order.price)}`);
  }
  if (order.executedQuantity > 0) {
    lines.push(`  avg price: ${toDecimalString(order.avgPrice)}`);
  }
  lines.push(`  updated:   ${formatTimestamp(order.updatedAt)}`);
  return lines;
}

export function formatOpenOrders(orders: readonly Order[]): string[] {
  if (orders.length === 0) {
    return ['No open orders'];
  }
  return orders.map(
    (order) =>
      `${order.id} ${order.symbol} ${order.side} ${order.type} ${toDecimalString(order.quantity)} @ ` +
      `${order.price === undefined ? 'MARKET' : toDecimalString(order.price)} ${order.status}`
  );
}

/**
 * One row per asset, alphabetical, columns aligned
 */
export function formatBalance(balance: Balance): string[] {
  const assets = Object.keys(balance).sort();
  if (assets.length === 0) {
    return ['No balances'];
  }

  const header = `${'ASSET'.padEnd(8)}${'FREE'.padStart(18)}${'USED'.padStart(18)}${'TOTAL'.padStart(18)}`;
  const rows = assets.map((asset) => {
    const { free, used, total } = balance[asset];
    return (
      asset.padEnd(8) +
      toDecimalString(free).padStart(18) +
      toDecimalString(used).padStart(18) +
      toDecimalString(total).padStart(18)
    );
  });
  return [header, ...rows];
}

export function formatTicker(ticker: Ticker): string[] {
  return [
    ticker.symbol,
    `  bid:    ${toDecimalString(ticker.bid)}`,
    `  ask:    ${toDecimalString(ticker.ask)}`,
    `  last:   ${toDecimalString(ticker.last)}`,
    `  spread: ${toDecimalString(ticker.ask - ticker.bid)}`,
    `  time:   ${formatTimestamp(ticker.timestamp)}`,
  ];
}

function formatLevels(levels: readonly OrderBookLevel[]): string[] {
  if (levels.length === 0) {
    return ['    (empty)'];
  }
  return levels.map((level) => `    ${toDecimalString(level.price)} x ${toDecimalString(level.quantity)}`);
}

/**
 * Asks print highest first so both sides meet at the spread
 */
export function formatOrderBook(book: OrderBook): string[] {
  return [
    `${book.symbol} order book at ${formatTimestamp(book.timestamp)}`,
    '  asks:',
    ...formatLevels([...book.asks].reverse()),
    '  bids:',
    ...formatLevels(book.bids),
  ];
}

export function formatCandles(candles: readonly Candle[]): string[] {
  if (candles.length === 0) {
    return ['No candles'];
  }
  return candles.map(
    (candle) =>
      `${formatTimestamp(new Date(candle.timestamp))}  O ${toDecimalString(candle.open)}  H ${toDecimalString(candle.high)}` +
      `  L ${toDecimalString(candle.low)}  C ${toDecimalString(candle.close)}  V ${toDecimalString(candle.volume)}`
  );
}
