import { QUOTE_ASSETS } from './constants';

export interface SymbolParts {
  base: string;
  quote: string;
}

/**
 * Split a canonical BASEQUOTE symbol using the quote allow-list.
 * Returns null when no allow-listed quote asset terminates the symbol.
 */
export function splitSymbol(symbol: string): SymbolParts | null {
  for (const quote of QUOTE_ASSETS) {
    if (symbol.length > quote.length && symbol.endsWith(quote)) {
      return { base: symbol.slice(0, -quote.length), quote };
    }
  }
  return null;
}

/**
 * BTCUSDT -> BTC/USDT
 */
export function toSlashSymbol(symbol: string): string {
  const parts = splitSymbol(symbol);
  return parts ? `${parts.base}/${parts.quote}` : symbol;
}

/**
 * BTC/USDT or BTC/USDT:USDT -> BTCUSDT
 */
export function fromSlashSymbol(symbol: string): string {
  const [pair] = symbol.split(':');
  return pair.replace('/', '').toUpperCase();
}
