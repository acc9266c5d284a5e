import type {
  Balance,
  Candle,
  CredentialProvider,
  ExchangeCredentials,
  ExchangeMode,
  Order,
  OrderBook,
  OrderParams,
  Ticker,
  Timeframe,
} from '@tradegate/types';
import { AuthError } from '@tradegate/utils';

/**
 * The one contract every backend implements. Inputs arrive already
 * validated and normalized by OrderManager.
 */
export interface ExchangeBackend {
  readonly mode: ExchangeMode;

  createOrder(params: OrderParams): Promise<Order>;
  cancelOrder(symbol: string, orderId: number): Promise<Order>;
  fetchOrder(symbol: string, orderId: number): Promise<Order>;
  /** Resting orders, ascending by id; all symbols when none is given */
  fetchOpenOrders(symbol?: string): Promise<Order[]>;
  fetchBalance(): Promise<Balance>;
  fetchTicker(symbol: string): Promise<Ticker>;
  fetchOrderBook(symbol: string, limit: number): Promise<OrderBook>;
  fetchOhlcv(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]>;
  testConnection(): Promise<boolean>;
}

/**
 * Wrap a provider so it is consulted once, on first authenticated use.
 * A failed or empty resolution is not cached.
 */
export function createCredentialResolver(
  provider: CredentialProvider | undefined
): () => Promise<ExchangeCredentials> {
  let cached: ExchangeCredentials | undefined;

  return async () => {
    if (cached) {
      return cached;
    }
    if (!provider) {
      throw new AuthError('API credentials are not configured');
    }
    const credentials = await provider();
    if (!credentials.apiKey.trim() || !credentials.apiSecret.trim()) {
      throw new AuthError('API key and secret must both be provided');
    }
    cached = { apiKey: credentials.apiKey.trim(), apiSecret: credentials.apiSecret.trim() };
    return cached;
  };
}
