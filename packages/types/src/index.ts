// Order types
export type {
  OrderSide,
  OrderType,
  OrderStatus,
  Order,
  CreateOrderRequest,
  OrderParams,
} from './order';

// Market data types
export type {
  Ticker,
  Candle,
  OrderBook,
  OrderBookLevel,
  Timeframe,
} from './market';

// Balance types
export type {
  AssetBalance,
  Balance,
} from './balance';

// Exchange types
export type {
  ExchangeMode,
  MarketType,
  ExchangeCredentials,
  CredentialProvider,
} from './exchange';
