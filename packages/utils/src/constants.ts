import type { Timeframe } from '@tradegate/types';

// Trading limits
export const MAX_ORDER_QUANTITY = 1000;
export const MIN_ORDER_QUANTITY = 0.001;

// Quote assets accepted in canonical BASEQUOTE symbols, longest first so
// that USDT wins over a hypothetical USD suffix match
export const QUOTE_ASSETS = ['USDT', 'BUSD', 'BTC', 'ETH', 'BNB'] as const;

// Decimal places kept on ledger amounts
export const AMOUNT_PRECISION = 8;

// Mock exchange defaults
export const DEFAULT_STARTING_BALANCE: Readonly<Record<string, number>> = { USDT: 10_000 };
export const DEFAULT_MOCK_SEED = 42;
export const MOCK_SLIPPAGE = 0.001;
export const MOCK_SPREAD = 0.001;
export const MOCK_TICK_VOLATILITY = 0.0005;
export const MOCK_CANDLE_HISTORY = 500;
export const MOCK_MIN_PRICE = 1e-8;

// USD reference prices used to seed the mock mid-price model
export const REFERENCE_PRICES_USD: Readonly<Record<string, number>> = {
  BTC: 45_000,
  ETH: 3_000,
  BNB: 450,
  SOL: 180,
  ADA: 1.2,
  XRP: 0.6,
  DOGE: 0.08,
  USDT: 1,
  BUSD: 1,
};

// Live request defaults
export const DEFAULT_RECV_WINDOW_MS = 5000;
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

// Market data defaults
export const DEFAULT_TIMEFRAME: Timeframe = '1h';
export const DEFAULT_CANDLE_LIMIT = 100;
export const MAX_CANDLE_LIMIT = 1500;
export const DEFAULT_ORDER_BOOK_LIMIT = 20;
export const MAX_ORDER_BOOK_LIMIT = 1000;

export const TIMEFRAMES = [
  '1m',
  '3m',
  '5m',
  '15m',
  '30m',
  '1h',
  '2h',
  '4h',
  '6h',
  '8h',
  '12h',
  '1d',
  '3d',
  '1w',
] as const satisfies readonly Timeframe[];

export const TIMEFRAME_MS: Readonly<Record<Timeframe, number>> = {
  '1m': 60_000,
  '3m': 180_000,
  '5m': 300_000,
  '15m': 900_000,
  '30m': 1_800_000,
  '1h': 3_600_000,
  '2h': 7_200_000,
  '4h': 14_400_000,
  '6h': 21_600_000,
  '8h': 28_800_000,
  '12h': 43_200_000,
  '1d': 86_400_000,
  '3d': 259_200_000,
  '1w': 604_800_000,
};

// Exchange error codes (Binance numbering)
export const EXCHANGE_ERROR_CODES = {
  DISCONNECTED: -1001,
  TOO_MANY_REQUESTS: -1003,
  TIMEOUT: -1007,
  TOO_MANY_ORDERS: -1015,
  INVALID_TIMESTAMP: -1021,
  INVALID_SIGNATURE: -1022,
  BAD_SYMBOL: -1121,
  NEW_ORDER_REJECTED: -2010,
  CANCEL_REJECTED: -2011,
  NO_SUCH_ORDER: -2013,
  BAD_API_KEY_FORMAT: -2014,
  REJECTED_MBX_KEY: -2015,
} as const;

/** Codes that mean the credentials, signature, permissions or clock are wrong */
export const AUTH_ERROR_CODES: readonly number[] = [
  EXCHANGE_ERROR_CODES.INVALID_TIMESTAMP,
  EXCHANGE_ERROR_CODES.INVALID_SIGNATURE,
  EXCHANGE_ERROR_CODES.BAD_API_KEY_FORMAT,
  EXCHANGE_ERROR_CODES.REJECTED_MBX_KEY,
];

/** Codes that mean the referenced order or symbol does not exist */
export const NOT_FOUND_ERROR_CODES: readonly number[] = [
  EXCHANGE_ERROR_CODES.BAD_SYMBOL,
  EXCHANGE_ERROR_CODES.CANCEL_REJECTED,
  EXCHANGE_ERROR_CODES.NO_SUCH_ORDER,
];

/** Default allow-list of transient codes (exchange codes, HTTP statuses, ccxt class names) */
export const DEFAULT_TRANSIENT_CODES: readonly (number | string)[] = [
  EXCHANGE_ERROR_CODES.DISCONNECTED,
  EXCHANGE_ERROR_CODES.TOO_MANY_REQUESTS,
  EXCHANGE_ERROR_CODES.TIMEOUT,
  EXCHANGE_ERROR_CODES.TOO_MANY_ORDERS,
  418,
  429,
  502,
  503,
  504,
  'RateLimitExceeded',
  'DDoSProtection',
];
