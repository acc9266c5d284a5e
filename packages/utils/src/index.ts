// Constants
export {
  MAX_ORDER_QUANTITY,
  MIN_ORDER_QUANTITY,
  QUOTE_ASSETS,
  AMOUNT_PRECISION,
  DEFAULT_STARTING_BALANCE,
  DEFAULT_MOCK_SEED,
  MOCK_SLIPPAGE,
  MOCK_SPREAD,
  MOCK_TICK_VOLATILITY,
  MOCK_CANDLE_HISTORY,
  MOCK_MIN_PRICE,
  REFERENCE_PRICES_USD,
  DEFAULT_RECV_WINDOW_MS,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_TIMEFRAME,
  DEFAULT_CANDLE_LIMIT,
  MAX_CANDLE_LIMIT,
  DEFAULT_ORDER_BOOK_LIMIT,
  MAX_ORDER_BOOK_LIMIT,
  TIMEFRAMES,
  TIMEFRAME_MS,
  EXCHANGE_ERROR_CODES,
  AUTH_ERROR_CODES,
  NOT_FOUND_ERROR_CODES,
  DEFAULT_TRANSIENT_CODES,
} from './constants';

// Symbols
export { splitSymbol, toSlashSymbol, fromSlashSymbol } from './symbols';
export type { SymbolParts } from './symbols';

// Errors
export {
  TradingError,
  ValidationError,
  AuthError,
  NetworkError,
  ExchangeError,
  NotFoundError,
  isTradingError,
  isRetryableTradingError,
} from './errors';

export type { TradingErrorKind, ExchangeErrorCode } from './errors';

// Validation schemas
export {
  SymbolSchema,
  OrderSideSchema,
  OrderTypeSchema,
  OrderIdSchema,
  TimeframeSchema,
  createOrderSchema,
  toValidationError,
  validateOrder,
  validateSymbol,
  validateOrderId,
  validateTimeframe,
  validateLimit,
  DEFAULT_QUANTITY_BOUNDS,
} from './validation';

export type { QuantityBounds } from './validation';

// Formatting utilities
export { formatTimestamp, toDecimalString, round } from './formatting';

// Request signing
export {
  buildQueryString,
  signQueryString,
  createSignedQuery,
  verifyQuerySignature,
  splitSignedQuery,
} from './crypto';

export type { QueryValue, QueryParams, SignedQuery } from './crypto';

// Math utilities
export { createRng, hashSeed, randomNormal, gbmReturn, gbmNextPrice } from './math';

// Retry utilities
export {
  retryWithBackoff,
  retry,
  calculateBackoffDelay,
  sleep,
  isRetryableError,
  DEFAULT_RETRY_CONFIG,
  RETRY_PROFILES,
} from './retry';

export type { RetryConfig, RetryResult } from './retry';

// Logger utilities
export {
  createLogger,
  createChildLogger,
  getLogLevel,
  isValidLogLevel,
  LOG_LEVELS,
  DEFAULT_LOG_LEVELS,
} from './logger';

export type { Logger, Level, LoggerConfig, LogLevel, Environment } from './logger';

// Configuration
export {
  ExchangeModeSchema,
  MarketTypeSchema,
  LogLevelSchema,
  RetrySettingsSchema,
  TradingConfigSchema,
  EnvSchema,
  parseConfig,
  loadConfig,
  safeLoadConfig,
} from './config';

export type { TradingConfig, TradingConfigInput, RetrySettings, EnvConfig, SafeLoadResult } from './config';
