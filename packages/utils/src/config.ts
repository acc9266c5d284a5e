import { z } from 'zod';
import type { ZodError } from 'zod';
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MOCK_SEED,
  DEFAULT_RECV_WINDOW_MS,
  DEFAULT_STARTING_BALANCE,
  DEFAULT_TRANSIENT_CODES,
  MAX_ORDER_QUANTITY,
  MIN_ORDER_QUANTITY,
} from './constants';

export const ExchangeModeSchema = z.enum(['mock', 'ccxt', 'rest']);

export const MarketTypeSchema = z.enum(['futures', 'spot']);

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

// Boolean string validation (handles 'true', 'false', '1', '0', 'yes', 'no')
const BooleanStringSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((val) => val === 'true' || val === '1' || val === 'yes');

// "USDT:10000,BTC:0.5" -> { USDT: 10000, BTC: 0.5 }
const BalanceStringSchema = z.string().transform((value, ctx) => {
  const balances: Record<string, number> = {};
  for (const entry of value.split(',').map((part) => part.trim()).filter(Boolean)) {
    const [asset, amount] = entry.split(':');
    const parsed = Number(amount);
    if (!asset || !/^[A-Za-z0-9]+$/.test(asset) || amount === undefined || !Number.isFinite(parsed) || parsed < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid balance entry '${entry}', expected ASSET:AMOUNT` });
      return z.NEVER;
    }
    balances[asset.toUpperCase()] = parsed;
  }
  return balances;
});

const TransientCodesStringSchema = z.string().transform((value) =>
  value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((code) => (/^-?\d+$/.test(code) ? Number(code) : code))
);

/**
 * Operator overrides of the retry policy. Absent fields fall back to the
 * selected backend's own profile (see `RETRY_PROFILES`).
 */
export const RetrySettingsSchema = z
  .object({
    maxRetries: z.number().int().min(0).optional(),
    initialDelayMs: z.number().int().positive().optional(),
    maxDelayMs: z.number().int().positive().optional(),
    backoffMultiplier: z.number().min(1).optional(),
    jitterFactor: z.number().min(0).max(1).optional(),
    maxElapsedMs: z.number().int().positive().optional(),
  })
  // Drop keys given as undefined so spreading over a profile keeps its values
  .transform(({ maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier, jitterFactor, maxElapsedMs }) => ({
    ...(maxRetries !== undefined ? { maxRetries } : {}),
    ...(initialDelayMs !== undefined ? { initialDelayMs } : {}),
    ...(maxDelayMs !== undefined ? { maxDelayMs } : {}),
    ...(backoffMultiplier !== undefined ? { backoffMultiplier } : {}),
    ...(jitterFactor !== undefined ? { jitterFactor } : {}),
    ...(maxElapsedMs !== undefined ? { maxElapsedMs } : {}),
  }));

/**
 * Configuration consumed by the core. Built once by the caller and passed
 * to OrderManager; nothing reads it from process-wide state.
 */
export const TradingConfigSchema = z
  .object({
    mode: ExchangeModeSchema.default('mock'),
    market: MarketTypeSchema.default('futures'),
    apiKey: z.string().min(1).optional(),
    apiSecret: z.string().min(1).optional(),
    /** Testnet unless the operator explicitly opts into real funds */
    sandbox: z.boolean().default(true),
    minOrderQuantity: z.number().positive().default(MIN_ORDER_QUANTITY),
    maxOrderQuantity: z.number().positive().default(MAX_ORDER_QUANTITY),
    startingBalance: z.record(z.number().nonnegative()).default({ ...DEFAULT_STARTING_BALANCE }),
    mockSeed: z.number().int().default(DEFAULT_MOCK_SEED),
    retry: RetrySettingsSchema.default({}),
    transientCodes: z.array(z.union([z.number(), z.string()])).default([...DEFAULT_TRANSIENT_CODES]),
    recvWindowMs: z.number().int().positive().max(60000).default(DEFAULT_RECV_WINDOW_MS),
    httpTimeoutMs: z.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
    restBaseUrl: z.string().url().optional(),
  })
  .refine((config) => config.minOrderQuantity <= config.maxOrderQuantity, {
    message: 'minOrderQuantity must not exceed maxOrderQuantity',
    path: ['minOrderQuantity'],
  });

export type TradingConfig = z.output<typeof TradingConfigSchema>;
export type TradingConfigInput = z.input<typeof TradingConfigSchema>;
export type RetrySettings = z.output<typeof RetrySettingsSchema>;

// Environment validation
export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Backend selection
  EXCHANGE_MODE: z.string().trim().toLowerCase().pipe(ExchangeModeSchema).optional(),
  EXCHANGE_MARKET: z.string().trim().toLowerCase().pipe(MarketTypeSchema).optional(),

  // Credentials (BINANCE_* kept as fallbacks)
  API_KEY: z.string().min(1).optional(),
  API_SECRET: z.string().min(1).optional(),
  BINANCE_API_KEY: z.string().min(1).optional(),
  BINANCE_API_SECRET: z.string().min(1).optional(),
  SANDBOX: BooleanStringSchema.optional(),

  // Trading limits
  MIN_ORDER_QUANTITY: z.coerce.number().positive().optional(),
  MAX_ORDER_QUANTITY: z.coerce.number().positive().optional(),

  // Mock exchange
  MOCK_STARTING_BALANCE: BalanceStringSchema.optional(),
  MOCK_SEED: z.coerce.number().int().optional(),

  // Retry and transport
  // Total tries per call, the first one included
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  RETRY_BACKOFF_MS: z.coerce.number().int().positive().optional(),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().positive().optional(),
  RETRY_MAX_ELAPSED_MS: z.coerce.number().int().positive().optional(),
  TRANSIENT_CODES: TransientCodesStringSchema.optional(),
  RECV_WINDOW_MS: z.coerce.number().int().positive().optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  REST_BASE_URL: z.string().url().optional(),

  // Logging configuration
  LOG_LEVEL: LogLevelSchema.optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export type SafeLoadResult = { success: true; data: TradingConfig } | { success: false; error: ZodError };

function envToConfigInput(env: EnvConfig): TradingConfigInput {
  return {
    mode: env.EXCHANGE_MODE,
    market: env.EXCHANGE_MARKET,
    apiKey: env.API_KEY ?? env.BINANCE_API_KEY,
    apiSecret: env.API_SECRET ?? env.BINANCE_API_SECRET,
    sandbox: env.SANDBOX,
    minOrderQuantity: env.MIN_ORDER_QUANTITY,
    maxOrderQuantity: env.MAX_ORDER_QUANTITY,
    startingBalance: env.MOCK_STARTING_BALANCE,
    mockSeed: env.MOCK_SEED,
    retry: {
      maxRetries: env.RETRY_MAX_ATTEMPTS === undefined ? undefined : env.RETRY_MAX_ATTEMPTS - 1,
      initialDelayMs: env.RETRY_BACKOFF_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      maxElapsedMs: env.RETRY_MAX_ELAPSED_MS,
    },
    transientCodes: env.TRANSIENT_CODES,
    recvWindowMs: env.RECV_WINDOW_MS,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    restBaseUrl: env.REST_BASE_URL,
  };
}

/**
 * Build a TradingConfig from programmatic input, applying defaults.
 * Throws a ZodError if validation fails.
 */
export function parseConfig(input: TradingConfigInput = {}): TradingConfig {
  return TradingConfigSchema.parse(input);
}

/**
 * Load configuration from environment variables.
 * Throws a ZodError if validation fails, with detailed messages.
 *
 * @example
 * ```typescript
 * import { loadConfig } from '@tradegate/utils';
 *
 * const config = loadConfig();
 * const manager = new OrderManager(config);
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TradingConfig {
  return parseConfig(envToConfigInput(EnvSchema.parse(env)));
}

/**
 * Safely load configuration without throwing.
 */
export function safeLoadConfig(env: NodeJS.ProcessEnv = process.env): SafeLoadResult {
  const envResult = EnvSchema.safeParse(env);
  if (!envResult.success) {
    return { success: false, error: envResult.error };
  }
  const result = TradingConfigSchema.safeParse(envToConfigInput(envResult.data));
  return result.success ? { success: true, data: result.data } : { success: false, error: result.error };
}
