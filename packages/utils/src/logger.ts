import pino from 'pino';
import type { DestinationStream, Level, Logger, LoggerOptions } from 'pino';

export type { Level, Logger };

export type LogLevel = Level | 'silent';

export type Environment = 'development' | 'production' | 'test';

export interface LoggerConfig {
  /** Component name, bound to every line as `service` */
  service: string;
  /** Explicit level; otherwise resolved from the environment */
  level?: LogLevel;
  /** Extra bindings merged into the base object */
  bindings?: Record<string, unknown>;
  /** Where lines are written; stdout when omitted */
  destination?: DestinationStream;
}

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export const DEFAULT_LOG_LEVELS: Record<Environment, LogLevel> = {
  development: 'debug',
  production: 'info',
  test: 'silent',
};

// Credentials and signatures never reach a log line
const REDACT_PATHS = [
  'apiKey',
  'apiSecret',
  'secret',
  'signature',
  '*.apiKey',
  '*.apiSecret',
  '*.secret',
  '*.signature',
];

export function isValidLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function resolveEnvironment(env: NodeJS.ProcessEnv): Environment {
  const nodeEnv = env.NODE_ENV;
  return nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development';
}

/**
 * Resolve the level for a service: LOG_LEVEL_<SERVICE>, then LOG_LEVEL,
 * then the NODE_ENV default
 */
export function getLogLevel(service: string, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const serviceKey = `LOG_LEVEL_${service.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
  const candidates = [env[serviceKey], env.LOG_LEVEL];

  for (const candidate of candidates) {
    const normalized = candidate?.toLowerCase();
    if (isValidLogLevel(normalized)) {
      return normalized;
    }
  }

  return DEFAULT_LOG_LEVELS[resolveEnvironment(env)];
}

/**
 * Create a structured logger for a component
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: config.service,
    level: config.level ?? getLogLevel(config.service),
    base: { service: config.service, ...config.bindings },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Create a child logger carrying additional bindings
 */
export function createChildLogger(logger: Logger, bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
