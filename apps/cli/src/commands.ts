import { parseArgs } from 'node:util';
import { ZodError } from 'zod';
import type { OrderManager } from '@tradegate/exchange';
import { ValidationError, isTradingError } from '@tradegate/utils';
import type { TradingErrorKind } from '@tradegate/utils';
import {
  formatBalance,
  formatCandles,
  formatOpenOrders,
  formatOrder,
  formatOrderBook,
  formatTicker,
} from './format';

export type ParsedCommand =
  | { command: 'help' }
  | { command: 'order'; symbol: string; side: string; type: string; quantity: number; price?: number }
  | { command: 'cancel' | 'status'; symbol: string; orderId: number }
  | { command: 'open'; symbol?: string }
  | { command: 'balance' }
  | { command: 'ticker'; symbol: string }
  | { command: 'book'; symbol: string; limit?: number }
  | { command: 'candles'; symbol: string; timeframe?: string; limit?: number }
  | { command: 'ping' };

export const USAGE: readonly string[] = [
  'Usage: tradegate <command> [options]',
  '',
  'Commands:',
  '  order <symbol> <side> <type> <quantity> [--price p]   Place a MARKET or LIMIT order',
  '  cancel <symbol> <orderId>                             Cancel a resting order',
  '  status <symbol> <orderId>                             Show one order',
  '  open [symbol]                                         List open orders',
  '  balance                                               Show balances',
  '  ticker <symbol>                                       Show bid, ask and last price',
  '  book <symbol> [--limit n]                             Show the order book',
  '  candles <symbol> [--timeframe tf] [--limit n]         Show OHLCV candles',
  '  ping                                                  Check connectivity and credentials',
  '',
  'Settings come from the environment: EXCHANGE_MODE, EXCHANGE_MARKET, API_KEY, API_SECRET, SANDBOX, ...',
];

export const EXIT_CODES = {
  ok: 0,
  unknown: 1,
  validation: 2,
  auth: 3,
  network: 4,
  exchange: 5,
  not_found: 6,
} as const satisfies Record<TradingErrorKind | 'ok' | 'unknown', number>;

function parseArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        price: { type: 'string' },
        limit: { type: 'string' },
        timeframe: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new ValidationError('arguments', error instanceof Error ? error.message : String(error));
  }
}

// Range and format checks happen in OrderManager; NaN is rejected there
function toNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

function toOptionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : toNumber(value);
}

/**
 * Turn argv (without the node and script entries) into a command
 */
export function parseCommand(argv: readonly string[]): ParsedCommand {
  const { values, positionals } = parseArgv(argv);
  const [name, ...args] = positionals;

  if (values.help || name === undefined || name === 'help') {
    return { command: 'help' };
  }

  const required = (index: number, field: string): string => {
    const value = args[index];
    if (value === undefined) {
      throw new ValidationError(field, 'is required');
    }
    return value;
  };
  const arity = (max: number): void => {
    if (args.length > max) {
      throw new ValidationError('arguments', `unexpected argument '${args[max]}'`);
    }
  };

  switch (name) {
    case 'order':
      arity(4);
      return {
        command: 'order',
        symbol: required(0, 'symbol'),
        side: required(1, 'side'),
        type: required(2, 'type'),
        quantity: toNumber(required(3, 'quantity')),
        price: toOptionalNumber(values.price),
      };
    case 'cancel':
    case 'status':
      arity(2);
      return { command: name, symbol: required(0, 'symbol'), orderId: toNumber(required(1, 'orderId')) };
    case 'open':
      arity(1);
      return { command: 'open', symbol: args[0] };
    case 'balance':
    case 'ping':
      arity(0);
      return { command: name };
    case 'ticker':
      arity(1);
      return { command: 'ticker', symbol: required(0, 'symbol') };
    case 'book':
      arity(1);
      return { command: 'book', symbol: required(0, 'symbol'), limit: toOptionalNumber(values.limit) };
    case 'candles':
      arity(1);
      return {
        command: 'candles',
        symbol: required(0, 'symbol'),
        timeframe: values.timeframe,
        limit: toOptionalNumber(values.limit),
      };
    default:
      throw new ValidationError('command', `unknown command '${name}'`);
  }
}

/**
 * Execute a parsed command, writing result lines to `out`. Errors
 * propagate to the caller.
 */
export async function runCommand(
  command: ParsedCommand,
  manager: OrderManager,
  out: (line: string) => void
): Promise<number> {
  const print = (lines: readonly string[]): number => {
    lines.forEach((line) => out(line));
    return EXIT_CODES.ok;
  };

  switch (command.command) {
    case 'help':
      return print(USAGE);
    case 'order':
      return print(
        formatOrder(
          await manager.createOrder({
            symbol: command.symbol,
            side: command.side,
            type: command.type,
            quantity: command.quantity,
            price: command.price,
          })
        )
      );
    case 'cancel':
      return print(formatOrder(await manager.cancelOrder(command.symbol, command.orderId)));
    case 'status':
      return print(formatOrder(await manager.fetchOrder(command.symbol, command.orderId)));
    case 'open':
      return print(formatOpenOrders(await manager.fetchOpenOrders(command.symbol)));
    case 'balance':
      return print(formatBalance(await manager.fetchBalance()));
    case 'ticker':
      return print(formatTicker(await manager.fetchTicker(command.symbol)));
    case 'book':
      return print(formatOrderBook(await manager.fetchOrderBook(command.symbol, command.limit)));
    case 'candles':
      return print(formatCandles(await manager.fetchOhlcv(command.symbol, command.timeframe, command.limit)));
    case 'ping': {
      const connected = await manager.testConnection();
      out(connected ? `Connected (${manager.mode})` : `Connection failed (${manager.mode})`);
      return connected ? EXIT_CODES.ok : EXIT_CODES.network;
    }
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ZodError) {
    return EXIT_CODES.validation;
  }
  return isTradingError(error) ? EXIT_CODES[error.kind] : EXIT_CODES.unknown;
}

export function formatError(error: unknown): string {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || 'environment'}: ${issue.message}`);
    return `configuration error: ${issues.join('; ')}`;
  }
  if (isTradingError(error)) {
    const code = 'code' in error && error.code !== undefined ? ` [${String(error.code)}]` : '';
    return `${error.kind.replace('_', ' ')} error${code}: ${error.message}`;
  }
  return `error: ${error instanceof Error ? error.message : String(error)}`;
}
