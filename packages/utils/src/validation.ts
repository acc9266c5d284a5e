import { z, ZodError } from 'zod';
import type { OrderParams, Timeframe } from '@tradegate/types';
import { MAX_ORDER_QUANTITY, MIN_ORDER_QUANTITY, TIMEFRAMES } from './constants';
import { ValidationError } from './errors';
import { splitSymbol } from './symbols';

export interface QuantityBounds {
  minOrderQuantity: number;
  maxOrderQuantity: number;
}

export const DEFAULT_QUANTITY_BOUNDS: QuantityBounds = {
  minOrderQuantity: MIN_ORDER_QUANTITY,
  maxOrderQuantity: MAX_ORDER_QUANTITY,
};

// Symbol validation: BTCUSDT, btcusdt and BTC/USDT all normalize to BTCUSDT
export const SymbolSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .toUpperCase()
  .transform((value) => value.replace('/', ''))
  .superRefine((value, ctx) => {
    if (value.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'cannot be empty' });
      return;
    }
    if (!/^[A-Z0-9]+$/.test(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `'${value}' must be uppercase letters and digits like BTCUSDT`,
      });
      return;
    }
    const parts = splitSymbol(value);
    if (!parts) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' has no supported quote asset` });
      return;
    }
    if (parts.base.length < 2 || parts.base === parts.quote) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' has an invalid base asset` });
    }
  });

// Order validation schemas
export const OrderSideSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .toUpperCase()
  .pipe(z.enum(['BUY', 'SELL'], { errorMap: () => ({ message: "must be 'BUY' or 'SELL'" }) }));

export const OrderTypeSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .toUpperCase()
  .pipe(z.enum(['MARKET', 'LIMIT'], { errorMap: () => ({ message: "must be 'MARKET' or 'LIMIT'" }) }));

const numberSchema = () =>
  z
    .number({ required_error: 'is required', invalid_type_error: 'must be a valid number' })
    .finite('must be a finite number');

/**
 * Build the order schema for the configured quantity bounds
 */
export function createOrderSchema(bounds: QuantityBounds = DEFAULT_QUANTITY_BOUNDS) {
  return z
    .object({
      symbol: SymbolSchema,
      side: OrderSideSchema,
      type: OrderTypeSchema,
      quantity: numberSchema()
        .positive('must be greater than 0')
        .min(bounds.minOrderQuantity, `is below minimum (${bounds.minOrderQuantity})`)
        .max(bounds.maxOrderQuantity, `exceeds maximum (${bounds.maxOrderQuantity})`),
      price: numberSchema().positive('must be greater than 0').optional(),
    })
    .superRefine((order, ctx) => {
      if (order.type === 'LIMIT' && order.price === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['price'], message: 'is required for LIMIT orders' });
      }
      if (order.type === 'MARKET' && order.price !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['price'], message: 'is not allowed for MARKET orders' });
      }
    });
}

export const OrderIdSchema = z
  .number({ required_error: 'is required', invalid_type_error: 'must be a valid number' })
  .int('must be an integer')
  .positive('must be greater than 0')
  .max(Number.MAX_SAFE_INTEGER, 'is too large');

export const TimeframeSchema = z.enum(TIMEFRAMES, {
  errorMap: () => ({ message: `must be one of: ${TIMEFRAMES.join(', ')}` }),
});

/**
 * Convert the first zod issue into a ValidationError naming the field
 */
export function toValidationError(error: ZodError, fallbackField: string): ValidationError {
  const [issue] = error.issues;
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : fallbackField;
  return new ValidationError(field, issue?.message ?? 'is invalid');
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, field: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw toValidationError(result.error, field);
  }
  return result.data;
}

/**
 * Validate and normalize an order request. Pure: no I/O, no state.
 *
 * @throws ValidationError naming the first offending field
 */
export function validateOrder(input: unknown, bounds: QuantityBounds = DEFAULT_QUANTITY_BOUNDS): OrderParams {
  const order = parseOrThrow(createOrderSchema(bounds), input, 'order');
  const params: OrderParams = {
    symbol: order.symbol,
    side: order.side,
    type: order.type,
    quantity: order.quantity,
  };
  if (order.type === 'LIMIT') {
    params.price = order.price;
  }
  return params;
}

export function validateSymbol(symbol: unknown): string {
  return parseOrThrow(SymbolSchema, symbol, 'symbol');
}

export function validateOrderId(orderId: unknown): number {
  return parseOrThrow(OrderIdSchema, orderId, 'orderId');
}

export function validateTimeframe(timeframe: unknown): Timeframe {
  return parseOrThrow(TimeframeSchema, timeframe, 'timeframe');
}

export function validateLimit(limit: unknown, max: number): number {
  const schema = z
    .number({ invalid_type_error: 'must be a valid number' })
    .int('must be an integer')
    .positive('must be greater than 0')
    .max(max, `exceeds maximum (${max})`);
  return parseOrThrow(schema, limit, 'limit');
}
