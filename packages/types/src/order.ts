export type OrderSide = 'BUY' | 'SELL';

export type OrderType = 'MARKET' | 'LIMIT';

export type OrderStatus =
  | 'NEW'              // Accepted, not yet matched
  | 'OPEN'             // Resting, waiting for a cross or a cancel
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'REJECTED'
  | 'EXPIRED';

export interface Order {
  id: number;
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  /** Limit price; absent for market orders */
  price?: number;
  status: OrderStatus;
  executedQuantity: number;
  /** Average fill price, 0 until something fills */
  avgPrice: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Raw, unvalidated order request as it arrives from a caller
 */
export interface CreateOrderRequest {
  symbol: string;
  side: string;
  type: string;
  quantity: number;
  price?: number;
}

/**
 * Order parameters after validation and normalization
 */
export interface OrderParams {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  price?: number;
}
