/**
 * Order Desk Types
 *
 * Order lifecycle: PENDING -> EXECUTED, or PENDING -> CANCELLED (then removed).
 * EXECUTED and CANCELLED are terminal.
 */

import { z } from 'zod';

export const ORDER_STATUSES = ['PENDING', 'EXECUTED', 'CANCELLED'] as const;

export const OrderStatusSchema = z.enum(ORDER_STATUSES);
export type OrderStatus = z.infer<typeof OrderStatusSchema>;

export const OrderSchema = z.object({
  id: z.string().uuid(),
  status: OrderStatusSchema
});
export type Order = z.infer<typeof OrderSchema>;

/**
 * Frame pushed to every WebSocket client on a status change.
 */
export const OrderUpdateSchema = z.object({
  orderId: z.string(),
  status: OrderStatusSchema
});
export type OrderUpdate = z.infer<typeof OrderUpdateSchema>;

const TRUE_FLAGS = ['true', 't', '1', 'yes', 'y', 'on'];
const FALSE_FLAGS = ['false', 'f', '0', 'no', 'n', 'off'];

/**
 * Query-string boolean: true/false, t/f, 1/0, yes/no, y/n, on/off (any case).
 * Anything else is left as-is so z.boolean() rejects it.
 */
export const QueryFlagSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (TRUE_FLAGS.includes(normalized)) return true;
  if (FALSE_FLAGS.includes(normalized)) return false;
  return value;
}, z.boolean());

export const CreateOrderQuerySchema = z.object({
  execute_order: QueryFlagSchema.optional().default(true)
});
export type CreateOrderQuery = z.infer<typeof CreateOrderQuerySchema>;

export interface CreateOrderOptions {
  execute: boolean;
}

export interface CancelResult {
  detail: string;
}

export type OrderCounts = Record<OrderStatus, number> & { total: number };

export interface OrderDeskStats {
  orders: OrderCounts;
  connections: number;
}

export type OrderErrorCode =
  | 'ORDERS_EMPTY'
  | 'ORDER_NOT_FOUND'
  | 'ORDER_NOT_PENDING';

/**
 * Domain error carrying the HTTP status the API answers with.
 */
export class OrderError extends Error {
  public readonly status: number;
  public readonly code: OrderErrorCode;

  constructor(status: number, message: string, code: OrderErrorCode) {
    super(message);
    this.name = 'OrderError';
    this.status = status;
    this.code = code;
  }
}
