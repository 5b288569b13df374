/**
 * Order Service - Order lifecycle and execution
 *
 * Features:
 * - Creates PENDING orders and broadcasts them to the update feed
 * - Executes orders after a random delay drawn from [minDelayMs, maxDelayMs]
 * - Cancels PENDING orders, broadcasting CANCELLED before removing them
 * - Tracks outstanding execution timers so shutdown never leaves a request hanging
 *
 * Broadcast order per order: PENDING always goes out before EXECUTED or CANCELLED.
 */

import { v4 as uuidv4 } from 'uuid';
import { createCategoryLogger } from './logger.js';
import type { ConnectionManager } from './connection-manager.js';
import type { OrderStorage } from './order-storage.js';
import {
  OrderError,
  type CancelResult,
  type CreateOrderOptions,
  type Order,
  type OrderDeskStats
} from './types.js';

const logger = createCategoryLogger('core.orders');

export interface OrderServiceConfig {
  storage: OrderStorage;
  connections: ConnectionManager;
  minDelayMs?: number; // default 100
  maxDelayMs?: number; // default 1000
  random?: () => number; // uniform in [0, 1)
}

export const DEFAULT_MIN_DELAY_MS = 100;
export const DEFAULT_MAX_DELAY_MS = 1000;

export class OrderService {
  private readonly storage: OrderStorage;
  private readonly connections: ConnectionManager;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly random: () => number;
  private readonly timers = new Map<NodeJS.Timeout, () => void>();
  private cancelledCount = 0;
  private stopped = false;

  constructor(config: OrderServiceConfig) {
    this.storage = config.storage;
    this.connections = config.connections;
    this.minDelayMs = config.minDelayMs ?? DEFAULT_MIN_DELAY_MS;
    this.maxDelayMs = config.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.random = config.random ?? Math.random;

    if (this.minDelayMs < 0 || this.maxDelayMs < this.minDelayMs) {
      throw new RangeError(`Invalid execution delay range [${this.minDelayMs}, ${this.maxDelayMs}]`);
    }
  }

  /**
   * Create a PENDING order. With execute, waits for execution to finish, so the
   * result is EXECUTED, or CANCELLED if a cancel got in first (PENDING after shutdown).
   */
  async createOrder(options: CreateOrderOptions = { execute: true }): Promise<Order> {
    const order = await this.storage.save({ id: uuidv4(), status: 'PENDING' });
    logger.debug(`Order ${order.id} created`);
    await this.connections.sendUpdate(order);

    if (!options.execute) {
      return order;
    }

    const executed = await this.executeOrder(order.id);
    if (executed) return executed;

    // Only a cancel removes an order
    return (await this.storage.get(order.id)) ?? { ...order, status: 'CANCELLED' };
  }

  /**
   * Wait the execution delay, then mark the order EXECUTED if it is still PENDING.
   * Returns the executed order, or null when it was gone or no longer PENDING.
   */
  async executeOrder(orderId: string): Promise<Order | null> {
    if (this.stopped) return null;
    await this.wait(this.nextDelay());
    if (this.stopped) return null;

    const order = await this.storage.get(orderId);
    if (!order || order.status !== 'PENDING') {
      logger.debug(`Order ${orderId} not executed (${order ? order.status : 'missing'})`);
      return null;
    }

    const executed = await this.storage.save({ ...order, status: 'EXECUTED' });
    logger.debug(`Order ${orderId} executed`);
    await this.connections.sendUpdate(executed);
    return executed;
  }

  async listOrders(): Promise<Order[]> {
    const orders = await this.storage.list();
    if (orders.length === 0) {
      throw new OrderError(404, 'Orders are empty', 'ORDERS_EMPTY');
    }
    return orders;
  }

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.storage.get(orderId);
    if (!order) {
      throw new OrderError(404, `Order ${orderId} not found`, 'ORDER_NOT_FOUND');
    }
    return order;
  }

  async cancelOrder(orderId: string): Promise<CancelResult> {
    const order = await this.storage.get(orderId);
    if (!order) {
      throw new OrderError(404, 'Order not found', 'ORDER_NOT_FOUND');
    }
    if (order.status !== 'PENDING') {
      throw new OrderError(400, 'Cannot cancel non-pending order', 'ORDER_NOT_PENDING');
    }

    const cancelled = await this.storage.save({ ...order, status: 'CANCELLED' });
    await this.connections.sendUpdate(cancelled);
    await this.storage.delete(orderId);
    this.cancelledCount++;

    logger.debug(`Order ${orderId} cancelled`);
    return { detail: 'Order cancelled' };
  }

  /**
   * CANCELLED counts orders cancelled since start; they are no longer stored.
   */
  async stats(): Promise<OrderDeskStats> {
    const orders = await this.storage.list();
    return {
      orders: {
        PENDING: orders.filter(order => order.status === 'PENDING').length,
        EXECUTED: orders.filter(order => order.status === 'EXECUTED').length,
        CANCELLED: this.cancelledCount,
        total: orders.length
      },
      connections: this.connections.count()
    };
  }

  pendingExecutions(): number {
    return this.timers.size;
  }

  /**
   * Clear outstanding execution timers and release their waiters.
   * Released orders stay PENDING.
   */
  shutdown(): void {
    this.stopped = true;
    for (const [timer, release] of this.timers) {
      clearTimeout(timer);
      release();
    }
    this.timers.clear();
  }

  private nextDelay(): number {
    return this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        resolve();
      }, ms);
      this.timers.set(timer, resolve);
    });
  }
}

export function createOrderService(config: OrderServiceConfig): OrderService {
  return new OrderService(config);
}
