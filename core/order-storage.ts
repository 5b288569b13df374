/**
 * Order Storage - In-Memory Order Store
 *
 * Purpose: Holds the order desk's orders for the life of the process
 *
 * Implementation:
 * - Map keyed by order id (insertion order is list order)
 * - Orders are copied on the way in and out, so callers never hold stored state
 *
 * Note: Data is NOT persisted - the desk is empty after a restart
 */

import type { Order } from './types.js';

/**
 * Order storage interface
 */
export interface OrderStorage {
  /**
   * Insert or replace an order by id
   */
  save(order: Order): Promise<Order>;

  /**
   * Get an order by id, or null when absent
   */
  get(id: string): Promise<Order | null>;

  /**
   * All orders in insertion order
   */
  list(): Promise<Order[]>;

  /**
   * Remove an order. Returns false when it was not stored
   */
  delete(id: string): Promise<boolean>;

  size(): Promise<number>;

  clear(): Promise<void>;
}

export function createMemoryOrderStorage(): OrderStorage {
  const orders = new Map<string, Order>();

  async function save(order: Order): Promise<Order> {
    orders.set(order.id, { ...order });
    return { ...order };
  }

  async function get(id: string): Promise<Order | null> {
    const order = orders.get(id);
    return order ? { ...order } : null;
  }

  async function list(): Promise<Order[]> {
    return Array.from(orders.values(), order => ({ ...order }));
  }

  async function remove(id: string): Promise<boolean> {
    return orders.delete(id);
  }

  async function size(): Promise<number> {
    return orders.size;
  }

  async function clear(): Promise<void> {
    orders.clear();
  }

  return {
    save,
    get,
    list,
    delete: remove,
    size,
    clear
  };
}
