/**
 * Order Storage Tests
 *
 * In-memory store: insertion order, copies in and out, delete/size/clear
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createMemoryOrderStorage, type OrderStorage } from '../../core/order-storage.js';

const ORDER_A = '6f1c2d3e-4b5a-4c6d-8e7f-a0b1c2d3e4f5';
const ORDER_B = '7a2b3c4d-5e6f-4a7b-9c8d-e9f0a1b2c3d4';

describe('Memory Order Storage', () => {
  let storage: OrderStorage;

  beforeEach(() => {
    storage = createMemoryOrderStorage();
  });

  it('should return null for an unknown order', async () => {
    expect(await storage.get('missing')).toBeNull();
  });

  it('should save and get an order', async () => {
    await storage.save({ id: ORDER_A, status: 'PENDING' });

    expect(await storage.get(ORDER_A)).toEqual({ id: ORDER_A, status: 'PENDING' });
    expect(await storage.size()).toBe(1);
  });

  it('should replace an order saved under the same id', async () => {
    await storage.save({ id: ORDER_A, status: 'PENDING' });
    await storage.save({ id: ORDER_A, status: 'EXECUTED' });

    expect(await storage.get(ORDER_A)).toEqual({ id: ORDER_A, status: 'EXECUTED' });
    expect(await storage.size()).toBe(1);
  });

  it('should list orders in insertion order', async () => {
    await storage.save({ id: ORDER_B, status: 'PENDING' });
    await storage.save({ id: ORDER_A, status: 'EXECUTED' });

    expect(await storage.list()).toEqual([
      { id: ORDER_B, status: 'PENDING' },
      { id: ORDER_A, status: 'EXECUTED' }
    ]);
  });

  it('should not expose stored state through returned objects', async () => {
    const saved = await storage.save({ id: ORDER_A, status: 'PENDING' });
    saved.status = 'EXECUTED';

    const fetched = await storage.get(ORDER_A);
    expect(fetched?.status).toBe('PENDING');

    const [listed] = await storage.list();
    if (listed) listed.status = 'CANCELLED';
    expect((await storage.get(ORDER_A))?.status).toBe('PENDING');
  });

  it('should delete orders and report whether they existed', async () => {
    await storage.save({ id: ORDER_A, status: 'PENDING' });

    expect(await storage.delete(ORDER_A)).toBe(true);
    expect(await storage.delete(ORDER_A)).toBe(false);
    expect(await storage.get(ORDER_A)).toBeNull();
  });

  it('should clear all orders', async () => {
    await storage.save({ id: ORDER_A, status: 'PENDING' });
    await storage.save({ id: ORDER_B, status: 'PENDING' });

    await storage.clear();

    expect(await storage.size()).toBe(0);
    expect(await storage.list()).toEqual([]);
  });
});
