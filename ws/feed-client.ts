/**
 * Order Feed Client - Node.js consumer of the /ws update feed
 *
 * Features:
 * - Buffers frames as they arrive, so none are lost between next() calls
 * - Validates each frame as an OrderUpdate; other frames (pong) are skipped
 * - next() waits for the following update with a timeout
 *
 * Usage:
 * ```typescript
 * const feed = await OrderFeedClient.connect('ws://localhost:5734/ws');
 * const update = await feed.next();
 * await feed.close();
 * ```
 */

import { WebSocket, type RawData } from 'ws';
import { OrderUpdateSchema, type OrderUpdate } from '../core/types.js';

type Waiter = {
  resolve: (update: OrderUpdate) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

export class OrderFeedClient {
  private readonly buffer: OrderUpdate[] = [];
  private readonly waiters: Waiter[] = [];
  private closedError: Error | null = null;

  private constructor(private readonly ws: WebSocket) {
    ws.on('message', (data: RawData) => this.handleFrame(data));
    ws.on('close', () => this.fail(new Error('Feed connection closed')));
    ws.on('error', (error: Error) => this.fail(error));
  }

  static connect(url: string): Promise<OrderFeedClient> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url);
      const client = new OrderFeedClient(ws);
      ws.once('open', () => resolve(client));
      ws.once('error', reject);
    });
  }

  /**
   * Updates received but not yet taken by next()
   */
  pending(): number {
    return this.buffer.length;
  }

  next(timeoutMs = 5000): Promise<OrderUpdate> {
    const buffered = this.buffer.shift();
    if (buffered) return Promise.resolve(buffered);
    if (this.closedError) return Promise.reject(this.closedError);

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters.splice(this.waiters.indexOf(waiter), 1);
          reject(new Error(`No order update within ${timeoutMs}ms`));
        }, timeoutMs)
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Send a raw text frame (the server ignores anything but {"type":"ping"})
   */
  send(text: string): void {
    this.ws.send(text);
  }

  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.ws.once('close', () => resolve());
      this.ws.close();
    });
  }

  private handleFrame(data: RawData): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data.toString());
    } catch {
      return;
    }

    const result = OrderUpdateSchema.safeParse(parsed);
    if (!result.success) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(result.data);
    } else {
      this.buffer.push(result.data);
    }
  }

  private fail(error: Error): void {
    this.closedError = error;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
  }
}
