/**
 * In-process stand-in for a ws WebSocket, recording what the manager sends.
 */

import { WebSocket } from 'ws';
import type { UpdateSocket } from '../../core/connection-manager.js';
import { OrderUpdateSchema, type OrderUpdate } from '../../core/types.js';

export class FakeSocket implements UpdateSocket {
  public readyState: number = WebSocket.OPEN;
  public sent: string[] = [];
  public closed: Array<{ code?: number; reason?: string }> = [];

  constructor(private readonly failWith?: Error) {}

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.failWith) {
      cb?.(this.failWith);
      return;
    }
    this.sent.push(data);
    cb?.();
  }

  close(code?: number, reason?: string): void {
    this.readyState = WebSocket.CLOSED;
    this.closed.push({ code, reason });
  }

  updates(): OrderUpdate[] {
    return this.sent.map(frame => OrderUpdateSchema.parse(JSON.parse(frame)));
  }
}
