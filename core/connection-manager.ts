/**
 * Connection Manager - WebSocket fan-out for order updates
 *
 * Features:
 * - Tracks accepted WebSocket connections in connection order
 * - Broadcasts {orderId, status} frames to every open connection
 * - Drops a connection whose send fails; the broadcast goes on to the rest
 */

import { WebSocket } from 'ws';
import { createCategoryLogger } from './logger.js';
import type { Order, OrderUpdate } from './types.js';

const logger = createCategoryLogger('ws.connections');

/**
 * The part of a ws WebSocket the manager relies on.
 */
export interface UpdateSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export function toOrderUpdate(order: Order): OrderUpdate {
  return { orderId: order.id, status: order.status };
}

export class ConnectionManager {
  private activeConnections: UpdateSocket[] = [];

  connect(socket: UpdateSocket): void {
    if (this.activeConnections.includes(socket)) return;
    this.activeConnections.push(socket);
    logger.debug(`Client connected (${this.activeConnections.length} active)`);
  }

  disconnect(socket: UpdateSocket): void {
    const index = this.activeConnections.indexOf(socket);
    if (index === -1) return;
    this.activeConnections.splice(index, 1);
    logger.debug(`Client disconnected (${this.activeConnections.length} active)`);
  }

  count(): number {
    return this.activeConnections.length;
  }

  /**
   * Send an order's current status to every open connection.
   * Resolves with the number of connections that accepted the frame.
   */
  async sendUpdate(order: Order): Promise<number> {
    const frame = JSON.stringify(toOrderUpdate(order));
    const targets = this.activeConnections.filter(socket => socket.readyState === WebSocket.OPEN);

    const results = await Promise.all(targets.map(socket => this.sendFrame(socket, frame)));
    const delivered = results.filter(Boolean).length;

    logger.trace(`Order ${order.id} ${order.status} sent to ${delivered}/${targets.length} clients`);
    return delivered;
  }

  closeAll(code = 1001, reason = 'Server shutting down'): void {
    const sockets = [...this.activeConnections];
    this.activeConnections = [];
    for (const socket of sockets) {
      socket.close(code, reason);
    }
  }

  private sendFrame(socket: UpdateSocket, frame: string): Promise<boolean> {
    return new Promise((resolve) => {
      const fail = (error: Error) => {
        logger.warn('Dropping client after failed send', { error: error.message });
        this.disconnect(socket);
        resolve(false);
      };

      try {
        socket.send(frame, (error) => {
          if (error) {
            fail(error);
          } else {
            resolve(true);
          }
        });
      } catch (error) {
        fail(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }
}
