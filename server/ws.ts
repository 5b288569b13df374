/**
 * Order Update Feed - WebSocket endpoint on /ws
 *
 * Features:
 * - ws WebSocketServer sharing the HTTP server, upgrade limited to /ws
 * - Every accepted client is registered with the ConnectionManager
 * - Client frames are read and ignored, except {"type":"ping"} which gets a pong
 * - Heartbeat: protocol-level ping each interval; a client that missed the
 *   previous pong is terminated
 */

import type { Server } from 'http';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { ConnectionManager } from '../core/connection-manager.js';
import { createCategoryLogger } from '../core/logger.js';

const logger = createCategoryLogger('ws');

export const WS_PATH = '/ws';

export interface OrderFeedOptions {
  server: Server;
  connections: ConnectionManager;
  heartbeatInterval?: number; // ms between pings (default 30000, 0 disables)
}

export interface OrderFeed {
  wss: WebSocketServer;
  close(): Promise<void>;
}

function isPingFrame(data: RawData): boolean {
  try {
    const parsed: unknown = JSON.parse(data.toString());
    return typeof parsed === 'object' && parsed !== null && 'type' in parsed && parsed.type === 'ping';
  } catch {
    return false;
  }
}

export function createOrderFeed(options: OrderFeedOptions): OrderFeed {
  const { server, connections } = options;
  const heartbeatInterval = options.heartbeatInterval ?? 30000;
  const wss = new WebSocketServer({ server, path: WS_PATH });
  const alive = new WeakMap<WebSocket, boolean>();

  wss.on('connection', (ws: WebSocket) => {
    alive.set(ws, true);
    connections.connect(ws);
    logger.info(`Client connected (${connections.count()} active)`);

    ws.on('pong', () => {
      alive.set(ws, true);
    });

    ws.on('message', (data: RawData) => {
      if (isPingFrame(data)) {
        ws.send(JSON.stringify({ type: 'pong', timestamp: Date.now() }));
      }
    });

    ws.on('close', () => {
      connections.disconnect(ws);
      logger.info(`Client disconnected (${connections.count()} active)`);
    });

    ws.on('error', (error: Error) => {
      logger.error('WebSocket error', { error: error.message });
      connections.disconnect(ws);
    });
  });

  let heartbeatTimer: NodeJS.Timeout | undefined;
  if (heartbeatInterval > 0) {
    heartbeatTimer = setInterval(() => {
      for (const ws of wss.clients) {
        if (!alive.get(ws)) {
          logger.warn('Client heartbeat timeout, closing connection');
          connections.disconnect(ws);
          ws.terminate();
          continue;
        }
        alive.set(ws, false);
        ws.ping();
      }
    }, heartbeatInterval);
    heartbeatTimer.unref();
  }

  async function close(): Promise<void> {
    if (heartbeatTimer) {
      clearInterval(heartbeatTimer);
    }
    connections.closeAll();
    for (const ws of wss.clients) {
      ws.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  return { wss, close };
}
