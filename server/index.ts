#!/usr/bin/env node
/**
 * Web Server - Express.js HTTP Server with REST API and WebSocket feed
 *
 * Features:
 * - Express server with CORS, the order API and a static HTML page at /
 * - ws update feed on /ws sharing the same HTTP server
 * - Category-based logging with configurable levels
 * - Health check endpoint and JSON error handling
 * - Environment Variables: loads .env, see core/config.ts
 *
 * Endpoints: / (page), /health, /orders API, /ws
 */

import dotenv from 'dotenv';
dotenv.config({ quiet: true });

import express from 'express';
import cors from 'cors';
import fs from 'fs';
import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { createServer, Server } from 'http';
import { createOrdersRouter, handleApiError, sendError } from './api.js';
import { createOrderFeed, WS_PATH, type OrderFeed } from './ws.js';
import { loadConfig } from '../core/config.js';
import { createCategoryLogger, initializeLogger } from '../core/logger.js';
import { ConnectionManager } from '../core/connection-manager.js';
import { createMemoryOrderStorage, type OrderStorage } from '../core/order-storage.js';
import { createOrderService, type OrderService } from '../core/order-service.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
// ../public from sources, ../../public from dist/server
const PUBLIC_DIR = [path.join(__dirname, '../public'), path.join(__dirname, '../../public')]
  .find(dir => fs.existsSync(path.join(dir, 'index.html'))) ?? path.join(__dirname, '../public');

const serverLogger = createCategoryLogger('server');
const httpLogger = createCategoryLogger('server.http');

export interface OrderDeskOptions {
  storage?: OrderStorage;
  minDelayMs?: number;
  maxDelayMs?: number;
  random?: () => number;
  heartbeatInterval?: number;
}

export interface OrderDeskServer {
  app: express.Application;
  server: Server;
  orders: OrderService;
  connections: ConnectionManager;
  feed: OrderFeed;
  close(): Promise<void>;
}

export function createApp(orders: OrderService): express.Application {
  const app = express();
  app.use(cors());

  app.use((req, _res, next) => {
    httpLogger.debug(`${req.method} ${req.path}`);
    next();
  });

  app.get('/', (_req, res) => {
    res.sendFile(path.join(PUBLIC_DIR, 'index.html'));
  });

  app.get('/health', async (_req, res, next) => {
    try {
      const stats = await orders.stats();
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        ...stats
      });
    } catch (error) {
      next(error);
    }
  });

  app.use(createOrdersRouter(orders));

  app.use((_req, res) => {
    sendError(res, 404, 'Not Found', 'NOT_FOUND');
  });

  app.use(handleApiError);

  return app;
}

/**
 * Wire storage, service, express app and ws feed onto one HTTP server (not listening yet).
 */
export function createOrderDeskServer(options: OrderDeskOptions = {}): OrderDeskServer {
  const connections = new ConnectionManager();
  const orders = createOrderService({
    storage: options.storage ?? createMemoryOrderStorage(),
    connections,
    minDelayMs: options.minDelayMs,
    maxDelayMs: options.maxDelayMs,
    random: options.random
  });

  const app = createApp(orders);
  const server = createServer(app);
  const feed = createOrderFeed({ server, connections, heartbeatInterval: options.heartbeatInterval });

  async function close(): Promise<void> {
    orders.shutdown();
    await feed.close();
    if (!server.listening) return;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    serverLogger.info('HTTP server closed');
  }

  return { app, server, orders, connections, feed, close };
}

export async function startWebServer(port: number, host: string, options: OrderDeskOptions = {}): Promise<OrderDeskServer> {
  const desk = createOrderDeskServer(options);

  await new Promise<void>((resolve, reject) => {
    desk.server.once('error', reject);
    desk.server.listen(port, host, () => {
      desk.server.off('error', reject);
      resolve();
    });
  });

  const address = desk.server.address();
  const actualPort = address && typeof address === 'object' ? address.port : port;
  serverLogger.info(`Web server running at http://${host}:${actualPort}`);

  return desk;
}

async function main(): Promise<void> {
  const config = loadConfig();
  initializeLogger({ globalLevel: config.logLevel });
  const desk = await startWebServer(config.port, config.host, {
    minDelayMs: config.minDelayMs,
    maxDelayMs: config.maxDelayMs,
    heartbeatInterval: config.heartbeatInterval
  });
  console.log(`Order desk listening on http://${config.host}:${config.port} (updates on ${WS_PATH})`);

  const gracefulShutdown = async (signal: string) => {
    serverLogger.info(`Received ${signal}, initiating graceful shutdown`);
    try {
      await desk.close();
      process.exit(0);
    } catch (error) {
      serverLogger.error('Error during graceful shutdown', {
        error: error instanceof Error ? error.message : String(error)
      });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    serverLogger.error('Unhandled rejection', {
      reason: reason instanceof Error ? reason.message : String(reason)
    });
  });
}

const entryPoint = process.argv[1];
const isDirectExecution = entryPoint !== undefined && import.meta.url === pathToFileURL(path.resolve(entryPoint)).href;

if (isDirectExecution) {
  main().catch((error) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
