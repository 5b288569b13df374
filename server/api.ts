/**
 * Order Desk API Routes
 *
 * REST API with Zod validation over the order service.
 *
 * Routes:
 * - POST   /orders?execute_order=<bool>  create (and by default execute) an order
 * - GET    /orders                       list orders, 404 when there are none
 * - GET    /orders/:orderId              fetch one order
 * - DELETE /orders/:orderId              cancel a PENDING order
 *
 * Error body: { detail, code } plus issues for validation errors.
 * Route failures go to next(error) and are mapped by handleApiError.
 */
import express, { NextFunction, Request, Response } from 'express';
import { createCategoryLogger } from '../core/logger.js';
import type { OrderService } from '../core/order-service.js';
import { CreateOrderQuerySchema, OrderError } from '../core/types.js';

const loggerOrders = createCategoryLogger('api.orders');
const loggerValidation = createCategoryLogger('api.validation');
const loggerServer = createCategoryLogger('server');

export interface ErrorBody {
  detail: string;
  code: string;
  issues?: unknown;
}

export function sendError(res: Response, status: number, detail: string, code: string, issues?: unknown): void {
  const body: ErrorBody = { detail, code };
  if (issues !== undefined) body.issues = issues;
  res.status(status).json(body);
}

// Express sets status 400 on errors such as an undecodable path parameter
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Error middleware for the whole app. OrderError keeps its status and code;
 * any other error without a 4xx status is logged and answered with 500.
 */
export function handleApiError(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof OrderError) {
    sendError(res, error.status, error.message, error.code);
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    loggerValidation.debug(`Rejected ${req.method} ${req.path}`, { status, error: error instanceof Error ? error.message : String(error) });
    sendError(res, status, 'Bad Request', 'BAD_REQUEST');
    return;
  }

  loggerServer.error(`Unhandled error on ${req.method} ${req.path}`, { error: error instanceof Error ? error.message : String(error) });
  sendError(res, 500, 'Internal server error', 'INTERNAL_ERROR');
}

export function createOrdersRouter(orders: OrderService): express.Router {
  const router = express.Router();

  router.post('/orders', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const validation = CreateOrderQuerySchema.safeParse(req.query);
    if (!validation.success) {
      loggerValidation.debug('Invalid create order query', { issues: validation.error.issues });
      sendError(res, 422, 'Invalid query parameters', 'VALIDATION_ERROR', validation.error.issues);
      return;
    }

    try {
      const order = await orders.createOrder({ execute: validation.data.execute_order });
      loggerOrders.info(`Order ${order.id} created with status ${order.status}`);
      res.json(order);
    } catch (error) {
      next(error);
    }
  });

  router.get('/orders', async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await orders.listOrders());
    } catch (error) {
      next(error);
    }
  });

  router.get('/orders/:orderId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await orders.getOrder(req.params.orderId));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/orders/:orderId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { orderId } = req.params;
    try {
      const result = await orders.cancelOrder(orderId);
      loggerOrders.info(`Order ${orderId} cancelled`);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
