import { FastifyInstance } from 'fastify';

import { NotFoundError } from '../domain/errors';
import { currentUserId, Guard } from '../http/guards';
import { parseIdParams, parsePageQuery } from '../http/validation';
import type { PlaceOrderInteractor } from './order-placement';
import type { OrderQueries } from './order-queries';
import type { OrderStatusService } from './order-service';
import type { OrderReadModel } from './types';

export interface OrderRouteDeps {
  placeOrder: PlaceOrderInteractor;
  statuses: OrderStatusService;
  queries: OrderQueries;
  requireUser: Guard;
  requireAdmin: Guard;
  defaultPageSize: number;
}

export function registerOrderRoutes(app: FastifyInstance, deps: OrderRouteDeps): void {
  const { queries, statuses } = deps;
  const asUser = { preHandler: deps.requireUser };
  const asAdmin = { preHandler: deps.requireAdmin };

  async function load(orderId: string, userId?: string): Promise<OrderReadModel> {
    const order = await queries.getOrder(orderId, userId);
    if (!order) {
      throw new NotFoundError('order', orderId);
    }
    return order;
  }

  app.post('/orders', asUser, async (req, reply) => {
    const placed = await deps.placeOrder.execute({ userId: currentUserId(req) });
    return reply.status(201).send({ orderId: placed.orderId });
  });

  app.get('/orders', asUser, async (req, reply) => {
    const q = parsePageQuery(req.query);
    const result = await queries.listOrders({
      userId: currentUserId(req),
      page: q.page ?? 1,
      pageSize: q.pageSize ?? deps.defaultPageSize,
    });
    return reply.send(result);
  });

  app.get('/orders/:id', asUser, async (req, reply) => {
    const { id } = parseIdParams(req.params);
    return reply.send(await load(id, currentUserId(req)));
  });

  app.post('/orders/:id/pay', asUser, async (req, reply) => {
    const { id } = parseIdParams(req.params);
    const userId = currentUserId(req);
    await statuses.pay(id, userId);
    return reply.send(await load(id, userId));
  });

  app.post('/orders/:id/cancel', asUser, async (req, reply) => {
    const { id } = parseIdParams(req.params);
    const userId = currentUserId(req);
    await statuses.cancel(id, userId);
    return reply.send(await load(id, userId));
  });

  app.post('/orders/:id/ship', asAdmin, async (req, reply) => {
    const { id } = parseIdParams(req.params);
    await statuses.ship(id);
    return reply.send(await load(id));
  });

  app.post('/orders/:id/deliver', asAdmin, async (req, reply) => {
    const { id } = parseIdParams(req.params);
    await statuses.deliver(id);
    return reply.send(await load(id));
  });
}
