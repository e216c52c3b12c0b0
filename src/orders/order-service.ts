/**
 * Order Status Service
 *
 * Pay and cancel are done by the order's owner; ship and deliver by an
 * administrator. Each change is validated against the transition table and
 * written with a compare-and-set, so two racing requests cannot both move
 * the same order.
 */

import type { CacheStore } from '../cache/types';
import { productCacheKey } from '../catalog/catalog-queries';
import type { UnitOfWork } from '../database/unit-of-work';
import { InvalidOrderTransitionError, NotFoundError } from '../domain/errors';
import { logger } from '../observability/logger';
import { orderTransitions } from '../observability/metrics';
import { transitionOrder } from './order-state-machine';
import type { Order, OrderActor, OrderStatus } from './types';

const log = logger.child({ component: 'order-status' });

export class OrderStatusService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly cache: CacheStore,
  ) {}

  pay(orderId: string, userId: string): Promise<Order> {
    return this.changeStatus(orderId, 'paid', { kind: 'user', userId });
  }

  /** Returns every line's quantity to stock */
  cancel(orderId: string, userId: string): Promise<Order> {
    return this.changeStatus(orderId, 'cancelled', { kind: 'user', userId });
  }

  ship(orderId: string): Promise<Order> {
    return this.changeStatus(orderId, 'shipped', { kind: 'admin' });
  }

  deliver(orderId: string): Promise<Order> {
    return this.changeStatus(orderId, 'delivered', { kind: 'admin' });
  }

  async changeStatus(orderId: string, to: OrderStatus, actor: OrderActor): Promise<Order> {
    const { order: updated, from } = await this.uow.run(async (scope) => {
      const order = await scope.orders.findById(orderId);
      // Someone else's order is reported as missing
      if (!order || (actor.kind === 'user' && order.userId !== actor.userId)) {
        throw new NotFoundError('order', orderId);
      }

      const event = transitionOrder(order.id, order.status, to);
      const updatedAt = new Date(event.timestamp).toISOString();

      if (!(await scope.orders.updateStatus(order.id, event.from, event.to, updatedAt))) {
        const current = await scope.orders.findById(order.id);
        throw new InvalidOrderTransitionError(current?.status ?? event.from, to);
      }

      if (to === 'cancelled') {
        for (const item of order.items) {
          await scope.products.incrementStock(item.productId, item.quantity);
        }
        scope.afterCommit(() => this.cache.del(...order.items.map((i) => productCacheKey(i.productId))));
      }

      await scope.commit();
      return { order: { ...order, status: to, updatedAt }, from: event.from };
    });

    orderTransitions.inc({ from, to });
    log.info({ orderId, from, to, actor: actor.kind }, 'Order status changed');
    return updated;
  }
}
