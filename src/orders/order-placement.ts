/**
 * Order Placement
 *
 * Turns the user's cart into an order inside a single unit of work:
 * stock is checked and decremented, the order and its price snapshot are
 * written, and the cart is emptied. Nothing is kept unless every step
 * succeeds.
 */

import { v4 as uuidv4 } from 'uuid';

import type { CacheStore } from '../cache/types';
import type { Product } from '../catalog/types';
import { productCacheKey } from '../catalog/catalog-queries';
import type { UnitOfWork } from '../database/unit-of-work';
import { DomainError, EmptyCartError, InsufficientStockError, NotFoundError } from '../domain/errors';
import { Money } from '../domain/value-objects';
import { logger } from '../observability/logger';
import { orderPlacementFailures, ordersPlaced } from '../observability/metrics';
import type { Order, OrderItem, PlacedOrder, PlaceOrderInput } from './types';

const log = logger.child({ component: 'order-placement' });

export class PlaceOrderInteractor {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly cache: CacheStore,
    private readonly defaultCurrency: string,
  ) {}

  async execute(input: PlaceOrderInput): Promise<PlacedOrder> {
    try {
      const placed = await this.place(input.userId);
      ordersPlaced.inc();
      log.info(
        { orderId: placed.orderId, userId: input.userId, total: placed.total.toString(), items: placed.itemCount },
        'Order placed',
      );
      return placed;
    } catch (err) {
      const reason = err instanceof DomainError ? err.code : 'internal_error';
      orderPlacementFailures.inc({ reason });
      log.warn({ userId: input.userId, reason }, 'Order placement failed');
      throw err;
    }
  }

  private place(userId: string): Promise<PlacedOrder> {
    return this.uow.run(async (scope) => {
      const cart = await scope.carts.findByUserId(userId);
      if (!cart || cart.items.length === 0) {
        throw new EmptyCartError();
      }

      const now = new Date().toISOString();
      // A concurrent placement for the same cart already took these lines
      if (!(await scope.carts.claim(cart.id, cart.updatedAt, now))) {
        throw new EmptyCartError();
      }

      // Ascending product id, so concurrent placements lock rows in the same order
      const lines = [...cart.items].sort((a, b) => (a.productId < b.productId ? -1 : a.productId > b.productId ? 1 : 0));
      const products = new Map(
        (await scope.products.findManyByIds(lines.map((l) => l.productId))).map((p) => [p.id, p]),
      );

      const reserved: Array<{ product: Product; quantity: number }> = [];
      for (const line of lines) {
        const product = products.get(line.productId);
        if (!product) {
          throw new NotFoundError('product', line.productId);
        }
        if (line.quantity > product.stock) {
          throw new InsufficientStockError(product.id, line.quantity, product.stock);
        }
        reserved.push({ product, quantity: line.quantity });
      }

      let total = Money.zero(reserved[0]?.product.price.currency ?? this.defaultCurrency);
      const items: OrderItem[] = [];

      for (const { product, quantity } of reserved) {
        if (!(await scope.products.decrementStock(product.id, quantity))) {
          // Another transaction took the units between our read and this write
          const current = await scope.products.findById(product.id);
          throw new InsufficientStockError(product.id, quantity, current?.stock ?? 0);
        }

        items.push({ id: uuidv4(), productId: product.id, quantity, unitPrice: product.price });
        total = total.add(product.price.multiply(quantity));
      }

      const order: Order = {
        id: uuidv4(),
        userId,
        status: 'created',
        items,
        total,
        createdAt: now,
        updatedAt: now,
      };
      await scope.orders.create(order);
      await scope.carts.save({ ...cart, items: [], updatedAt: now });

      scope.afterCommit(() => this.cache.del(...items.map((i) => productCacheKey(i.productId))));
      await scope.commit();

      return { orderId: order.id, total, itemCount: items.reduce((sum, i) => sum + i.quantity, 0) };
    });
  }
}
