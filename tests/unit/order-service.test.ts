import { InMemoryCacheStore } from '../../src/cache/cache-service';
import { productCacheKey } from '../../src/catalog/catalog-queries';
import type { Database } from '../../src/database/schema';
import { KyselyUnitOfWork } from '../../src/database/unit-of-work';
import { InvalidOrderTransitionError, NotFoundError } from '../../src/domain/errors';
import { PlaceOrderInteractor } from '../../src/orders/order-placement';
import { OrderStatusService } from '../../src/orders/order-service';
import { createTestDatabase, insertCart, insertCategory, insertProduct, insertUser, readStock } from '../helpers/test-db';

describe('OrderStatusService', () => {
  let db: Database;
  let cache: InMemoryCacheStore;
  let service: OrderStatusService;
  let orderId: string;

  async function statusOf(id: string): Promise<string | undefined> {
    const row = await db.selectFrom('orders').select('status').where('id', '=', id).executeTakeFirst();
    return row?.status;
  }

  beforeEach(async () => {
    db = await createTestDatabase();
    cache = new InMemoryCacheStore();
    const uow = new KyselyUnitOfWork(db);
    service = new OrderStatusService(uow, cache);

    await insertUser(db, 'alice');
    await insertUser(db, 'mallory');
    await insertCategory(db, 'cat-1');
    await insertProduct(db, { id: 'prod-a', categoryId: 'cat-1', priceCents: 500, stock: 10 });
    await insertProduct(db, { id: 'prod-b', categoryId: 'cat-1', priceCents: 200, stock: 4 });
    await insertCart(db, 'alice', [
      ['prod-a', 3],
      ['prod-b', 4],
    ]);
    ({ orderId } = await new PlaceOrderInteractor(uow, cache, 'USD').execute({ userId: 'alice' }));
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('should walk an order through pay, ship and deliver', async () => {
    expect((await service.pay(orderId, 'alice')).status).toBe('paid');
    expect((await service.ship(orderId)).status).toBe('shipped');
    const delivered = await service.deliver(orderId);

    expect(delivered.status).toBe('delivered');
    expect(await statusOf(orderId)).toBe('delivered');
  });

  it('should restore stock when an order is cancelled', async () => {
    expect(await readStock(db, 'prod-a')).toBe(7);
    expect(await readStock(db, 'prod-b')).toBe(0);

    const cancelled = await service.cancel(orderId, 'alice');

    expect(cancelled.status).toBe('cancelled');
    expect(await readStock(db, 'prod-a')).toBe(10);
    expect(await readStock(db, 'prod-b')).toBe(4);
  });

  it('should allow cancelling a paid order', async () => {
    await service.pay(orderId, 'alice');
    await service.cancel(orderId, 'alice');
    expect(await statusOf(orderId)).toBe('cancelled');
  });

  it('should invalidate product cache entries on cancel', async () => {
    await cache.set(productCacheKey('prod-a'), { stock: 7 });
    await service.cancel(orderId, 'alice');
    expect(await cache.get(productCacheKey('prod-a'))).toBeNull();
  });

  it('should reject shipping an unpaid order', async () => {
    await expect(service.ship(orderId)).rejects.toThrow(InvalidOrderTransitionError);
    expect(await statusOf(orderId)).toBe('created');
  });

  it('should not cancel twice or restock twice', async () => {
    await service.cancel(orderId, 'alice');
    await expect(service.cancel(orderId, 'alice')).rejects.toThrow('Cannot move order from cancelled to cancelled');
    expect(await readStock(db, 'prod-a')).toBe(10);
  });

  it('should reject cancelling a shipped order and keep stock', async () => {
    await service.pay(orderId, 'alice');
    await service.ship(orderId);
    await expect(service.cancel(orderId, 'alice')).rejects.toThrow(InvalidOrderTransitionError);
    expect(await readStock(db, 'prod-a')).toBe(7);
  });

  it("should report another user's order as not found", async () => {
    await expect(service.pay(orderId, 'mallory')).rejects.toThrow(NotFoundError);
    expect(await statusOf(orderId)).toBe('created');
  });

  it('should report an unknown order as not found', async () => {
    await expect(service.ship('missing')).rejects.toThrow('order not found: missing');
  });
});
