import type { Selectable } from 'kysely';

import { Money } from '../domain/value-objects';
import type { Executor, OrderItemsTable, OrdersTable } from '../database/schema';
import { isOrderStatus } from './order-state-machine';
import type { Order, OrderStatus } from './types';

function toOrder(row: Selectable<OrdersTable>, items: Selectable<OrderItemsTable>[]): Order {
  if (!isOrderStatus(row.status)) {
    throw new Error(`Unknown order status "${row.status}" on order ${row.id}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    status: row.status,
    items: items.map((i) => ({
      id: i.id,
      productId: i.product_id,
      quantity: i.quantity,
      unitPrice: Money.fromCents(i.unit_price_cents, row.currency),
    })),
    total: Money.fromCents(row.total_cents, row.currency),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class OrderRepository {
  constructor(private readonly db: Executor) {}

  async findById(id: string): Promise<Order | null> {
    const row = await this.db.selectFrom('orders').selectAll().where('id', '=', id).executeTakeFirst();
    if (!row) return null;
    const items = await this.db
      .selectFrom('order_items')
      .selectAll()
      .where('order_id', '=', id)
      .orderBy('product_id')
      .execute();
    return toOrder(row, items);
  }

  /** Orders are written once; only their status changes afterwards */
  async create(order: Order): Promise<void> {
    await this.db
      .insertInto('orders')
      .values({
        id: order.id,
        user_id: order.userId,
        status: order.status,
        total_cents: order.total.cents,
        currency: order.total.currency,
        created_at: order.createdAt,
        updated_at: order.updatedAt,
      })
      .execute();

    await this.db
      .insertInto('order_items')
      .values(
        order.items.map((item) => ({
          id: item.id,
          order_id: order.id,
          product_id: item.productId,
          quantity: item.quantity,
          unit_price_cents: item.unitPrice.cents,
        })),
      )
      .execute();
  }

  /**
   * Compare-and-set on the status column. Returns false if another
   * request moved the order first.
   */
  async updateStatus(id: string, from: OrderStatus, to: OrderStatus, updatedAt: string): Promise<boolean> {
    const result = await this.db
      .updateTable('orders')
      .set({ status: to, updated_at: updatedAt })
      .where('id', '=', id)
      .where('status', '=', from)
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }
}
