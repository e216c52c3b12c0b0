import type { Database } from '../database/schema';
import { paginate, Pagination, PaginatedResult } from '../domain/value-objects';
import { isOrderStatus } from './order-state-machine';
import type { OrderItemReadModel, OrderReadModel } from './types';

export interface ListOrdersQuery {
  userId: string;
  page: number;
  pageSize: number;
}

export class OrderQueries {
  constructor(private readonly db: Database) {}

  /** Newest first */
  async listOrders(query: ListOrdersQuery): Promise<PaginatedResult<OrderReadModel>> {
    const pagination = Pagination.of(query.page, query.pageSize);

    const countRow = await this.db
      .selectFrom('orders')
      .select((eb) => eb.fn.countAll().as('count'))
      .where('user_id', '=', query.userId)
      .executeTakeFirst();

    const rows = await this.db
      .selectFrom('orders')
      .selectAll()
      .where('user_id', '=', query.userId)
      .orderBy('created_at', 'desc')
      .orderBy('id')
      .offset(pagination.offset)
      .limit(pagination.limit)
      .execute();

    const items = await this.loadItems(rows.map((r) => r.id));
    const orders = rows.map((row) => toReadModel(row, items.get(row.id) ?? []));
    return paginate(orders, Number(countRow?.count ?? 0), pagination);
  }

  /** Pass `userId` to restrict the lookup to that user's orders */
  async getOrder(orderId: string, userId?: string): Promise<OrderReadModel | null> {
    let query = this.db.selectFrom('orders').selectAll().where('id', '=', orderId);
    if (userId) {
      query = query.where('user_id', '=', userId);
    }
    const row = await query.executeTakeFirst();
    if (!row) return null;

    const items = await this.loadItems([row.id]);
    return toReadModel(row, items.get(row.id) ?? []);
  }

  private async loadItems(orderIds: string[]): Promise<Map<string, OrderItemReadModel[]>> {
    const byOrder = new Map<string, OrderItemReadModel[]>();
    if (orderIds.length === 0) return byOrder;

    const rows = await this.db
      .selectFrom('order_items')
      .innerJoin('products', 'products.id', 'order_items.product_id')
      .select([
        'order_items.id',
        'order_items.order_id',
        'order_items.product_id',
        'order_items.quantity',
        'order_items.unit_price_cents',
        'products.name',
      ])
      .where('order_items.order_id', 'in', orderIds)
      .orderBy('order_items.product_id')
      .execute();

    for (const row of rows) {
      const list = byOrder.get(row.order_id) ?? [];
      list.push({
        id: row.id,
        productId: row.product_id,
        productName: row.name,
        quantity: row.quantity,
        unitPrice: row.unit_price_cents / 100,
        lineTotal: (row.unit_price_cents * row.quantity) / 100,
      });
      byOrder.set(row.order_id, list);
    }
    return byOrder;
  }
}

interface OrderRow {
  id: string;
  user_id: string;
  status: string;
  total_cents: number;
  currency: string;
  created_at: string;
  updated_at: string;
}

function toReadModel(row: OrderRow, items: OrderItemReadModel[]): OrderReadModel {
  if (!isOrderStatus(row.status)) {
    throw new Error(`Unknown order status "${row.status}" on order ${row.id}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    status: row.status,
    items,
    totalAmount: row.total_cents / 100,
    currency: row.currency,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
