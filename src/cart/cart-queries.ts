import type { Database } from '../database/schema';
import type { CartReadModel } from './types';

export class CartQueries {
  constructor(
    private readonly db: Database,
    private readonly defaultCurrency: string,
  ) {}

  /** A user without a cart gets an empty one (id null) */
  async getCart(userId: string): Promise<CartReadModel> {
    const cart = await this.db.selectFrom('carts').select('id').where('user_id', '=', userId).executeTakeFirst();
    if (!cart) {
      return { id: null, userId, items: [], totalItems: 0, totalAmount: 0, currency: this.defaultCurrency };
    }

    const rows = await this.db
      .selectFrom('cart_items')
      .innerJoin('products', 'products.id', 'cart_items.product_id')
      .select([
        'cart_items.id',
        'cart_items.product_id',
        'cart_items.quantity',
        'products.name',
        'products.price_cents',
        'products.currency',
      ])
      .where('cart_items.cart_id', '=', cart.id)
      .orderBy('products.name')
      .execute();

    let totalCents = 0;
    let totalItems = 0;
    const items = rows.map((row) => {
      const lineCents = row.price_cents * row.quantity;
      totalCents += lineCents;
      totalItems += row.quantity;
      return {
        id: row.id,
        productId: row.product_id,
        productName: row.name,
        unitPrice: row.price_cents / 100,
        quantity: row.quantity,
        lineTotal: lineCents / 100,
      };
    });

    return {
      id: cart.id,
      userId,
      items,
      totalItems,
      totalAmount: totalCents / 100,
      currency: rows[0]?.currency ?? this.defaultCurrency,
    };
  }
}
