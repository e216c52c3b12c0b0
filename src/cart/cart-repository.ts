import type { Executor } from '../database/schema';
import type { Cart } from './types';

export class CartRepository {
  constructor(private readonly db: Executor) {}

  async findByUserId(userId: string): Promise<Cart | null> {
    const cart = await this.db.selectFrom('carts').selectAll().where('user_id', '=', userId).executeTakeFirst();
    if (!cart) return null;

    const items = await this.db
      .selectFrom('cart_items')
      .select(['id', 'product_id', 'quantity'])
      .where('cart_id', '=', cart.id)
      .orderBy('product_id')
      .execute();

    return {
      id: cart.id,
      userId: cart.user_id,
      items: items.map((i) => ({ id: i.id, productId: i.product_id, quantity: i.quantity })),
      createdAt: cart.created_at,
      updatedAt: cart.updated_at,
    };
  }

  /**
   * Compare-and-set on `updated_at`. Takes the cart row lock on PostgreSQL;
   * false when another transaction changed the cart since it was read.
   */
  async claim(cartId: string, readAt: string, now: string): Promise<boolean> {
    const result = await this.db
      .updateTable('carts')
      .set({ updated_at: now })
      .where('id', '=', cartId)
      .where('updated_at', '=', readAt)
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }

  /** Persist the cart row and replace its lines with `cart.items` */
  async save(cart: Cart): Promise<void> {
    await this.db
      .insertInto('carts')
      .values({
        id: cart.id,
        user_id: cart.userId,
        created_at: cart.createdAt,
        updated_at: cart.updatedAt,
      })
      .onConflict((oc) => oc.column('id').doUpdateSet({ updated_at: cart.updatedAt }))
      .execute();

    await this.db.deleteFrom('cart_items').where('cart_id', '=', cart.id).execute();

    if (cart.items.length > 0) {
      await this.db
        .insertInto('cart_items')
        .values(
          cart.items.map((item) => ({
            id: item.id,
            cart_id: cart.id,
            product_id: item.productId,
            quantity: item.quantity,
          })),
        )
        .execute();
    }
  }
}
