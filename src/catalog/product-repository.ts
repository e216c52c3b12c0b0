import type { Selectable } from 'kysely';

import { Money } from '../domain/value-objects';
import type { Executor, ProductsTable } from '../database/schema';
import type { Product } from './types';

function toProduct(row: Selectable<ProductsTable>): Product {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: Money.fromCents(row.price_cents, row.currency),
    stock: row.stock,
    categoryId: row.category_id,
    createdAt: row.created_at,
  };
}

export class ProductRepository {
  constructor(private readonly db: Executor) {}

  async findById(id: string): Promise<Product | null> {
    const row = await this.db.selectFrom('products').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toProduct(row) : null;
  }

  async existsInCategory(categoryId: string, name: string): Promise<boolean> {
    const row = await this.db
      .selectFrom('products')
      .select('id')
      .where('category_id', '=', categoryId)
      .where('name', '=', name)
      .executeTakeFirst();
    return row !== undefined;
  }

  /** Rows come back in ascending id order */
  async findManyByIds(ids: string[]): Promise<Product[]> {
    if (ids.length === 0) return [];
    const rows = await this.db
      .selectFrom('products')
      .selectAll()
      .where('id', 'in', ids)
      .orderBy('id')
      .execute();
    return rows.map(toProduct);
  }

  async save(product: Product): Promise<void> {
    await this.db
      .insertInto('products')
      .values({
        id: product.id,
        name: product.name,
        description: product.description,
        price_cents: product.price.cents,
        currency: product.price.currency,
        stock: product.stock,
        category_id: product.categoryId,
        created_at: product.createdAt,
      })
      .onConflict((oc) =>
        oc.column('id').doUpdateSet({
          name: product.name,
          description: product.description,
          price_cents: product.price.cents,
          currency: product.price.currency,
          category_id: product.categoryId,
        }),
      )
      .execute();
  }

  /**
   * Take `quantity` units if at least that many remain.
   * Returns false when the row had too little stock at write time, which is how
   * concurrent placements racing for the same units are detected.
   */
  async decrementStock(id: string, quantity: number): Promise<boolean> {
    const result = await this.db
      .updateTable('products')
      .set((eb) => ({ stock: eb('stock', '-', quantity) }))
      .where('id', '=', id)
      .where('stock', '>=', quantity)
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }

  async incrementStock(id: string, quantity: number): Promise<number | null> {
    await this.db
      .updateTable('products')
      .set((eb) => ({ stock: eb('stock', '+', quantity) }))
      .where('id', '=', id)
      .execute();
    const row = await this.db.selectFrom('products').select('stock').where('id', '=', id).executeTakeFirst();
    return row ? row.stock : null;
  }
}
