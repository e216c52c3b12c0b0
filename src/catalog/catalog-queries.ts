/**
 * Catalog query services (read side).
 *
 * Reads go straight to the tables and return flat read models; nothing here
 * touches the domain entities or opens a transaction.
 */

import type { CacheStore } from '../cache/types';
import type { Database } from '../database/schema';
import { paginate, Pagination, PaginatedResult } from '../domain/value-objects';
import type {
  CategoryReadModel,
  ListProductsQuery,
  ProductReadModel,
  SearchProductsQuery,
} from './types';

export const CATEGORIES_CACHE_KEY = 'categories:all';

export function productCacheKey(productId: string): string {
  return `product:${productId}`;
}

interface ProductRow {
  id: string;
  name: string;
  description: string;
  price_cents: number;
  currency: string;
  stock: number;
  category_id: string;
  created_at: string;
  category_name: string;
}

function toReadModel(row: ProductRow): ProductReadModel {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: row.price_cents / 100,
    currency: row.currency,
    stock: row.stock,
    categoryId: row.category_id,
    categoryName: row.category_name,
    createdAt: row.created_at,
  };
}

export class CatalogQueries {
  constructor(
    private readonly db: Database,
    private readonly cache: CacheStore,
    private readonly cacheTtlSeconds: number,
  ) {}

  async listProducts(query: ListProductsQuery): Promise<PaginatedResult<ProductReadModel>> {
    const pagination = Pagination.of(query.page, query.pageSize);

    let countQuery = this.db.selectFrom('products').select((eb) => eb.fn.countAll().as('count'));
    let rowsQuery = this.baseProductQuery();
    if (query.categoryId) {
      countQuery = countQuery.where('products.category_id', '=', query.categoryId);
      rowsQuery = rowsQuery.where('products.category_id', '=', query.categoryId);
    }

    const countRow = await countQuery.executeTakeFirst();
    const rows = await rowsQuery
      .orderBy('products.created_at', 'desc')
      .orderBy('products.id')
      .offset(pagination.offset)
      .limit(pagination.limit)
      .execute();

    return paginate(rows.map(toReadModel), Number(countRow?.count ?? 0), pagination);
  }

  /** Case-insensitive substring match on name or description */
  async searchProducts(query: SearchProductsQuery): Promise<PaginatedResult<ProductReadModel>> {
    const pagination = Pagination.of(query.page, query.pageSize);
    const pattern = `%${query.query.trim().toLowerCase()}%`;

    const countRow = await this.db
      .selectFrom('products')
      .select((eb) => eb.fn.countAll().as('count'))
      .where((eb) =>
        eb.or([
          eb(eb.fn<string>('lower', ['products.name']), 'like', pattern),
          eb(eb.fn<string>('lower', ['products.description']), 'like', pattern),
        ]),
      )
      .executeTakeFirst();

    const rows = await this.baseProductQuery()
      .where((eb) =>
        eb.or([
          eb(eb.fn<string>('lower', ['products.name']), 'like', pattern),
          eb(eb.fn<string>('lower', ['products.description']), 'like', pattern),
        ]),
      )
      .orderBy('products.name')
      .orderBy('products.id')
      .offset(pagination.offset)
      .limit(pagination.limit)
      .execute();

    return paginate(rows.map(toReadModel), Number(countRow?.count ?? 0), pagination);
  }

  async getProduct(productId: string): Promise<ProductReadModel | null> {
    const key = productCacheKey(productId);
    const cached = await this.cache.get<ProductReadModel>(key);
    if (cached) return cached;

    const row = await this.baseProductQuery().where('products.id', '=', productId).executeTakeFirst();
    if (!row) return null;

    const product = toReadModel(row);
    await this.cache.set(key, product, this.cacheTtlSeconds);
    return product;
  }

  async listCategories(): Promise<CategoryReadModel[]> {
    const cached = await this.cache.get<CategoryReadModel[]>(CATEGORIES_CACHE_KEY);
    if (cached) return cached;

    const rows = await this.db.selectFrom('categories').selectAll().orderBy('name').orderBy('id').execute();
    const categories = rows.map((c) => ({ id: c.id, name: c.name, slug: c.slug, parentId: c.parent_id }));
    await this.cache.set(CATEGORIES_CACHE_KEY, categories, this.cacheTtlSeconds);
    return categories;
  }

  private baseProductQuery() {
    return this.db
      .selectFrom('products')
      .innerJoin('categories', 'categories.id', 'products.category_id')
      .select([
        'products.id',
        'products.name',
        'products.description',
        'products.price_cents',
        'products.currency',
        'products.stock',
        'products.category_id',
        'products.created_at',
        'categories.name as category_name',
      ]);
  }
}
