import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('users')
    .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
    .addColumn('email', 'varchar(254)', (col) => col.notNull().unique())
    .addColumn('username', 'varchar(50)', (col) => col.notNull())
    .addColumn('password_hash', 'varchar(255)', (col) => col.notNull())
    .addColumn('is_active', 'integer', (col) => col.notNull().defaultTo(1))
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('categories')
    .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
    .addColumn('name', 'varchar(100)', (col) => col.notNull())
    .addColumn('slug', 'varchar(100)', (col) => col.notNull().unique())
    .addColumn('parent_id', 'varchar(36)', (col) => col.references('categories.id'))
    .execute();

  await db.schema
    .createTable('products')
    .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
    .addColumn('name', 'varchar(200)', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .addColumn('price_cents', 'integer', (col) => col.notNull())
    .addColumn('currency', 'varchar(3)', (col) => col.notNull())
    .addColumn('stock', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('category_id', 'varchar(36)', (col) => col.notNull().references('categories.id'))
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addCheckConstraint('products_stock_non_negative', sql`stock >= 0`)
    .execute();

  await db.schema.createIndex('idx_products_category').on('products').column('category_id').execute();
  await db.schema.createIndex('idx_products_created').on('products').column('created_at').execute();

  await db.schema
    .createTable('carts')
    .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
    .addColumn('user_id', 'varchar(36)', (col) => col.notNull().unique().references('users.id'))
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addColumn('updated_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('cart_items')
    .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
    .addColumn('cart_id', 'varchar(36)', (col) => col.notNull().references('carts.id').onDelete('cascade'))
    .addColumn('product_id', 'varchar(36)', (col) => col.notNull().references('products.id'))
    .addColumn('quantity', 'integer', (col) => col.notNull())
    .addUniqueConstraint('uq_cart_product', ['cart_id', 'product_id'])
    .execute();

  await db.schema
    .createTable('orders')
    .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
    .addColumn('user_id', 'varchar(36)', (col) => col.notNull().references('users.id'))
    .addColumn('status', 'varchar(20)', (col) => col.notNull())
    .addColumn('total_cents', 'integer', (col) => col.notNull())
    .addColumn('currency', 'varchar(3)', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addColumn('updated_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema.createIndex('idx_orders_user_created').on('orders').columns(['user_id', 'created_at']).execute();

  await db.schema
    .createTable('order_items')
    .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
    .addColumn('order_id', 'varchar(36)', (col) => col.notNull().references('orders.id').onDelete('cascade'))
    .addColumn('product_id', 'varchar(36)', (col) => col.notNull().references('products.id'))
    .addColumn('quantity', 'integer', (col) => col.notNull())
    .addColumn('unit_price_cents', 'integer', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('password_reset_tokens')
    .addColumn('id', 'varchar(36)', (col) => col.primaryKey())
    .addColumn('user_id', 'varchar(36)', (col) => col.notNull().references('users.id'))
    .addColumn('token', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('expires_at', 'text', (col) => col.notNull())
    .addColumn('used', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'text', (col) => col.notNull())
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  for (const table of [
    'password_reset_tokens',
    'order_items',
    'orders',
    'cart_items',
    'carts',
    'products',
    'categories',
    'users',
  ]) {
    await db.schema.dropTable(table).execute();
  }
}
