/**
 * Relational schema as seen by Kysely.
 *
 * Money columns hold integer cents, timestamps ISO-8601 text and flags 0/1,
 * so the same tables work on SQLite and PostgreSQL.
 */

import type { Kysely } from 'kysely';

export interface UsersTable {
  id: string;
  email: string;
  username: string;
  password_hash: string;
  is_active: number;
  created_at: string;
}

export interface CategoriesTable {
  id: string;
  name: string;
  slug: string;
  parent_id: string | null;
}

export interface ProductsTable {
  id: string;
  name: string;
  description: string;
  price_cents: number;
  currency: string;
  stock: number;
  category_id: string;
  created_at: string;
}

export interface CartsTable {
  id: string;
  user_id: string;
  created_at: string;
  updated_at: string;
}

export interface CartItemsTable {
  id: string;
  cart_id: string;
  product_id: string;
  quantity: number;
}

export interface OrdersTable {
  id: string;
  user_id: string;
  status: string;
  total_cents: number;
  currency: string;
  created_at: string;
  updated_at: string;
}

export interface OrderItemsTable {
  id: string;
  order_id: string;
  product_id: string;
  quantity: number;
  unit_price_cents: number;
}

export interface PasswordResetTokensTable {
  id: string;
  user_id: string;
  token: string;
  expires_at: string;
  used: number;
  created_at: string;
}

export interface DatabaseSchema {
  users: UsersTable;
  categories: CategoriesTable;
  products: ProductsTable;
  carts: CartsTable;
  cart_items: CartItemsTable;
  orders: OrdersTable;
  order_items: OrderItemsTable;
  password_reset_tokens: PasswordResetTokensTable;
}

export type Database = Kysely<DatabaseSchema>;

/** Anything repositories can issue queries against: the pool or an open transaction */
export type Executor = Kysely<DatabaseSchema>;
