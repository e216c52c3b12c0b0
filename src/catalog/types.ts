/**
 * Catalog Types: categories, products and their read models
 */

import type { Money } from '../domain/value-objects';

export interface Category {
  id: string;
  name: string;
  slug: string;
  parentId: string | null;
}

export interface Product {
  id: string;
  name: string;
  description: string;
  price: Money;
  stock: number;
  categoryId: string;
  createdAt: string;
}

export interface CreateCategoryInput {
  name: string;
  slug: string;
  parentId?: string | null;
}

export interface CreateProductInput {
  name: string;
  description: string;
  /** Decimal amount, rounded to cents */
  price: number;
  stock: number;
  categoryId: string;
}

export interface RestockInput {
  productId: string;
  quantity: number;
}

// ───── Read Models ─────

export interface ProductReadModel {
  id: string;
  name: string;
  description: string;
  price: number;
  currency: string;
  stock: number;
  categoryId: string;
  categoryName: string;
  createdAt: string;
}

export interface CategoryReadModel {
  id: string;
  name: string;
  slug: string;
  parentId: string | null;
}

export interface ListProductsQuery {
  page: number;
  pageSize: number;
  categoryId?: string;
}

export interface SearchProductsQuery {
  query: string;
  page: number;
  pageSize: number;
}
