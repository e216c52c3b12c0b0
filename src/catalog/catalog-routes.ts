import { FastifyInstance } from 'fastify';

import { NotFoundError } from '../domain/errors';
import type { Guard } from '../http/guards';
import { createParser, parseIdParams } from '../http/validation';
import type { CreateCategoryInteractor, CreateProductInteractor, RestockProductInteractor } from './catalog-interactors';
import type { CatalogQueries } from './catalog-queries';
import type { SitemapQueries } from './sitemap';
import type { CreateCategoryInput, CreateProductInput } from './types';

export interface CatalogRouteDeps {
  queries: CatalogQueries;
  sitemap: SitemapQueries;
  createCategory: CreateCategoryInteractor;
  createProduct: CreateProductInteractor;
  restockProduct: RestockProductInteractor;
  requireAdmin: Guard;
  defaultPageSize: number;
}

interface ListProductsParams {
  page?: number;
  pageSize?: number;
  categoryId?: string;
}

const parseListProducts = createParser<ListProductsParams>({
  type: 'object',
  properties: {
    page: { type: 'integer', minimum: 1, nullable: true },
    pageSize: { type: 'integer', minimum: 1, maximum: 100, nullable: true },
    categoryId: { type: 'string', minLength: 1, nullable: true },
  },
  required: [],
});

interface SearchProductsParams {
  q: string;
  page?: number;
  pageSize?: number;
}

const parseSearchProducts = createParser<SearchProductsParams>({
  type: 'object',
  properties: {
    q: { type: 'string', minLength: 1, maxLength: 200 },
    page: { type: 'integer', minimum: 1, nullable: true },
    pageSize: { type: 'integer', minimum: 1, maximum: 100, nullable: true },
  },
  required: ['q'],
});

const parseCreateCategory = createParser<CreateCategoryInput>({
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 100 },
    slug: { type: 'string', minLength: 1, maxLength: 100 },
    parentId: { type: 'string', nullable: true },
  },
  required: ['name', 'slug'],
  additionalProperties: false,
});

const parseCreateProduct = createParser<CreateProductInput>({
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 200 },
    description: { type: 'string' },
    price: { type: 'number', minimum: 0 },
    stock: { type: 'integer', minimum: 0 },
    categoryId: { type: 'string', minLength: 1 },
  },
  required: ['name', 'description', 'price', 'stock', 'categoryId'],
  additionalProperties: false,
});

const parseRestock = createParser<{ quantity: number }>({
  type: 'object',
  properties: { quantity: { type: 'integer', minimum: 1 } },
  required: ['quantity'],
  additionalProperties: false,
});

export function registerCatalogRoutes(app: FastifyInstance, deps: CatalogRouteDeps): void {
  const { queries, requireAdmin } = deps;

  app.get('/categories', async (_req, reply) => {
    return reply.send({ items: await queries.listCategories() });
  });

  app.post('/categories', { preHandler: requireAdmin }, async (req, reply) => {
    const id = await deps.createCategory.execute(parseCreateCategory(req.body));
    return reply.status(201).send({ id });
  });

  app.get('/products', async (req, reply) => {
    const q = parseListProducts(req.query);
    const result = await queries.listProducts({
      page: q.page ?? 1,
      pageSize: q.pageSize ?? deps.defaultPageSize,
      categoryId: q.categoryId,
    });
    return reply.send(result);
  });

  // Registered before /products/:id so "search" is not taken for an id
  app.get('/products/search', async (req, reply) => {
    const q = parseSearchProducts(req.query);
    const result = await queries.searchProducts({
      query: q.q,
      page: q.page ?? 1,
      pageSize: q.pageSize ?? deps.defaultPageSize,
    });
    return reply.send(result);
  });

  app.get('/products/:id', async (req, reply) => {
    const { id } = parseIdParams(req.params);
    const product = await queries.getProduct(id);
    if (!product) {
      throw new NotFoundError('product', id);
    }
    return reply.send(product);
  });

  app.post('/products', { preHandler: requireAdmin }, async (req, reply) => {
    const id = await deps.createProduct.execute(parseCreateProduct(req.body));
    return reply.status(201).send({ id });
  });

  app.post('/products/:id/restock', { preHandler: requireAdmin }, async (req, reply) => {
    const { id } = parseIdParams(req.params);
    const { quantity } = parseRestock(req.body);
    const stock = await deps.restockProduct.execute({ productId: id, quantity });
    return reply.send({ id, stock });
  });

  app.get('/sitemap.xml', async (_req, reply) => {
    return reply.type('application/xml').send(await deps.sitemap.generate());
  });
}
