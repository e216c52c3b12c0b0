import { v4 as uuidv4 } from 'uuid';

import type { CacheStore } from '../cache/types';
import type { UnitOfWork } from '../database/unit-of-work';
import { ConflictError, NotFoundError, ValidationError } from '../domain/errors';
import { Money } from '../domain/value-objects';
import { logger } from '../observability/logger';
import { CATEGORIES_CACHE_KEY, productCacheKey } from './catalog-queries';
import type { Category, CreateCategoryInput, CreateProductInput, Product, RestockInput } from './types';

const log = logger.child({ component: 'catalog' });

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export class CreateCategoryInteractor {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly cache: CacheStore,
  ) {}

  async execute(input: CreateCategoryInput): Promise<string> {
    const slug = input.slug.trim().toLowerCase();
    if (!SLUG_PATTERN.test(slug)) {
      throw new ValidationError(`Invalid slug: ${input.slug}`);
    }

    return this.uow.run(async (scope) => {
      if (await scope.categories.findBySlug(slug)) {
        throw new ConflictError(`Category slug already taken: ${slug}`);
      }
      const parentId = input.parentId ?? null;
      if (parentId && !(await scope.categories.findById(parentId))) {
        throw new NotFoundError('category', parentId);
      }

      const category: Category = { id: uuidv4(), name: input.name.trim(), slug, parentId };
      await scope.categories.save(category);
      scope.afterCommit(() => this.cache.del(CATEGORIES_CACHE_KEY));
      await scope.commit();

      log.info({ categoryId: category.id, slug }, 'Category created');
      return category.id;
    });
  }
}

export class CreateProductInteractor {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly currency: string,
  ) {}

  async execute(input: CreateProductInput): Promise<string> {
    if (!Number.isInteger(input.stock) || input.stock < 0) {
      throw new ValidationError('Stock must be a non-negative integer');
    }
    const price = Money.fromAmount(input.price, this.currency);

    return this.uow.run(async (scope) => {
      if (!(await scope.categories.findById(input.categoryId))) {
        throw new NotFoundError('category', input.categoryId);
      }

      const product: Product = {
        id: uuidv4(),
        name: input.name.trim(),
        description: input.description,
        price,
        stock: input.stock,
        categoryId: input.categoryId,
        createdAt: new Date().toISOString(),
      };
      await scope.products.save(product);
      await scope.commit();

      log.info({ productId: product.id, price: price.toString(), stock: product.stock }, 'Product created');
      return product.id;
    });
  }
}

export class RestockProductInteractor {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly cache: CacheStore,
  ) {}

  async execute(input: RestockInput): Promise<number> {
    if (!Number.isInteger(input.quantity) || input.quantity < 1) {
      throw new ValidationError('Restock quantity must be a positive integer');
    }

    return this.uow.run(async (scope) => {
      const stock = await scope.products.incrementStock(input.productId, input.quantity);
      if (stock === null) {
        throw new NotFoundError('product', input.productId);
      }
      scope.afterCommit(() => this.cache.del(productCacheKey(input.productId)));
      await scope.commit();

      log.info({ productId: input.productId, added: input.quantity, stock }, 'Product restocked');
      return stock;
    });
  }
}
