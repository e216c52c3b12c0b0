/**
 * Catalog seeding
 *
 * Loads categories, products and demo users from a YAML file and writes them
 * in one unit of work. Existing category slugs, product names (per category)
 * and user emails are left untouched, so the seed can be re-run.
 *
 * Usage: npm run build && npm run seed
 */

import * as fs from 'fs';
import yaml from 'js-yaml';
import { v4 as uuidv4 } from 'uuid';

import { env } from '../config/env';
import { createDatabase } from '../database/connection';
import { runMigrations } from '../database/migrator';
import type { UnitOfWork } from '../database/unit-of-work';
import { KyselyUnitOfWork } from '../database/unit-of-work';
import { ValidationError } from '../domain/errors';
import { Email, Money, Password } from '../domain/value-objects';
import { createParser } from '../http/validation';
import { logger } from '../observability/logger';
import { BcryptPasswordHasher } from '../users/password-hasher';
import type { PasswordHasher } from '../users/types';

const log = logger.child({ component: 'seed' });

export interface SeedCategory {
  name: string;
  slug: string;
  parent?: string;
}

export interface SeedProduct {
  name: string;
  description: string;
  price: number;
  stock: number;
  /** Category slug */
  category: string;
}

export interface SeedUser {
  email: string;
  username: string;
  password: string;
}

export interface SeedCatalog {
  categories: SeedCategory[];
  products: SeedProduct[];
  users?: SeedUser[];
}

export interface SeedResult {
  categories: number;
  products: number;
  users: number;
}

export const parseSeedCatalog = createParser<SeedCatalog>({
  type: 'object',
  properties: {
    categories: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1 },
          slug: { type: 'string', minLength: 1 },
          parent: { type: 'string', nullable: true },
        },
        required: ['name', 'slug'],
      },
    },
    products: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1 },
          description: { type: 'string' },
          price: { type: 'number', minimum: 0 },
          stock: { type: 'integer', minimum: 0 },
          category: { type: 'string', minLength: 1 },
        },
        required: ['name', 'description', 'price', 'stock', 'category'],
      },
    },
    users: {
      type: 'array',
      nullable: true,
      items: {
        type: 'object',
        properties: {
          email: { type: 'string', minLength: 1 },
          username: { type: 'string', minLength: 1 },
          password: { type: 'string', minLength: 1 },
        },
        required: ['email', 'username', 'password'],
      },
    },
  },
  required: ['categories', 'products'],
});

export function loadSeedFile(filePath: string): SeedCatalog {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return parseSeedCatalog(yaml.load(raw));
}

/** Parents must be listed before their children */
export async function seedCatalog(
  uow: UnitOfWork,
  catalog: SeedCatalog,
  hasher: PasswordHasher,
  currency: string,
): Promise<SeedResult> {
  // Hash outside the transaction; bcrypt is slow
  const users = await Promise.all(
    (catalog.users ?? []).map(async (u) => ({
      email: Email.parse(u.email),
      username: u.username,
      passwordHash: await hasher.hash(Password.parse(u.password).value),
    })),
  );

  return uow.run(async (scope) => {
    const result: SeedResult = { categories: 0, products: 0, users: 0 };
    const categoryIds = new Map<string, string>();

    for (const c of catalog.categories) {
      const existing = await scope.categories.findBySlug(c.slug);
      if (existing) {
        categoryIds.set(c.slug, existing.id);
        continue;
      }

      let parentId: string | null = null;
      if (c.parent) {
        const parent = categoryIds.get(c.parent) ?? (await scope.categories.findBySlug(c.parent))?.id;
        if (!parent) {
          throw new ValidationError(`Unknown parent category "${c.parent}" for "${c.slug}"`);
        }
        parentId = parent;
      }

      const id = uuidv4();
      await scope.categories.save({ id, name: c.name, slug: c.slug, parentId });
      categoryIds.set(c.slug, id);
      result.categories++;
    }

    for (const p of catalog.products) {
      const categoryId = categoryIds.get(p.category) ?? (await scope.categories.findBySlug(p.category))?.id;
      if (!categoryId) {
        throw new ValidationError(`Unknown category "${p.category}" for product "${p.name}"`);
      }
      if (await scope.products.existsInCategory(categoryId, p.name)) continue;

      await scope.products.save({
        id: uuidv4(),
        name: p.name,
        description: p.description,
        price: Money.fromAmount(p.price, currency),
        stock: p.stock,
        categoryId,
        createdAt: new Date().toISOString(),
      });
      result.products++;
    }

    for (const u of users) {
      if (await scope.users.existsByEmail(u.email)) continue;
      await scope.users.save({
        id: uuidv4(),
        email: u.email.value,
        username: u.username,
        passwordHash: u.passwordHash,
        isActive: true,
        createdAt: new Date().toISOString(),
      });
      result.users++;
    }

    await scope.commit();
    return result;
  });
}

async function main(): Promise<void> {
  const db = createDatabase({ url: env.database.url, poolMax: env.database.poolMax, ssl: env.database.ssl });
  try {
    await runMigrations(db);
    const catalog = loadSeedFile(env.seedFile);
    const result = await seedCatalog(
      new KyselyUnitOfWork(db),
      catalog,
      new BcryptPasswordHasher(env.auth.bcryptRounds),
      env.commerce.defaultCurrency,
    );
    log.info({ file: env.seedFile, ...result }, 'Seed complete');
  } finally {
    await db.destroy();
  }
}

if (require.main === module) {
  main().catch((err) => {
    log.fatal({ err }, 'Seed failed');
    process.exit(1);
  });
}
