import type { Selectable } from 'kysely';

import type { CategoriesTable, Executor } from '../database/schema';
import type { Category } from './types';

function toCategory(row: Selectable<CategoriesTable>): Category {
  return { id: row.id, name: row.name, slug: row.slug, parentId: row.parent_id };
}

export class CategoryRepository {
  constructor(private readonly db: Executor) {}

  async findById(id: string): Promise<Category | null> {
    const row = await this.db.selectFrom('categories').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toCategory(row) : null;
  }

  async findBySlug(slug: string): Promise<Category | null> {
    const row = await this.db.selectFrom('categories').selectAll().where('slug', '=', slug).executeTakeFirst();
    return row ? toCategory(row) : null;
  }

  async save(category: Category): Promise<void> {
    await this.db
      .insertInto('categories')
      .values({
        id: category.id,
        name: category.name,
        slug: category.slug,
        parent_id: category.parentId,
      })
      .onConflict((oc) =>
        oc.column('id').doUpdateSet({
          name: category.name,
          slug: category.slug,
          parent_id: category.parentId,
        }),
      )
      .execute();
  }
}
