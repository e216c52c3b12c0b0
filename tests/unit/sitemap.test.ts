import { renderSitemap, SitemapQueries } from '../../src/catalog/sitemap';
import type { Database } from '../../src/database/schema';
import { createTestDatabase, insertCategory, insertProduct } from '../helpers/test-db';

describe('sitemap', () => {
  describe('renderSitemap', () => {
    it('should escape locations and drop a trailing slash from the base url', () => {
      const xml = renderSitemap('https://shop.example.com/', [
        { path: '/products?a=1&b=2', changefreq: 'daily', priority: '0.9' },
      ]);

      expect(xml).toBe(
        '<?xml version="1.0" encoding="UTF-8"?>\n' +
          '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">' +
          '<url><loc>https://shop.example.com/products?a=1&amp;b=2</loc>' +
          '<changefreq>daily</changefreq><priority>0.9</priority></url>' +
          '</urlset>',
      );
    });
  });

  describe('SitemapQueries', () => {
    let db: Database;

    beforeEach(async () => {
      db = await createTestDatabase();
      await insertCategory(db, 'cat-kitchen', 'kitchen');
      await insertCategory(db, 'cat-books', 'books');
      await insertProduct(db, {
        id: 'p-old',
        categoryId: 'cat-kitchen',
        priceCents: 100,
        stock: 1,
        createdAt: '2024-01-15T08:00:00.000Z',
      });
      await insertProduct(db, {
        id: 'p-new',
        categoryId: 'cat-books',
        priceCents: 200,
        stock: 1,
        createdAt: '2024-03-02T20:30:00.000Z',
      });
    });

    afterEach(async () => {
      await db.destroy();
    });

    it('should list static pages, categories by slug and newest products first', async () => {
      const xml = await new SitemapQueries(db, 'https://shop.example.com').generate();

      const locs = [...xml.matchAll(/<loc>([^<]*)<\/loc>/g)].map((m) => m[1]);
      expect(locs).toEqual([
        'https://shop.example.com/',
        'https://shop.example.com/products',
        'https://shop.example.com/categories',
        'https://shop.example.com/categories/books',
        'https://shop.example.com/categories/kitchen',
        'https://shop.example.com/products/p-new',
        'https://shop.example.com/products/p-old',
      ]);
    });

    it('should date product entries by their creation day', async () => {
      const xml = await new SitemapQueries(db, 'https://shop.example.com').generate();

      expect(xml).toContain(
        '<url><loc>https://shop.example.com/products/p-new</loc><lastmod>2024-03-02</lastmod>' +
          '<changefreq>weekly</changefreq><priority>0.6</priority></url>',
      );
    });
  });
});
