/**
 * sitemap.xml built from the current catalog on every request.
 */

import type { Database } from '../database/schema';

const SITEMAP_NS = 'http://www.sitemaps.org/schemas/sitemap/0.9';
const MAX_PRODUCTS = 1000;

export type ChangeFrequency = 'daily' | 'weekly';

export interface SitemapEntry {
  path: string;
  /** YYYY-MM-DD */
  lastmod?: string;
  changefreq: ChangeFrequency;
  priority: string;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function renderSitemap(baseUrl: string, entries: SitemapEntry[]): string {
  const root = baseUrl.replace(/\/+$/, '');
  const urls = entries.map((entry) => {
    const lines = [`<loc>${escapeXml(root + entry.path)}</loc>`];
    if (entry.lastmod) lines.push(`<lastmod>${entry.lastmod}</lastmod>`);
    lines.push(`<changefreq>${entry.changefreq}</changefreq>`, `<priority>${entry.priority}</priority>`);
    return `<url>${lines.join('')}</url>`;
  });
  return `<?xml version="1.0" encoding="UTF-8"?>\n<urlset xmlns="${SITEMAP_NS}">${urls.join('')}</urlset>`;
}

export class SitemapQueries {
  constructor(
    private readonly db: Database,
    private readonly baseUrl: string,
  ) {}

  /** Static pages, every category by slug, then the newest products */
  async generate(): Promise<string> {
    const categories = await this.db.selectFrom('categories').select('slug').orderBy('slug').execute();
    const products = await this.db
      .selectFrom('products')
      .select(['id', 'created_at'])
      .orderBy('created_at', 'desc')
      .orderBy('id')
      .limit(MAX_PRODUCTS)
      .execute();

    const entries: SitemapEntry[] = [
      { path: '/', changefreq: 'daily', priority: '1.0' },
      { path: '/products', changefreq: 'daily', priority: '0.9' },
      { path: '/categories', changefreq: 'weekly', priority: '0.8' },
      ...categories.map((c): SitemapEntry => ({
        path: `/categories/${encodeURIComponent(c.slug)}`,
        changefreq: 'weekly',
        priority: '0.7',
      })),
      ...products.map((p): SitemapEntry => ({
        path: `/products/${encodeURIComponent(p.id)}`,
        lastmod: p.created_at.slice(0, 10),
        changefreq: 'weekly',
        priority: '0.6',
      })),
    ];

    return renderSitemap(this.baseUrl, entries);
  }
}
