// Catalog query - all provided filters are ANDed, results keep catalog order

import type { Catalog, CatalogFilters, Product } from '@parley/protocol';
import { CATEGORY_SYNONYMS, canonicalCategory } from './categories.js';

/**
 * Parse a price bound. Currency symbols and separators are stripped;
 * anything still unparseable yields null and the bound is ignored.
 */
export function parsePrice(value: number | string | undefined): number | null {
  if (value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const cleaned = value.replace(/[^0-9.-]/g, '');
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

function present(value: string | undefined): string | null {
  const trimmed = value?.trim().toLowerCase();
  return trimmed ? trimmed : null;
}

export function queryCatalog(
  catalog: Catalog,
  filters: CatalogFilters,
  synonyms: Readonly<Record<string, string>> = CATEGORY_SYNONYMS
): Product[] {
  const q = present(filters.q);
  const category = present(filters.category);
  const color = present(filters.color);
  const size = present(filters.size);
  const minPrice = parsePrice(filters.minPrice);
  const maxPrice = parsePrice(filters.maxPrice);

  const qCategory = q !== null && Object.prototype.hasOwnProperty.call(synonyms, q) ? synonyms[q] : null;
  const wantedCategory = category === null ? null : canonicalCategory(category, synonyms);

  return catalog.products.filter((product) => {
    const productCategory = product.category.toLowerCase();

    if (qCategory !== null) {
      if (productCategory !== qCategory) return false;
    } else if (q !== null) {
      const haystacks = [product.name, product.description, product.category].map((s) => s.toLowerCase());
      if (!haystacks.some((text) => text.includes(q))) return false;
    }

    if (wantedCategory !== null && productCategory !== wantedCategory) return false;
    if (minPrice !== null && product.price < minPrice) return false;
    if (maxPrice !== null && product.price > maxPrice) return false;
    if (color !== null && product.color?.toLowerCase() !== color) return false;
    if (size !== null && !(product.sizes ?? []).some((s) => s.toLowerCase() === size)) return false;

    return true;
  });
}

export function findProduct(catalog: Catalog, productId: string): Product | null {
  return catalog.products.find((p) => p.id === productId) ?? null;
}

/**
 * Round to whole cents.
 */
export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * "INR 299", "INR 12.50"
 */
export function formatPrice(amount: number, currency: string): string {
  const value = Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
  return `${currency} ${value}`;
}
