// Catalog types - products the shopping assistant can sell

import type { Id } from './common.js';

/**
 * A purchasable product.
 */
export type Product = {
  id: Id;
  name: string;
  description: string;

  /**
   * Canonical category (e.g. "mug", "mobile")
   */
  category: string;

  /**
   * Unit price in the catalog currency
   */
  price: number;

  currency: string;
  color?: string;

  /**
   * Sizes on offer. Absent or empty means the product is unsized.
   */
  sizes?: string[];
};

/**
 * The full product catalog. Product order is presentation order.
 */
export type Catalog = {
  currency: string;
  products: Product[];
};

/**
 * Filters accepted by a catalog query. All provided filters are ANDed.
 *
 * Price bounds accept strings so spoken values can pass through untouched;
 * values that fail to parse are ignored.
 */
export type CatalogFilters = {
  q?: string;
  category?: string;
  minPrice?: number | string;
  maxPrice?: number | string;
  color?: string;
  size?: string;
};
