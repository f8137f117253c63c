// Catalog validation

import type { Catalog, Product } from '../types/catalog.js';
import {
  isRecord,
  isNonEmptyString,
  type ParseResult,
  type ReferenceValidationError,
  type ReferenceValidationWarning,
} from './result.js';

/**
 * Parse and validate a catalog document.
 *
 * Products inherit the catalog currency when they do not declare one.
 * Categories, colors and sizes are kept as written; matching is case-insensitive.
 */
export function parseCatalog(input: unknown): ParseResult<Catalog> {
  const errors: ReferenceValidationError[] = [];
  const warnings: ReferenceValidationWarning[] = [];

  if (!isRecord(input)) {
    errors.push({ path: 'catalog', message: 'Catalog must be an object', code: 'INVALID_TYPE' });
    return { valid: false, errors, warnings };
  }

  if (!isNonEmptyString(input.currency)) {
    errors.push({
      path: 'catalog.currency',
      message: 'Catalog must declare a currency',
      code: 'MISSING_FIELD',
    });
  }

  if (!Array.isArray(input.products)) {
    errors.push({ path: 'catalog.products', message: 'Products must be a list', code: 'INVALID_TYPE' });
    return { valid: false, errors, warnings };
  }

  const currency = isNonEmptyString(input.currency) ? input.currency : '';
  const products: Product[] = [];
  const seen = new Set<string>();

  for (const [index, raw] of input.products.entries()) {
    const path = `catalog.products[${index}]`;
    const product = parseProduct(raw, path, currency, errors, warnings);
    if (!product) continue;

    const key = product.id.toLowerCase();
    if (seen.has(key)) {
      errors.push({
        path: `${path}.id`,
        message: `Duplicate product id "${product.id}"`,
        code: 'DUPLICATE_ID',
      });
      continue;
    }
    seen.add(key);
    products.push(product);
  }

  if (products.length === 0 && errors.length === 0) {
    warnings.push({ path: 'catalog.products', message: 'Catalog has no products', code: 'EMPTY_CONTENTS' });
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  return { valid: true, value: { currency, products }, errors: [], warnings };
}

function parseProduct(
  raw: unknown,
  path: string,
  defaultCurrency: string,
  errors: ReferenceValidationError[],
  warnings: ReferenceValidationWarning[]
): Product | null {
  if (!isRecord(raw)) {
    errors.push({ path, message: 'Product must be an object', code: 'INVALID_TYPE' });
    return null;
  }

  const errorCount = errors.length;

  if (!isNonEmptyString(raw.id)) {
    errors.push({ path: `${path}.id`, message: 'Product must have an id', code: 'MISSING_FIELD' });
  }
  if (!isNonEmptyString(raw.name)) {
    errors.push({ path: `${path}.name`, message: 'Product must have a name', code: 'MISSING_FIELD' });
  }
  if (!isNonEmptyString(raw.category)) {
    errors.push({
      path: `${path}.category`,
      message: 'Product must have a category',
      code: 'MISSING_FIELD',
    });
  }
  if (typeof raw.price !== 'number' || !Number.isFinite(raw.price) || raw.price < 0) {
    errors.push({
      path: `${path}.price`,
      message: 'Price must be a non-negative number',
      code: 'INVALID_VALUE',
    });
  }
  if (raw.color !== undefined && !isNonEmptyString(raw.color)) {
    errors.push({ path: `${path}.color`, message: 'Color must be a string', code: 'INVALID_TYPE' });
  }

  let sizes: string[] | undefined;
  if (raw.sizes !== undefined) {
    if (Array.isArray(raw.sizes) && raw.sizes.every(isNonEmptyString)) {
      sizes = raw.sizes;
    } else {
      errors.push({
        path: `${path}.sizes`,
        message: 'Sizes must be a list of strings',
        code: 'INVALID_TYPE',
      });
    }
  }

  if (raw.description !== undefined && typeof raw.description !== 'string') {
    errors.push({
      path: `${path}.description`,
      message: 'Description must be a string',
      code: 'INVALID_TYPE',
    });
  } else if (!raw.description) {
    warnings.push({
      path: `${path}.description`,
      message: 'Product should have a description',
      code: 'MISSING_DESCRIPTION',
    });
  }

  if (
    errors.length > errorCount ||
    !isNonEmptyString(raw.id) ||
    !isNonEmptyString(raw.name) ||
    !isNonEmptyString(raw.category) ||
    typeof raw.price !== 'number'
  ) {
    return null;
  }

  const product: Product = {
    id: raw.id,
    name: raw.name,
    description: typeof raw.description === 'string' ? raw.description : '',
    category: raw.category,
    price: raw.price,
    currency: isNonEmptyString(raw.currency) ? raw.currency : defaultCurrency,
  };
  if (isNonEmptyString(raw.color)) product.color = raw.color;
  if (sizes && sizes.length > 0) product.sizes = sizes;
  return product;
}
