// Tests for catalog validation

import { describe, it, expect } from 'vitest';
import { parseCatalog } from './catalog.js';

function createRawProduct(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'mug-001',
    name: 'Stoneware Mug',
    description: 'A heavy mug.',
    category: 'mug',
    price: 299,
    color: 'white',
    ...overrides,
  };
}

describe('parseCatalog', () => {
  it('should parse a valid catalog and inherit the currency', () => {
    const result = parseCatalog({ currency: 'INR', products: [createRawProduct()] });

    if (!result.valid) throw new Error('expected a valid catalog');
    expect(result.value.products).toEqual([
      {
        id: 'mug-001',
        name: 'Stoneware Mug',
        description: 'A heavy mug.',
        category: 'mug',
        price: 299,
        currency: 'INR',
        color: 'white',
      },
    ]);
  });

  it('should keep sizes when present', () => {
    const result = parseCatalog({
      currency: 'INR',
      products: [createRawProduct({ id: 'tee-001', category: 'tshirt', sizes: ['S', 'M'] })],
    });

    if (!result.valid) throw new Error('expected a valid catalog');
    expect(result.value.products[0].sizes).toEqual(['S', 'M']);
  });

  it('should reject duplicate ids regardless of case', () => {
    const result = parseCatalog({
      currency: 'INR',
      products: [createRawProduct(), createRawProduct({ id: 'MUG-001' })],
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        path: 'catalog.products[1].id',
        message: 'Duplicate product id "MUG-001"',
        code: 'DUPLICATE_ID',
      },
    ]);
  });

  it('should reject negative prices', () => {
    const result = parseCatalog({ currency: 'INR', products: [createRawProduct({ price: -1 })] });

    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('catalog.products[0].price');
  });

  it('should reject a missing currency', () => {
    const result = parseCatalog({ products: [createRawProduct()] });

    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('MISSING_FIELD');
  });

  it('should warn when a product has no description', () => {
    const result = parseCatalog({
      currency: 'INR',
      products: [createRawProduct({ description: undefined })],
    });

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(['MISSING_DESCRIPTION']);
  });

  it('should warn for an empty catalog', () => {
    const result = parseCatalog({ currency: 'INR', products: [] });

    expect(result.valid).toBe(true);
    expect(result.warnings[0].code).toBe('EMPTY_CONTENTS');
  });
});
