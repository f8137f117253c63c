// Category synonym table - spoken keyword → canonical category

export const CATEGORY_SYNONYMS: Readonly<Record<string, string>> = {
  mug: 'mug',
  mugs: 'mug',
  cup: 'mug',
  cups: 'mug',
  tshirt: 'tshirt',
  tshirts: 'tshirt',
  't-shirt': 'tshirt',
  't-shirts': 'tshirt',
  hoodie: 'hoodie',
  hoodies: 'hoodie',
  sweatshirt: 'hoodie',
  sweatshirts: 'hoodie',
  mobile: 'mobile',
  mobiles: 'mobile',
  phone: 'mobile',
  phones: 'mobile',
  smartphone: 'mobile',
  smartphones: 'mobile',
  cellphone: 'mobile',
  bottle: 'bottle',
  bottles: 'bottle',
  flask: 'bottle',
  flasks: 'bottle',
};

/**
 * Map a category name or synonym to its canonical form. Unknown names pass
 * through lower-cased.
 */
export function canonicalCategory(
  value: string,
  synonyms: Readonly<Record<string, string>> = CATEGORY_SYNONYMS
): string {
  const normalized = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(synonyms, normalized) ? synonyms[normalized] : normalized;
}
