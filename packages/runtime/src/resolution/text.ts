// Text helpers shared by the resolvers. Every comparison is case-insensitive.

/**
 * Trim and lower-case.
 */
export function normalizeText(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Alphabetic runs longer than two characters, lower-cased.
 */
export function significantTokens(text: string): string[] {
  return (text.toLowerCase().match(/[a-z]+/g) ?? []).filter((token) => token.length > 2);
}

/**
 * Alphabetic runs of any length, lower-cased.
 */
export function wordTokens(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+/g) ?? [];
}

/**
 * Whitespace-separated tokens that are entirely digits, as numbers.
 * Trailing punctuation is ignored ("2." counts, "mug-001" does not).
 */
export function bareIntegers(text: string): number[] {
  return text
    .split(/\s+/)
    .map((token) => token.replace(/[.,!?;:]+$/, ''))
    .filter((token) => /^\d+$/.test(token))
    .map((token) => Number(token));
}

/**
 * Whitespace-separated words of a description, lower-cased, punctuation kept.
 */
export function descriptionWords(description: string): string[] {
  return description.toLowerCase().split(/\s+/).filter((word) => word !== '');
}
