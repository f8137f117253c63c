// Reference resolver - maps a free-text fragment to one entity among candidates
//
// Stages run in order and the first match wins:
//   1. domain hint   - a category keyword narrows the candidates (reverted if nothing is left)
//   2. ordinal       - "first" .. "fourth" index into the candidates
//   3. exact id
//   4. compound      - the text names both the candidate's color and its category
//   5. strong name   - every significant token is in the name
//   6. weak name     - any significant token is in the name
//   7. numeric index - a bare integer N selects the N-th candidate
//
// Keyword, color and name checks are substring checks. A color embedded in an
// unrelated word still counts as a mention.

import type { ReferenceResolution } from '@parley/protocol';
import { runCascade, type MatchStrategy } from './cascade.js';
import { bareIntegers, normalizeText, significantTokens, wordTokens } from './text.js';

/**
 * The fields the resolver reads from a candidate.
 */
export type ResolvableEntity = {
  id: string;
  name: string;
  category?: string;
  color?: string;
};

export type ReferenceResolverOptions = {
  /**
   * Spoken keyword → canonical category (e.g. "phones" → "mobile")
   */
  categorySynonyms?: Readonly<Record<string, string>>;

  /**
   * Run the ordinal and numeric-index stages (default true). Turn off when the
   * candidates are not the list the user was shown.
   */
  positional?: boolean;
};

const POSITIONAL_STRATEGIES: ReadonlySet<string> = new Set(['ordinal', 'numeric_index']);

export const ORDINALS: Readonly<Record<string, number>> = {
  first: 0,
  second: 1,
  third: 2,
  fourth: 3,
};

/**
 * Canonical category named in the text, if any. Longer keywords are checked
 * first so "smartphone" wins over "phone".
 */
export function findCategoryHint(
  text: string,
  synonyms: Readonly<Record<string, string>>
): string | null {
  const keywords = Object.keys(synonyms).sort((a, b) => b.length - a.length || a.localeCompare(b));
  const keyword = keywords.find((k) => text.includes(k));
  return keyword === undefined ? null : synonyms[keyword];
}

function mentionsCategory(
  text: string,
  category: string,
  synonyms: Readonly<Record<string, string>>
): boolean {
  const canonical = category.toLowerCase();
  if (text.includes(canonical)) {
    return true;
  }
  return Object.entries(synonyms).some(
    ([keyword, target]) => target === canonical && text.includes(keyword)
  );
}

function createReferenceStrategies<T extends ResolvableEntity>(
  synonyms: Readonly<Record<string, string>>
): MatchStrategy<T, T>[] {
  return [
    {
      name: 'ordinal',
      match(text, candidates) {
        const ordinal = wordTokens(text).find((word) => word in ORDINALS);
        if (ordinal === undefined) return null;
        return candidates[ORDINALS[ordinal]] ?? null;
      },
    },
    {
      name: 'exact_id',
      match(text, candidates) {
        return candidates.find((c) => c.id.toLowerCase() === text) ?? null;
      },
    },
    {
      name: 'compound_attribute',
      match(text, candidates) {
        return (
          candidates.find((c) => {
            if (!c.color || !c.category) return false;
            return (
              text.includes(c.color.toLowerCase()) && mentionsCategory(text, c.category, synonyms)
            );
          }) ?? null
        );
      },
    },
    {
      name: 'strong_name',
      match(text, candidates) {
        const tokens = significantTokens(text);
        if (tokens.length === 0) return null;
        return (
          candidates.find((c) => {
            const name = c.name.toLowerCase();
            return tokens.every((token) => name.includes(token));
          }) ?? null
        );
      },
    },
    {
      name: 'weak_name',
      match(text, candidates) {
        const tokens = significantTokens(text);
        if (tokens.length === 0) return null;
        return (
          candidates.find((c) => {
            const name = c.name.toLowerCase();
            return tokens.some((token) => name.includes(token));
          }) ?? null
        );
      },
    },
    {
      name: 'numeric_index',
      match(text, candidates) {
        const [index] = bareIntegers(text);
        if (index === undefined || index < 1) return null;
        return candidates[index - 1] ?? null;
      },
    },
  ];
}

/**
 * Resolve free text to one candidate.
 *
 * Deterministic: the same text and candidate order always give the same result.
 */
export function resolveReference<T extends ResolvableEntity>(
  text: string,
  candidates: readonly T[],
  options: ReferenceResolverOptions = {}
): ReferenceResolution<T> {
  const synonyms = options.categorySynonyms ?? {};
  const normalized = normalizeText(text);
  if (normalized === '' || candidates.length === 0) {
    return { kind: 'not_found' };
  }

  let scoped: readonly T[] = candidates;
  const hint = findCategoryHint(normalized, synonyms);
  if (hint !== null) {
    const narrowed = candidates.filter((c) => c.category?.toLowerCase() === hint);
    if (narrowed.length > 0) {
      scoped = narrowed;
    }
  }

  const strategies = createReferenceStrategies<T>(synonyms).filter(
    (strategy) => options.positional !== false || !POSITIONAL_STRATEGIES.has(strategy.name)
  );
  const match = runCascade(strategies, normalized, scoped);
  if (!match) {
    return { kind: 'not_found' };
  }
  return { kind: 'matched', entity: match.result, strategy: match.strategy };
}
