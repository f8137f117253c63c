// Action resolver - maps free text onto one of a scene's legal actions

import type { ActionResolution, LegalAction } from '@parley/protocol';
import { runCascade, type MatchStrategy } from './cascade.js';
import { descriptionWords, normalizeText } from './text.js';

type ActionStrategy = MatchStrategy<LegalAction, string>;

/**
 * The whole text equals an action id.
 */
export const exactIdStrategy: ActionStrategy = {
  name: 'exact_id',
  match(text, actions) {
    return actions.find((a) => a.id.toLowerCase() === text)?.id ?? null;
  },
};

/**
 * An action id appears somewhere in the text ("I'll inspect_box now").
 */
export const idSubstringStrategy: ActionStrategy = {
  name: 'id_substring',
  match(text, actions) {
    return actions.find((a) => text.includes(a.id.toLowerCase()))?.id ?? null;
  },
};

/**
 * One of the first four words of a description appears in the text.
 */
export const leadingWordsStrategy: ActionStrategy = {
  name: 'leading_words',
  match(text, actions) {
    const found = actions.find((a) =>
      descriptionWords(a.description)
        .slice(0, 4)
        .some((word) => text.includes(word))
    );
    return found?.id ?? null;
  },
};

/**
 * Any word of a description appears in the text. Last resort.
 */
export const anyWordStrategy: ActionStrategy = {
  name: 'any_word',
  match(text, actions) {
    const found = actions.find((a) =>
      descriptionWords(a.description).some((word) => text.includes(word))
    );
    return found?.id ?? null;
  },
};

export const ACTION_STRATEGIES: readonly ActionStrategy[] = [
  exactIdStrategy,
  idSubstringStrategy,
  leadingWordsStrategy,
  anyWordStrategy,
];

/**
 * Resolve free text to one legal action.
 *
 * Word matching is substring-based, so short description words ("a", "at")
 * match liberally. An empty action set reports `no_actions` before any
 * matching is attempted.
 */
export function resolveAction(
  text: string,
  legalActions: readonly LegalAction[]
): ActionResolution {
  if (legalActions.length === 0) {
    return { kind: 'no_actions' };
  }

  const normalized = normalizeText(text);
  if (normalized === '') {
    return { kind: 'not_found' };
  }

  const match = runCascade(ACTION_STRATEGIES, normalized, legalActions);
  if (!match) {
    return { kind: 'not_found' };
  }
  return { kind: 'matched', actionId: match.result, strategy: match.strategy };
}
