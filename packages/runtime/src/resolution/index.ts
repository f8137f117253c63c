export { runCascade, type MatchStrategy, type CascadeMatch } from './cascade.js';
export {
  resolveAction,
  ACTION_STRATEGIES,
  exactIdStrategy,
  idSubstringStrategy,
  leadingWordsStrategy,
  anyWordStrategy,
} from './action-resolver.js';
export {
  resolveReference,
  findCategoryHint,
  ORDINALS,
  type ResolvableEntity,
  type ReferenceResolverOptions,
} from './reference-resolver.js';
export {
  normalizeText,
  significantTokens,
  wordTokens,
  bareIntegers,
  descriptionWords,
} from './text.js';
