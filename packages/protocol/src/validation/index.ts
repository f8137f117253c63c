export { parseWorld, parseEffects } from './world.js';
export { parseCatalog } from './catalog.js';
export { isOrder, isOrderItem } from './orders.js';
export {
  isRecord,
  isNonEmptyString,
  type ParseResult,
  type ReferenceValidationError,
  type ReferenceValidationWarning,
  type ReferenceValidationErrorCode,
  type ReferenceValidationWarningCode,
} from './result.js';
