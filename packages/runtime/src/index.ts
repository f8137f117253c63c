// @parley/runtime
// Intent resolution and session state engine

// Error types
export {
  RuntimeError,
  ValidationError,
  SceneNotFoundError,
  ProductNotFoundError,
  UnresolvedReferenceError,
  InvalidAttributeError,
  InvalidQuantityError,
  EmptyCartError,
  UnknownEffectError,
  EffectTargetError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  createLevelFilteredLogger,
  type LogEntry,
} from './logging.js';

// Resolvers (free text → action or entity)
export * from './resolution/index.js';

// Effect application
export * from './effects/index.js';

// Session helpers
export * from './sessions/index.js';

// Game master
export * from './game/index.js';

// Shopping assistant
export * from './shop/index.js';
