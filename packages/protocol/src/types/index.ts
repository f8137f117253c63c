// Re-export all protocol types

export * from './common.js';
export * from './effects.js';
export * from './scenes.js';
export * from './catalog.js';
export * from './sessions.js';
export * from './orders.js';
export * from './resolution.js';
export * from './logging.js';
