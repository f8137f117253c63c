// @parley/server
// tRPC tool surface for the game master and shopping assistant

export { loadConfig, ConfigError, DEFAULT_WORLD_FILE, DEFAULT_CATALOG_FILE, type Config } from './config.js';
export { createAppContext, type CreateAppOptions } from './app.js';
export {
  createConversationRegistry,
  type Conversation,
  type ConversationRegistry,
  type ConversationRegistryOptions,
} from './sessions/registry.js';
export { appRouter, type AppRouter } from './trpc/routers/index.js';
export { createContextFactory, type Context } from './trpc/context.js';
export { createCallerFactory } from './trpc/index.js';
