// tRPC request context
//
// The context is shared by every request: the conversation registry, the
// order ledger, and the logger are process-wide.

import type { Logger } from '@parley/protocol';
import type { OrderLedger } from '@parley/repositories';
import type { ConversationRegistry } from '../sessions/registry.js';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  /** Per-conversation game and shop sessions */
  conversations: ConversationRegistry;

  /** Durable order ledger shared by every conversation */
  ledger: OrderLedger;

  logger: Logger;
};

/**
 * Build a context factory over long-lived dependencies.
 */
export function createContextFactory(context: Context): () => Context {
  return () => context;
}
