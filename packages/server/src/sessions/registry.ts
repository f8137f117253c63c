// Conversation registry - one game session and one shop session per conversation
//
// Sessions live in memory only and are lost on restart. Each conversation is
// driven by one front end, so calls for the same conversation do not overlap.
// A front end may disconnect without ending its conversation, so conversations
// idle for longer than the timeout are dropped on the next registry call.

import type { Catalog, Logger, World } from '@parley/protocol';
import type { OrderLedger } from '@parley/repositories';
import {
  createGameMasterTools,
  createShoppingTools,
  type GameMasterTools,
  type IdentitySource,
  type ShoppingTools,
} from '@parley/runtime';

export type Conversation = {
  id: string;
  game: GameMasterTools;
  shop: ShoppingTools;
  createdAt: string;
};

export type ConversationRegistry = {
  /**
   * The conversation's tools, created on first use.
   */
  get(conversationId: string): Conversation;

  /**
   * Drop a conversation and its sessions.
   * @returns true if the conversation existed
   */
  end(conversationId: string): boolean;

  size(): number;
};

export type ConversationRegistryOptions = {
  world: World;
  catalog: Catalog;
  ledger: OrderLedger;
  logger: Logger;
  identity?: Partial<IdentitySource>;

  /**
   * Idle time after which a conversation is dropped (default 30 minutes)
   */
  idleTimeoutMs?: number;

  /**
   * Milliseconds clock used for idle tracking (default Date.now)
   */
  clock?: () => number;
};

export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

type Entry = {
  conversation: Conversation;
  lastUsedAt: number;
};

export function createConversationRegistry(options: ConversationRegistryOptions): ConversationRegistry {
  const { world, catalog, ledger, logger, identity } = options;
  const idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
  const clock = options.clock ?? Date.now;
  const conversations = new Map<string, Entry>();

  function expireIdle(now: number): void {
    for (const [conversationId, entry] of conversations) {
      if (now - entry.lastUsedAt > idleTimeoutMs) {
        conversations.delete(conversationId);
        logger.debug('Conversation expired', { conversationId, idleMs: now - entry.lastUsedAt });
      }
    }
  }

  return {
    get(conversationId) {
      const now = clock();
      expireIdle(now);

      const existing = conversations.get(conversationId);
      if (existing) {
        existing.lastUsedAt = now;
        return existing.conversation;
      }

      const conversation: Conversation = {
        id: conversationId,
        game: createGameMasterTools({ world, logger, identity }),
        shop: createShoppingTools({ catalog, ledger, logger, identity }),
        createdAt: identity?.now?.() ?? new Date().toISOString(),
      };
      conversations.set(conversationId, { conversation, lastUsedAt: now });
      logger.debug('Conversation opened', { conversationId });
      return conversation;
    },

    end(conversationId) {
      const removed = conversations.delete(conversationId);
      if (removed) {
        logger.debug('Conversation ended', { conversationId });
      }
      return removed;
    },

    size() {
      expireIdle(clock());
      return conversations.size;
    },
  };
}
