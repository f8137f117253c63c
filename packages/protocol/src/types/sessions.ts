// Session state types - one mutable record per conversation

import type { Attributes, Id, Timestamp } from './common.js';

/**
 * An append-only record of one accepted action.
 */
export type TransitionRecord = {
  from: string;
  action: string;
  to: string;
  timestamp: Timestamp;
};

/**
 * Fields shared by every session kind.
 */
export type SessionBase = {
  /**
   * Opaque display id, regenerated on reset
   */
  sessionId: string;
  startedAt: Timestamp;
  history: TransitionRecord[];
};

/**
 * Game master session. `currentSceneId` always names a scene in the world.
 */
export type GameSession = SessionBase & {
  kind: 'game';
  playerName?: string;
  currentSceneId: Id;
  journal: string[];
  inventory: string[];
  choicesMade: string[];
};

/**
 * A line in the shopping cart.
 */
export type CartLine = {
  productId: Id;
  quantity: number;
  attrs: Attributes;
};

/**
 * Shopping assistant session.
 */
export type ShopSession = SessionBase & {
  kind: 'shop';
  customerName?: string;
  cart: CartLine[];

  /**
   * Ids of orders placed during this session
   */
  orders: Id[];

  /**
   * Product ids returned by the most recent catalog query, used to resolve
   * ordinal references such as "the second one"
   */
  lastResults: Id[];
};

export type Session = GameSession | ShopSession;
