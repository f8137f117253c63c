// Game session lifecycle

import type { GameSession, World } from '@parley/protocol';
import { resolveIdentity, type IdentitySource } from '../sessions/ids.js';

export type GameSessionOptions = {
  playerName?: string;
  identity?: Partial<IdentitySource>;
};

/**
 * A fresh session positioned at the start scene with empty collections.
 */
export function createGameSession(world: World, options: GameSessionOptions = {}): GameSession {
  const identity = resolveIdentity(options.identity);
  const session: GameSession = {
    kind: 'game',
    sessionId: identity.sessionId(),
    startedAt: identity.now(),
    history: [],
    currentSceneId: world.startSceneId,
    journal: [],
    inventory: [],
    choicesMade: [],
  };
  const playerName = options.playerName?.trim();
  if (playerName) {
    session.playerName = playerName;
  }
  return session;
}

/**
 * Reset in place. The player name survives unless a new one is given.
 */
export function resetGameSession(
  session: GameSession,
  world: World,
  options: GameSessionOptions = {}
): GameSession {
  const fresh = createGameSession(world, {
    identity: options.identity,
    playerName: options.playerName?.trim() || session.playerName,
  });
  Object.assign(session, fresh);
  if (fresh.playerName === undefined) {
    delete session.playerName;
  }
  return session;
}
