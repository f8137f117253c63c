// Game master tool surface - one text block per call, never throws

import type { GameSession, Logger, World } from '@parley/protocol';
import type { EffectHandlerRegistry } from '../effects/registry.js';
import { resolveIdentity, type IdentitySource } from '../sessions/ids.js';
import { silentLogger } from '../logging.js';
import { createGameSession, resetGameSession } from './session.js';
import { currentScene, submitAction } from './engine.js';
import { GAME_PROMPT, renderJournal, renderOpening, renderOutcome, renderRestart, renderScene } from './render.js';

export type GameMasterToolsOptions = {
  world: World;
  logger?: Logger;
  identity?: Partial<IdentitySource>;
  registry?: EffectHandlerRegistry;
};

export type GameMasterTools = {
  /**
   * The live session. Replaced contents on start and restart, same object.
   */
  readonly session: GameSession;

  startAdventure(playerName?: string): string;
  getScene(): string;
  playerAction(text: string): string;
  showJournal(): string;
  restartAdventure(): string;
};

export const GAME_FAILURE_TEXT = `Something went wrong on my side. Let's pick up where we left off. ${GAME_PROMPT}`;

/**
 * Create the game master tools over one session.
 */
export function createGameMasterTools(options: GameMasterToolsOptions): GameMasterTools {
  const { world, registry } = options;
  const logger = options.logger ?? silentLogger;
  const identity = resolveIdentity(options.identity);
  const session = createGameSession(world, { identity });

  const guard = (tool: string, run: () => string): string => {
    try {
      return run();
    } catch (error) {
      logger.error('Game tool failed', {
        tool,
        sessionId: session.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      return GAME_FAILURE_TEXT;
    }
  };

  return {
    session,

    startAdventure(playerName) {
      return guard('startAdventure', () => {
        resetGameSession(session, world, { playerName, identity });
        logger.info('Adventure started', { sessionId: session.sessionId, playerName: session.playerName });
        return renderOpening(world, session, currentScene(session, world));
      });
    },

    getScene() {
      return guard('getScene', () => renderScene(currentScene(session, world)));
    },

    playerAction(text) {
      return guard('playerAction', () => {
        const outcome = submitAction(session, world, text, { logger, now: identity.now, registry });
        return renderOutcome(world, outcome);
      });
    },

    showJournal() {
      return guard('showJournal', () => renderJournal(session));
    },

    restartAdventure() {
      return guard('restartAdventure', () => {
        resetGameSession(session, world, { identity });
        logger.info('Adventure restarted', { sessionId: session.sessionId });
        return renderRestart(world, currentScene(session, world));
      });
    },
  };
}
