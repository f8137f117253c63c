// Game engine - resolves an utterance against the current scene and applies the transition

import type { GameSession, Logger, Scene, World } from '@parley/protocol';
import { resolveAction } from '../resolution/action-resolver.js';
import { applyEffects } from '../effects/executor.js';
import type { EffectHandlerRegistry } from '../effects/registry.js';
import { appendHistory } from '../sessions/history.js';
import { silentLogger } from '../logging.js';
import { coerceSceneId, getScene, getStartScene, legalActions } from './world.js';

/**
 * What an utterance did to the session.
 *
 * - advanced: an action matched; effects ran and the position moved
 * - unresolved: nothing matched; the position is unchanged
 * - soft_reset: the scene had no actions; the position went back to the start
 */
export type TransitionOutcome =
  | {
      kind: 'advanced';
      actionId: string;
      strategy: string;
      from: string;
      to: string;
      scene: Scene;
    }
  | { kind: 'unresolved'; scene: Scene }
  | { kind: 'soft_reset'; scene: Scene };

export type SubmitActionOptions = {
  logger?: Logger;
  now?: () => string;
  registry?: EffectHandlerRegistry;
};

/**
 * The scene at the session's position. Does not modify the session.
 */
export function currentScene(session: GameSession, world: World): Scene {
  return getScene(world, session.currentSceneId) ?? getStartScene(world);
}

/**
 * Resolve `text` against the current scene's actions and apply the result.
 */
export function submitAction(
  session: GameSession,
  world: World,
  text: string,
  options: SubmitActionOptions = {}
): TransitionOutcome {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date().toISOString());

  const from = coerceSceneId(world, session.currentSceneId, logger);
  session.currentSceneId = from;
  const scene = currentScene(session, world);

  const resolution = resolveAction(text, legalActions(scene));

  if (resolution.kind === 'no_actions') {
    session.currentSceneId = world.startSceneId;
    logger.warn('Dead end reached, returning to the start scene', {
      sessionId: session.sessionId,
      sceneId: from,
    });
    return { kind: 'soft_reset', scene: getStartScene(world) };
  }

  if (resolution.kind === 'not_found') {
    logger.debug('Action not resolved', { sessionId: session.sessionId, sceneId: from, text });
    return { kind: 'unresolved', scene };
  }

  const choice = scene.choices[resolution.actionId];
  const applied = applyEffects(choice.effects ?? [], { session, logger }, options.registry);

  const to = coerceSceneId(world, choice.resultScene, logger);
  appendHistory(session, { from, action: resolution.actionId, to }, now());
  session.choicesMade.push(resolution.actionId);
  session.currentSceneId = to;

  logger.info('Scene transition', {
    sessionId: session.sessionId,
    from,
    action: resolution.actionId,
    to,
    strategy: resolution.strategy,
    effects: applied.count,
  });

  return {
    kind: 'advanced',
    actionId: resolution.actionId,
    strategy: resolution.strategy,
    from,
    to,
    scene: currentScene(session, world),
  };
}
