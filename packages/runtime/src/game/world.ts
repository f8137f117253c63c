// World lookups - scenes are addressed by id only

import type { LegalAction, Logger, Scene, World } from '@parley/protocol';
import { SceneNotFoundError } from '../errors.js';

export function getScene(world: World, sceneId: string): Scene | null {
  return Object.prototype.hasOwnProperty.call(world.scenes, sceneId) ? world.scenes[sceneId] : null;
}

/**
 * The start scene. A parsed world always defines it.
 *
 * @throws SceneNotFoundError for a world built without one
 */
export function getStartScene(world: World): Scene {
  const scene = getScene(world, world.startSceneId);
  if (!scene) {
    throw new SceneNotFoundError(world.startSceneId);
  }
  return scene;
}

/**
 * The scene's choices in presentation order.
 */
export function legalActions(scene: Scene): LegalAction[] {
  return Object.entries(scene.choices).map(([id, choice]) => ({ id, description: choice.description }));
}

/**
 * Return `sceneId` when it names a scene, otherwise the start scene id.
 */
export function coerceSceneId(world: World, sceneId: string, logger?: Logger): string {
  if (getScene(world, sceneId)) {
    return sceneId;
  }
  logger?.warn('Unknown scene, using the start scene', { sceneId, startSceneId: world.startSceneId });
  return world.startSceneId;
}
