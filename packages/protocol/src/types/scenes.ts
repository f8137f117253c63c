// Scene types - the narrative graph walked by the game master

import type { Id } from './common.js';
import type { EffectDescriptor } from './effects.js';

/**
 * A legal next action from a scene.
 */
export type Choice = {
  /**
   * Human-readable description, read aloud as a hint
   */
  description: string;

  /**
   * Scene the session moves to when this choice is taken
   */
  resultScene: Id;

  /**
   * Effects applied when the choice is taken, in order
   */
  effects?: EffectDescriptor[];
};

/**
 * A scene in the narrative graph.
 *
 * Scenes reference each other only by id. A scene with no choices is a dead end.
 */
export type Scene = {
  id: Id;
  title: string;
  description: string;

  /**
   * Legal next actions keyed by action id. Key order is presentation order.
   */
  choices: Record<Id, Choice>;
};

/**
 * The complete narrative graph.
 */
export type World = {
  title: string;
  startSceneId: Id;
  scenes: Record<Id, Scene>;

  /**
   * World-specific framing lines. The engine falls back to generic wording
   * for any line left out.
   */
  narration?: WorldNarration;
};

export type WorldNarration = {
  /**
   * Spoken when a dead end sends the player back to the start scene
   */
  softReset?: string;

  /**
   * Spoken when the player restarts the adventure
   */
  restart?: string;
};

/**
 * A legal action as seen by the action resolver: an id and its description.
 */
export type LegalAction = {
  id: Id;
  description: string;
};
