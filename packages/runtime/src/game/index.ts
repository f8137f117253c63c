export { getScene, getStartScene, legalActions, coerceSceneId } from './world.js';
export { createGameSession, resetGameSession, type GameSessionOptions } from './session.js';
export { currentScene, submitAction, type TransitionOutcome, type SubmitActionOptions } from './engine.js';
export {
  renderScene,
  renderOpening,
  renderRestart,
  renderOutcome,
  renderJournal,
  GAME_PROMPT,
  VOID_SCENE_TEXT,
  PERSONA_PREFIX,
  DEFAULT_SOFT_RESET,
  DEFAULT_RESTART,
  UNRESOLVED_TEXT,
} from './render.js';
export {
  createGameMasterTools,
  GAME_FAILURE_TEXT,
  type GameMasterTools,
  type GameMasterToolsOptions,
} from './tools.js';
