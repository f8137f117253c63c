// Game response rendering. Every block ends with the prompt.

import type { GameSession, Scene, World } from '@parley/protocol';
import { recentHistory } from '../sessions/history.js';
import type { TransitionOutcome } from './engine.js';

export const GAME_PROMPT = 'What do you do?';

export const VOID_SCENE_TEXT = `You are in a featureless void. ${GAME_PROMPT}`;

export const PERSONA_PREFIX = 'The Game Master, calm and slightly mysterious, replies:';

export const DEFAULT_SOFT_RESET =
  'This part of the story has no obvious actions left. The scene softens and you find yourself back where it all began.';

export const DEFAULT_RESTART = 'The world resets, wiping away your previous path.';

export const UNRESOLVED_TEXT =
  "I didn't quite catch that action for this situation. Try one of the listed choices, or say the short code shown after each one.";

const JOURNAL_HISTORY_LIMIT = 6;

function ensurePrompt(text: string): string {
  return text.endsWith(GAME_PROMPT) ? text : `${text}\n${GAME_PROMPT}`;
}

/**
 * Description, then the choices with their codes.
 */
export function renderScene(scene: Scene | null): string {
  if (!scene) {
    return VOID_SCENE_TEXT;
  }
  let text = `${scene.description}\n\nChoices:\n`;
  for (const [id, choice] of Object.entries(scene.choices)) {
    text += `- ${choice.description} (say: ${id})\n`;
  }
  return `${text}\n${GAME_PROMPT}`;
}

export function renderOpening(world: World, session: GameSession, scene: Scene): string {
  const greeting = `Greetings ${session.playerName || 'traveler'}. Welcome to '${world.title}'.`;
  return ensurePrompt(`${greeting}\n\n${renderScene(scene)}`);
}

export function renderRestart(world: World, scene: Scene): string {
  return ensurePrompt(`${world.narration?.restart ?? DEFAULT_RESTART}\n\n${renderScene(scene)}`);
}

export function renderOutcome(world: World, outcome: TransitionOutcome): string {
  switch (outcome.kind) {
    case 'advanced':
      return ensurePrompt(
        `${PERSONA_PREFIX}\n\nYou chose '${outcome.actionId}'.\n\n${renderScene(outcome.scene)}`
      );
    case 'unresolved':
      return ensurePrompt(`${UNRESOLVED_TEXT}\n\n${renderScene(outcome.scene)}`);
    case 'soft_reset':
      return ensurePrompt(
        `${world.narration?.softReset ?? DEFAULT_SOFT_RESET}\n\n${renderScene(outcome.scene)}`
      );
  }
}

/**
 * Session line, journal, inventory, and the most recent choices.
 */
export function renderJournal(session: GameSession): string {
  const lines: string[] = [`Session: ${session.sessionId} | Started at: ${session.startedAt}`];
  if (session.playerName) {
    lines.push(`Player: ${session.playerName}`);
  }

  if (session.journal.length > 0) {
    lines.push('\nJournal entries:', ...session.journal.map((entry) => `- ${entry}`));
  } else {
    lines.push('\nJournal is empty so far.');
  }

  if (session.inventory.length > 0) {
    lines.push('\nInventory:', ...session.inventory.map((item) => `- ${item}`));
  } else {
    lines.push('\nNo items in inventory yet.');
  }

  lines.push('\nRecent choices:');
  const recent = recentHistory(session, JOURNAL_HISTORY_LIMIT);
  if (recent.length > 0) {
    for (const h of recent) {
      lines.push(`- ${h.timestamp} | from ${h.from} -> ${h.to} via ${h.action}`);
    }
  } else {
    lines.push('- None yet. Your story is just beginning.');
  }

  lines.push(`\n${GAME_PROMPT}`);
  return lines.join('\n');
}
