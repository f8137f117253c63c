// World validation
//
// Parses a raw world document (as read from JSON) into a normalized World.
// Choices may declare effects either as a descriptor list or in the compact
// form { "add_journal": "...", "add_inventory": "..." }.

import type { World, WorldNarration, Scene, Choice } from '../types/scenes.js';
import type { EffectDescriptor } from '../types/effects.js';
import { isEffectKind } from '../types/effects.js';
import {
  isRecord,
  isNonEmptyString,
  type ParseResult,
  type ReferenceValidationError,
  type ReferenceValidationWarning,
} from './result.js';

/**
 * Parse and validate a world document.
 *
 * Targets that name no scene are reported as warnings, not errors: the engine
 * sends the session back to the start scene when it lands on an unknown id.
 */
export function parseWorld(input: unknown): ParseResult<World> {
  const errors: ReferenceValidationError[] = [];
  const warnings: ReferenceValidationWarning[] = [];

  if (!isRecord(input)) {
    errors.push({ path: 'world', message: 'World must be an object', code: 'INVALID_TYPE' });
    return { valid: false, errors, warnings };
  }

  if (!isNonEmptyString(input.title)) {
    errors.push({ path: 'world.title', message: 'World must have a title', code: 'MISSING_FIELD' });
  }

  if (!isNonEmptyString(input.startSceneId)) {
    errors.push({
      path: 'world.startSceneId',
      message: 'World must name a start scene',
      code: 'MISSING_FIELD',
    });
  }

  if (!isRecord(input.scenes)) {
    errors.push({ path: 'world.scenes', message: 'Scenes must be an object', code: 'INVALID_TYPE' });
    return { valid: false, errors, warnings };
  }

  const scenes: Record<string, Scene> = {};
  for (const [sceneId, rawScene] of Object.entries(input.scenes)) {
    const scene = parseScene(sceneId, rawScene, `world.scenes.${sceneId}`, errors);
    if (scene) {
      scenes[sceneId] = scene;
    }
  }

  if (isNonEmptyString(input.startSceneId) && !hasScene(scenes, input.startSceneId)) {
    errors.push({
      path: 'world.startSceneId',
      message: `Start scene "${input.startSceneId}" is not defined`,
      code: 'INVALID_START',
    });
  }

  for (const scene of Object.values(scenes)) {
    const choiceIds = Object.keys(scene.choices);
    if (choiceIds.length === 0) {
      warnings.push({
        path: `world.scenes.${scene.id}.choices`,
        message: `Scene "${scene.id}" has no choices and will soft-reset to the start scene`,
        code: 'DEAD_END',
      });
    }
    for (const choiceId of choiceIds) {
      const target = scene.choices[choiceId].resultScene;
      if (!hasScene(scenes, target)) {
        warnings.push({
          path: `world.scenes.${scene.id}.choices.${choiceId}.resultScene`,
          message: `Choice "${choiceId}" targets undefined scene "${target}"`,
          code: 'DANGLING_TARGET',
        });
      }
    }
  }

  const narration = input.narration === undefined ? undefined : parseNarration(input.narration, errors);

  if (errors.length > 0 || !isNonEmptyString(input.title) || !isNonEmptyString(input.startSceneId)) {
    return { valid: false, errors, warnings };
  }

  const world: World = { title: input.title, startSceneId: input.startSceneId, scenes };
  if (narration) {
    world.narration = narration;
  }
  return { valid: true, value: world, errors: [], warnings };
}

function parseNarration(raw: unknown, errors: ReferenceValidationError[]): WorldNarration | null {
  if (!isRecord(raw)) {
    errors.push({ path: 'world.narration', message: 'Narration must be an object', code: 'INVALID_TYPE' });
    return null;
  }

  const narration: WorldNarration = {};
  for (const key of ['softReset', 'restart'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isNonEmptyString(value)) {
      narration[key] = value;
    } else {
      errors.push({
        path: `world.narration.${key}`,
        message: 'Narration lines must be non-empty strings',
        code: 'INVALID_VALUE',
      });
    }
  }
  return narration;
}

function parseScene(
  sceneId: string,
  raw: unknown,
  path: string,
  errors: ReferenceValidationError[]
): Scene | null {
  if (!isRecord(raw)) {
    errors.push({ path, message: 'Scene must be an object', code: 'INVALID_TYPE' });
    return null;
  }

  const errorCount = errors.length;

  if (!isNonEmptyString(raw.title)) {
    errors.push({ path: `${path}.title`, message: 'Scene must have a title', code: 'MISSING_FIELD' });
  }
  if (!isNonEmptyString(raw.description)) {
    errors.push({
      path: `${path}.description`,
      message: 'Scene must have a description',
      code: 'MISSING_FIELD',
    });
  }

  const choices: Record<string, Choice> = {};
  if (raw.choices !== undefined) {
    if (!isRecord(raw.choices)) {
      errors.push({ path: `${path}.choices`, message: 'Choices must be an object', code: 'INVALID_TYPE' });
    } else {
      for (const [choiceId, rawChoice] of Object.entries(raw.choices)) {
        const choice = parseChoice(rawChoice, `${path}.choices.${choiceId}`, errors);
        if (choice) {
          choices[choiceId] = choice;
        }
      }
    }
  }

  if (errors.length > errorCount || !isNonEmptyString(raw.title) || !isNonEmptyString(raw.description)) {
    return null;
  }

  return { id: sceneId, title: raw.title, description: raw.description, choices };
}

function parseChoice(
  raw: unknown,
  path: string,
  errors: ReferenceValidationError[]
): Choice | null {
  if (!isRecord(raw)) {
    errors.push({ path, message: 'Choice must be an object', code: 'INVALID_TYPE' });
    return null;
  }

  if (!isNonEmptyString(raw.description)) {
    errors.push({
      path: `${path}.description`,
      message: 'Choice must have a description',
      code: 'MISSING_FIELD',
    });
  }
  if (!isNonEmptyString(raw.resultScene)) {
    errors.push({
      path: `${path}.resultScene`,
      message: 'Choice must name a result scene',
      code: 'MISSING_FIELD',
    });
  }

  const effects = raw.effects === undefined ? [] : parseEffects(raw.effects, `${path}.effects`, errors);

  if (!isNonEmptyString(raw.description) || !isNonEmptyString(raw.resultScene) || effects === null) {
    return null;
  }

  const choice: Choice = { description: raw.description, resultScene: raw.resultScene };
  if (effects.length > 0) {
    choice.effects = effects;
  }
  return choice;
}

function hasScene(scenes: Record<string, Scene>, sceneId: string): boolean {
  return Object.prototype.hasOwnProperty.call(scenes, sceneId);
}

/**
 * Parse effects in either the descriptor-list or the compact form.
 */
export function parseEffects(
  raw: unknown,
  path: string,
  errors: ReferenceValidationError[]
): EffectDescriptor[] | null {
  if (Array.isArray(raw)) {
    const effects: EffectDescriptor[] = [];
    const errorCount = errors.length;
    for (const [index, entry] of raw.entries()) {
      const effect = parseEffectDescriptor(entry, `${path}[${index}]`, errors);
      if (effect) {
        effects.push(effect);
      }
    }
    return errors.length > errorCount ? null : effects;
  }

  if (!isRecord(raw)) {
    errors.push({ path, message: 'Effects must be a list or an object', code: 'INVALID_TYPE' });
    return null;
  }

  // Compact form: journal first, then inventory
  const effects: EffectDescriptor[] = [];
  const errorCount = errors.length;
  for (const key of Object.keys(raw)) {
    if (key !== 'add_journal' && key !== 'add_inventory') {
      errors.push({ path: `${path}.${key}`, message: `Unknown effect "${key}"`, code: 'UNKNOWN_EFFECT' });
    }
  }
  if (raw.add_journal !== undefined) {
    if (isNonEmptyString(raw.add_journal)) {
      effects.push({ kind: 'add_journal', text: raw.add_journal });
    } else {
      errors.push({
        path: `${path}.add_journal`,
        message: 'Journal entry must be a non-empty string',
        code: 'INVALID_VALUE',
      });
    }
  }
  if (raw.add_inventory !== undefined) {
    if (isNonEmptyString(raw.add_inventory)) {
      effects.push({ kind: 'add_inventory', item: raw.add_inventory });
    } else {
      errors.push({
        path: `${path}.add_inventory`,
        message: 'Inventory item must be a non-empty string',
        code: 'INVALID_VALUE',
      });
    }
  }
  return errors.length > errorCount ? null : effects;
}

function parseEffectDescriptor(
  raw: unknown,
  path: string,
  errors: ReferenceValidationError[]
): EffectDescriptor | null {
  if (!isRecord(raw) || typeof raw.kind !== 'string') {
    errors.push({ path, message: 'Effect must be an object with a kind', code: 'INVALID_TYPE' });
    return null;
  }

  if (!isEffectKind(raw.kind)) {
    errors.push({ path: `${path}.kind`, message: `Unknown effect "${raw.kind}"`, code: 'UNKNOWN_EFFECT' });
    return null;
  }

  switch (raw.kind) {
    case 'add_journal':
      if (isNonEmptyString(raw.text)) return { kind: 'add_journal', text: raw.text };
      break;
    case 'add_inventory':
      if (isNonEmptyString(raw.item)) return { kind: 'add_inventory', item: raw.item };
      break;
    default:
      // Cart and order effects are produced by the shop engine, never declared in data
      errors.push({
        path: `${path}.kind`,
        message: `Effect "${raw.kind}" cannot be declared on a scene choice`,
        code: 'INVALID_VALUE',
      });
      return null;
  }

  errors.push({ path, message: `Effect "${raw.kind}" is missing its value`, code: 'MISSING_FIELD' });
  return null;
}
