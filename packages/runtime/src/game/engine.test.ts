// Tests for the game engine

import { describe, it, expect } from 'vitest';
import type { World } from '@parley/protocol';
import { currentScene, submitAction } from './engine.js';
import { createGameSession } from './session.js';
import { renderScene } from './render.js';
import { getStartScene } from './world.js';
import { SceneNotFoundError } from '../errors.js';
import { createCapturingLogger, silentLogger } from '../logging.js';

// --- Test Fixtures ---

function createWorld(): World {
  return {
    title: 'Test Shore',
    startSceneId: 'intro',
    scenes: {
      intro: {
        id: 'intro',
        title: 'Shore',
        description: 'You wake on a quiet shore.',
        choices: {
          inspect_box: { description: 'Inspect the carved box.', resultScene: 'box' },
          approach_tower: { description: 'Head inland towards the tower.', resultScene: 'tower_approach' },
          walk_to_cottages: { description: 'Follow the path east.', resultScene: 'cottages' },
        },
      },
      box: {
        id: 'box',
        title: 'The Box',
        description: 'A box with a map inside.',
        choices: {
          take_map: {
            description: 'Take the map and keep it.',
            resultScene: 'tower_approach',
            effects: [{ kind: 'add_journal', text: 'Found map fragment.' }],
          },
          leave_box: { description: 'Leave the box where it is.', resultScene: 'intro' },
        },
      },
      tower_approach: {
        id: 'tower_approach',
        title: 'Toward the Tower',
        description: 'The tower looms.',
        choices: {
          open_hatch: { description: 'Open the hatch.', resultScene: 'hatch' },
          retreat: { description: 'Return to the shore.', resultScene: 'intro' },
        },
      },
      hatch: { id: 'hatch', title: 'Hatch', description: 'Darkness below.', choices: {} },
    },
  };
}

const fixedNow = () => '2024-01-01T00:00:00.000Z';

// --- Tests ---

describe('submitAction', () => {
  it('should walk intro -> box -> tower_approach and record the map', () => {
    const world = createWorld();
    const session = createGameSession(world);

    const first = submitAction(session, world, 'inspect_box', { now: fixedNow });
    expect(first.kind).toBe('advanced');
    expect(session.currentSceneId).toBe('box');
    expect(session.journal).toEqual([]);

    const second = submitAction(session, world, 'take_map', { now: fixedNow });
    expect(second).toMatchObject({ kind: 'advanced', actionId: 'take_map', from: 'box', to: 'tower_approach' });
    expect(session.currentSceneId).toBe('tower_approach');
    expect(session.journal).toEqual(['Found map fragment.']);
    expect(session.choicesMade).toEqual(['inspect_box', 'take_map']);
    expect(session.history).toEqual([
      { from: 'intro', action: 'inspect_box', to: 'box', timestamp: '2024-01-01T00:00:00.000Z' },
      { from: 'box', action: 'take_map', to: 'tower_approach', timestamp: '2024-01-01T00:00:00.000Z' },
    ]);
  });

  it('should log each transition with the number of effects applied', () => {
    const world = createWorld();
    const session = createGameSession(world);
    const logger = createCapturingLogger();

    submitAction(session, world, 'inspect_box', { now: fixedNow, logger });
    submitAction(session, world, 'take_map', { now: fixedNow, logger });

    const transitions = logger.entries.filter((e) => e.message === 'Scene transition');
    expect(transitions.map((e) => e.data?.effects)).toEqual([0, 1]);
    expect(transitions[1].data).toMatchObject({ from: 'box', action: 'take_map', to: 'tower_approach' });
  });

  it('should record one history entry per accepted action', () => {
    const world = createWorld();
    const session = createGameSession(world);
    const inputs = ['inspect_box', 'leave_box', 'approach_tower', 'retreat', 'inspect_box'];

    for (const input of inputs) {
      submitAction(session, world, input);
    }

    expect(session.history.map((h) => h.action)).toEqual(inputs);
    expect(session.currentSceneId).toBe('box');
  });

  it('should keep the position and history on unresolved input', () => {
    const world = createWorld();
    const session = createGameSession(world);
    const logger = createCapturingLogger();

    const outcome = submitAction(session, world, 'xyz-nonsense', { logger });

    expect(outcome).toEqual({ kind: 'unresolved', scene: world.scenes.intro });
    expect(session.currentSceneId).toBe('intro');
    expect(session.history).toEqual([]);
    expect(logger.entries.map((e) => e.level)).toEqual(['debug']);
  });

  it('should soft-reset from a dead end without a history entry', () => {
    const world = createWorld();
    const session = createGameSession(world);
    session.currentSceneId = 'hatch';

    const outcome = submitAction(session, world, 'anything at all', { logger: silentLogger });

    expect(outcome).toEqual({ kind: 'soft_reset', scene: world.scenes.intro });
    expect(session.currentSceneId).toBe('intro');
    expect(session.history).toEqual([]);
  });

  it('should send the session to the start when a choice targets an unknown scene', () => {
    const world = createWorld();
    const session = createGameSession(world);
    const logger = createCapturingLogger();

    const outcome = submitAction(session, world, 'walk_to_cottages', { logger });

    expect(outcome).toMatchObject({ kind: 'advanced', to: 'intro' });
    expect(session.currentSceneId).toBe('intro');
    expect(logger.entries.find((e) => e.level === 'warn')?.data).toEqual({
      sceneId: 'cottages',
      startSceneId: 'intro',
    });
  });

  it('should treat an invalid position as the start scene', () => {
    const world = createWorld();
    const session = createGameSession(world);
    session.currentSceneId = 'nowhere';

    const outcome = submitAction(session, world, 'inspect_box');

    expect(outcome).toMatchObject({ kind: 'advanced', from: 'intro', to: 'box' });
  });
});

describe('currentScene', () => {
  it('should not modify the session', () => {
    const world = createWorld();
    const session = createGameSession(world);
    session.currentSceneId = 'nowhere';
    const before = structuredClone(session);

    expect(renderScene(currentScene(session, world))).toBe(renderScene(currentScene(session, world)));
    expect(session).toEqual(before);
  });
});

describe('getStartScene', () => {
  it('should throw for a world without its start scene', () => {
    const world = createWorld();
    world.startSceneId = 'missing';

    expect(() => getStartScene(world)).toThrow(SceneNotFoundError);
  });
});
