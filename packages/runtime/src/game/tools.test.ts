// Tests for the game master tools and their rendered text

import { describe, it, expect } from 'vitest';
import type { World } from '@parley/protocol';
import { createGameMasterTools, GAME_FAILURE_TEXT } from './tools.js';
import { createEffectRegistry } from '../effects/executor.js';
import { createCapturingLogger } from '../logging.js';

// --- Test Fixtures ---

function createWorld(narration?: World['narration']): World {
  const world: World = {
    title: 'Test Shore',
    startSceneId: 'intro',
    scenes: {
      intro: {
        id: 'intro',
        title: 'Shore',
        description: 'You wake on a quiet shore.',
        choices: {
          inspect_box: { description: 'Inspect the carved box.', resultScene: 'box' },
          rest: { description: 'Rest a while.', resultScene: 'camp' },
        },
      },
      box: {
        id: 'box',
        title: 'The Box',
        description: 'A box with a map inside.',
        choices: {
          take_map: {
            description: 'Take the map.',
            resultScene: 'intro',
            effects: [
              { kind: 'add_journal', text: 'Found map fragment.' },
              { kind: 'add_inventory', item: 'map' },
            ],
          },
        },
      },
      camp: { id: 'camp', title: 'Camp', description: 'A cold camp.', choices: {} },
    },
  };
  if (narration) {
    world.narration = narration;
  }
  return world;
}

const INTRO_BLOCK =
  'You wake on a quiet shore.\n\nChoices:\n' +
  '- Inspect the carved box. (say: inspect_box)\n' +
  '- Rest a while. (say: rest)\n' +
  '\nWhat do you do?';

let sequence = 0;
const identity = {
  now: () => '2024-01-01T00:00:00.000Z',
  sessionId: () => `sess000${++sequence}`,
};

// --- Tests ---

describe('createGameMasterTools', () => {
  it('should greet the player and describe the start scene', () => {
    const tools = createGameMasterTools({ world: createWorld(), identity });

    expect(tools.startAdventure('  Ava ')).toBe(`Greetings Ava. Welcome to 'Test Shore'.\n\n${INTRO_BLOCK}`);
    expect(tools.session.playerName).toBe('Ava');
  });

  it('should greet an unnamed player as traveler', () => {
    const tools = createGameMasterTools({ world: createWorld(), identity });
    expect(tools.startAdventure()).toBe(`Greetings traveler. Welcome to 'Test Shore'.\n\n${INTRO_BLOCK}`);
  });

  it('should return the same scene text on repeated reads', () => {
    const tools = createGameMasterTools({ world: createWorld(), identity });
    tools.startAdventure();

    expect(tools.getScene()).toBe(INTRO_BLOCK);
    expect(tools.getScene()).toBe(INTRO_BLOCK);
    expect(tools.session.history).toEqual([]);
  });

  it('should narrate an accepted action', () => {
    const tools = createGameMasterTools({ world: createWorld(), identity });
    tools.startAdventure();

    expect(tools.playerAction('inspect_box')).toBe(
      "The Game Master, calm and slightly mysterious, replies:\n\nYou chose 'inspect_box'.\n\n" +
        'A box with a map inside.\n\nChoices:\n- Take the map. (say: take_map)\n\nWhat do you do?'
    );
  });

  it('should re-list the same choices for unresolved input', () => {
    const tools = createGameMasterTools({ world: createWorld(), identity });
    tools.startAdventure();

    expect(tools.playerAction('xyz-nonsense')).toBe(
      "I didn't quite catch that action for this situation. Try one of the listed choices, " +
        `or say the short code shown after each one.\n\n${INTRO_BLOCK}`
    );
  });

  it('should use the world narration for a dead end', () => {
    const tools = createGameMasterTools({
      world: createWorld({ softReset: 'The mist returns you to the shore.' }),
      identity,
    });
    tools.startAdventure();
    tools.playerAction('rest');

    expect(tools.session.currentSceneId).toBe('camp');
    expect(tools.playerAction('look around')).toBe(`The mist returns you to the shore.\n\n${INTRO_BLOCK}`);
    expect(tools.session.currentSceneId).toBe('intro');
  });

  it('should list journal, inventory, and recent choices', () => {
    const tools = createGameMasterTools({ world: createWorld(), identity });
    tools.startAdventure('Ava');
    tools.playerAction('inspect_box');
    tools.playerAction('take_map');
    const { sessionId } = tools.session;

    expect(tools.showJournal()).toBe(
      [
        `Session: ${sessionId} | Started at: 2024-01-01T00:00:00.000Z`,
        'Player: Ava',
        '\nJournal entries:',
        '- Found map fragment.',
        '\nInventory:',
        '- map',
        '\nRecent choices:',
        '- 2024-01-01T00:00:00.000Z | from intro -> box via inspect_box',
        '- 2024-01-01T00:00:00.000Z | from box -> intro via take_map',
        '\nWhat do you do?',
      ].join('\n')
    );
  });

  it('should show an empty journal for a new session', () => {
    const tools = createGameMasterTools({ world: createWorld(), identity });
    tools.startAdventure();
    const { sessionId } = tools.session;

    expect(tools.showJournal()).toBe(
      [
        `Session: ${sessionId} | Started at: 2024-01-01T00:00:00.000Z`,
        '\nJournal is empty so far.',
        '\nNo items in inventory yet.',
        '\nRecent choices:',
        '- None yet. Your story is just beginning.',
        '\nWhat do you do?',
      ].join('\n')
    );
  });

  it('should clear progress and issue a new session id on restart', () => {
    const tools = createGameMasterTools({ world: createWorld({ restart: 'The tide turns.' }), identity });
    tools.startAdventure('Ava');
    tools.playerAction('inspect_box');
    tools.playerAction('take_map');
    const previousId = tools.session.sessionId;

    expect(tools.restartAdventure()).toBe(`The tide turns.\n\n${INTRO_BLOCK}`);
    expect(tools.session.sessionId).not.toBe(previousId);
    expect(tools.session).toMatchObject({
      playerName: 'Ava',
      currentSceneId: 'intro',
      history: [],
      journal: [],
      inventory: [],
      choicesMade: [],
    });
  });

  it('should answer with a fallback and log when a tool fails', () => {
    const registry = createEffectRegistry();
    registry.unregister('add_inventory');
    const logger = createCapturingLogger();
    const tools = createGameMasterTools({ world: createWorld(), identity, registry, logger });
    tools.startAdventure();
    tools.playerAction('inspect_box');

    expect(tools.playerAction('take_map')).toBe(GAME_FAILURE_TEXT);
    expect(tools.session.journal).toEqual([]);
    expect(logger.entries.find((e) => e.level === 'error')?.data).toMatchObject({
      tool: 'playerAction',
      error: 'No handler registered for effect: add_inventory',
    });
  });
});
