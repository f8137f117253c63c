// Tests for the bundled world and catalog

import { describe, it, expect } from 'vitest';
import { createFilesystemStore, loadCatalog, loadWorld, memory } from '@parley/repositories';
import {
  createCapturingLogger,
  createGameMasterTools,
  createShoppingTools,
  queryCatalog,
  silentLogger,
} from '@parley/runtime';
import { DEFAULT_CATALOG_FILE, DEFAULT_WORLD_FILE } from './config.js';

const files = createFilesystemStore();

describe('bundled world', () => {
  it('should load with only the cottages path left dangling', async () => {
    const logger = createCapturingLogger();
    const world = await loadWorld(DEFAULT_WORLD_FILE, { files, logger });

    expect(world.title).toBe('A Shadow over Brinmere');
    expect(world.startSceneId).toBe('intro');
    expect(logger.entries.filter((e) => e.level === 'warn').map((e) => e.data?.path)).toEqual([
      'world.scenes.intro.choices.walk_to_cottages.resultScene',
    ]);
  });

  it('should follow the box to the tower approach', async () => {
    const world = await loadWorld(DEFAULT_WORLD_FILE, { files, logger: silentLogger });
    const tools = createGameMasterTools({ world });
    tools.startAdventure('Ava');

    tools.playerAction('inspect_box');
    expect(tools.session.currentSceneId).toBe('box');
    expect(tools.session.journal).toEqual([]);

    tools.playerAction('take_map');
    expect(tools.session.currentSceneId).toBe('tower_approach');
    expect(tools.session.journal).toEqual(["Found map fragment: 'Beneath the tower, the latch sings.'"]);
  });

  it('should record the key and its journal entry in the cellar', async () => {
    const world = await loadWorld(DEFAULT_WORLD_FILE, { files, logger: silentLogger });

    expect(world.scenes.cellar.choices.take_key.effects).toEqual([
      { kind: 'add_journal', text: 'Found brass key on plinth.' },
      { kind: 'add_inventory', item: 'brass_key' },
    ]);
  });

  it('should return to the shore when the cottages path is taken', async () => {
    const world = await loadWorld(DEFAULT_WORLD_FILE, { files, logger: silentLogger });
    const tools = createGameMasterTools({ world });

    tools.playerAction('walk_to_cottages');

    expect(tools.session.currentSceneId).toBe('intro');
    expect(tools.session.history.map((h) => h.to)).toEqual(['intro']);
  });

  it('should use the Brinmere framing when restarting', async () => {
    const world = await loadWorld(DEFAULT_WORLD_FILE, { files, logger: silentLogger });
    const tools = createGameMasterTools({ world });

    expect(
      tools
        .restartAdventure()
        .startsWith('The world resets. A new tide laps at the shore of Brinmere, wiping away your previous path.\n\n')
    ).toBe(true);
  });
});

describe('bundled catalog', () => {
  it('should list only mobiles at or under 20000', async () => {
    const catalog = await loadCatalog(DEFAULT_CATALOG_FILE, { files, logger: silentLogger });

    const results = queryCatalog(catalog, { category: 'mobile', maxPrice: 20000 });

    expect(results.length).toBeGreaterThan(0);
    expect(results.every((p) => p.category === 'mobile' && p.price <= 20000)).toBe(true);
    expect(results.map((p) => p.id)).toEqual(['mob-001', 'mob-002', 'mob-003']);
  });

  it('should add the first listed mobile and total a two-mug order at 598', async () => {
    const catalog = await loadCatalog(DEFAULT_CATALOG_FILE, { files, logger: silentLogger });
    const ledger = memory.createInMemoryOrderLedger();
    const tools = createShoppingTools({ catalog, ledger });

    await tools.browseCatalog({ category: 'mobile', maxPrice: 20000 });
    await tools.addToCart('first', 1);
    expect(tools.session.cart).toEqual([{ productId: 'mob-001', quantity: 1, attrs: {} }]);

    await tools.clearCart();
    await tools.addToCart('mug-001', 2);
    await tools.placeOrder();

    const order = await ledger.mostRecent();
    expect(order?.total).toBe(598);
    expect(order?.id).toBe(tools.session.orders[0]);
  });
});
