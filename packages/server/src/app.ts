// Application wiring - loads reference data and builds the tRPC context

import type { Logger } from '@parley/protocol';
import {
  createFilesystemStore,
  createJsonFileOrderLedger,
  loadCatalog,
  loadWorld,
  type FileStore,
  type OrderLedger,
} from '@parley/repositories';
import type { IdentitySource } from '@parley/runtime';
import type { Config } from './config.js';
import type { Context } from './trpc/context.js';
import { createConversationRegistry } from './sessions/registry.js';

export type CreateAppOptions = {
  config: Pick<Config, 'worldFile' | 'catalogFile' | 'ordersFile'>;
  logger: Logger;

  /**
   * File access (defaults to the local filesystem)
   */
  files?: FileStore;

  /**
   * Order ledger (defaults to the JSON file named by `ordersFile`)
   */
  ledger?: OrderLedger;

  identity?: Partial<IdentitySource>;
};

/**
 * Load the world and catalog, prepare the ledger, and return the shared context.
 *
 * @throws ReferenceDataLoadError if either reference document is invalid
 */
export async function createAppContext(options: CreateAppOptions): Promise<Context> {
  const { config, logger, identity } = options;
  const files = options.files ?? createFilesystemStore();

  const [world, catalog] = await Promise.all([
    loadWorld(config.worldFile, { files, logger }),
    loadCatalog(config.catalogFile, { files, logger }),
  ]);

  const ledger = options.ledger ?? createJsonFileOrderLedger({ filePath: config.ordersFile, files, logger });
  await ledger.init();

  const conversations = createConversationRegistry({ world, catalog, ledger, logger, identity });
  return { conversations, ledger, logger };
}
