// JSON-file order ledger
//
// The whole ledger is a single JSON array. Every append reads the full file,
// appends one record, and writes the full file back.
//
// Appends from this process are serialized. Nothing guards against a second
// process writing the same file: concurrent writers race and the last whole-file
// write wins.

import type { Id, Logger, Order } from '@parley/protocol';
import { isOrder } from '@parley/protocol';
import type { OrderLedger } from '../interfaces/order-ledger.js';
import type { FileStore } from '../interfaces/file-store.js';
import { DuplicateOrderError } from './errors.js';
import { createSerialQueue } from './serial.js';

export type JsonFileLedgerOptions = {
  /**
   * Path of the ledger file
   */
  filePath: string;

  /**
   * File access (filesystem in production, in-memory in tests)
   */
  files: FileStore;

  /**
   * Logger for recovery warnings
   */
  logger: Logger;
};

export function createJsonFileOrderLedger(options: JsonFileLedgerOptions): OrderLedger {
  const { filePath, files, logger } = options;
  const serialize = createSerialQueue();

  async function load(): Promise<Order[]> {
    let content: string;
    try {
      if (!(await files.exists(filePath))) {
        return [];
      }
      content = await files.readFile(filePath);
    } catch (error) {
      logger.warn('Order ledger unreadable, treating as empty', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.warn('Order ledger is not valid JSON, treating as empty', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    if (!Array.isArray(parsed)) {
      logger.warn('Order ledger is not a list, treating as empty', { filePath });
      return [];
    }

    const orders = parsed.filter(isOrder);
    if (orders.length !== parsed.length) {
      logger.warn('Skipped malformed order records', {
        filePath,
        skipped: parsed.length - orders.length,
      });
    }
    return orders;
  }

  async function save(orders: Order[]): Promise<void> {
    await files.writeFile(filePath, JSON.stringify(orders, null, 2) + '\n');
  }

  return {
    async init() {
      await serialize(async () => {
        if (!(await files.exists(filePath))) {
          await save([]);
          logger.info('Created empty order ledger', { filePath });
        }
      });
    },

    async append(order) {
      return serialize(async () => {
        const orders = await load();
        if (orders.some((o) => o.id === order.id)) {
          throw new DuplicateOrderError(order.id);
        }
        orders.push(order);
        await save(orders);
        logger.info('Order appended to ledger', {
          orderId: order.id,
          total: order.total,
          ledgerSize: orders.length,
        });
        return order;
      });
    },

    async readAll() {
      return serialize(load);
    },

    async mostRecent() {
      const orders = await serialize(load);
      return orders.length > 0 ? orders[orders.length - 1] : null;
    },

    async get(id: Id) {
      const orders = await serialize(load);
      return orders.find((o) => o.id === id) ?? null;
    },
  };
}
