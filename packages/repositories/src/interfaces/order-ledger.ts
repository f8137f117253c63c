import type { Id, Order } from '@parley/protocol';

/**
 * Repository interface for the durable order ledger.
 *
 * The ledger is an append-only collection of placed orders shared by every
 * session in the process. Orders are never updated or deleted.
 */
export interface OrderLedger {
  /**
   * Prepare the backing store (e.g. create an empty ledger file if absent)
   */
  init(): Promise<void>;

  /**
   * Append one order.
   * @throws DuplicateOrderError if an order with the same id is already recorded
   */
  append(order: Order): Promise<Order>;

  /**
   * Every recorded order, oldest first.
   * An unreadable store reads as empty.
   */
  readAll(): Promise<Order[]>;

  /**
   * The most recently appended order, or null if the ledger is empty
   */
  mostRecent(): Promise<Order | null>;

  /**
   * Get an order by id
   * @returns Order or null if not found
   */
  get(id: Id): Promise<Order | null>;
}
