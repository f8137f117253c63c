// Transition history - append-only, never pruned

import type { SessionBase, TransitionRecord } from '@parley/protocol';

export function appendHistory(
  session: SessionBase,
  entry: Omit<TransitionRecord, 'timestamp'>,
  timestamp: string
): TransitionRecord {
  const record: TransitionRecord = { ...entry, timestamp };
  session.history.push(record);
  return record;
}

/**
 * The last `count` entries, oldest first.
 */
export function recentHistory(session: SessionBase, count: number): TransitionRecord[] {
  return count <= 0 ? [] : session.history.slice(-count);
}
