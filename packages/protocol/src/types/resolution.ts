// Resolution outcomes produced by the reference and action resolvers

import type { Id } from './common.js';

/**
 * Outcome of resolving free text against the legal actions of a scene.
 *
 * `no_actions` is distinct from `not_found`: it means there was nothing to
 * match against at all.
 */
export type ActionResolution =
  | { kind: 'matched'; actionId: Id; strategy: string }
  | { kind: 'not_found' }
  | { kind: 'no_actions' };

/**
 * Outcome of resolving free text to one entity among candidates.
 */
export type ReferenceResolution<T> =
  | { kind: 'matched'; entity: T; strategy: string }
  | { kind: 'not_found' };
