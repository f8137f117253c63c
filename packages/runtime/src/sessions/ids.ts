// Identifier and clock sources, injectable for deterministic tests

import { randomBytes, randomUUID } from 'node:crypto';

/**
 * Source of session ids, order ids, and timestamps.
 */
export type IdentitySource = {
  now: () => string;
  sessionId: () => string;
  orderId: () => string;
};

/**
 * 8-character opaque session id.
 */
export function generateSessionId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * "ORD-" followed by 8 uppercase hex characters.
 */
export function generateOrderId(): string {
  return `ORD-${randomBytes(4).toString('hex').toUpperCase()}`;
}

export const systemIdentity: IdentitySource = {
  now: () => new Date().toISOString(),
  sessionId: generateSessionId,
  orderId: generateOrderId,
};

/**
 * Fill in any missing sources with the system defaults.
 */
export function resolveIdentity(overrides: Partial<IdentitySource> = {}): IdentitySource {
  return { ...systemIdentity, ...overrides };
}
