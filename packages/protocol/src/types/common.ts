// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Stable string key of a scene, product, action or order
 */
export type Id = string;

/**
 * Free-form attributes attached to a cart line or order item (e.g. size)
 */
export type Attributes = Record<string, string>;
