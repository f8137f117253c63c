// Environment configuration
//
// Every setting has a default, so an empty environment starts a local server
// with the bundled world and catalog.

import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

export const DEFAULT_WORLD_FILE = `${DATA_DIR}world.json`;
export const DEFAULT_CATALOG_FILE = `${DATA_DIR}catalog.json`;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('127.0.0.1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ORDERS_FILE: z.string().min(1).default('orders.json'),
  WORLD_FILE: z.string().min(1).default(DEFAULT_WORLD_FILE),
  CATALOG_FILE: z.string().min(1).default(DEFAULT_CATALOG_FILE),
});

export type Config = {
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  ordersFile: string;
  worldFile: string;
  catalogFile: string;
};

/**
 * Error when environment variables fail validation
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read configuration from environment variables.
 *
 * Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    ordersFile: parsed.ORDERS_FILE,
    worldFile: parsed.WORLD_FILE,
    catalogFile: parsed.CATALOG_FILE,
  };
}
