// Tests for environment configuration

import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_CATALOG_FILE, DEFAULT_WORLD_FILE, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: '127.0.0.1',
      logLevel: 'info',
      ordersFile: 'orders.json',
      worldFile: DEFAULT_WORLD_FILE,
      catalogFile: DEFAULT_CATALOG_FILE,
    });
  });

  it('should point the default data files at the bundled JSON', () => {
    expect(DEFAULT_WORLD_FILE.endsWith('/data/world.json')).toBe(true);
    expect(DEFAULT_CATALOG_FILE.endsWith('/data/catalog.json')).toBe(true);
  });

  it('should read overrides and coerce the port', () => {
    const config = loadConfig({ PORT: '8080', LOG_LEVEL: 'debug', ORDERS_FILE: '/tmp/orders.json', HOST: '' });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
    expect(config.ordersFile).toBe('/tmp/orders.json');
    expect(config.host).toBe('127.0.0.1');
  });

  it('should report every invalid variable', () => {
    try {
      loadConfig({ PORT: 'eighty', LOG_LEVEL: 'loud' });
      expect.unreachable('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0].startsWith('PORT:')).toBe(true);
        expect(error.issues[1].startsWith('LOG_LEVEL:')).toBe(true);
      }
    }
  });
});
