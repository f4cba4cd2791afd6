import { describe, test, expect } from 'vitest';
import { homedir } from 'os';
import path from 'path';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  test('defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      host: '0.0.0.0',
      dataDir: path.join(homedir(), '.cartsync', 'data'),
      storageDriver: 'sqlite',
      durability: 'eventual',
      persistDebounceMs: 250,
      persistRetryMs: 5000,
      autoCreateLists: false,
      heartbeatIntervalMs: 30000,
      maxBufferedBytes: 1048576,
    });
  });

  test('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      DATA_DIR: '/tmp/lists',
      STORAGE_DRIVER: 'json',
      DURABILITY: 'sync',
      AUTO_CREATE_LISTS: 'yes',
      HEARTBEAT_INTERVAL_MS: '0',
    });

    expect(config).toMatchObject({
      port: 9000,
      dataDir: '/tmp/lists',
      storageDriver: 'json',
      durability: 'sync',
      autoCreateLists: true,
      heartbeatIntervalMs: 0,
    });
  });

  test('empty values fall back to defaults', () => {
    expect(loadConfig({ PORT: '', DURABILITY: '' })).toMatchObject({ port: 8080, durability: 'eventual' });
  });

  test('invalid values are rejected with the variable name', () => {
    expect(() => loadConfig({ DURABILITY: 'sometimes' })).toThrow(/^Invalid configuration: DURABILITY: /);
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/PORT/);
  });
});
