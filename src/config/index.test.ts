import { describe, test, expect } from 'vitest';
import path from 'path';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  test('applies defaults', () => {
    const config = loadConfig({});

    expect(config.server).toEqual({ port: 8080, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.photos.rootPath).toBe('./photos');
    expect(config.database.path).toBe(path.join('./photos', 'sync.db'));
    expect(config.sync).toEqual({ batchSize: 16, windowHeuristic: true });
    expect(config.log).toEqual({ level: 'info', pretty: false });
    expect(config.google.clientSecretFile).toBe('clientsecret.json');
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      PHOTOS_ROOT_PATH: '/srv/photos',
      SYNC_DB_PATH: '/var/lib/photosync/state.db',
      GOOGLE_CLIENT_ID: 'test-client',
      GOOGLE_CLIENT_SECRET: 'test-secret',
      SYNC_BATCH_SIZE: '4',
      SYNC_WINDOW_HEURISTIC: 'false',
      LOG_LEVEL: 'debug',
      LOG_PRETTY: 'yes',
    });

    expect(config.server.port).toBe(9000);
    expect(config.photos.rootPath).toBe('/srv/photos');
    expect(config.database.path).toBe('/var/lib/photosync/state.db');
    expect(config.google.clientId).toBe('test-client');
    expect(config.sync).toEqual({ batchSize: 4, windowHeuristic: false });
    expect(config.log).toEqual({ level: 'debug', pretty: true });
  });

  test('rejects invalid values', () => {
    expect(() => loadConfig({ SYNC_BATCH_SIZE: '0' })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow();
  });
});
