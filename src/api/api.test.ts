import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { FastifyInstance } from 'fastify';
import type { Kysely } from 'kysely';
import type { Database } from '../db/schema.js';
import { buildServer } from '../app.js';
import { PhotoSyncService } from '../services/sync/index.js';
import { AuthError } from '../../services/photosync/src/errors.js';
import type { StateStore } from '../../services/photosync/src/sync/state.js';
import type { ItemMetadata, TimeWindow } from '../../services/photosync/src/sync/types.js';
import { CREDENTIAL_ID } from '../../services/photosync/src/photos/token-source.js';
import {
  FakeLibrary,
  createMemoryStore,
  photo,
  silentLogger,
} from '../../services/photosync/src/sync/testing.js';

const oauth = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:8080/api/auth/google/callback',
};

class GatedLibrary extends FakeLibrary {
  release: () => void = () => {};
  private gate: Promise<void>;

  constructor(items: ItemMetadata[]) {
    super(items);
    this.gate = new Promise((resolve) => {
      this.release = resolve;
    });
  }

  async *listItems(window: TimeWindow): AsyncGenerator<ItemMetadata> {
    await this.gate;
    yield* super.listItems(window);
  }
}

describe('HTTP API', () => {
  let db: Kysely<Database>;
  let store: StateStore;
  let rootPath: string;
  let library: FakeLibrary;
  let service: PhotoSyncService;
  let server: FastifyInstance;
  let exchanged: string[];

  async function start(client: FakeLibrary) {
    library = client;
    service = new PhotoSyncService({
      store,
      rootPath,
      batchSize: 16,
      windowHeuristic: true,
      oauth: () => oauth,
      createClient: () => library,
      exchangeCode: async (_client, code) => {
        exchanged.push(code);
        return { access_token: 'test-access', refresh_token: 'test-refresh', expires_at: Date.now() + 3_600_000 };
      },
      logger: silentLogger,
    });
    server = await buildServer({ service, logLevel: 'silent' });
  }

  beforeEach(async () => {
    ({ db, store } = await createMemoryStore());
    rootPath = fs.mkdtempSync(path.join(os.tmpdir(), 'photosync-api-test-'));
    exchanged = [];
    await start(
      new FakeLibrary([
        photo('a', '2021-03-04T10:00:00Z'),
        photo('b', '2021-03-05T10:00:00Z'),
      ])
    );
  });

  afterEach(async () => {
    await server.close();
    await db.destroy();
    fs.rmSync(rootPath, { recursive: true, force: true });
  });

  test('GET /api/health', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('ok');
  });

  test('POST /api/sync fetches and downloads', async () => {
    const response = await server.inject({ method: 'POST', url: '/api/sync', payload: {} });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      success: true,
      metadata: { items_seen: 2, items_added: 2, items_skipped: 0, failed_windows: 0 },
      download: { attempted: 2, downloaded: 2, failed: [] },
    });
    expect(fs.existsSync(path.join(rootPath, '2021', '03', '04', 'a.jpg'))).toBe(true);
  });

  test('POST /api/sync rejects a malformed body', async () => {
    const response = await server.inject({ method: 'POST', url: '/api/sync', payload: { all: 'yes' } });

    expect(response.statusCode).toBe(400);
  });

  test('POST /api/sync answers 409 while a run is in progress', async () => {
    const gated = new GatedLibrary([photo('a', '2021-03-04T10:00:00Z')]);
    await server.close();
    await start(gated);

    const first = service.sync();
    const response = await server.inject({ method: 'POST', url: '/api/sync' });
    gated.release();
    await first;

    expect(response.statusCode).toBe(409);
    expect(response.json().message).toBe('A sync run is already in progress');
  });

  test('POST /api/sync answers 401 on authorization failure', async () => {
    library.listError = new AuthError('token revoked');

    const response = await server.inject({ method: 'POST', url: '/api/sync' });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'Sync failed', message: 'token revoked' });
  });

  test('items can be listed and inspected', async () => {
    await service.sync();

    const list = await server.inject({ method: 'GET', url: '/api/items?status=Downloaded&limit=1' });
    expect(list.statusCode).toBe(200);
    expect(list.json()).toEqual({
      items: [
        {
          id: 'a',
          creation_time: '2021-03-04T10:00:00.000Z',
          path: '2021/03/04',
          filename: 'a.jpg',
          mime_type: 'image/jpeg',
          media_kind: 'Photo',
          download_status: 'Downloaded',
        },
      ],
      limit: 1,
      offset: 0,
    });

    const one = await server.inject({ method: 'GET', url: '/api/items/b' });
    expect(one.statusCode).toBe(200);
    expect(one.json().transactions.map((t: { event_kind: string }) => t.event_kind)).toEqual(['Added', 'Downloaded']);

    const missing = await server.inject({ method: 'GET', url: '/api/items/nope' });
    expect(missing.statusCode).toBe(404);

    const invalid = await server.inject({ method: 'GET', url: '/api/items?status=Lost' });
    expect(invalid.statusCode).toBe(400);
  });

  test('GET /api/items/:id/remote asks the remote library', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/items/b/remote' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      id: 'b',
      creation_time: '2021-03-05T10:00:00Z',
      filename: 'b.jpg',
      mime_type: 'image/jpeg',
      media_kind: 'Photo',
    });
  });

  test('POST /api/sync/resync reports vanished files', async () => {
    await service.sync();
    fs.rmSync(path.join(rootPath, '2021', '03', '05', 'b.jpg'));

    const response = await server.inject({ method: 'POST', url: '/api/sync/resync', payload: { download: true } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ success: true, vanished: 1, downloaded: 1, failed: [] });
    expect(fs.existsSync(path.join(rootPath, '2021', '03', '05', 'b.jpg'))).toBe(true);
  });

  test('POST /api/sync/resync works without OAuth settings', async () => {
    await service.sync();
    fs.rmSync(path.join(rootPath, '2021', '03', '05', 'b.jpg'));
    await server.close();

    service = new PhotoSyncService({
      store,
      rootPath,
      batchSize: 16,
      windowHeuristic: true,
      oauth: () => {
        throw new AuthError('GOOGLE_CLIENT_ID is not set');
      },
      logger: silentLogger,
    });
    server = await buildServer({ service, logLevel: 'silent' });

    const response = await server.inject({ method: 'POST', url: '/api/sync/resync', payload: {} });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ success: true, vanished: 1, downloaded: null, failed: [] });
    expect((await store.getItem('b'))?.status).toBe('Pending');
  });

  test('GET /api/sync/status reports counts and the last run', async () => {
    await service.sync();

    const response = await server.inject({ method: 'GET', url: '/api/sync/status' });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.running).toBeNull();
    expect(body.counts).toEqual({ Pending: 0, Downloaded: 2 });
    expect(body.extremes).toEqual({ oldest: '2021-03-04T10:00:00.000Z', newest: '2021-03-05T10:00:00.000Z' });
    expect(body.lastRun.kind).toBe('sync');
    expect(typeof body.lastRun.finishedAt).toBe('string');
  });

  test('OAuth callback checks state and stores the credential', async () => {
    const bad = await server.inject({ method: 'GET', url: '/api/auth/google/callback?code=c&state=unknown' });
    expect(bad.statusCode).toBe(400);

    const init = await server.inject({ method: 'GET', url: '/api/auth/google' });
    const { auth_url: authUrl, state } = init.json();
    expect(new URL(authUrl).searchParams.get('state')).toBe(state);

    const callback = await server.inject({
      method: 'GET',
      url: `/api/auth/google/callback?code=test-code&state=${state}`,
    });

    expect(callback.statusCode).toBe(200);
    expect(exchanged).toEqual(['test-code']);
    expect(await store.getCredential(CREDENTIAL_ID)).not.toBeNull();

    const replay = await server.inject({
      method: 'GET',
      url: `/api/auth/google/callback?code=test-code&state=${state}`,
    });
    expect(replay.statusCode).toBe(400);
  });
});
