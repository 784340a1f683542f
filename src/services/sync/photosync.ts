/**
 * Photo sync service for the HTTP server
 *
 * Wraps the photosync engine around the shared state database and keeps
 * at most one run (sync or resync) going at a time.
 */

import { SyncEngine } from '../../../services/photosync/src/sync/sync.js';
import type { DriveResult, FetchOptions } from '../../../services/photosync/src/sync/sync.js';
import type { StateStore, ListItemsOptions } from '../../../services/photosync/src/sync/state.js';
import type {
  DownloadStatus,
  Item,
  ItemMetadata,
  RemoteLibraryClient,
  SyncLogger,
  TimeExtremes,
  TransactionLogEntry,
} from '../../../services/photosync/src/sync/types.js';
import { createPhotosClient } from '../../../services/photosync/src/photos/client.js';
import {
  exchangeCodeForTokens,
  extractAuthorizationCode,
  getAuthorizationUrl,
  type GoogleTokens,
  type OAuthClientConfig,
} from '../../../services/photosync/src/photos/auth.js';
import { TokenSource } from '../../../services/photosync/src/photos/token-source.js';
import { SyncInProgressError, errorMessage } from '../../../services/photosync/src/errors.js';
import { getLogger } from '../../log/logger.js';

export type RunKind = 'sync' | 'resync';

export interface RunRecord {
  kind: RunKind;
  startedAt: string;
  finishedAt: string | null;
  result?: DriveResult;
  vanished?: number;
  error?: string;
}

export interface SyncRequest {
  all?: boolean;
  from?: Date;
  to?: Date;
}

export interface ResyncRequest {
  download?: boolean;
}

export interface ResyncOutcome {
  vanished: number;
  downloaded: number | null;
  failed: string[];
}

export interface SyncStatus {
  running: RunKind | null;
  counts: Record<DownloadStatus, number>;
  /** Null while the store is empty */
  extremes: TimeExtremes | null;
  lastRun: RunRecord | null;
}

export type ClientFactory = (store: StateStore, oauth: OAuthClientConfig) => RemoteLibraryClient;
export type CodeExchange = (client: OAuthClientConfig, code: string) => Promise<GoogleTokens>;

export interface PhotoSyncServiceOptions {
  store: StateStore;
  rootPath: string;
  batchSize: number;
  windowHeuristic: boolean;
  /** Resolved on use so the server starts without OAuth settings */
  oauth: () => OAuthClientConfig;
  createClient?: ClientFactory;
  exchangeCode?: CodeExchange;
  logger?: SyncLogger;
}

export class PhotoSyncService {
  private options: PhotoSyncServiceOptions;
  private createClient: ClientFactory;
  private exchangeCode: CodeExchange;
  private logger: SyncLogger;
  private running: RunKind | null = null;
  private lastRun: RunRecord | null = null;

  constructor(options: PhotoSyncServiceOptions) {
    this.options = options;
    this.createClient = options.createClient ?? createPhotosClient;
    this.exchangeCode = options.exchangeCode ?? exchangeCodeForTokens;
    this.logger = options.logger ?? getLogger({ component: 'sync' });
  }

  get store(): StateStore {
    return this.options.store;
  }

  private engine(): SyncEngine {
    const { store, rootPath, batchSize } = this.options;
    return new SyncEngine({
      store,
      client: () => this.createClient(store, this.options.oauth()),
      rootPath,
      batchSize,
      logger: this.logger,
    });
  }

  private async exclusive<T>(
    kind: RunKind,
    run: (record: RunRecord) => Promise<T>
  ): Promise<T> {
    if (this.running) {
      throw new SyncInProgressError();
    }

    this.running = kind;
    const record: RunRecord = {
      kind,
      startedAt: new Date().toISOString(),
      finishedAt: null,
    };
    this.lastRun = record;

    try {
      return await run(record);
    } catch (error) {
      record.error = errorMessage(error);
      throw error;
    } finally {
      record.finishedAt = new Date().toISOString();
      this.running = null;
    }
  }

  async sync(request: SyncRequest = {}): Promise<DriveResult> {
    return this.exclusive('sync', async (record) => {
      const options: FetchOptions = {
        windowHeuristic: request.all ? false : this.options.windowHeuristic,
        range: request.from || request.to ? { start: request.from, end: request.to } : undefined,
      };

      const result = await this.engine().drive(options);
      record.result = result;
      return result;
    });
  }

  async resync(request: ResyncRequest = {}): Promise<ResyncOutcome> {
    return this.exclusive('resync', async (record) => {
      const engine = this.engine();
      const vanished = await engine.resync();
      record.vanished = vanished;

      if (!request.download || vanished === 0) {
        return { vanished, downloaded: null, failed: [] };
      }

      const download = await engine.downloadPending();
      return { vanished, downloaded: download.downloaded, failed: download.failed };
    });
  }

  async status(): Promise<SyncStatus> {
    const counts = await this.options.store.countByStatus();
    const empty = counts.Pending + counts.Downloaded === 0;

    return {
      running: this.running,
      counts,
      extremes: empty ? null : await this.options.store.queryExtremes(),
      lastRun: this.lastRun,
    };
  }

  listItems(options: ListItemsOptions): Promise<Item[]> {
    return this.options.store.listItems(options);
  }

  async getItem(id: string): Promise<{ item: Item; transactions: TransactionLogEntry[] } | null> {
    const item = await this.options.store.getItem(id);
    if (!item) {
      return null;
    }
    return { item, transactions: await this.options.store.transactions(id) };
  }

  remoteItem(id: string): Promise<ItemMetadata> {
    return this.createClient(this.options.store, this.options.oauth()).getItem(id);
  }

  authorizationUrl(state: string): string {
    return getAuthorizationUrl(this.options.oauth(), state);
  }

  async authorize(codeOrUrl: string): Promise<void> {
    const oauth = this.options.oauth();
    const tokens = await this.exchangeCode(oauth, extractAuthorizationCode(codeOrUrl));
    await new TokenSource(this.options.store, oauth).save(tokens);
    this.logger.info({}, 'Stored Google Photos credential');
  }
}
