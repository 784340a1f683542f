export { PhotoSyncService } from './photosync.js';
export type {
  PhotoSyncServiceOptions,
  ClientFactory,
  CodeExchange,
  RunKind,
  RunRecord,
  SyncRequest,
  ResyncRequest,
  ResyncOutcome,
  SyncStatus,
} from './photosync.js';
