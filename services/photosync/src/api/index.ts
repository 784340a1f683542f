// Sync engine
export { SyncEngine, DEFAULT_BATCH_SIZE } from "../sync/sync.js";
export type {
	SyncEngineOptions,
	FetchOptions,
	BatchProgress,
	MetadataResult,
	DownloadSummary,
	DriveResult,
} from "../sync/sync.js";
export { planWindows, formatWindow, hasExplicitRange } from "../sync/windows.js";

// State management
export { StateStore, EPOCH, parseCreationTime, type ListItemsOptions } from "../sync/state.js";
export type {
	Item,
	ItemMetadata,
	DownloadStatus,
	MediaKind,
	TransactionKind,
	TransactionLogEntry,
	TimeExtremes,
	TimeWindow,
	ExplicitRange,
	ContentRequest,
	RemoteLibraryClient,
	PathMapper,
	SyncLogger,
} from "../sync/types.js";

// Logging
export { logSyncStart, logWindows, logSyncComplete, logResyncResult, type SyncSummary } from "../sync/logger.js";

// Layout on disk
export { dateDirectoryMapper, sanitizeFilename } from "../path-mapper.js";

// Download operations
export { Downloader } from "../downloader/downloader.js";
export type { DownloaderOptions, ContentSource } from "../downloader/downloader.js";
export type { DownloadResult } from "../downloader/types.js";

// Google Photos client
export {
	GooglePhotosClient,
	createPhotosClient,
	PhotosApi,
	TokenSource,
	generateOAuthState,
	getAuthorizationUrl,
	extractAuthorizationCode,
	exchangeCodeForTokens,
	refreshAccessToken,
} from "../photos/index.js";
export type { OAuthClientConfig, GoogleTokens } from "../photos/index.js";

// Config
export { loadConfig, loadOAuthClient } from "../config.js";
export type { Config, ConfigOverrides } from "../config.js";
export { openStateStore, type OpenedStore } from "../adapters/database.js";

// Errors
export { SyncError, AuthError, APIError, LocalIOError, SyncInProgressError, errorMessage } from "../errors.js";
