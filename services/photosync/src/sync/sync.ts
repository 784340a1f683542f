import fs from "fs";
import path from "path";
import { getLogger } from "../../../../src/log/logger.js";
import { AuthError, errorMessage } from "../errors.js";
import { dateDirectoryMapper, sanitizeFilename } from "../path-mapper.js";
import { parseCreationTime, type StateStore } from "./state.js";
import { formatWindow, hasExplicitRange, planWindows } from "./windows.js";
import type {
	ContentRequest,
	ExplicitRange,
	Item,
	PathMapper,
	RemoteLibraryClient,
	SyncLogger,
	TimeWindow,
} from "./types.js";

export const DEFAULT_BATCH_SIZE = 16;

export interface SyncEngineOptions {
	store: StateStore;
	/** A factory is only called once remote access is needed */
	client: RemoteLibraryClient | (() => RemoteLibraryClient);
	/** Directory item paths are relative to */
	rootPath: string;
	pathMapper?: PathMapper;
	batchSize?: number;
	logger?: SyncLogger;
	now?: () => Date;
	onBatchComplete?: (progress: BatchProgress) => void;
}

export interface FetchOptions {
	range?: ExplicitRange;
	windowHeuristic?: boolean;
}

export interface BatchProgress {
	pass: "initial" | "retry";
	batch: number;
	batches: number;
	downloaded: number;
	failed: number;
}

export interface MetadataResult {
	success: boolean;
	windows: TimeWindow[];
	failedWindows: TimeWindow[];
	itemsSeen: number;
	itemsAdded: number;
	itemsSkipped: number;
}

export interface DownloadSummary {
	attempted: number;
	downloaded: number;
	/** Ids still Pending after the retry pass */
	failed: string[];
}

export interface DriveResult {
	metadata: MetadataResult;
	/** Null when metadata fetching failed and downloads were skipped */
	download: DownloadSummary | null;
}

function chunk<T>(items: T[], size: number): T[][] {
	const batches: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		batches.push(items.slice(i, i + size));
	}
	return batches;
}

export class SyncEngine {
	private store: StateStore;
	private clientSource: RemoteLibraryClient | (() => RemoteLibraryClient);
	private resolvedClient: RemoteLibraryClient | null = null;
	private rootPath: string;
	private pathMapper: PathMapper;
	private batchSize: number;
	private logger: SyncLogger;
	private now: () => Date;
	private onBatchComplete?: (progress: BatchProgress) => void;

	constructor(options: SyncEngineOptions) {
		if (options.batchSize !== undefined && (!Number.isInteger(options.batchSize) || options.batchSize < 1)) {
			throw new Error(`Batch size must be a positive integer, got ${options.batchSize}`);
		}

		this.store = options.store;
		this.clientSource = options.client;
		this.rootPath = options.rootPath;
		this.pathMapper = options.pathMapper ?? dateDirectoryMapper;
		this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
		this.logger = options.logger ?? getLogger({ component: "sync" });
		this.now = options.now ?? (() => new Date());
		this.onBatchComplete = options.onBatchComplete;
	}

	private get client(): RemoteLibraryClient {
		if (!this.resolvedClient) {
			this.resolvedClient = typeof this.clientSource === "function" ? this.clientSource() : this.clientSource;
		}
		return this.resolvedClient;
	}

	async computeWindows(options: FetchOptions = {}): Promise<TimeWindow[]> {
		const { range, windowHeuristic = true } = options;
		const useHeuristic = windowHeuristic && !hasExplicitRange(range);

		return planWindows({
			explicitRange: range,
			useWindowHeuristic: windowHeuristic,
			extremes: useHeuristic ? await this.store.queryExtremes() : undefined,
			now: this.now(),
		});
	}

	/**
	 * List remote metadata for each window and record new items as Pending.
	 * Only an AuthError escapes; other window failures mark the result
	 * unsuccessful and the remaining windows still run.
	 */
	async fetchMetadata(options: FetchOptions = {}): Promise<MetadataResult> {
		const windows = await this.computeWindows(options);
		const result: MetadataResult = {
			success: true,
			windows,
			failedWindows: [],
			itemsSeen: 0,
			itemsAdded: 0,
			itemsSkipped: 0,
		};

		for (const window of windows) {
			this.logger.info({ window: formatWindow(window) }, "Fetching metadata");

			try {
				for await (const metadata of this.client.listItems(window)) {
					result.itemsSeen++;

					let relativePath: string;
					try {
						parseCreationTime(metadata.creationTime);
						relativePath = this.pathMapper.map(metadata);
					} catch (error) {
						result.itemsSkipped++;
						this.logger.warn({ id: metadata.id, err: errorMessage(error) }, "Skipping item with unusable metadata");
						continue;
					}

					// Store failures fail the window; the item must be listed again
					const added = await this.store.addItem(
						{ ...metadata, filename: sanitizeFilename(metadata.filename) },
						relativePath
					);

					if (added) {
						result.itemsAdded++;
						this.logger.info({ id: metadata.id, filename: metadata.filename }, "Added item");
					} else {
						this.logger.debug({ id: metadata.id }, "Item already in store");
					}
				}
			} catch (error) {
				if (error instanceof AuthError) {
					throw error;
				}
				result.success = false;
				result.failedWindows.push(window);
				this.logger.error({ window: formatWindow(window), err: errorMessage(error) }, "Metadata fetch failed for window");
			}
		}

		this.logger.info(
			{ seen: result.itemsSeen, added: result.itemsAdded, skipped: result.itemsSkipped },
			"Metadata fetch finished"
		);

		return result;
	}

	/**
	 * Download every Pending item, oldest first, in fixed-size batches.
	 * Failures from all batches go into one retry pool that gets exactly one
	 * more pass; whatever still fails stays Pending for the next run.
	 */
	async downloadPending(): Promise<DownloadSummary> {
		const pending: Item[] = [];
		for await (const item of this.store.pendingItems()) {
			pending.push(item);
		}

		if (pending.length === 0) {
			this.logger.info({}, "Nothing to download");
			return { attempted: 0, downloaded: 0, failed: [] };
		}

		this.logger.info({ pending: pending.length, batchSize: this.batchSize }, "Downloading pending items");

		const retryPool = await this.downloadPass(pending, "initial");
		let stillFailing: Item[] = [];

		if (retryPool.length > 0) {
			this.logger.info({ items: retryPool.length }, "Retrying failed downloads");
			stillFailing = await this.downloadPass(retryPool, "retry");
		}

		if (stillFailing.length > 0) {
			this.logger.warn(
				{ ids: stillFailing.map((item) => item.id) },
				"Some items could not be downloaded; they stay pending for the next run"
			);
		}

		return {
			attempted: pending.length,
			downloaded: pending.length - stillFailing.length,
			failed: stillFailing.map((item) => item.id),
		};
	}

	private async downloadPass(items: Item[], pass: BatchProgress["pass"]): Promise<Item[]> {
		const failed: Item[] = [];
		const batches = chunk(items, this.batchSize);

		for (let i = 0; i < batches.length; i++) {
			const batch = batches[i];
			const batchFailures = await this.downloadBatch(batch);
			failed.push(...batchFailures);

			this.onBatchComplete?.({
				pass,
				batch: i + 1,
				batches: batches.length,
				downloaded: batch.length - batchFailures.length,
				failed: batchFailures.length,
			});
		}

		return failed;
	}

	/** Returns the items of the batch that were not written. */
	private async downloadBatch(batch: Item[]): Promise<Item[]> {
		const requests: ContentRequest[] = batch.map((item) => ({
			id: item.id,
			directory: path.join(this.rootPath, item.path),
			filename: item.filename,
			mediaKind: item.mediaKind,
		}));

		let written: Set<string>;
		try {
			written = await this.client.batchFetchContent(requests);
		} catch (error) {
			if (error instanceof AuthError) {
				throw error;
			}
			this.logger.warn({ items: batch.length, err: errorMessage(error) }, "Batch download failed");
			return batch;
		}

		const succeeded = batch.filter((item) => written.has(item.id));
		await this.store.markDownloaded(
			succeeded.map((item) => item.id),
			true
		);

		for (const item of succeeded) {
			this.logger.debug({ id: item.id, filename: item.filename }, "Downloaded item");
		}

		return batch.filter((item) => !written.has(item.id));
	}

	/**
	 * Demote Downloaded items whose file no longer exists under rootDirectory.
	 * Returns how many were demoted; re-downloading is left to the caller.
	 */
	async resync(rootDirectory: string = this.rootPath): Promise<number> {
		const vanished: string[] = [];

		for await (const item of this.store.downloadedItems()) {
			const filePath = path.join(rootDirectory, item.path, item.filename);
			if (!fs.existsSync(filePath)) {
				this.logger.info({ id: item.id, path: filePath }, "Local file vanished");
				vanished.push(item.id);
			}
		}

		await this.store.markDownloaded(vanished, false);

		this.logger.info({ vanished: vanished.length }, "Resync finished");
		return vanished.length;
	}

	/** Fetch metadata, then download pending content if that succeeded. */
	async drive(options: FetchOptions = {}): Promise<DriveResult> {
		const metadata = await this.fetchMetadata(options);
		if (!metadata.success) {
			this.logger.warn(
				{ failedWindows: metadata.failedWindows.map(formatWindow) },
				"Skipping downloads because metadata fetching failed"
			);
			return { metadata, download: null };
		}

		const download = await this.downloadPending();
		return { metadata, download };
	}
}
