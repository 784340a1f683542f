import type { DownloadStatus, MediaKind, TransactionKind } from "../../../../src/db/schema.js";

export type { DownloadStatus, MediaKind, TransactionKind };

/** Metadata for one remote item, as reported by the remote library. */
export interface ItemMetadata {
	id: string;
	creationTime: string; // ISO-8601
	filename: string;
	mimeType: string;
	mediaKind: MediaKind;
	/** Short-lived content handle (base URL); never persisted */
	contentRef?: string;
}

export interface Item {
	id: string;
	creationTime: Date;
	path: string;
	filename: string;
	mimeType: string;
	mediaKind: MediaKind;
	status: DownloadStatus;
}

export interface TransactionLogEntry {
	itemId: string;
	eventKind: TransactionKind;
	timestamp: Date;
}

export interface TimeExtremes {
	oldest: Date;
	newest: Date;
}

/**
 * Time interval bounding one listing request. Bounds are inclusive unless
 * flagged otherwise.
 */
export interface TimeWindow {
	start: Date;
	end: Date;
	includeStart: boolean;
	includeEnd: boolean;
}

export interface ExplicitRange {
	start?: Date;
	end?: Date;
}

export interface ContentRequest {
	id: string;
	directory: string;
	filename: string;
	mediaKind: MediaKind;
}

/**
 * Remote side of the sync. Pagination and transport retries are the
 * implementation's business.
 */
export interface RemoteLibraryClient {
	listItems(window: TimeWindow): AsyncIterable<ItemMetadata>;
	/** Resolves to the ids whose content was fully written to disk. */
	batchFetchContent(requests: ContentRequest[]): Promise<Set<string>>;
	getItem(id: string): Promise<ItemMetadata>;
}

export interface PathMapper {
	map(item: ItemMetadata): string;
}

export interface SyncLogger {
	debug(obj: object, msg?: string): void;
	info(obj: object, msg?: string): void;
	warn(obj: object, msg?: string): void;
	error(obj: object, msg?: string): void;
}
