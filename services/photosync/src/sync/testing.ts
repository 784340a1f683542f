import fs from "fs";
import path from "path";
import { createDatabase, initializeDatabase } from "../../../../src/db/index.js";
import { StateStore } from "./state.js";
import type { ContentRequest, ItemMetadata, RemoteLibraryClient, SyncLogger, TimeWindow } from "./types.js";

/** State store over a private in-memory database. */
export async function createMemoryStore(now?: () => Date) {
	const db = createDatabase(":memory:");
	await initializeDatabase(db);
	return { db, store: new StateStore(db, now) };
}

export function photo(id: string, creationTime: string, filename = `${id}.jpg`): ItemMetadata {
	return { id, creationTime, filename, mimeType: "image/jpeg", mediaKind: "Photo" };
}

export const silentLogger: SyncLogger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};

function inWindow(item: ItemMetadata, window: TimeWindow): boolean {
	const time = new Date(item.creationTime).getTime();
	// Unparseable times are passed through for the engine to reject
	if (Number.isNaN(time)) {
		return true;
	}
	const start = window.start.getTime();
	const end = window.end.getTime();
	const afterStart = window.includeStart ? time >= start : time > start;
	const beforeEnd = window.includeEnd ? time <= end : time < end;
	return afterStart && beforeEnd;
}

/**
 * Remote library held in memory. Content is written as the item id, so
 * tests can check what landed where.
 */
export class FakeLibrary implements RemoteLibraryClient {
	items: ItemMetadata[];
	listedWindows: TimeWindow[] = [];
	attempts = new Map<string, number>();
	batches: string[][] = [];
	/** Remaining transient failures per id */
	failTimes = new Map<string, number>();
	failAlways = new Set<string>();
	listError: Error | null = null;
	batchError: Error | null = null;

	constructor(items: ItemMetadata[] = []) {
		this.items = items;
	}

	async *listItems(window: TimeWindow): AsyncGenerator<ItemMetadata> {
		this.listedWindows.push(window);
		if (this.listError) {
			throw this.listError;
		}
		for (const item of this.items) {
			if (inWindow(item, window)) {
				yield item;
			}
		}
	}

	async batchFetchContent(requests: ContentRequest[]): Promise<Set<string>> {
		this.batches.push(requests.map((request) => request.id));
		if (this.batchError) {
			throw this.batchError;
		}

		const written = new Set<string>();
		for (const request of requests) {
			this.attempts.set(request.id, (this.attempts.get(request.id) ?? 0) + 1);

			const remaining = this.failTimes.get(request.id) ?? 0;
			if (remaining > 0) {
				this.failTimes.set(request.id, remaining - 1);
				continue;
			}
			if (this.failAlways.has(request.id)) {
				continue;
			}

			fs.mkdirSync(request.directory, { recursive: true });
			fs.writeFileSync(path.join(request.directory, request.filename), request.id);
			written.add(request.id);
		}
		return written;
	}

	async getItem(id: string): Promise<ItemMetadata> {
		const item = this.items.find((candidate) => candidate.id === id);
		if (!item) {
			throw new Error(`Unknown item ${id}`);
		}
		return item;
	}
}
