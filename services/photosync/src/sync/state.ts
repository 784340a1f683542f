/**
 * Durable sync state: known items and their download status, the
 * append-only transaction log, and stored authorization material.
 *
 * Every mutating call runs in its own SQLite transaction.
 */

import type { Kysely, Selectable } from "kysely";
import type { Database, DownloadStatus, ItemTable } from "../../../../src/db/schema.js";
import type { Item, ItemMetadata, TimeExtremes, TransactionLogEntry } from "./types.js";

export const EPOCH = new Date(0);

const DEFAULT_PAGE_SIZE = 500;
// Keeps IN (...) lists well below SQLite's bound-parameter limit
const MAX_IDS_PER_STATEMENT = 500;

export interface ListItemsOptions {
	status?: DownloadStatus;
	limit?: number;
	offset?: number;
}

export function parseCreationTime(value: string): Date {
	const date = new Date(value);
	if (Number.isNaN(date.getTime())) {
		throw new Error(`Invalid creation time: ${value}`);
	}
	return date;
}

function toItem(row: Selectable<ItemTable>): Item {
	return {
		id: row.id,
		creationTime: new Date(row.creation_time),
		path: row.path,
		filename: row.filename,
		mimeType: row.mime_type,
		mediaKind: row.media_kind,
		status: row.download_status,
	};
}

function chunk<T>(values: T[], size: number): T[][] {
	const chunks: T[][] = [];
	for (let i = 0; i < values.length; i += size) {
		chunks.push(values.slice(i, i + size));
	}
	return chunks;
}

export class StateStore {
	private db: Kysely<Database>;
	private now: () => Date;

	constructor(db: Kysely<Database>, now: () => Date = () => new Date()) {
		this.db = db;
		this.now = now;
	}

	/**
	 * Insert a newly observed item as Pending. Returns false, and changes
	 * nothing, if the id is already known.
	 */
	async addItem(metadata: ItemMetadata, itemPath: string): Promise<boolean> {
		const creationTime = parseCreationTime(metadata.creationTime);

		return this.db.transaction().execute(async (trx) => {
			const existing = await trx
				.selectFrom("items")
				.select("id")
				.where("id", "=", metadata.id)
				.executeTakeFirst();

			if (existing) {
				return false;
			}

			await trx
				.insertInto("items")
				.values({
					id: metadata.id,
					creation_time: creationTime.getTime(),
					path: itemPath,
					filename: metadata.filename,
					mime_type: metadata.mimeType,
					media_kind: metadata.mediaKind,
					download_status: "Pending",
				})
				.execute();

			await trx
				.insertInto("transactions")
				.values({
					item_id: metadata.id,
					event_kind: "Added",
					timestamp: this.now().getTime(),
				})
				.execute();

			return true;
		});
	}

	/**
	 * Creation times of the oldest and newest known items. An empty store
	 * reports oldest = now and newest = epoch.
	 */
	async queryExtremes(): Promise<TimeExtremes> {
		const oldest = await this.db
			.selectFrom("items")
			.select("creation_time")
			.orderBy("creation_time", "asc")
			.limit(1)
			.executeTakeFirst();

		const newest = await this.db
			.selectFrom("items")
			.select("creation_time")
			.orderBy("creation_time", "desc")
			.limit(1)
			.executeTakeFirst();

		return {
			oldest: oldest ? new Date(oldest.creation_time) : this.now(),
			newest: newest ? new Date(newest.creation_time) : EPOCH,
		};
	}

	/** Pending items, oldest first. */
	pendingItems(pageSize: number = DEFAULT_PAGE_SIZE): AsyncGenerator<Item> {
		return this.itemsWithStatus("Pending", pageSize);
	}

	/** Downloaded items, oldest first. */
	downloadedItems(pageSize: number = DEFAULT_PAGE_SIZE): AsyncGenerator<Item> {
		return this.itemsWithStatus("Downloaded", pageSize);
	}

	/**
	 * Keyset pagination over (creation_time, id): no cursor stays open
	 * between pages, so callers may write to the store while iterating.
	 */
	private async *itemsWithStatus(status: DownloadStatus, pageSize: number): AsyncGenerator<Item> {
		let cursor: { creationTime: number; id: string } | null = null;

		while (true) {
			let query = this.db
				.selectFrom("items")
				.selectAll()
				.where("download_status", "=", status);

			if (cursor) {
				const { creationTime, id } = cursor;
				query = query.where((eb) =>
					eb.or([
						eb("creation_time", ">", creationTime),
						eb.and([eb("creation_time", "=", creationTime), eb("id", ">", id)]),
					])
				);
			}

			const rows = await query
				.orderBy("creation_time", "asc")
				.orderBy("id", "asc")
				.limit(pageSize)
				.execute();

			for (const row of rows) {
				yield toItem(row);
			}

			if (rows.length < pageSize) {
				return;
			}

			const last = rows[rows.length - 1];
			cursor = { creationTime: last.creation_time, id: last.id };
		}
	}

	/**
	 * Set each id to Downloaded (true) or back to Pending (false). Only the
	 * true branch is recorded in the transaction log. Unknown ids are ignored.
	 */
	async markDownloaded(ids: string[], downloaded: boolean): Promise<void> {
		if (ids.length === 0) {
			return;
		}

		const status: DownloadStatus = downloaded ? "Downloaded" : "Pending";
		const timestamp = this.now().getTime();

		await this.db.transaction().execute(async (trx) => {
			for (const group of chunk([...new Set(ids)], MAX_IDS_PER_STATEMENT)) {
				const known = await trx
					.selectFrom("items")
					.select("id")
					.where("id", "in", group)
					.execute();

				if (known.length === 0) {
					continue;
				}

				const knownIds = known.map((row) => row.id);

				await trx
					.updateTable("items")
					.set({ download_status: status })
					.where("id", "in", knownIds)
					.execute();

				if (downloaded) {
					await trx
						.insertInto("transactions")
						.values(
							knownIds.map((id) => ({
								item_id: id,
								event_kind: "Downloaded" as const,
								timestamp,
							}))
						)
						.execute();
				}
			}
		});
	}

	async getItem(id: string): Promise<Item | null> {
		const row = await this.db
			.selectFrom("items")
			.selectAll()
			.where("id", "=", id)
			.executeTakeFirst();

		return row ? toItem(row) : null;
	}

	async listItems(options: ListItemsOptions = {}): Promise<Item[]> {
		const { status, limit = 100, offset = 0 } = options;

		let query = this.db.selectFrom("items").selectAll();
		if (status) {
			query = query.where("download_status", "=", status);
		}

		const rows = await query
			.orderBy("creation_time", "asc")
			.orderBy("id", "asc")
			.limit(limit)
			.offset(offset)
			.execute();

		return rows.map(toItem);
	}

	async countByStatus(): Promise<Record<DownloadStatus, number>> {
		const rows = await this.db
			.selectFrom("items")
			.select((eb) => ["download_status", eb.fn.countAll<number>().as("count")])
			.groupBy("download_status")
			.execute();

		const counts: Record<DownloadStatus, number> = { Pending: 0, Downloaded: 0 };
		for (const row of rows) {
			counts[row.download_status] = Number(row.count);
		}
		return counts;
	}

	async transactions(itemId?: string): Promise<TransactionLogEntry[]> {
		let query = this.db.selectFrom("transactions").selectAll();
		if (itemId !== undefined) {
			query = query.where("item_id", "=", itemId);
		}

		const rows = await query.orderBy("timestamp", "asc").orderBy("id", "asc").execute();

		return rows.map((row) => ({
			itemId: row.item_id,
			eventKind: row.event_kind,
			timestamp: new Date(row.timestamp),
		}));
	}

	/** Upsert an opaque credential blob. */
	async storeCredential(identity: string, blob: Uint8Array): Promise<void> {
		const credentials = Buffer.from(blob);

		await this.db
			.insertInto("oauth")
			.values({ id: identity, credentials })
			.onConflict((oc) => oc.column("id").doUpdateSet({ credentials }))
			.execute();
	}

	async getCredential(identity: string): Promise<Uint8Array | null> {
		const row = await this.db
			.selectFrom("oauth")
			.select("credentials")
			.where("id", "=", identity)
			.executeTakeFirst();

		return row ? row.credentials : null;
	}
}
