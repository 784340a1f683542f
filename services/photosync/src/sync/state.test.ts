import { describe, test, expect, beforeEach, afterEach } from "vitest";
import type { Kysely } from "kysely";
import type { Database } from "../../../../src/db/schema.js";
import { EPOCH, parseCreationTime, type StateStore } from "./state.js";
import { createMemoryStore, photo } from "./testing.js";
import type { Item } from "./types.js";

const NOW = new Date("2024-06-01T12:00:00.000Z");

async function collect(items: AsyncIterable<Item>): Promise<string[]> {
	const ids: string[] = [];
	for await (const item of items) {
		ids.push(item.id);
	}
	return ids;
}

describe("StateStore", () => {
	let db: Kysely<Database>;
	let store: StateStore;

	beforeEach(async () => {
		({ db, store } = await createMemoryStore(() => NOW));
	});

	afterEach(async () => {
		await db.destroy();
	});

	test("addItem inserts a pending item and logs it", async () => {
		const added = await store.addItem(photo("a", "2021-03-04T10:00:00Z"), "2021/03/04");

		expect(added).toBe(true);
		expect(await store.getItem("a")).toEqual({
			id: "a",
			creationTime: new Date("2021-03-04T10:00:00.000Z"),
			path: "2021/03/04",
			filename: "a.jpg",
			mimeType: "image/jpeg",
			mediaKind: "Photo",
			status: "Pending",
		});
		expect(await store.transactions("a")).toEqual([{ itemId: "a", eventKind: "Added", timestamp: NOW }]);
	});

	test("addItem is idempotent", async () => {
		await store.addItem(photo("a", "2021-03-04T10:00:00Z"), "2021/03/04");
		await store.markDownloaded(["a"], true);

		const again = await store.addItem(photo("a", "2022-01-01T00:00:00Z", "renamed.jpg"), "2022/01/01");

		expect(again).toBe(false);
		const item = await store.getItem("a");
		expect(item?.status).toBe("Downloaded");
		expect(item?.filename).toBe("a.jpg");
		expect((await store.transactions("a")).map((entry) => entry.eventKind)).toEqual(["Added", "Downloaded"]);
	});

	test("addItem rejects an unparseable creation time", async () => {
		await expect(store.addItem(photo("bad", "not a date"), "x")).rejects.toThrow("Invalid creation time: not a date");
		expect(await store.getItem("bad")).toBeNull();
	});

	test("queryExtremes on an empty store", async () => {
		expect(await store.queryExtremes()).toEqual({ oldest: NOW, newest: EPOCH });
	});

	test("queryExtremes reports oldest and newest creation times", async () => {
		await store.addItem(photo("mid", "2020-05-05T00:00:00Z"), "p");
		await store.addItem(photo("old", "2019-01-01T00:00:00Z"), "p");
		await store.addItem(photo("new", "2023-12-31T23:59:59Z"), "p");

		expect(await store.queryExtremes()).toEqual({
			oldest: new Date("2019-01-01T00:00:00.000Z"),
			newest: new Date("2023-12-31T23:59:59.000Z"),
		});
	});

	test("pendingItems yields oldest first across pages, ties broken by id", async () => {
		await store.addItem(photo("c", "2020-01-03T00:00:00Z"), "p");
		await store.addItem(photo("b2", "2020-01-02T00:00:00Z"), "p");
		await store.addItem(photo("a", "2020-01-01T00:00:00Z"), "p");
		await store.addItem(photo("b1", "2020-01-02T00:00:00Z"), "p");
		await store.addItem(photo("d", "2020-01-04T00:00:00Z"), "p");

		expect(await collect(store.pendingItems(2))).toEqual(["a", "b1", "b2", "c", "d"]);
	});

	test("pendingItems tolerates status changes while iterating", async () => {
		for (let i = 1; i <= 5; i++) {
			await store.addItem(photo(`item-${i}`, `2020-01-0${i}T00:00:00Z`), "p");
		}

		const seen: string[] = [];
		for await (const item of store.pendingItems(2)) {
			seen.push(item.id);
			await store.markDownloaded([item.id], true);
		}

		expect(seen).toEqual(["item-1", "item-2", "item-3", "item-4", "item-5"]);
		expect(await collect(store.pendingItems())).toEqual([]);
		expect(await collect(store.downloadedItems())).toHaveLength(5);
	});

	test("markDownloaded flips status both ways and only logs downloads", async () => {
		await store.addItem(photo("a", "2020-01-01T00:00:00Z"), "p");
		await store.addItem(photo("b", "2020-01-02T00:00:00Z"), "p");

		await store.markDownloaded(["a", "b", "a"], true);
		expect(await store.countByStatus()).toEqual({ Pending: 0, Downloaded: 2 });

		await store.markDownloaded(["b"], false);
		expect(await collect(store.pendingItems())).toEqual(["b"]);
		expect(await collect(store.downloadedItems())).toEqual(["a"]);

		const events = (await store.transactions()).map((entry) => `${entry.itemId}:${entry.eventKind}`);
		expect(events).toEqual(["a:Added", "b:Added", "a:Downloaded", "b:Downloaded"]);
	});

	test("markDownloaded ignores unknown ids and empty input", async () => {
		await store.markDownloaded([], true);
		await store.markDownloaded(["ghost"], true);

		expect(await store.getItem("ghost")).toBeNull();
		expect(await store.transactions()).toEqual([]);
	});

	test("listItems filters by status and pages", async () => {
		await store.addItem(photo("a", "2020-01-01T00:00:00Z"), "p");
		await store.addItem(photo("b", "2020-01-02T00:00:00Z"), "p");
		await store.addItem(photo("c", "2020-01-03T00:00:00Z"), "p");
		await store.markDownloaded(["b"], true);

		expect((await store.listItems({ status: "Pending" })).map((item) => item.id)).toEqual(["a", "c"]);
		expect((await store.listItems({ limit: 1, offset: 1 })).map((item) => item.id)).toEqual(["b"]);
	});

	test("credentials are stored and replaced", async () => {
		expect(await store.getCredential("installed.main")).toBeNull();

		await store.storeCredential("installed.main", Buffer.from("first"));
		await store.storeCredential("installed.main", Buffer.from("second"));

		const blob = await store.getCredential("installed.main");
		expect(blob && Buffer.from(blob).toString()).toBe("second");
	});
});

describe("parseCreationTime", () => {
	test("parses RFC 3339 timestamps", () => {
		expect(parseCreationTime("2021-03-04T10:11:12.5Z").getTime()).toBe(Date.UTC(2021, 2, 4, 10, 11, 12, 500));
	});

	test("throws on garbage", () => {
		expect(() => parseCreationTime("yesterday")).toThrow("Invalid creation time: yesterday");
	});
});
