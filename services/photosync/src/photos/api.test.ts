import { describe, test, expect, beforeAll, afterAll } from "vitest";
import http from "http";
import { AuthError } from "../errors.js";
import { EPOCH } from "../sync/state.js";
import { PhotosApi, toDateRange, toItemMetadata } from "./api.js";
import type { MediaItem } from "./types.js";

describe("toDateRange", () => {
	test("uses the UTC calendar days of both bounds", () => {
		expect(
			toDateRange({
				start: EPOCH,
				end: new Date("2024-02-29T23:30:00.000Z"),
				includeStart: true,
				includeEnd: false,
			})
		).toEqual({
			startDate: { year: 1970, month: 1, day: 1 },
			endDate: { year: 2024, month: 2, day: 29 },
		});
	});
});

describe("toItemMetadata", () => {
	const base: MediaItem = {
		id: "m1",
		baseUrl: "https://example.test/base/m1",
		mimeType: "image/heic",
		filename: "IMG_0001.HEIC",
		mediaMetadata: { creationTime: "2021-03-04T10:00:00Z", photo: {} },
	};

	test("maps a photo", () => {
		expect(toItemMetadata(base)).toEqual({
			id: "m1",
			creationTime: "2021-03-04T10:00:00Z",
			filename: "IMG_0001.HEIC",
			mimeType: "image/heic",
			mediaKind: "Photo",
			contentRef: "https://example.test/base/m1",
		});
	});

	test("anything with video metadata is a video", () => {
		const video = { ...base, mediaMetadata: { creationTime: "2021-03-04T10:00:00Z", video: { fps: 30 } } };
		expect(toItemMetadata(video).mediaKind).toBe("Video");
	});
});

describe("PhotosApi", () => {
	const requests: { method?: string; url?: string; auth?: string; body: string }[] = [];
	let server: http.Server;
	let api: PhotosApi;

	const item = (id: string) => ({
		id,
		filename: `${id}.jpg`,
		mimeType: "image/jpeg",
		baseUrl: `https://example.test/${id}`,
		mediaMetadata: { creationTime: "2021-03-04T10:00:00Z" },
	});

	beforeAll(async () => {
		server = http.createServer((req, res) => {
			let body = "";
			req.on("data", (chunk: Buffer) => {
				body += chunk.toString();
			});
			req.on("end", () => {
				requests.push({ method: req.method, url: req.url, auth: req.headers.authorization, body });
				res.setHeader("Content-Type", "application/json");

				if (req.url?.startsWith("/mediaItems/forbidden")) {
					res.statusCode = 403;
					res.end(JSON.stringify({ error: { message: "denied" } }));
				} else if (req.url?.startsWith("/mediaItems/broken")) {
					res.end(JSON.stringify({ filename: "no id" }));
				} else if (req.url?.startsWith("/mediaItems:search")) {
					const page = body.includes("page-2")
						? { mediaItems: [item("c")] }
						: { mediaItems: [item("a"), item("b")], nextPageToken: "page-2" };
					res.end(JSON.stringify(page));
				} else if (req.url?.startsWith("/mediaItems:batchGet")) {
					const ids = new URL(req.url, "http://localhost").searchParams.getAll("mediaItemIds");
					res.end(JSON.stringify({ mediaItemResults: ids.map((id) => ({ mediaItem: item(id) })) }));
				} else {
					res.end(JSON.stringify(item("single")));
				}
			});
		});

		await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
		const address = server.address();
		if (!address || typeof address === "string") {
			throw new Error("Test server has no TCP address");
		}
		api = new PhotosApi({ accessToken: async () => "test-token" }, { baseUrl: `http://127.0.0.1:${address.port}` });
	});

	afterAll(async () => {
		await new Promise<void>((resolve) => server.close(() => resolve()));
	});

	test("search follows page tokens", async () => {
		requests.length = 0;
		const ids: string[] = [];
		for await (const found of api.search({
			startDate: { year: 2021, month: 1, day: 1 },
			endDate: { year: 2021, month: 12, day: 31 },
		})) {
			ids.push(found.id);
		}

		expect(ids).toEqual(["a", "b", "c"]);
		expect(requests).toHaveLength(2);
		expect(requests[0].auth).toBe("Bearer test-token");
		expect(JSON.parse(requests[0].body)).toEqual({
			pageSize: 100,
			filters: {
				dateFilter: {
					ranges: [{ startDate: { year: 2021, month: 1, day: 1 }, endDate: { year: 2021, month: 12, day: 31 } }],
				},
			},
		});
		expect(JSON.parse(requests[1].body).pageToken).toBe("page-2");
	});

	test("batchGet repeats the id parameter", async () => {
		const results = await api.batchGet(["x", "y"]);
		expect(results.map((result) => result.mediaItem?.id)).toEqual(["x", "y"]);
	});

	test("403 becomes an AuthError", async () => {
		await expect(api.get("forbidden")).rejects.toBeInstanceOf(AuthError);
	});

	test("malformed responses are rejected", async () => {
		await expect(api.get("broken")).rejects.toThrow("mediaItems/broken returned an unexpected response");
	});
});
