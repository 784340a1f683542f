import got, { HTTPError, RequestError } from "got";
import type { z } from "zod";
import { APIError, AuthError, errorMessage } from "../errors.js";
import type { ItemMetadata, TimeWindow } from "../sync/types.js";
import {
	BatchGetResponseSchema,
	MediaItemSchema,
	SearchResponseSchema,
	type AccessTokenProvider,
	type CalendarDate,
	type DateRange,
	type MediaItem,
	type MediaItemResult,
	type PhotosApiOptions,
} from "./types.js";

const DEFAULT_BASE_URL = "https://photoslibrary.googleapis.com/v1";
const DEFAULT_PAGE_SIZE = 100;
const MAX_BATCH_GET = 50;
const MAX_RETRIES = 3;
const RETRYABLE_CODES = ["ECONNABORTED", "ECONNREFUSED", "ECONNRESET", "ENETRESET", "ETIMEDOUT", "EAI_AGAIN"];

interface CallOptions {
	method: "GET" | "POST";
	json?: Record<string, unknown>;
	searchParams?: URLSearchParams;
}

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

function toCalendarDate(date: Date): CalendarDate {
	return {
		year: date.getUTCFullYear(),
		month: date.getUTCMonth() + 1,
		day: date.getUTCDate(),
	};
}

/**
 * The service filters by whole days, inclusive on both ends, so open window
 * bounds widen to the bounding day. Items seen twice are absorbed by the
 * idempotent insert.
 */
export function toDateRange(window: TimeWindow): DateRange {
	return {
		startDate: toCalendarDate(window.start),
		endDate: toCalendarDate(window.end),
	};
}

export function toItemMetadata(item: MediaItem): ItemMetadata {
	return {
		id: item.id,
		creationTime: item.mediaMetadata.creationTime,
		filename: item.filename,
		mimeType: item.mimeType,
		mediaKind: item.mediaMetadata.video ? "Video" : "Photo",
		contentRef: item.baseUrl,
	};
}

export class PhotosApi {
	private tokens: AccessTokenProvider;
	private baseUrl: string;
	private pageSize: number;

	constructor(tokens: AccessTokenProvider, options: PhotosApiOptions = {}) {
		this.tokens = tokens;
		this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
		this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
	}

	private async call<S extends z.ZodTypeAny>(
		schema: S,
		endpoint: string,
		options: CallOptions,
		attempt = 0
	): Promise<z.infer<S>> {
		const token = await this.tokens.accessToken();

		let body: unknown;
		try {
			body = await got(`${this.baseUrl}/${endpoint}`, {
				method: options.method,
				json: options.json,
				searchParams: options.searchParams,
				headers: { Authorization: `Bearer ${token}` },
				retry: { limit: 0 },
			}).json<unknown>();
		} catch (e) {
			if (e instanceof HTTPError) {
				const status = e.response.statusCode;
				if (status === 401 || status === 403) {
					throw new AuthError(`${endpoint} rejected the credentials (HTTP ${status})`, { cause: e });
				}
				if ((status === 429 || status >= 500) && attempt < MAX_RETRIES) {
					await delay(Math.min(1000 * 2 ** attempt, 8000));
					return this.call(schema, endpoint, options, attempt + 1);
				}
				throw new APIError(`${endpoint} failed with HTTP ${status}`, status, { cause: e });
			}
			if (e instanceof RequestError && RETRYABLE_CODES.includes(e.code) && attempt < MAX_RETRIES) {
				await delay(2000);
				return this.call(schema, endpoint, options, attempt + 1);
			}
			throw new APIError(`${endpoint} failed: ${errorMessage(e)}`, undefined, { cause: e });
		}

		const parsed = schema.safeParse(body);
		if (!parsed.success) {
			throw new APIError(`${endpoint} returned an unexpected response: ${parsed.error.message}`);
		}
		return parsed.data;
	}

	/**
	 * Yields every item in the date range, following page tokens. Items come
	 * back in whatever order the service chooses.
	 */
	async *search(range: DateRange): AsyncGenerator<MediaItem> {
		let pageToken: string | undefined;

		do {
			const response = await this.call(SearchResponseSchema, "mediaItems:search", {
				method: "POST",
				json: {
					pageSize: this.pageSize,
					pageToken,
					filters: { dateFilter: { ranges: [range] } },
				},
			});

			for (const item of response.mediaItems ?? []) {
				yield item;
			}

			pageToken = response.nextPageToken;
		} while (pageToken);
	}

	async get(id: string): Promise<MediaItem> {
		return this.call(MediaItemSchema, `mediaItems/${encodeURIComponent(id)}`, { method: "GET" });
	}

	/** Fresh metadata (including base URLs) for many items. */
	async batchGet(ids: string[]): Promise<MediaItemResult[]> {
		const results: MediaItemResult[] = [];

		for (let i = 0; i < ids.length; i += MAX_BATCH_GET) {
			const searchParams = new URLSearchParams();
			for (const id of ids.slice(i, i + MAX_BATCH_GET)) {
				searchParams.append("mediaItemIds", id);
			}

			const response = await this.call(BatchGetResponseSchema, "mediaItems:batchGet", {
				method: "GET",
				searchParams,
			});
			results.push(...response.mediaItemResults);
		}

		return results;
	}
}
