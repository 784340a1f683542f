import path from "path";
import { errorMessage } from "../errors.js";
import type { MediaItemResult } from "../photos/types.js";
import type { ContentRequest } from "../sync/types.js";
import { streamToFile, openHttpStream, type OpenStream } from "./stream.js";
import { contentUrl, type DownloadResult } from "./types.js";

/** Where fresh base URLs come from; base URLs expire, so they are fetched per batch. */
export interface ContentSource {
	batchGet(ids: string[]): Promise<MediaItemResult[]>;
}

export interface DownloaderOptions {
	openStream?: OpenStream;
	onItemStart?: (request: ContentRequest, index: number, total: number) => void;
	onItemComplete?: (result: DownloadResult, index: number, total: number) => void;
}

export class Downloader {
	private source: ContentSource;
	private options: DownloaderOptions;

	constructor(source: ContentSource, options: DownloaderOptions = {}) {
		this.source = source;
		this.options = options;
	}

	/**
	 * Download each requested item into its directory. Resolves to the ids
	 * that were fully written; everything else failed for this attempt.
	 * Errors from the base URL lookup (authorization included) propagate.
	 */
	async batchFetchContent(requests: ContentRequest[]): Promise<Set<string>> {
		const written = new Set<string>();
		if (requests.length === 0) {
			return written;
		}

		const results = await this.source.batchGet(requests.map((request) => request.id));
		const baseUrls = new Map<string, string>();
		for (const result of results) {
			if (result.mediaItem?.baseUrl) {
				baseUrls.set(result.mediaItem.id, result.mediaItem.baseUrl);
			}
		}

		for (let i = 0; i < requests.length; i++) {
			const request = requests[i];
			this.options.onItemStart?.(request, i + 1, requests.length);

			const result = await this.downloadItem(request, baseUrls.get(request.id));
			if (result.success) {
				written.add(request.id);
			}

			this.options.onItemComplete?.(result, i + 1, requests.length);
		}

		return written;
	}

	async downloadItem(request: ContentRequest, baseUrl: string | undefined): Promise<DownloadResult> {
		const filePath = path.join(request.directory, request.filename);

		if (!baseUrl) {
			return {
				success: false,
				id: request.id,
				filename: request.filename,
				error: "No base URL returned for item",
			};
		}

		try {
			const bytes = await streamToFile(
				filePath,
				contentUrl(baseUrl, request.mediaKind),
				this.options.openStream ?? openHttpStream
			);
			return {
				success: true,
				id: request.id,
				filename: request.filename,
				filePath,
				bytes,
			};
		} catch (e) {
			return {
				success: false,
				id: request.id,
				filename: request.filename,
				error: errorMessage(e),
			};
		}
	}
}
