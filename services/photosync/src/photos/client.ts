import { Downloader, type DownloaderOptions } from "../downloader/index.js";
import type { ContentRequest, ItemMetadata, RemoteLibraryClient, TimeWindow } from "../sync/types.js";
import { PhotosApi, toDateRange, toItemMetadata } from "./api.js";
import type { OAuthClientConfig } from "./auth.js";
import { TokenSource, type CredentialStore } from "./token-source.js";
import type { PhotosApiOptions } from "./types.js";

/**
 * Google Photos behind the engine's RemoteLibraryClient interface.
 */
export class GooglePhotosClient implements RemoteLibraryClient {
	readonly api: PhotosApi;
	private downloader: Downloader;

	constructor(api: PhotosApi, downloaderOptions: DownloaderOptions = {}) {
		this.api = api;
		this.downloader = new Downloader(api, downloaderOptions);
	}

	async *listItems(window: TimeWindow): AsyncGenerator<ItemMetadata> {
		for await (const item of this.api.search(toDateRange(window))) {
			yield toItemMetadata(item);
		}
	}

	batchFetchContent(requests: ContentRequest[]): Promise<Set<string>> {
		return this.downloader.batchFetchContent(requests);
	}

	async getItem(id: string): Promise<ItemMetadata> {
		return toItemMetadata(await this.api.get(id));
	}
}

export interface PhotosClientOptions {
	api?: PhotosApiOptions;
	downloader?: DownloaderOptions;
}

export function createPhotosClient(
	store: CredentialStore,
	oauth: OAuthClientConfig,
	options: PhotosClientOptions = {}
): GooglePhotosClient {
	const tokens = new TokenSource(store, oauth);
	return new GooglePhotosClient(new PhotosApi(tokens, options.api), options.downloader);
}
