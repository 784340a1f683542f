import type { MediaKind } from "../sync/types.js";

export interface DownloadResult {
	success: boolean;
	id: string;
	filename: string;
	filePath?: string;
	bytes?: number;
	error?: string;
}

export function contentUrl(baseUrl: string, mediaKind: MediaKind): string {
	// =dv: full-quality video stream, =d: original image bytes
	return `${baseUrl}=${mediaKind === "Video" ? "dv" : "d"}`;
}
