import path from "path";
import { parseCreationTime } from "./sync/state.js";
import type { ItemMetadata, PathMapper } from "./sync/types.js";

/**
 * Default layout: one directory per UTC calendar day, e.g. "2021/03/04".
 */
export const dateDirectoryMapper: PathMapper = {
	map(item: ItemMetadata): string {
		const date = parseCreationTime(item.creationTime);
		const year = String(date.getUTCFullYear());
		const month = String(date.getUTCMonth() + 1).padStart(2, "0");
		const day = String(date.getUTCDate()).padStart(2, "0");
		return `${year}/${month}/${day}`;
	},
};

// Leaves room for the hidden ".<name>.<pid>.part" download name within 255 bytes
const MAX_FILENAME_BYTES = 200;
const MAX_EXTENSION_BYTES = 16;

function truncateBytes(value: string, maxBytes: number): string {
	let result = "";
	let bytes = 0;
	for (const char of value) {
		const size = Buffer.byteLength(char, "utf-8");
		if (bytes + size > maxBytes) {
			break;
		}
		result += char;
		bytes += size;
	}
	return result;
}

export function sanitizeFilename(name: string): string {
	let sanitized = name
		.replace(/[<>:"/\\|?*\x00-\x1f]/g, "_") // Replace invalid chars
		.replace(/\s+/g, " ") // Normalize whitespace
		.trim()
		.replace(/\.+$/g, "") // Remove trailing dots
		.trim();

	if (Buffer.byteLength(sanitized, "utf-8") > MAX_FILENAME_BYTES) {
		const extension = path.extname(sanitized);
		const keep = Buffer.byteLength(extension, "utf-8") <= MAX_EXTENSION_BYTES ? extension : "";
		const stem = sanitized.slice(0, sanitized.length - keep.length);
		sanitized = truncateBytes(stem, MAX_FILENAME_BYTES - Buffer.byteLength(keep, "utf-8")).replace(/[\s.]+$/, "") + keep;
	}

	return sanitized.length > 0 ? sanitized : "untitled";
}
