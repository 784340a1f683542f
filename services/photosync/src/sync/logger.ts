import pc from "picocolors";
import { formatWindow } from "./windows.js";
import type { DriveResult } from "./sync.js";
import type { TimeWindow } from "./types.js";

export interface SyncSummary {
	result: DriveResult;
	vanished?: number;
	duration: number; // milliseconds
}

const RULE = "═══════════════════════════════════════════════════════════";

/**
 * Log sync start
 */
export function logSyncStart(options: {
	rootPath: string;
	databasePath: string;
	batchSize: number;
	windowHeuristic: boolean;
}): void {
	console.log();
	console.log(RULE);
	console.log("  Starting Photo Sync");
	console.log(RULE);
	console.log(`  Root:       ${options.rootPath}`);
	console.log(`  State:      ${options.databasePath}`);
	console.log(`  Batch size: ${options.batchSize}`);
	console.log(`  Mode:       ${options.windowHeuristic ? "Incremental (window heuristic)" : "Full listing"}`);
	console.log(RULE);
	console.log();
}

export function logWindows(windows: TimeWindow[]): void {
	for (const window of windows) {
		console.log(pc.dim(`  →  Listing ${formatWindow(window)}`));
	}
}

/**
 * Log sync complete with summary
 */
export function logSyncComplete(summary: SyncSummary): void {
	const { metadata, download } = summary.result;
	const durationSeconds = (summary.duration / 1000).toFixed(1);

	console.log();
	console.log(RULE);
	console.log("  Sync Complete");
	console.log(RULE);
	if (summary.vanished !== undefined) {
		console.log(`  Vanished Items:   ${summary.vanished}`);
	}
	console.log(`  Items Listed:     ${metadata.itemsSeen}`);
	console.log(`  New Items:        ${metadata.itemsAdded}`);
	if (metadata.itemsSkipped > 0) {
		console.log(pc.yellow(`  Skipped Items:    ${metadata.itemsSkipped}`));
	}
	if (metadata.failedWindows.length > 0) {
		console.log(pc.red(`  Failed Windows:   ${metadata.failedWindows.map(formatWindow).join(", ")}`));
	}
	if (download) {
		console.log(`  Downloaded:       ${download.downloaded}/${download.attempted}`);
		if (download.failed.length > 0) {
			console.log(pc.yellow(`  Still Pending:    ${download.failed.length} (retried on next run)`));
		}
	} else {
		console.log(pc.yellow("  Downloads skipped (metadata fetch failed)"));
	}
	console.log(`  Duration:         ${durationSeconds}s`);
	console.log(RULE);
	console.log();
}

/**
 * Log resync result
 */
export function logResyncResult(vanished: number): void {
	if (vanished === 0) {
		console.log(pc.green("  ✓  All downloaded items are present on disk"));
	} else {
		console.log(pc.yellow(`  ⚠  ${vanished} item(s) vanished locally and were marked pending`));
	}
}
