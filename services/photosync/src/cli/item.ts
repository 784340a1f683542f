import pc from "picocolors";
import { loadOAuthClient } from "../config.js";
import { createPhotosClient } from "../photos/client.js";
import type { Item, ItemMetadata, TransactionLogEntry } from "../sync/types.js";
import { ensureAuthorized } from "./auth.js";
import { withContext, type CommonOptions } from "./context.js";

export interface ItemCommandOptions extends CommonOptions {
	remote?: boolean;
}

function printItem(item: Item, history: TransactionLogEntry[]): void {
	const status = item.status === "Downloaded" ? pc.green(item.status) : pc.yellow(item.status);

	console.log();
	console.log(`  ${pc.bold(pc.white(item.filename))} ${pc.dim(`(${item.id})`)}`);
	console.log(`  Created:  ${item.creationTime.toISOString()}`);
	console.log(`  Path:     ${item.path}`);
	console.log(`  Type:     ${item.mediaKind} ${pc.dim(item.mimeType)}`);
	console.log(`  Status:   ${status}`);

	if (history.length > 0) {
		console.log(pc.dim("  History:"));
		for (const entry of history) {
			console.log(pc.dim(`    ${entry.timestamp.toISOString()}  ${entry.eventKind}`));
		}
	}
	console.log();
}

function printRemote(metadata: ItemMetadata): void {
	console.log(pc.dim("  Remote:"));
	console.log(`    Filename: ${metadata.filename}`);
	console.log(`    Created:  ${metadata.creationTime}`);
	console.log(`    Type:     ${metadata.mediaKind} ${pc.dim(metadata.mimeType)}`);
	console.log();
}

export async function itemCommand(id: string, opts: ItemCommandOptions): Promise<void> {
	process.exitCode = await withContext(opts, async ({ config, store }) => {
		const item = await store.getItem(id);
		if (item) {
			printItem(item, await store.transactions(id));
		} else {
			console.log(pc.yellow(`\n  ⚠ Item ${id} is not in the local store\n`));
		}

		if (opts.remote) {
			const oauth = loadOAuthClient(config);
			await ensureAuthorized(store, oauth);
			printRemote(await createPhotosClient(store, oauth).getItem(id));
			return 0;
		}

		return item ? 0 : 1;
	});
}

export async function statusCommand(opts: CommonOptions): Promise<void> {
	await withContext(opts, async ({ config, store }) => {
		const counts = await store.countByStatus();
		const extremes = await store.queryExtremes();
		const total = counts.Pending + counts.Downloaded;

		console.log();
		console.log(`  ${pc.bold("Photo Sync Status")}`);
		console.log(`  Root:       ${config.rootPath}`);
		console.log(`  State:      ${config.databasePath}`);
		console.log(`  Items:      ${total}`);
		console.log(`  Downloaded: ${pc.green(String(counts.Downloaded))}`);
		console.log(`  Pending:    ${counts.Pending > 0 ? pc.yellow(String(counts.Pending)) : "0"}`);
		if (total > 0) {
			console.log(`  Oldest:     ${extremes.oldest.toISOString()}`);
			console.log(`  Newest:     ${extremes.newest.toISOString()}`);
		}
		console.log();
	});
}
