#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import { authCommand } from "./cli/auth.js";
import { itemCommand, statusCommand } from "./cli/item.js";
import { parseDateOption, parsePositiveInt } from "./cli/options.js";
import { resyncCommand, syncCommand } from "./cli/sync.js";
import { AuthError, errorMessage } from "./errors.js";

const program = new Command();

function fail(error: unknown): never {
	console.error(pc.red("Error:"), errorMessage(error));
	if (error instanceof AuthError) {
		console.error(pc.dim("  Run `photosync auth` to authorize again."));
	}
	process.exit(1);
}

program
	.name("photosync")
	.description("Mirror a Google Photos library into a local directory tree")
	.version("1.0.0");

program
	.command("sync")
	.alias("s")
	.description("Fetch new metadata and download pending items")
	.option("-d, --dir <path>", "Root directory for downloads")
	.option("--creds <path>", "Path to clientsecret.json")
	.option("--all", "List the whole library instead of only the unseen time windows")
	.option("--from <date>", "Only list items created on or after this date", (v) => parseDateOption(v))
	.option("--to <date>", "Only list items created on or before this date", (v) => parseDateOption(v, true))
	.option("-b, --batch-size <n>", "Items per download batch", parsePositiveInt)
	.option("--resync", "Mark items whose local file vanished as pending first")
	.option("-v, --verbose", "Log every step")
	.action((opts) => {
		syncCommand(opts).catch(fail);
	});

program
	.command("resync")
	.description("Mark downloaded items whose local file vanished as pending")
	.option("-d, --dir <path>", "Root directory for downloads")
	.option("--creds <path>", "Path to clientsecret.json")
	.option("--download", "Download the vanished items straight away")
	.option("-v, --verbose", "Log every step")
	.action((opts) => {
		resyncCommand(opts).catch(fail);
	});

program
	.command("auth")
	.description("Authorize access to the Google Photos library")
	.option("-d, --dir <path>", "Root directory for downloads")
	.option("--creds <path>", "Path to clientsecret.json")
	.action((opts) => {
		authCommand(opts).catch(fail);
	});

program
	.command("item")
	.description("Show what the local store knows about one item")
	.argument("<id>", "Media item id")
	.option("-d, --dir <path>", "Root directory for downloads")
	.option("--creds <path>", "Path to clientsecret.json")
	.option("--remote", "Also fetch the item's metadata from Google Photos")
	.action((id: string, opts) => {
		itemCommand(id, opts).catch(fail);
	});

program
	.command("status")
	.description("Show item counts by download status")
	.option("-d, --dir <path>", "Root directory for downloads")
	.action((opts) => {
		statusCommand(opts).catch(fail);
	});

program.parse();
