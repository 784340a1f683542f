import cliProgress from "cli-progress";
import ora from "ora";
import pc from "picocolors";
import { loadOAuthClient } from "../config.js";
import { createPhotosClient } from "../photos/client.js";
import { logResyncResult, logSyncComplete, logSyncStart, logWindows } from "../sync/logger.js";
import { SyncEngine, type BatchProgress, type DriveResult } from "../sync/sync.js";
import { ensureAuthorized } from "./auth.js";
import { withContext, type CommandContext, type CommonOptions } from "./context.js";

export interface SyncCommandOptions extends CommonOptions {
	all?: boolean;
	from?: Date;
	to?: Date;
	batchSize?: number;
	resync?: boolean;
}

export interface ResyncCommandOptions extends CommonOptions {
	download?: boolean;
}

function createProgressBar() {
	return new cliProgress.SingleBar({
		format: pc.dim("  │ ") + pc.cyan("{bar}") + pc.dim(" │ ") + pc.white("{percentage}%") + pc.dim(" │ ") + pc.dim("{value}/{total} batches {pass}"),
		barCompleteChar: "█",
		barIncompleteChar: "░",
		hideCursor: true,
		clearOnComplete: false,
		barsize: 25,
	});
}

/** Drives one progress bar per download pass. */
function batchReporter() {
	const bar = createProgressBar();
	let currentPass: BatchProgress["pass"] | null = null;

	return {
		onBatchComplete(progress: BatchProgress) {
			if (progress.pass !== currentPass) {
				if (currentPass !== null) {
					bar.stop();
				}
				currentPass = progress.pass;
				bar.start(progress.batches, 0, { pass: progress.pass === "retry" ? "(retry)" : "" });
			}
			bar.update(progress.batch);
		},
		stop() {
			if (currentPass !== null) {
				bar.stop();
			}
		},
	};
}

function createEngine(context: CommandContext, onBatchComplete?: (progress: BatchProgress) => void): SyncEngine {
	const { config, store, logger } = context;

	return new SyncEngine({
		store,
		client: () => createPhotosClient(store, loadOAuthClient(config)),
		rootPath: config.rootPath,
		batchSize: config.batchSize,
		logger,
		onBatchComplete,
	});
}

function exitCodeFor(result: DriveResult): number {
	return result.download === null || result.download.failed.length > 0 ? 1 : 0;
}

export async function syncCommand(opts: SyncCommandOptions): Promise<void> {
	process.exitCode = await withContext(opts, async (context) => {
		const { config, store } = context;
		const windowHeuristic = opts.all ? false : config.windowHeuristic;

		await ensureAuthorized(store, loadOAuthClient(config));

		logSyncStart({
			rootPath: config.rootPath,
			databasePath: config.databasePath,
			batchSize: config.batchSize,
			windowHeuristic,
		});

		const reporter = batchReporter();
		const engine = createEngine(context, reporter.onBatchComplete);
		const startTime = Date.now();

		let vanished: number | undefined;
		if (opts.resync) {
			vanished = await engine.resync();
			logResyncResult(vanished);
		}

		const fetchOptions = {
			range: opts.from || opts.to ? { start: opts.from, end: opts.to } : undefined,
			windowHeuristic,
		};
		logWindows(await engine.computeWindows(fetchOptions));

		const spinner = ora({
			text: "Fetching metadata...",
			prefixText: " ",
			color: "magenta",
		}).start();

		const metadata = await engine.fetchMetadata(fetchOptions).catch((error: unknown) => {
			spinner.fail(pc.red("Metadata fetch failed"));
			throw error;
		});

		if (metadata.success) {
			spinner.succeed(pc.green(`Listed ${metadata.itemsSeen} item(s), ${metadata.itemsAdded} new`));
		} else {
			spinner.warn(pc.yellow(`Listing failed for ${metadata.failedWindows.length} window(s)`));
		}

		let result: DriveResult = { metadata, download: null };
		if (metadata.success) {
			try {
				result = { metadata, download: await engine.downloadPending() };
			} finally {
				reporter.stop();
			}
		}

		logSyncComplete({ result, vanished, duration: Date.now() - startTime });
		return exitCodeFor(result);
	});
}

export async function resyncCommand(opts: ResyncCommandOptions): Promise<void> {
	process.exitCode = await withContext(opts, async (context) => {
		const { config, store } = context;

		const reporter = batchReporter();
		const engine = createEngine(context, reporter.onBatchComplete);

		const vanished = await engine.resync();
		logResyncResult(vanished);

		if (!opts.download || vanished === 0) {
			return 0;
		}

		await ensureAuthorized(store, loadOAuthClient(config));

		try {
			const download = await engine.downloadPending();
			console.log(pc.dim(`  Downloaded ${download.downloaded}/${download.attempted}`));
			return download.failed.length > 0 ? 1 : 0;
		} finally {
			reporter.stop();
		}
	});
}
