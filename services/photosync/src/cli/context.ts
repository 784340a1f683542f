import type { Logger } from "pino";
import { createLogger } from "../../../../src/log/logger.js";
import { openStateStore } from "../adapters/database.js";
import { loadConfig, type Config, type ConfigOverrides } from "../config.js";
import type { StateStore } from "../sync/state.js";

export interface CommonOptions {
	dir?: string;
	creds?: string;
	verbose?: boolean;
}

export interface CommandContext {
	config: Config;
	store: StateStore;
	logger: Logger;
}

/**
 * Open the state store for one command and close it afterwards, whatever
 * the command does.
 */
export async function withContext<T>(
	options: CommonOptions & ConfigOverrides,
	run: (context: CommandContext) => Promise<T>
): Promise<T> {
	const config = loadConfig({ dir: options.dir, creds: options.creds, batchSize: options.batchSize });
	// Keep routine logs out of the way of spinners and progress bars
	const logger = createLogger({ component: "photosync" }, options.verbose ? {} : { level: "warn" });
	const opened = await openStateStore(config.databasePath);

	try {
		return await run({ config, store: opened.store, logger });
	} finally {
		await opened.close();
	}
}
