/**
 * Configuration Adapter for photosync
 *
 * Derives the engine's settings from the shared server configuration.
 */

import path from 'path';
import { config } from '../../../../src/config/index.js';

export interface Config {
	rootPath: string;
	databasePath: string;
	batchSize: number;
	windowHeuristic: boolean;
	google: {
		clientId: string;
		clientSecret: string;
		redirectUri: string;
		clientSecretFile: string;
	};
}

export interface ConfigOverrides {
	/** Root directory; the state database moves with it unless SYNC_DB_PATH is set */
	dir?: string;
	/** Path to a clientsecret.json file */
	creds?: string;
	batchSize?: number;
}

export function getPhotosyncConfig(overrides: ConfigOverrides = {}): Config {
	const rootPath = overrides.dir ?? config.photos.rootPath;
	const databasePath = overrides.dir && !process.env.SYNC_DB_PATH
		? path.join(overrides.dir, 'sync.db')
		: config.database.path;

	return {
		rootPath,
		databasePath,
		batchSize: overrides.batchSize ?? config.sync.batchSize,
		windowHeuristic: config.sync.windowHeuristic,
		google: {
			...config.google,
			clientSecretFile: overrides.creds ?? config.google.clientSecretFile,
		},
	};
}

// Re-export main config for advanced usage
export { config };
