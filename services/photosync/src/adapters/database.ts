/**
 * Database Adapter for photosync
 *
 * Opens the SQLite state database through the shared database module.
 */

import { createDatabase, initializeDatabase } from '../../../../src/db/index.js';
import { StateStore } from '../sync/state.js';

export interface OpenedStore {
	store: StateStore;
	close(): Promise<void>;
}

export async function openStateStore(databasePath: string): Promise<OpenedStore> {
	const db = createDatabase(databasePath);
	await initializeDatabase(db);

	return {
		store: new StateStore(db),
		close: () => db.destroy(),
	};
}
