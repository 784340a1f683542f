export class SyncError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** The remote service rejected our credentials. Fatal for the current run. */
export class AuthError extends SyncError {}

/** A remote call failed after transport-level retries. */
export class APIError extends SyncError {
	readonly statusCode?: number;

	constructor(message: string, statusCode?: number, options?: ErrorOptions) {
		super(message, options);
		this.statusCode = statusCode;
	}
}

/** Could not create a target directory or write a file. Scoped to one item. */
export class LocalIOError extends SyncError {
	readonly path: string;

	constructor(message: string, path: string, options?: ErrorOptions) {
		super(message, options);
		this.path = path;
	}
}

export class SyncInProgressError extends SyncError {
	constructor() {
		super("A sync run is already in progress");
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
