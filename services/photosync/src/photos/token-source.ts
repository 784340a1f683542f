import { AuthError } from "../errors.js";
import type { StateStore } from "../sync/state.js";
import { GoogleTokensSchema, refreshAccessToken, type GoogleTokens, type OAuthClientConfig } from "./auth.js";
import type { AccessTokenProvider } from "./types.js";

export const CREDENTIAL_ID = "installed.main";

// Refresh 1 minute before expiry
const EXPIRY_MARGIN_MS = 60_000;

export type CredentialStore = Pick<StateStore, "getCredential" | "storeCredential">;

export type RefreshFn = (client: OAuthClientConfig, refreshToken: string) => Promise<GoogleTokens>;

export function encodeTokens(tokens: GoogleTokens): Uint8Array {
	return Buffer.from(JSON.stringify(tokens), "utf-8");
}

export function decodeTokens(blob: Uint8Array): GoogleTokens {
	let raw: unknown;
	try {
		raw = JSON.parse(Buffer.from(blob).toString("utf-8"));
	} catch (error) {
		throw new AuthError("Stored credential is unreadable; authorize again", { cause: error });
	}

	const result = GoogleTokensSchema.safeParse(raw);
	if (!result.success) {
		throw new AuthError("Stored credential is unreadable; authorize again");
	}
	return result.data;
}

/**
 * Supplies bearer tokens, persisting them in the state store under one
 * fixed identity. Nothing else decodes the stored blob.
 */
export class TokenSource implements AccessTokenProvider {
	private store: CredentialStore;
	private client: OAuthClientConfig;
	private refresh: RefreshFn;
	private cached: GoogleTokens | null = null;

	constructor(store: CredentialStore, client: OAuthClientConfig, refresh: RefreshFn = refreshAccessToken) {
		this.store = store;
		this.client = client;
		this.refresh = refresh;
	}

	async hasCredential(): Promise<boolean> {
		return (await this.store.getCredential(CREDENTIAL_ID)) !== null;
	}

	async save(tokens: GoogleTokens): Promise<void> {
		await this.store.storeCredential(CREDENTIAL_ID, encodeTokens(tokens));
		this.cached = tokens;
	}

	async accessToken(): Promise<string> {
		let tokens = this.cached;
		if (!tokens) {
			const blob = await this.store.getCredential(CREDENTIAL_ID);
			if (!blob) {
				throw new AuthError("No stored credential; run `photosync auth` first");
			}
			tokens = decodeTokens(blob);
		}

		if (Date.now() >= tokens.expires_at - EXPIRY_MARGIN_MS) {
			tokens = await this.refresh(this.client, tokens.refresh_token);
			await this.save(tokens);
		} else {
			this.cached = tokens;
		}

		return tokens.access_token;
	}
}
