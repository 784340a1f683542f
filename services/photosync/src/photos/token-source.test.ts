import { describe, test, expect, vi } from "vitest";
import { AuthError } from "../errors.js";
import type { GoogleTokens, OAuthClientConfig } from "./auth.js";
import { CREDENTIAL_ID, TokenSource, decodeTokens, encodeTokens, type CredentialStore } from "./token-source.js";

const client: OAuthClientConfig = {
	clientId: "test-client",
	clientSecret: "test-secret",
	redirectUri: "http://localhost:8080/api/auth/google/callback",
};

class MemoryCredentials implements CredentialStore {
	blobs = new Map<string, Uint8Array>();

	async getCredential(identity: string): Promise<Uint8Array | null> {
		return this.blobs.get(identity) ?? null;
	}

	async storeCredential(identity: string, blob: Uint8Array): Promise<void> {
		this.blobs.set(identity, blob);
	}
}

describe("TokenSource", () => {
	test("fails with AuthError when nothing is stored", async () => {
		const tokens = new TokenSource(new MemoryCredentials(), client);

		expect(await tokens.hasCredential()).toBe(false);
		await expect(tokens.accessToken()).rejects.toBeInstanceOf(AuthError);
	});

	test("returns a stored token that is still valid", async () => {
		const store = new MemoryCredentials();
		const refresh = vi.fn();
		await store.storeCredential(
			CREDENTIAL_ID,
			encodeTokens({ access_token: "test-access", refresh_token: "test-refresh", expires_at: Date.now() + 3_600_000 })
		);

		const tokens = new TokenSource(store, client, refresh);

		expect(await tokens.accessToken()).toBe("test-access");
		expect(refresh).not.toHaveBeenCalled();
	});

	test("refreshes a token close to expiry and persists the result", async () => {
		const store = new MemoryCredentials();
		await store.storeCredential(
			CREDENTIAL_ID,
			encodeTokens({ access_token: "stale", refresh_token: "test-refresh", expires_at: Date.now() + 30_000 })
		);
		const refreshed: GoogleTokens = {
			access_token: "fresh",
			refresh_token: "test-refresh",
			expires_at: Date.now() + 3_600_000,
		};
		const refresh = vi.fn(async () => refreshed);

		const tokens = new TokenSource(store, client, refresh);

		expect(await tokens.accessToken()).toBe("fresh");
		expect(refresh).toHaveBeenCalledWith(client, "test-refresh");

		const stored = await store.getCredential(CREDENTIAL_ID);
		expect(stored && decodeTokens(stored)).toEqual(refreshed);
	});

	test("unreadable blobs ask for a new authorization", () => {
		expect(() => decodeTokens(Buffer.from("{not json"))).toThrow(AuthError);
		expect(() => decodeTokens(Buffer.from('{"access_token":"x"}'))).toThrow(
			"Stored credential is unreadable; authorize again"
		);
	});
});
