/**
 * Configuration adapter for photosync
 * Uses shared server configuration
 */

import fs from "fs";
import { getPhotosyncConfig } from "./adapters/config.js";
import type { Config, ConfigOverrides } from "./adapters/config.js";
import { AuthError } from "./errors.js";
import { loadClientSecretFile, type OAuthClientConfig } from "./photos/auth.js";

export function loadConfig(overrides: ConfigOverrides = {}): Config {
	return getPhotosyncConfig(overrides);
}

/**
 * OAuth client settings: GOOGLE_CLIENT_ID/GOOGLE_CLIENT_SECRET when both are
 * set, otherwise the clientsecret.json file.
 */
export function loadOAuthClient(config: Config): OAuthClientConfig {
	const { clientId, clientSecret, redirectUri, clientSecretFile } = config.google;

	if (clientId && clientSecret) {
		return { clientId, clientSecret, redirectUri };
	}

	if (fs.existsSync(clientSecretFile)) {
		return loadClientSecretFile(clientSecretFile, redirectUri);
	}

	throw new AuthError(
		`No OAuth client configured: set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET or provide ${clientSecretFile}`
	);
}

export type { Config, ConfigOverrides };
