import fs from "fs";
import axios from "axios";
import { randomBytes } from "crypto";
import { z } from "zod";
import { AuthError } from "../errors.js";

const AUTH_URL = "https://accounts.google.com/o/oauth2/v2/auth";
const TOKEN_URL = "https://oauth2.googleapis.com/token";
export const PHOTOS_SCOPE = "https://www.googleapis.com/auth/photoslibrary.readonly";

export interface OAuthClientConfig {
	clientId: string;
	clientSecret: string;
	redirectUri: string;
}

export interface GoogleTokens {
	access_token: string;
	refresh_token: string;
	expires_at: number; // epoch milliseconds
}

export const GoogleTokensSchema = z.object({
	access_token: z.string(),
	refresh_token: z.string(),
	expires_at: z.number(),
});

const TokenResponseSchema = z.object({
	access_token: z.string(),
	refresh_token: z.string().optional(),
	expires_in: z.number().optional(),
});

const ClientSecretSectionSchema = z.object({
	client_id: z.string(),
	client_secret: z.string(),
	redirect_uris: z.array(z.string()).optional(),
});

// Shape of the clientsecret.json downloaded from the Google Cloud console
const ClientSecretFileSchema = z
	.object({
		installed: ClientSecretSectionSchema.optional(),
		web: ClientSecretSectionSchema.optional(),
	})
	.refine((file) => file.installed || file.web, "expected an 'installed' or 'web' section");

/**
 * Read OAuth client settings from a clientsecret.json file. The configured
 * redirect URI wins over the first one listed in the file.
 */
export function loadClientSecretFile(filePath: string, redirectUri?: string): OAuthClientConfig {
	const content = fs.readFileSync(filePath, "utf-8");
	const parsed = ClientSecretFileSchema.parse(JSON.parse(content));
	const section = parsed.installed ?? parsed.web;
	if (!section) {
		throw new Error(`No client section in ${filePath}`);
	}

	const fallbackRedirect = section.redirect_uris?.[0];
	const resolvedRedirect = redirectUri || fallbackRedirect;
	if (!resolvedRedirect) {
		throw new Error(`No redirect URI configured and none listed in ${filePath}`);
	}

	return {
		clientId: section.client_id,
		clientSecret: section.client_secret,
		redirectUri: resolvedRedirect,
	};
}

// Generate state for OAuth flow
export function generateOAuthState(): string {
	return randomBytes(32).toString("hex");
}

export function getAuthorizationUrl(client: OAuthClientConfig, state: string): string {
	const params = new URLSearchParams({
		client_id: client.clientId,
		response_type: "code",
		redirect_uri: client.redirectUri,
		scope: PHOTOS_SCOPE,
		access_type: "offline",
		prompt: "consent",
		state,
	});

	return `${AUTH_URL}?${params.toString()}`;
}

export interface AuthorizationResponse {
	code: string;
	/** Only present when a redirected URL was pasted */
	state: string | null;
}

/**
 * Accepts either a bare authorization code or the full URL the browser was
 * redirected to.
 */
export function parseAuthorizationResponse(input: string): AuthorizationResponse {
	const trimmed = input.trim();
	if (!trimmed.includes("code=")) {
		return { code: trimmed, state: null };
	}

	const query = trimmed.includes("?") ? trimmed.slice(trimmed.indexOf("?") + 1) : trimmed;
	const params = new URLSearchParams(query);
	const code = params.get("code");
	if (!code) {
		throw new AuthError("No authorization code found in the pasted URL");
	}
	return { code, state: params.get("state") };
}

export function extractAuthorizationCode(input: string): string {
	return parseAuthorizationResponse(input).code;
}

async function requestTokens(data: URLSearchParams, what: string): Promise<z.infer<typeof TokenResponseSchema>> {
	try {
		const response = await axios.post<unknown>(TOKEN_URL, data, {
			headers: {
				"Content-Type": "application/x-www-form-urlencoded",
			},
		});
		return TokenResponseSchema.parse(response.data);
	} catch (error) {
		if (axios.isAxiosError(error)) {
			const details = z.object({ error_description: z.string() }).safeParse(error.response?.data);
			const reason = details.success ? details.data.error_description : error.message;
			throw new AuthError(`Google token ${what} failed: ${reason}`, { cause: error });
		}
		throw error;
	}
}

// Exchange authorization code for tokens
export async function exchangeCodeForTokens(client: OAuthClientConfig, code: string): Promise<GoogleTokens> {
	const data = new URLSearchParams({
		grant_type: "authorization_code",
		code,
		redirect_uri: client.redirectUri,
		client_id: client.clientId,
		client_secret: client.clientSecret,
	});

	const response = await requestTokens(data, "exchange");
	if (!response.refresh_token) {
		throw new AuthError("Google did not return a refresh token; revoke access and authorize again");
	}

	return {
		access_token: response.access_token,
		refresh_token: response.refresh_token,
		expires_at: Date.now() + (response.expires_in ?? 3600) * 1000,
	};
}

// Refresh access token
export async function refreshAccessToken(client: OAuthClientConfig, refreshToken: string): Promise<GoogleTokens> {
	const data = new URLSearchParams({
		grant_type: "refresh_token",
		refresh_token: refreshToken,
		client_id: client.clientId,
		client_secret: client.clientSecret,
	});

	const response = await requestTokens(data, "refresh");

	return {
		access_token: response.access_token,
		refresh_token: response.refresh_token ?? refreshToken,
		expires_at: Date.now() + (response.expires_in ?? 3600) * 1000,
	};
}
