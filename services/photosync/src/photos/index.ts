export { PhotosApi, toDateRange, toItemMetadata } from "./api.js";
export {
	PHOTOS_SCOPE,
	exchangeCodeForTokens,
	extractAuthorizationCode,
	parseAuthorizationResponse,
	type AuthorizationResponse,
	generateOAuthState,
	getAuthorizationUrl,
	loadClientSecretFile,
	refreshAccessToken,
	type GoogleTokens,
	type OAuthClientConfig,
} from "./auth.js";
export { GooglePhotosClient, createPhotosClient, type PhotosClientOptions } from "./client.js";
export { CREDENTIAL_ID, TokenSource, decodeTokens, encodeTokens, type CredentialStore } from "./token-source.js";
export type * from "./types.js";
