import * as readline from "node:readline/promises";
import ora from "ora";
import pc from "picocolors";
import { loadOAuthClient } from "../config.js";
import { AuthError } from "../errors.js";
import {
	exchangeCodeForTokens,
	generateOAuthState,
	getAuthorizationUrl,
	parseAuthorizationResponse,
	type OAuthClientConfig,
} from "../photos/auth.js";
import { TokenSource } from "../photos/token-source.js";
import type { StateStore } from "../sync/state.js";
import { withContext, type CommonOptions } from "./context.js";

/**
 * Interactive installed-app flow: print the consent URL, read back the code
 * (or the whole redirected URL) and store the resulting tokens.
 */
export async function authorize(store: StateStore, oauth: OAuthClientConfig): Promise<void> {
	const state = generateOAuthState();

	console.log(pc.yellow("  ⚠ Authorization required."));
	console.log(pc.dim("    Open this URL, grant access, then paste the code or the URL you were redirected to.\n"));
	console.log(`  ${pc.cyan(getAuthorizationUrl(oauth, state))}\n`);

	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	let answer: string;
	try {
		answer = await rl.question(pc.cyan("  Code: "));
	} finally {
		rl.close();
	}

	if (!answer || answer.trim().length === 0) {
		throw new AuthError("No authorization code provided");
	}

	const response = parseAuthorizationResponse(answer);
	if (response.state !== null && response.state !== state) {
		throw new AuthError("OAuth state mismatch; start the authorization again");
	}

	const spinner = ora({
		text: "Exchanging authorization code...",
		prefixText: " ",
		color: "magenta",
	}).start();

	try {
		const tokens = await exchangeCodeForTokens(oauth, response.code);
		await new TokenSource(store, oauth).save(tokens);
		spinner.succeed(pc.green("Authorized"));
	} catch (error) {
		spinner.fail(pc.red("Authorization failed"));
		throw error;
	}
}

export async function ensureAuthorized(store: StateStore, oauth: OAuthClientConfig): Promise<void> {
	if (!(await new TokenSource(store, oauth).hasCredential())) {
		await authorize(store, oauth);
	}
}

export async function authCommand(options: CommonOptions): Promise<void> {
	await withContext(options, async ({ config, store }) => {
		await authorize(store, loadOAuthClient(config));
	});
}
