import fs from "fs";
import path from "path";
import type { Readable } from "stream";
import { pipeline as streamPipeline } from "stream/promises";
import got from "got";
import { LocalIOError, errorMessage } from "../errors.js";

const MAX_RETRIES = 2;
const RETRYABLE_CODES = ["ESOCKETTIMEDOUT", "ERR_STREAM_PREMATURE_CLOSE", "ETIMEDOUT", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN"];

export type OpenStream = (url: string) => Readable;

export const openHttpStream: OpenStream = (url) =>
	got.stream(url, {
		timeout: {
			lookup: 5000,
			connect: 10000,
			secureConnect: 10000,
			socket: 60000,
			send: 10000,
			response: 30000,
		},
	});

function partPath(target: string): string {
	return path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.part`);
}

function isRetryable(error: unknown): boolean {
	if (!(error instanceof Error) || error instanceof LocalIOError) {
		return false;
	}
	const code = "code" in error && typeof error.code === "string" ? error.code : "";
	return error.name === "TimeoutError" || RETRYABLE_CODES.includes(code);
}

/**
 * Stream into a hidden .part file beside the target and rename it into place
 * once complete. The target name only ever holds a fully written file.
 */
export async function writeAtomically(target: string, openSource: () => Readable): Promise<number> {
	const directory = path.dirname(target);
	try {
		await fs.promises.mkdir(directory, { recursive: true });
	} catch (e) {
		throw new LocalIOError(`Cannot create directory ${directory}: ${errorMessage(e)}`, directory, { cause: e });
	}

	// Opened only once the pipeline can take its errors
	const temporary = partPath(target);
	try {
		await streamPipeline(openSource(), fs.createWriteStream(temporary));
		await fs.promises.rename(temporary, target);
	} catch (e) {
		await fs.promises.rm(temporary, { force: true });
		throw e;
	}

	const stats = await fs.promises.stat(target);
	return stats.size;
}

export async function streamToFile(
	target: string,
	url: string,
	openStream: OpenStream = openHttpStream,
	retryCount = 0
): Promise<number> {
	try {
		return await writeAtomically(target, () => openStream(url));
	} catch (e) {
		if (isRetryable(e) && retryCount < MAX_RETRIES) {
			const delay = Math.min(1000 * Math.pow(2, retryCount), 5000);
			await new Promise((r) => setTimeout(r, delay));
			return streamToFile(target, url, openStream, retryCount + 1);
		}
		throw e;
	}
}
