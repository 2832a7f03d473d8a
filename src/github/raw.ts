/**
 * Unauthenticated raw file access on raw.githubusercontent.com
 *
 * @module github/raw
 */

import type { FetchLike } from "../gerrit/rest-client.ts";
import { loggers } from "../observability/index.ts";

const RAW_HOST = "raw.githubusercontent.com";
const RAW_TIMEOUT_MS = 5000;

export function rawFileUrl(repository: string, branch: string, path: string): string {
	return `https://${RAW_HOST}/${repository}/refs/heads/${branch}/${path}`;
}

/**
 * Fetch a file from a branch; null on any non-2xx response
 */
export async function fetchRawFile(
	repository: string,
	branch: string,
	path: string,
	fetchImpl: FetchLike = fetch,
): Promise<string | null> {
	const url = rawFileUrl(repository, branch, path);
	const parsed = new URL(url);
	if (parsed.protocol !== "https:" || parsed.host !== RAW_HOST) {
		return null;
	}

	loggers.github.info({ url }, "Fetching file via raw URL");
	const response = await fetchImpl(url, { signal: AbortSignal.timeout(RAW_TIMEOUT_MS) });
	if (!response.ok) {
		loggers.github.debug({ url, status: response.status }, "Raw file not available");
		return null;
	}
	return response.text();
}
