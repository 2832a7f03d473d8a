/**
 * Retry policy for GitHub API calls
 *
 * @module github/retry
 */

import { loggers } from "../observability/index.ts";
import { backoffDelayWithJitter, sleep } from "../vcs/backends/command-runner.ts";

export const GITHUB_RETRY_ATTEMPTS = 5;
const GITHUB_BACKOFF_BASE_MS = 500;
const GITHUB_BACKOFF_CAP_MS = 6000;

/**
 * HTTP status carried by an Octokit RequestError, if any
 */
export function errorStatus(error: unknown): number | undefined {
	if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
		return error.status;
	}
	return undefined;
}

/**
 * Retry on 5xx and on 403/429 responses that mention the rate limit
 */
export function shouldRetryGitHub(error: unknown): boolean {
	const status = errorStatus(error);
	if (status === undefined) return false;
	if (status >= 500 && status <= 599) return true;
	if (status === 403 || status === 429) {
		const message = error instanceof Error ? error.message : "";
		return message.toLowerCase().includes("rate limit");
	}
	return false;
}

/**
 * Run a GitHub call with exponential backoff on transient failures
 */
export async function withGitHubRetry<T>(
	label: string,
	fn: () => Promise<T>,
	options: { attempts?: number; sleep?: (ms: number) => Promise<void> } = {},
): Promise<T> {
	const attempts = options.attempts ?? GITHUB_RETRY_ATTEMPTS;
	const wait = options.sleep ?? sleep;

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (error) {
			if (!shouldRetryGitHub(error) || attempt >= attempts) {
				loggers.github.debug({ label, attempt, error: String(error) }, "GitHub call failed (no retry)");
				throw error;
			}
			const delay = backoffDelayWithJitter(attempt, GITHUB_BACKOFF_BASE_MS, GITHUB_BACKOFF_CAP_MS);
			loggers.github.warn({ label, attempt, delay, error: String(error) }, "GitHub call failed; retrying");
			await wait(delay);
		}
	}
}
