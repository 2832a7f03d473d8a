/**
 * @fileoverview GitHub event context
 *
 * @module config/context
 */

import { readFile } from "node:fs/promises";
import { type EventPayload, EventPayloadSchema, GitHubContextSchema } from "../domain/config/schema.ts";
import type { GitHubContext } from "../domain/config/types.ts";
import { loggers } from "../observability/index.ts";
import type { EnvMap } from "./env.ts";

/**
 * Event payload at `path`; empty when missing or unreadable
 */
export async function loadEventPayload(path: string | null): Promise<EventPayload> {
	if (!path) return {};
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (error) {
		loggers.config.debug({ path, error: String(error) }, "GitHub event file not readable");
		return {};
	}

	try {
		const result = EventPayloadSchema.safeParse(JSON.parse(text));
		if (result.success) return result.data;
		loggers.config.warn({ path }, "GitHub event payload has an unexpected shape");
	} catch (error) {
		loggers.config.warn({ path, error: String(error) }, "Failed to parse GITHUB_EVENT_PATH");
	}
	return {};
}

/**
 * PR number from a pull_request, issue or top-level `number` field
 */
export function extractPrNumber(event: EventPayload): number | null {
	return event.pull_request?.number ?? event.issue?.number ?? event.number ?? null;
}

/**
 * GitHub context from `GITHUB_*` variables and the event payload. A
 * numeric `PR_NUMBER` is used when the event carries none.
 */
export async function readGitHubContext(env: EnvMap = process.env): Promise<GitHubContext> {
	const eventPath = env.GITHUB_EVENT_PATH?.trim() || null;
	const event = await loadEventPayload(eventPath);

	let prNumber = extractPrNumber(event);
	const envPr = env.PR_NUMBER?.trim() ?? "";
	if (prNumber === null && /^\d+$/.test(envPr)) {
		prNumber = Number.parseInt(envPr, 10);
	}

	return GitHubContextSchema.parse({
		eventName: env.GITHUB_EVENT_NAME ?? "",
		eventAction: event.action ?? "",
		eventPath,
		repository: env.GITHUB_REPOSITORY ?? "",
		repositoryOwner: env.GITHUB_REPOSITORY_OWNER ?? "",
		serverUrl: env.GITHUB_SERVER_URL || "https://github.com",
		runId: env.GITHUB_RUN_ID ?? "",
		sha: env.GITHUB_SHA ?? "",
		baseRef: env.GITHUB_BASE_REF ?? "",
		headRef: env.GITHUB_HEAD_REF ?? "",
		prNumber: prNumber !== null && prNumber > 0 ? prNumber : null,
	});
}
