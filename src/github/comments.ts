/**
 * PR comment helpers: Change-Id recovery and the messages the pipeline posts
 *
 * @module github/comments
 */

import { findChangeIdMentions } from "../domain/submission/change-id.ts";
import { loggers } from "../observability/index.ts";
import type { GitHubGateway } from "./types.ts";

export const MAX_SCANNED_COMMENTS = 50;

export const CLOSE_COMMENT = "Auto-closing pull request";

/**
 * Change-Ids mentioned in the most recent comments, oldest to newest.
 * Duplicates are kept.
 */
export async function getRecentChangeIdsFromComments(
	gateway: GitHubGateway,
	prNumber: number,
	maxComments = MAX_SCANNED_COMMENTS,
): Promise<string[]> {
	const bodies = await gateway.listCommentBodies(prNumber);
	const recent = maxComments > 0 ? bodies.slice(-maxComments) : bodies;
	return recent.flatMap((body) => findChangeIdMentions(body));
}

/**
 * Comment that links a PR to its Gerrit change(s)
 */
export function formatSubmittedComment(options: {
	prNumber: number;
	organization: string;
	gerritHost: string;
	changeUrls: readonly string[];
}): string {
	let text = `The pull-request PR-${options.prNumber} is submitted to Gerrit [${options.organization}](https://${options.gerritHost})!\n\n`;
	if (options.changeUrls.length > 0) {
		text += `To follow up on the change visit:\n\n${options.changeUrls.join("\n")}`;
	}
	return text;
}

/**
 * Close a PR after posting the closing comment
 */
export async function closePullWithComment(gateway: GitHubGateway, prNumber: number): Promise<void> {
	try {
		await gateway.createComment(prNumber, CLOSE_COMMENT);
	} catch (error) {
		loggers.github.warn({ prNumber, error: String(error) }, "Failed to add close comment");
	}
	await gateway.closePull(prNumber);
}
