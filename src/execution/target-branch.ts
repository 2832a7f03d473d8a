/**
 * Target branch and reviewer resolution
 *
 * @module execution/target-branch
 */

import type { GitHubContext, Inputs } from "../domain/config/types.ts";
import { loggers } from "../observability/index.ts";
import type { GitHistory } from "../vcs/services/history-service.ts";

/**
 * Gerrit branch to push to.
 *
 * Order: explicit input, PR base ref, origin/HEAD, then master or main
 * when the remote has them, else "master".
 */
export async function resolveTargetBranch(
	inputs: Inputs,
	github: GitHubContext,
	history: GitHistory,
): Promise<string> {
	if (inputs.gerritBranch) return inputs.gerritBranch;
	if (github.baseRef.trim()) return github.baseRef.trim();

	const originHead = await history.abbrevRef("origin/HEAD");
	if (originHead) {
		const slash = originHead.indexOf("/");
		const branch = slash >= 0 ? originHead.slice(slash + 1) : originHead;
		if (branch) return branch;
	}

	if (await history.refExists("refs/remotes/origin/master")) return "master";
	if (await history.refExists("refs/remotes/origin/main")) return "main";

	loggers.pipeline.debug("No target branch hint found; defaulting to master");
	return "master";
}

/**
 * Reviewer emails: the input list, else the Gerrit SSH user's email
 */
export function resolveReviewers(inputs: Inputs): string[] {
	const source = inputs.reviewersEmail.trim() || inputs.gerritSshUserEmail.trim();
	return source
		.split(",")
		.map((email) => email.trim())
		.filter((email) => email.length > 0);
}
