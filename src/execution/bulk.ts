/**
 * Bulk mode: submit every open PR of the repository, one after another
 *
 * @module execution/bulk
 */

import type { GitHubContext, Inputs } from "../domain/config/types.ts";
import type { SubmissionResult } from "../domain/submission/types.ts";
import type { PullRequestInfo } from "../github/types.ts";
import { loggers } from "../observability/index.ts";
import { logInfo } from "../ui/logger.ts";
import type { Orchestrator } from "./pipeline.ts";
import type { PipelineDeps } from "./types.ts";

export function isBulkMode(inputs: Inputs, github: GitHubContext): boolean {
	return inputs.syncAllOpenPrs && (github.eventName === "workflow_dispatch" || Boolean(inputs.targetUrl));
}

/**
 * Context for one PR of a bulk run
 */
export function pullContext(github: GitHubContext, pull: PullRequestInfo): GitHubContext {
	return {
		...github,
		prNumber: pull.number,
		headRef: pull.headRef,
		baseRef: pull.baseRef,
		sha: pull.headSha,
	};
}

/**
 * Run the pipeline for each open PR sequentially. Live runs check out the
 * PR head first. Results are concatenated in PR order; the first fatal
 * error stops the run.
 */
export async function runBulkSubmission(options: {
	orchestrator: Orchestrator;
	deps: PipelineDeps;
	inputs: Inputs;
	github: GitHubContext;
}): Promise<SubmissionResult> {
	const { orchestrator, deps, inputs, github } = options;
	const pulls = (await deps.gateway.listOpenPulls()).filter((pull) => pull.number > 0);
	logInfo(`Bulk mode: ${pulls.length} open PR(s) in ${github.repository}`);

	const changeUrls: string[] = [];
	const changeNumbers: string[] = [];
	const commitShas: string[] = [];

	for (const pull of pulls) {
		loggers.pipeline.info({ prNumber: pull.number, head: pull.headRef }, "Processing open PR");
		if (!inputs.dryRun) {
			await deps.history.fetch("origin", `pull/${pull.number}/head`);
			await deps.history.checkout("FETCH_HEAD");
		}
		const result = await orchestrator.execute(inputs, pullContext(github, pull));
		changeUrls.push(...result.changeUrls);
		changeNumbers.push(...result.changeNumbers);
		commitShas.push(...result.commitShas);
	}

	return { changeUrls, changeNumbers, commitShas };
}
