/**
 * Push prepared commits to Gerrit with git-review
 *
 * @module execution/push
 */

import { OrchestratorError } from "../domain/errors.ts";
import { bus } from "../events/bus.ts";
import { loggers } from "../observability/index.ts";
import { gitSshEnv } from "./ssh.ts";
import type { PipelineDeps, PipelineRunContext } from "./types.ts";

/**
 * Gerrit topic grouping the changes of one PR
 */
export function buildTopic(prefix: string, githubName: string, prNumber: number | null): string {
	const base = `${prefix.trim() || "GH"}-${githubName}`;
	return prNumber === null ? base : `${base}-${prNumber}`;
}

export function gitReviewArgv(topic: string, reviewers: readonly string[], branch: string): string[] {
	const argv = ["git", "review", "--yes", "-v", "-t", topic];
	for (const reviewer of reviewers) {
		argv.push("--reviewer", reviewer);
	}
	argv.push(branch);
	return argv;
}

/**
 * Switch back to the target branch and drop the scratch branch.
 * Failures are logged only.
 */
export async function cleanupScratchBranch(ctx: PipelineRunContext, deps: PipelineDeps): Promise<void> {
	const scratch = ctx.tmpBranch;
	if (!scratch) return;
	try {
		await deps.history.checkout(ctx.targetBranch);
		await deps.history.deleteBranch(scratch, true);
		ctx.tmpBranch = undefined;
	} catch (error) {
		loggers.pipeline.warn({ branch: scratch, error: String(error) }, "Failed to clean up scratch branch");
	}
}

export async function pushToGerrit(
	ctx: PipelineRunContext,
	deps: PipelineDeps,
	reviewers: readonly string[],
): Promise<void> {
	const { gerrit, repoNames } = ctx;
	if (!gerrit || !repoNames) {
		throw new OrchestratorError("Gerrit connection not resolved before push");
	}
	const branch = ctx.targetBranch;
	loggers.pipeline.info(
		{ host: gerrit.host, port: gerrit.port, project: repoNames.gerritPath, branch },
		"Pushing changes to Gerrit",
	);

	if (ctx.inputs.submitSingleCommits && ctx.tmpBranch) {
		await deps.history.checkout(ctx.tmpBranch);
	}

	const topic = buildTopic(ctx.inputs.topicPrefix, repoNames.githubName, ctx.github.prNumber);
	try {
		await deps.runner(gitReviewArgv(topic, reviewers, branch), {
			cwd: ctx.workspace,
			env: gitSshEnv(ctx.sshKeyPath),
		});
	} catch (error) {
		throw new OrchestratorError("Failed to push changes to Gerrit with git-review", { cause: error });
	}
	bus.emit("gerrit:push", { topic, branch });

	await cleanupScratchBranch(ctx, deps);
}
