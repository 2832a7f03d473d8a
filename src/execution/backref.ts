/**
 * Cross-links between the Gerrit change and the GitHub PR.
 *
 * Every step here runs after a successful push; failures become advisory
 * outcomes and never fail the run.
 *
 * @module execution/backref
 */

import type { GitHubContext } from "../domain/config/types.ts";
import type { SubmissionResult } from "../domain/submission/types.ts";
import { closePullWithComment, formatSubmittedComment } from "../github/comments.ts";
import { loggers } from "../observability/index.ts";
import { advisory, type PipelineDeps, type PipelineRunContext, STEP_OK, type StepOutcome } from "./types.ts";

const SSH_COMMAND_TIMEOUT_MS = 60_000;

export function pullRequestUrl(github: GitHubContext): string {
	return `${github.serverUrl}/${github.repository}/pull/${github.prNumber}`;
}

export function actionRunUrl(github: GitHubContext): string {
	return github.runId ? `${github.serverUrl}/${github.repository}/actions/runs/${github.runId}` : "N/A";
}

export function backrefArgv(options: {
	user: string;
	host: string;
	port: number;
	message: string;
	branch: string;
	project: string;
	sha: string;
	/** Private key to offer; ssh defaults otherwise */
	identityFile?: string;
}): string[] {
	return [
		"ssh",
		"-n",
		...(options.identityFile ? ["-i", options.identityFile] : []),
		"-p",
		String(options.port),
		`${options.user}@${options.host}`,
		"gerrit",
		"review",
		"-m",
		options.message,
		"--branch",
		options.branch,
		"--project",
		options.project,
		options.sha,
	];
}

/**
 * Comment on each Gerrit patchset with links to the PR and the workflow run
 */
export async function addBackrefComments(
	ctx: PipelineRunContext,
	deps: PipelineDeps,
	commitShas: readonly string[],
): Promise<StepOutcome> {
	const { gerrit, repoNames } = ctx;
	if (!gerrit || !repoNames) return advisory("backref", "Gerrit connection not resolved");
	if (commitShas.length === 0) {
		loggers.pipeline.warn("No commit shas to comment on in Gerrit");
		return STEP_OK;
	}

	const message = `GHPR: ${pullRequestUrl(ctx.github)} Action-Run: ${actionRunUrl(ctx.github)}`;
	let outcome: StepOutcome = STEP_OK;
	for (const sha of commitShas) {
		if (!sha) continue;
		const argv = backrefArgv({
			user: ctx.inputs.gerritSshUser,
			host: gerrit.host,
			port: gerrit.port,
			message,
			branch: ctx.targetBranch,
			project: repoNames.gerritPath,
			sha,
			identityFile: ctx.sshKeyPath,
		});
		try {
			await deps.runner(argv, { cwd: ctx.workspace, timeout: SSH_COMMAND_TIMEOUT_MS });
		} catch (error) {
			loggers.pipeline.warn({ sha, error: String(error) }, "Failed to add back-reference comment in Gerrit");
			if (outcome.ok) outcome = advisory("backref", error);
		}
	}
	return outcome;
}

/**
 * Post the Gerrit change URLs on the PR
 */
export async function commentOnPullRequest(
	ctx: PipelineRunContext,
	deps: PipelineDeps,
	result: SubmissionResult,
): Promise<StepOutcome> {
	const prNumber = ctx.github.prNumber;
	if (prNumber === null || !ctx.gerrit) return STEP_OK;

	const body = formatSubmittedComment({
		prNumber,
		organization: ctx.inputs.organization || ctx.github.repositoryOwner,
		gerritHost: ctx.gerrit.host,
		changeUrls: result.changeUrls,
	});
	try {
		await deps.gateway.createComment(prNumber, body);
		return STEP_OK;
	} catch (error) {
		loggers.pipeline.warn({ prNumber, error: String(error) }, "Failed to add PR comment");
		return advisory("pr-comment", error);
	}
}

/**
 * Close the PR on pull_request_target events unless PRs are preserved
 */
export async function closePullRequestIfRequired(ctx: PipelineRunContext, deps: PipelineDeps): Promise<StepOutcome> {
	const prNumber = ctx.github.prNumber;
	if (ctx.inputs.preserveGithubPrs) {
		loggers.pipeline.info({ prNumber }, "Preserving GitHub PR; not closing");
		return STEP_OK;
	}
	if (ctx.github.eventName !== "pull_request_target" || prNumber === null) {
		loggers.pipeline.debug("Event is not pull_request_target; not closing PR");
		return STEP_OK;
	}

	loggers.pipeline.info({ prNumber }, "Closing PR");
	try {
		await closePullWithComment(deps.gateway, prNumber);
		return STEP_OK;
	} catch (error) {
		loggers.pipeline.warn({ prNumber, error: String(error) }, "Failed to close PR");
		return advisory("pr-close", error);
	}
}
