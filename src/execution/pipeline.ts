/**
 * Submission Orchestrator
 *
 * Drives one PR through the submission state machine:
 * ContextGuard → ResolveGerrit → (DryRunPreflight | SetupSsh → ConfigureGit
 * → PrepareCommits → ApplyTitleOverride → Push → QueryResults
 * → BackrefComment → PrCommentAndClose) → Done
 *
 * Steps before the push are fatal on failure. Once the push succeeded the
 * remaining steps only report advisories.
 *
 * @module execution/pipeline
 */

import type { GitHubContext, Inputs } from "../domain/config/types.ts";
import { OrchestratorError, toError } from "../domain/errors.ts";
import {
	EMPTY_SUBMISSION_RESULT,
	type PreparedChange,
	type SubmissionResult,
} from "../domain/submission/types.ts";
import { bus, type SubmissionEventContext } from "../events/index.ts";
import { deriveRepoNames, queryGerritResults, resolveGerritInfo, resolveGitreview } from "../gerrit/index.ts";
import { loggers } from "../observability/index.ts";
import { applyPrTitleBody, prepareCommits } from "../prepare/index.ts";
import { formatDuration, logInfo, logStep, logSuccess, logWarn } from "../ui/logger.ts";
import { addBackrefComments, closePullRequestIfRequired, commentOnPullRequest } from "./backref.ts";
import { configureGit } from "./git-setup.ts";
import { dryRunPreflight } from "./preflight.ts";
import { cleanupScratchBranch, pushToGerrit } from "./push.ts";
import { setupSsh } from "./ssh.ts";
import { resolveReviewers, resolveTargetBranch } from "./target-branch.ts";
import {
	advisory,
	type PipelineDeps,
	type PipelineRunContext,
	type PipelineState,
	type StepOutcome,
} from "./types.ts";

function eventContext(github: GitHubContext): SubmissionEventContext {
	return {
		prNumber: github.prNumber ?? undefined,
		repository: github.repository || undefined,
	};
}

export class Orchestrator {
	private readonly deps: PipelineDeps;

	constructor(deps: PipelineDeps) {
		this.deps = deps;
	}

	/**
	 * Run the pipeline for one PR. Fatal errors are rethrown after the
	 * scratch branch is cleaned up.
	 */
	async execute(inputs: Inputs, github: GitHubContext): Promise<SubmissionResult> {
		const startTime = Date.now();
		const ctx: PipelineRunContext = {
			inputs,
			github,
			workspace: this.deps.history.workspace,
			targetBranch: "",
			state: "Init",
		};

		bus.emit("pipeline:start", { dryRun: inputs.dryRun, ...eventContext(github) });

		try {
			this.transition(ctx, "ContextGuard");
			if (github.prNumber === null) {
				throw new OrchestratorError("missing PR context", { context: { eventName: github.eventName } });
			}

			this.transition(ctx, "ResolveGerrit");
			await this.resolveGerrit(ctx);

			if (inputs.dryRun) {
				this.transition(ctx, "DryRunPreflight");
				await dryRunPreflight(ctx, this.deps);
				logSuccess(`Dry run complete for PR #${github.prNumber}; nothing was pushed`);
				return this.finish(ctx, EMPTY_SUBMISSION_RESULT, startTime);
			}

			const prepared = await this.prepareAndPush(ctx);
			const result = await this.reportBack(ctx, prepared);
			return this.finish(ctx, result, startTime);
		} catch (error) {
			const failedIn = ctx.state;
			this.transition(ctx, "Failed");
			bus.emit("pipeline:error", { state: failedIn, error: toError(error), ...eventContext(github) });
			await cleanupScratchBranch(ctx, this.deps);
			throw error;
		}
	}

	// ============================================================================
	// Steps
	// ============================================================================

	private async resolveGerrit(ctx: PipelineRunContext): Promise<void> {
		const { inputs, github } = ctx;
		const gitreview = await resolveGitreview({
			workspace: ctx.workspace,
			github,
			inputs,
			gateway: this.deps.gateway,
			fetch: this.deps.fetch,
		});
		const repoNames = deriveRepoNames(gitreview, github);
		ctx.repoNames = repoNames;
		ctx.gerrit = resolveGerritInfo(gitreview, inputs, repoNames);
		ctx.targetBranch = await resolveTargetBranch(inputs, github, this.deps.history);

		loggers.pipeline.info(
			{ gerrit: ctx.gerrit, project: repoNames.gerritPath, branch: ctx.targetBranch },
			"Resolved Gerrit target",
		);
	}

	private async prepareAndPush(ctx: PipelineRunContext): Promise<PreparedChange> {
		const { deps } = this;
		const { gerrit } = ctx;
		if (!gerrit) throw new OrchestratorError("Gerrit connection not resolved");

		this.transition(ctx, "SetupSsh");
		ctx.sshKeyPath = (await setupSsh(ctx.inputs, deps.homeDir)) ?? undefined;

		this.transition(ctx, "ConfigureGit");
		await configureGit({
			gerrit,
			inputs: ctx.inputs,
			history: deps.history,
			runner: deps.runner,
			sshKeyPath: ctx.sshKeyPath,
		});

		this.transition(ctx, "PrepareCommits");
		const prepared = await prepareCommits(ctx, deps);

		this.transition(ctx, "ApplyTitleOverride");
		await applyPrTitleBody(ctx, deps);

		this.transition(ctx, "Push");
		await pushToGerrit(ctx, deps, resolveReviewers(ctx.inputs));
		logSuccess(`Pushed PR #${ctx.github.prNumber} to ${gerrit.host} (${ctx.targetBranch})`);

		return prepared;
	}

	/**
	 * Everything after the push. Never throws.
	 */
	private async reportBack(ctx: PipelineRunContext, prepared: PreparedChange): Promise<SubmissionResult> {
		const { deps } = this;
		const { gerrit, repoNames, inputs } = ctx;
		if (!gerrit || !repoNames) {
			this.report(ctx, advisory("query", "Gerrit connection not resolved"));
			return EMPTY_SUBMISSION_RESULT;
		}

		this.transition(ctx, "QueryResults");
		let result: SubmissionResult = EMPTY_SUBMISSION_RESULT;
		try {
			result = await queryGerritResults({
				gerrit,
				repo: repoNames,
				changeIds: prepared.changeIds,
				rest: {
					basePath: inputs.gerritHttpBasePath,
					username: inputs.gerritHttpUser || inputs.gerritSshUser,
					password: inputs.gerritHttpPassword,
					fetch: deps.fetch,
				},
			});
		} catch (error) {
			this.report(ctx, advisory("query", error));
		}

		this.transition(ctx, "BackrefComment");
		this.report(ctx, await addBackrefComments(ctx, deps, result.commitShas));

		this.transition(ctx, "PrCommentAndClose");
		this.report(ctx, await commentOnPullRequest(ctx, deps, result));
		this.report(ctx, await closePullRequestIfRequired(ctx, deps));

		return result;
	}

	// ============================================================================
	// Bookkeeping
	// ============================================================================

	private transition(ctx: PipelineRunContext, state: PipelineState): void {
		loggers.pipeline.debug({ from: ctx.state, to: state, prNumber: ctx.github.prNumber }, "State transition");
		ctx.state = state;
		logStep(state, ctx.github.prNumber);
		bus.emit("pipeline:state", { state, ...eventContext(ctx.github) });
	}

	private report(ctx: PipelineRunContext, outcome: StepOutcome): void {
		if (outcome.ok) return;
		logWarn(`${outcome.step}: ${outcome.message}`);
		bus.emit("pipeline:advisory", { step: outcome.step, message: outcome.message, ...eventContext(ctx.github) });
	}

	private finish(ctx: PipelineRunContext, result: SubmissionResult, startTime: number): SubmissionResult {
		this.transition(ctx, "Done");
		const duration = Date.now() - startTime;
		for (const url of result.changeUrls) {
			logInfo(`Gerrit change: ${url}`);
		}
		loggers.pipeline.info({ changes: result.changeUrls.length, duration }, "Submission pipeline complete");
		logInfo(`Finished in ${formatDuration(duration)}`);
		bus.emit("pipeline:complete", {
			changeUrls: [...result.changeUrls],
			duration,
			...eventContext(ctx.github),
		});
		return result;
	}
}
