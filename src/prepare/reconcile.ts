/**
 * Change-Id reconciliation
 *
 * Reshapes the PR commits on a scratch branch, either one Gerrit change
 * per commit or a single squashed change, and reports the Change-Ids the
 * resulting commits carry.
 *
 * @module prepare/reconcile
 */

import {
	dedupePreservingOrder,
	validateChangeIds,
} from "../domain/submission/change-id.ts";
import type { PreparedChange } from "../domain/submission/types.ts";
import type { PipelineDeps, PipelineRunContext } from "../execution/types.ts";
import { getRecentChangeIdsFromComments } from "../github/comments.ts";
import { loggers } from "../observability/index.ts";
import { splitSquashMessage, buildSquashCommitMessage } from "./message.ts";

const CHANGE_ID = "Change-Id";

/** Events whose PR may already have a Gerrit change */
const REUSE_EVENTS = new Set(["pull_request_target", "pull_request"]);
const REUSE_ACTIONS = new Set(["reopened", "synchronize"]);

const EMPTY_PREPARED: PreparedChange = { changeIds: [], commitShas: [] };

/**
 * Scratch branch name for a PR
 */
export function tempBranchName(prNumber: number | null, pid: number): string {
	return `pr2gerrit_tmp_${prNumber ?? "pr"}_${pid}`;
}

async function startScratchBranch(
	ctx: PipelineRunContext,
	deps: PipelineDeps,
	baseSha: string,
): Promise<string> {
	const name = tempBranchName(ctx.github.prNumber, deps.pid ?? process.pid);
	ctx.tmpBranch = name;
	await deps.history.createBranch(name, baseSha);
	return name;
}

/**
 * Cherry-pick each PR commit onto a scratch branch, oldest first, so every
 * commit gets its own Change-Id.
 */
export async function prepareSingleCommits(ctx: PipelineRunContext, deps: PipelineDeps): Promise<PreparedChange> {
	const { history } = deps;
	const branch = ctx.targetBranch;
	const baseRef = `origin/${branch}`;
	loggers.pipeline.info({ pr: ctx.github.prNumber, branch }, "Preparing single-commit submission");

	await history.fetch("origin", branch);
	const commits = await history.commitRange(baseRef, "HEAD");
	if (commits.length === 0) {
		loggers.pipeline.info("No commits to submit");
		return EMPTY_PREPARED;
	}

	const baseSha = await history.revParse(baseRef);
	const scratch = await startScratchBranch(ctx, deps, baseSha);

	const changeIds: string[] = [];
	for (const commit of commits) {
		await history.checkout(scratch);
		await history.cherryPick(commit);
		const author = await history.authorOf(commit);
		await history.commitAmend({ author, noEdit: true, signoff: true });
		const trailers = await history.lastCommitTrailers([CHANGE_ID]);
		changeIds.push(...validateChangeIds(trailers[CHANGE_ID] ?? []));
		await history.checkout(branch);
	}

	return { changeIds: dedupePreservingOrder(changeIds), commitShas: [] };
}

/**
 * Change-Id to reuse when a PR is reopened or updated: the last one
 * mentioned in its recent comments. Lookup failures mean no reuse.
 */
export async function findReusableChangeId(ctx: PipelineRunContext, deps: PipelineDeps): Promise<string | undefined> {
	const { eventName, eventAction, prNumber } = ctx.github;
	if (prNumber === null || !REUSE_EVENTS.has(eventName) || !REUSE_ACTIONS.has(eventAction)) {
		return undefined;
	}
	try {
		const mentioned = validateChangeIds(await getRecentChangeIdsFromComments(deps.gateway, prNumber));
		const reused = mentioned.at(-1);
		if (reused) {
			loggers.pipeline.info({ changeId: reused }, "Reusing Change-Id from PR comments");
		}
		return reused;
	} catch (error) {
		loggers.pipeline.warn(
			{ error: error instanceof Error ? error.message : String(error) },
			"Could not read PR comments for Change-Id reuse",
		);
		return undefined;
	}
}

/**
 * Squash the PR into one commit on a scratch branch with a synthesized
 * message, reusing a prior Change-Id when one is known.
 */
export async function prepareSquashedCommit(ctx: PipelineRunContext, deps: PipelineDeps): Promise<PreparedChange> {
	const { history } = deps;
	const branch = ctx.targetBranch;
	const baseRef = `origin/${branch}`;
	loggers.pipeline.info({ pr: ctx.github.prNumber, branch }, "Preparing squashed commit");

	await history.fetch("origin", branch);
	const baseSha = await history.revParse(baseRef);
	const headSha = await history.revParse("HEAD");

	await startScratchBranch(ctx, deps, baseSha);
	await history.mergeSquash(headSha);

	const parts = splitSquashMessage(await history.logMessages(`${baseRef}..${headSha}`));
	const reused = await findReusableChangeId(ctx, deps);
	const message = buildSquashCommitMessage(parts, reused);

	const author = await history.authorOf(headSha);
	await history.commitNew({ message, author, signoff: true });

	let trailers = await history.lastCommitTrailers([CHANGE_ID]);
	if (!trailers[CHANGE_ID]?.length) {
		loggers.pipeline.debug("No Change-Id after commit; amending to run the commit-msg hook");
		await history.commitAmend({ author, noEdit: true, signoff: true });
		trailers = await history.lastCommitTrailers([CHANGE_ID]);
	}

	return { changeIds: validateChangeIds(trailers[CHANGE_ID] ?? []), commitShas: [] };
}

/**
 * Run the configured strategy
 */
export function prepareCommits(ctx: PipelineRunContext, deps: PipelineDeps): Promise<PreparedChange> {
	return ctx.inputs.submitSingleCommits ? prepareSingleCommits(ctx, deps) : prepareSquashedCommit(ctx, deps);
}
