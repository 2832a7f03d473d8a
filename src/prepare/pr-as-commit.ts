/**
 * Replace the prepared commit's message with the PR title and body
 *
 * @module prepare/pr-as-commit
 */

import type { PipelineDeps, PipelineRunContext } from "../execution/types.ts";
import { loggers } from "../observability/index.ts";
import { composePrTitleMessage } from "./message.ts";

export async function applyPrTitleBody(ctx: PipelineRunContext, deps: PipelineDeps): Promise<void> {
	const prNumber = ctx.github.prNumber;
	if (!ctx.inputs.usePrAsCommit || prNumber === null) {
		loggers.pipeline.debug("PR title override disabled");
		return;
	}

	loggers.pipeline.info({ pr: prNumber }, "Applying PR title and body to commit");
	const pull = await deps.gateway.getPull(prNumber);
	const current = await deps.history.messageBody("HEAD");
	const { message, signoff } = composePrTitleMessage(pull.title, pull.body, current);
	const author = await deps.history.authorOf("HEAD");

	await deps.history.commitAmend({ message, author, signoff });
}
