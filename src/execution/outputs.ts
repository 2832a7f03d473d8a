/**
 * Workflow step outputs
 *
 * @module execution/outputs
 */

import { appendFile } from "node:fs/promises";
import type { SubmissionResult } from "../domain/submission/types.ts";
import { loggers } from "../observability/index.ts";

const OUTPUT_DELIMITER = "PR2GERRIT_EOF";

/**
 * Render one output in the multiline `name<<DELIM` form
 */
export function formatOutput(name: string, values: readonly string[]): string {
	return `${name}<<${OUTPUT_DELIMITER}\n${values.join("\n")}\n${OUTPUT_DELIMITER}\n`;
}

export function formatSubmissionOutputs(result: SubmissionResult): string {
	return [
		formatOutput("gerrit_change_request_url", result.changeUrls),
		formatOutput("gerrit_change_request_num", result.changeNumbers),
		formatOutput("gerrit_commit_sha", result.commitShas),
	].join("");
}

/**
 * Append the change URLs, numbers and shas to `$GITHUB_OUTPUT`.
 * Returns false when no output file is configured.
 */
export async function writeSubmissionOutputs(
	result: SubmissionResult,
	env: NodeJS.ProcessEnv = process.env,
): Promise<boolean> {
	const file = env.GITHUB_OUTPUT?.trim();
	if (!file) return false;
	await appendFile(file, formatSubmissionOutputs(result), "utf8");
	loggers.pipeline.debug({ file, changes: result.changeUrls.length }, "Wrote workflow outputs");
	return true;
}
