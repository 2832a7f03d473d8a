/**
 * @fileoverview Input validation and effective config logging
 *
 * @module config/validate
 */

import type { GitHubContext, Inputs } from "../domain/config/types.ts";
import { ConfigurationError } from "../domain/errors.ts";
import { loggers } from "../observability/index.ts";
import { maskSecret } from "../ui/logger.ts";

const REQUIRED_SSH_INPUTS = [
	["gerritKnownHosts", "GERRIT_KNOWN_HOSTS"],
	["gerritSshPrivkey", "GERRIT_SSH_PRIVKEY_G2G"],
	["gerritSshUser", "GERRIT_SSH_USER_G2G"],
	["gerritSshUserEmail", "GERRIT_SSH_USER_G2G_EMAIL"],
] as const satisfies ReadonlyArray<readonly [keyof Inputs, string]>;

/**
 * Reject conflicting strategies and missing SSH credentials.
 * SSH inputs are optional for a dry run.
 */
export function validateInputs(inputs: Inputs): void {
	if (inputs.usePrAsCommit && inputs.submitSingleCommits) {
		throw new ConfigurationError("USE_PR_AS_COMMIT and SUBMIT_SINGLE_COMMITS cannot be enabled at the same time");
	}

	if (inputs.dryRun) return;

	for (const [field, variable] of REQUIRED_SSH_INPUTS) {
		if (!inputs[field].trim()) {
			throw new ConfigurationError(`Missing required input: ${variable}`, { context: { field } });
		}
	}
}

/**
 * Sanitized view of the inputs; secrets are masked
 */
export function effectiveConfig(inputs: Inputs): Record<string, string | number | boolean> {
	return {
		SUBMIT_SINGLE_COMMITS: inputs.submitSingleCommits,
		USE_PR_AS_COMMIT: inputs.usePrAsCommit,
		FETCH_DEPTH: inputs.fetchDepth,
		GERRIT_KNOWN_HOSTS: inputs.gerritKnownHosts ? "<provided>" : "<missing>",
		GERRIT_SSH_PRIVKEY_G2G: maskSecret(inputs.gerritSshPrivkey),
		GERRIT_SSH_USER_G2G: inputs.gerritSshUser,
		GERRIT_SSH_USER_G2G_EMAIL: inputs.gerritSshUserEmail,
		ORGANIZATION: inputs.organization,
		REVIEWERS_EMAIL: inputs.reviewersEmail,
		PRESERVE_GITHUB_PRS: inputs.preserveGithubPrs,
		DRY_RUN: inputs.dryRun,
		GERRIT_SERVER: inputs.gerritServer,
		GERRIT_SERVER_PORT: inputs.gerritServerPort,
		GERRIT_PROJECT: inputs.gerritProject,
		GERRIT_BRANCH: inputs.gerritBranch,
		GERRIT_HTTP_USER: inputs.gerritHttpUser,
		GERRIT_HTTP_PASSWORD: maskSecret(inputs.gerritHttpPassword),
		GITHUB_TOKEN: inputs.githubToken ? "<provided>" : "<missing>",
		SYNC_ALL_OPEN_PRS: inputs.syncAllOpenPrs,
	};
}

export function logEffectiveConfig(inputs: Inputs, github: GitHubContext): void {
	loggers.config.info({ config: effectiveConfig(inputs) }, "Effective configuration (sanitized)");
	loggers.config.info(
		{
			eventName: github.eventName,
			eventAction: github.eventAction,
			repository: github.repository,
			repositoryOwner: github.repositoryOwner,
			prNumber: github.prNumber,
			baseRef: github.baseRef,
			headRef: github.headRef,
			sha: github.sha,
		},
		"GitHub context",
	);
}
