/**
 * @fileoverview Inputs from environment variables
 *
 * Every input has an environment variable; CLI options are folded into the
 * same variable map before parsing so that one code path builds `Inputs`.
 *
 * @module config/env
 */

import { type InputsInput, parseInputs } from "../domain/config/schema.ts";
import type { Inputs } from "../domain/config/types.ts";

export type EnvMap = Record<string, string | undefined>;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/**
 * Boolean environment value: 1/true/yes/on, case-insensitive
 */
export function envBool(value: string | undefined, fallback = false): boolean {
	if (value === undefined || value.trim() === "") return fallback;
	return TRUE_VALUES.has(value.trim().toLowerCase());
}

function envInt(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	return Number(value.trim());
}

/**
 * Raw, unvalidated inputs read from an environment map
 */
export function inputsFromEnv(env: EnvMap): InputsInput {
	return {
		submitSingleCommits: envBool(env.SUBMIT_SINGLE_COMMITS),
		usePrAsCommit: envBool(env.USE_PR_AS_COMMIT),
		fetchDepth: envInt(env.FETCH_DEPTH),
		gerritKnownHosts: env.GERRIT_KNOWN_HOSTS,
		gerritSshPrivkey: env.GERRIT_SSH_PRIVKEY_G2G,
		gerritSshUser: env.GERRIT_SSH_USER_G2G,
		gerritSshUserEmail: env.GERRIT_SSH_USER_G2G_EMAIL,
		organization: env.ORGANIZATION || env.GITHUB_REPOSITORY_OWNER,
		reviewersEmail: env.REVIEWERS_EMAIL,
		preserveGithubPrs: envBool(env.PRESERVE_GITHUB_PRS),
		dryRun: envBool(env.DRY_RUN),
		dryRunDisableNetwork: envBool(env.G2G_DRYRUN_DISABLE_NETWORK),
		gerritServer: env.GERRIT_SERVER,
		gerritServerPort: env.GERRIT_SERVER_PORT,
		gerritProject: env.GERRIT_PROJECT,
		gerritBranch: env.GERRIT_BRANCH,
		gerritHttpBasePath: env.GERRIT_HTTP_BASE_PATH,
		gerritHttpUser: env.GERRIT_HTTP_USER,
		gerritHttpPassword: env.GERRIT_HTTP_PASSWORD,
		topicPrefix: env.G2G_TOPIC_PREFIX,
		githubToken: env.GITHUB_TOKEN || env.GH_TOKEN,
		syncAllOpenPrs: envBool(env.SYNC_ALL_OPEN_PRS),
		targetUrl: env.G2G_TARGET_URL,
	};
}

/**
 * Validated inputs from an environment map. Throws a ZodError on bad values.
 */
export function buildInputsFromEnv(env: EnvMap = process.env): Inputs {
	return parseInputs(inputsFromEnv(env));
}
