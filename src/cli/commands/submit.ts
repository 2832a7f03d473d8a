/**
 * @fileoverview Submit command
 *
 * Resolves configuration from CLI options, the environment and the
 * organization config file, then runs the submission pipeline for one PR
 * or, in bulk mode, for every open PR.
 *
 * @module cli/commands/submit
 */

import {
	applyOrgConfig,
	buildInputsFromEnv,
	envBool,
	loadOrgConfig,
	logEffectiveConfig,
	readGitHubContext,
	validateInputs,
	type EnvMap,
} from "../../config/index.ts";
import {
	ConfigurationError,
	EMPTY_SUBMISSION_RESULT,
	getConfigFilePath,
	type GitHubContext,
	type Inputs,
	type SubmissionResult,
} from "../../domain/index.ts";
import {
	isBulkMode,
	Orchestrator,
	runBulkSubmission,
	writeSubmissionOutputs,
	type PipelineDeps,
} from "../../execution/index.ts";
import { OctokitGitHubGateway, type GitHubGateway } from "../../github/index.ts";
import { loggers } from "../../observability/index.ts";
import { logDebug, logInfo, logSuccess, logWarn } from "../../ui/logger.ts";
import { GitHistory, retryingRunner, type CommandRunner } from "../../vcs/index.ts";
import type { ParsedArgs } from "../types.ts";

/**
 * Process-level collaborators of the command, replaceable in tests
 */
export interface SubmitEnvironment {
	env: EnvMap;
	workspace: string;
	runner?: CommandRunner;
	/** Organization config path; defaults to the standard location */
	configPath?: string;
	createGateway?: (inputs: Inputs, github: GitHubContext) => GitHubGateway;
}

function defaultGateway(env: EnvMap) {
	return (inputs: Inputs, github: GitHubContext): GitHubGateway =>
		new OctokitGitHubGateway({
			repository: github.repository,
			token: inputs.githubToken,
			baseUrl: env.GITHUB_API_URL || undefined,
		});
}

/**
 * Reviewers from local git config when running outside a workflow and
 * none were given
 */
export async function withDerivedReviewers(inputs: Inputs, github: GitHubContext, history: GitHistory): Promise<Inputs> {
	if (inputs.reviewersEmail || (github.eventName && !inputs.targetUrl)) return inputs;
	try {
		const emails = await history.enumerateReviewerEmails();
		if (emails.length === 0) return inputs;
		logInfo(`Derived reviewers: ${emails.join(",")}`);
		return { ...inputs, reviewersEmail: emails.join(",") };
	} catch (error) {
		logDebug(`Could not derive reviewers from git config: ${String(error)}`);
		return inputs;
	}
}

/**
 * Resolve configuration. CLI options beat the environment; the
 * organization config only fills what is still unset.
 */
export async function resolveConfiguration(
	args: ParsedArgs,
	environment: SubmitEnvironment,
): Promise<{ env: EnvMap; inputs: Inputs; github: GitHubContext }> {
	const explicit: EnvMap = { ...environment.env, ...args.overrides };
	const organization = buildInputsFromEnv(explicit).organization;
	const configPath = environment.configPath ?? getConfigFilePath(explicit);
	const settings = organization ? await loadOrgConfig(organization, configPath) : {};
	const env = applyOrgConfig(explicit, settings);

	return { env, inputs: buildInputsFromEnv(env), github: await readGitHubContext(env) };
}

export async function runSubmit(args: ParsedArgs, environment: SubmitEnvironment): Promise<SubmissionResult> {
	const resolved = await resolveConfiguration(args, environment);
	const { env, github } = resolved;
	const history = new GitHistory({ workspace: environment.workspace, runner: environment.runner });

	const inputs = await withDerivedReviewers(resolved.inputs, github, history);
	validateInputs(inputs);
	logEffectiveConfig(inputs, github);

	if (envBool(env.G2G_TEST_MODE)) {
		logSuccess("Validation complete. Ready to execute submission pipeline.");
		return EMPTY_SUBMISSION_RESULT;
	}

	const bulk = isBulkMode(inputs, github);
	if (!bulk && github.prNumber === null) {
		throw new ConfigurationError(
			`PR_NUMBER is empty. A pull request context is required. Current event: ${github.eventName || "<none>"}`,
		);
	}

	const createGateway = environment.createGateway ?? defaultGateway(env);
	const deps: PipelineDeps = {
		history,
		runner: environment.runner ?? retryingRunner,
		gateway: createGateway(inputs, github),
	};
	const orchestrator = new Orchestrator(deps);

	const result = bulk
		? await runBulkSubmission({ orchestrator, deps, inputs, github })
		: await orchestrator.execute(inputs, github);

	try {
		if (await writeSubmissionOutputs(result, env)) {
			loggers.cli.debug("Workflow outputs written");
		}
	} catch (error) {
		// Runs after the push: warn only
		logWarn(`Could not write workflow outputs: ${String(error)}`);
	}
	logSuccess(bulk ? "Submission pipeline complete (multi-PR)." : "Submission pipeline complete.");
	return result;
}
