/**
 * Builders for pipeline test contexts
 */

import { DEFAULT_INPUTS } from "../../src/domain/config/schema.ts";
import type { GitHubContext, Inputs } from "../../src/domain/config/types.ts";
import type { PipelineDeps, PipelineRunContext } from "../../src/execution/types.ts";
import { GitHistory } from "../../src/vcs/services/history-service.ts";
import { FakeGitHub } from "./fake-github.ts";
import { ScriptedRunner } from "./scripted-runner.ts";

export const WORKSPACE = "/work/widgets";
export const TEST_PID = 4242;

export function makeGitHubContext(overrides: Partial<GitHubContext> = {}): GitHubContext {
	return {
		eventName: "pull_request_target",
		eventAction: "opened",
		eventPath: null,
		repository: "acme/widgets",
		repositoryOwner: "acme",
		serverUrl: "https://github.com",
		runId: "1001",
		sha: "headsha",
		baseRef: "main",
		headRef: "feature",
		prNumber: 7,
		...overrides,
	};
}

export function makeInputs(overrides: Partial<Inputs> = {}): Inputs {
	return {
		...DEFAULT_INPUTS,
		gerritKnownHosts: "review.example.org ssh-ed25519 AAAAtest",
		gerritSshPrivkey: "test-private-key",
		gerritSshUser: "bot",
		gerritSshUserEmail: "bot@example.org",
		organization: "acme",
		...overrides,
	};
}

export function makeRunContext(
	options: { inputs?: Partial<Inputs>; github?: Partial<GitHubContext> } = {},
): PipelineRunContext {
	return {
		inputs: makeInputs(options.inputs),
		github: makeGitHubContext(options.github),
		workspace: WORKSPACE,
		targetBranch: "main",
		state: "Init",
	};
}

export function makeDeps(): { deps: PipelineDeps; runner: ScriptedRunner; gateway: FakeGitHub } {
	const runner = new ScriptedRunner();
	const gateway = new FakeGitHub();
	const deps: PipelineDeps = {
		history: new GitHistory({ workspace: WORKSPACE, runner: runner.run }),
		runner: runner.run,
		gateway,
		pid: TEST_PID,
	};
	return { deps, runner, gateway };
}
