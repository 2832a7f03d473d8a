/**
 * Unit tests for the submit command
 *
 * @module tests/unit/cli/submit.test.ts
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveConfiguration, runSubmit, withDerivedReviewers } from "../../../src/cli/commands/submit.ts";
import type { EnvMap } from "../../../src/config/env.ts";
import { ConfigurationError } from "../../../src/domain/errors.ts";
import { EMPTY_SUBMISSION_RESULT } from "../../../src/domain/submission/types.ts";
import { bus } from "../../../src/events/bus.ts";
import { GitHistory } from "../../../src/vcs/services/history-service.ts";
import { makeGitHubContext, makeInputs } from "../../helpers/context.ts";
import { FakeGitHub, makePull } from "../../helpers/fake-github.ts";
import { ScriptedRunner } from "../../helpers/scripted-runner.ts";

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), "pr2gerrit-submit-"));
});

afterEach(async () => {
	bus.clear();
	await rm(dir, { recursive: true, force: true });
});

function workflowEnv(overrides: EnvMap = {}): EnvMap {
	return {
		GITHUB_EVENT_NAME: "pull_request_target",
		GITHUB_REPOSITORY: "acme/widgets",
		GITHUB_REPOSITORY_OWNER: "acme",
		GITHUB_BASE_REF: "main",
		GITHUB_HEAD_REF: "feature",
		PR_NUMBER: "7",
		GERRIT_KNOWN_HOSTS: "review.example.org ssh-ed25519 AAAAtest",
		GERRIT_SSH_PRIVKEY_G2G: "test-private-key",
		GERRIT_SSH_USER_G2G: "bot",
		GERRIT_SSH_USER_G2G_EMAIL: "bot@example.org",
		REVIEWERS_EMAIL: "reviewer@example.org",
		...overrides,
	};
}

const noArgs = { overrides: {}, verbose: false };

describe("resolveConfiguration", () => {
	it("fills unset values from the organization config and lets options win", async () => {
		const configPath = join(dir, "configuration.yaml");
		await writeFile(
			configPath,
			"organizations:\n  acme:\n    GERRIT_SERVER: review.acme.org\n    GERRIT_PROJECT: acme/widgets\n",
		);

		const { inputs, github } = await resolveConfiguration(
			{ overrides: { GERRIT_PROJECT: "override/project" }, verbose: false },
			{ env: workflowEnv(), workspace: dir, configPath },
		);

		expect(inputs.gerritServer).toBe("review.acme.org");
		expect(inputs.gerritProject).toBe("override/project");
		expect(inputs.organization).toBe("acme");
		expect(github.prNumber).toBe(7);
	});
});

describe("runSubmit", () => {
	it("stops after validation in test mode", async () => {
		const runner = new ScriptedRunner();

		const result = await runSubmit(noArgs, {
			env: workflowEnv({ G2G_TEST_MODE: "true" }),
			workspace: dir,
			runner: runner.run,
			configPath: join(dir, "missing.yaml"),
		});

		expect(result).toEqual(EMPTY_SUBMISSION_RESULT);
		expect(runner.calls).toHaveLength(0);
	});

	it("rejects missing SSH inputs", async () => {
		await expect(
			runSubmit(noArgs, {
				env: workflowEnv({ GERRIT_SSH_USER_G2G: "" }),
				workspace: dir,
				configPath: join(dir, "missing.yaml"),
			}),
		).rejects.toThrow("Missing required input: GERRIT_SSH_USER_G2G");
	});

	it("requires a PR number outside bulk mode", async () => {
		const error = await runSubmit(noArgs, {
			env: workflowEnv({ PR_NUMBER: "" }),
			workspace: dir,
			configPath: join(dir, "missing.yaml"),
		}).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(ConfigurationError);
	});

	it("runs a dry run end to end and writes outputs", async () => {
		await writeFile(join(dir, ".gitreview"), "[gerrit]\nhost=review.example.org\nproject=acme/widgets.git\n");
		const outputFile = join(dir, "github-output");
		const runner = new ScriptedRunner();
		const gateway = new FakeGitHub();
		gateway.pulls.set(7, makePull());

		const result = await runSubmit(
			{ overrides: { DRY_RUN: "true", G2G_DRYRUN_DISABLE_NETWORK: "true" }, verbose: false },
			{
				env: workflowEnv({ GITHUB_OUTPUT: outputFile }),
				workspace: dir,
				runner: runner.run,
				configPath: join(dir, "missing.yaml"),
				createGateway: () => gateway,
			},
		);

		expect(result).toEqual(EMPTY_SUBMISSION_RESULT);
		expect(runner.calls).toHaveLength(0);
		expect(await readFile(outputFile, "utf-8")).toBe(
			[
				"gerrit_change_request_url<<PR2GERRIT_EOF\n\nPR2GERRIT_EOF\n",
				"gerrit_change_request_num<<PR2GERRIT_EOF\n\nPR2GERRIT_EOF\n",
				"gerrit_commit_sha<<PR2GERRIT_EOF\n\nPR2GERRIT_EOF\n",
			].join(""),
		);
	});

	it("still succeeds when the outputs file cannot be written", async () => {
		await writeFile(join(dir, ".gitreview"), "[gerrit]\nhost=review.example.org\nproject=acme/widgets.git\n");
		const outputDir = join(dir, "outputs");
		await mkdir(outputDir);
		const gateway = new FakeGitHub();
		gateway.pulls.set(7, makePull());

		const result = await runSubmit(
			{ overrides: { DRY_RUN: "true", G2G_DRYRUN_DISABLE_NETWORK: "true" }, verbose: false },
			{
				env: workflowEnv({ GITHUB_OUTPUT: outputDir }),
				workspace: dir,
				runner: new ScriptedRunner().run,
				configPath: join(dir, "missing.yaml"),
				createGateway: () => gateway,
			},
		);

		expect(result).toEqual(EMPTY_SUBMISSION_RESULT);
	});
});

describe("withDerivedReviewers", () => {
	it("reads reviewers from git config when running locally", async () => {
		const runner = new ScriptedRunner();
		runner
			.on(["git", "config", "--get", "pr2gerrit.reviewersEmail"], { stdout: "lead@example.org, me@example.org\n" })
			.on(["git", "config", "--get", "user.email"], { stdout: "me@example.org\n" });
		const history = new GitHistory({ workspace: dir, runner: runner.run });

		const inputs = await withDerivedReviewers(
			makeInputs({ reviewersEmail: "" }),
			makeGitHubContext({ eventName: "" }),
			history,
		);

		expect(inputs.reviewersEmail).toBe("lead@example.org,me@example.org");
	});

	it("keeps workflow runs unchanged", async () => {
		const runner = new ScriptedRunner();
		const history = new GitHistory({ workspace: dir, runner: runner.run });

		const inputs = await withDerivedReviewers(makeInputs({ reviewersEmail: "" }), makeGitHubContext(), history);

		expect(inputs.reviewersEmail).toBe("");
		expect(runner.calls).toHaveLength(0);
	});
});
