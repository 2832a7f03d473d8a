/**
 * @fileoverview Unit Tests for CLI Argument Parser
 *
 * @module cli/args.test
 */

import { CommanderError } from "commander";
import { describe, expect, test } from "vitest";
import { ZodError, z } from "zod";
import { ConfigurationError, OrchestratorError } from "../domain/errors.ts";
import { parseArgs, parseGithubTarget, targetOverrides } from "./args.ts";
import { describeError, exitCodeFor } from "./errors.ts";

describe("parseGithubTarget", () => {
	test("parses pull request URLs", () => {
		expect(parseGithubTarget("https://github.com/acme/widgets/pull/12")).toEqual({
			owner: "acme",
			repo: "widgets",
			prNumber: 12,
		});
		expect(parseGithubTarget("https://www.github.com/acme/widgets/pulls/3/files")).toEqual({
			owner: "acme",
			repo: "widgets",
			prNumber: 3,
		});
	});

	test("parses repository URLs", () => {
		expect(parseGithubTarget("https://github.com/acme/widgets")).toEqual({
			owner: "acme",
			repo: "widgets",
			prNumber: null,
		});
		expect(parseGithubTarget("https://github.com/acme/widgets/pull/abc")?.prNumber).toBeNull();
	});

	test("rejects other hosts and malformed input", () => {
		expect(parseGithubTarget("https://gitlab.com/acme/widgets")).toBeNull();
		expect(parseGithubTarget("https://github.com/acme")).toBeNull();
		expect(parseGithubTarget("not a url")).toBeNull();
	});
});

describe("targetOverrides", () => {
	test("selects a single PR", () => {
		expect(targetOverrides("https://github.com/acme/widgets/pull/12")).toEqual({
			G2G_TARGET_URL: "https://github.com/acme/widgets/pull/12",
			ORGANIZATION: "acme",
			GITHUB_REPOSITORY_OWNER: "acme",
			GITHUB_REPOSITORY: "acme/widgets",
			PR_NUMBER: "12",
			SYNC_ALL_OPEN_PRS: "false",
		});
	});

	test("enables bulk mode for a repository", () => {
		expect(targetOverrides("https://github.com/acme/widgets").SYNC_ALL_OPEN_PRS).toBe("true");
	});
});

describe("parseArgs", () => {
	test("maps options onto variables", () => {
		const result = parseArgs([
			"node",
			"pr2gerrit",
			"--gerrit-ssh-user",
			"bot",
			"--fetch-depth",
			"20",
			"--dry-run",
			"--submit-single-commits",
			"-v",
		]);

		expect(result).toEqual({
			targetUrl: undefined,
			overrides: {
				GERRIT_SSH_USER_G2G: "bot",
				FETCH_DEPTH: "20",
				SUBMIT_SINGLE_COMMITS: "true",
				DRY_RUN: "true",
			},
			verbose: true,
		});
	});

	test("combines the target URL with options", () => {
		const result = parseArgs(["node", "pr2gerrit", "https://github.com/acme/widgets/pull/4", "--gerrit-branch", "stable"]);

		expect(result.targetUrl).toBe("https://github.com/acme/widgets/pull/4");
		expect(result.overrides.PR_NUMBER).toBe("4");
		expect(result.overrides.GERRIT_BRANCH).toBe("stable");
		expect(result.verbose).toBe(false);
	});

	test("throws on unknown options", () => {
		expect(() => parseArgs(["node", "pr2gerrit", "--no-such-option"])).toThrow(CommanderError);
	});
});

describe("exit codes", () => {
	test("maps configuration problems to 2", () => {
		expect(exitCodeFor(new ConfigurationError("missing GERRIT_SERVER"))).toBe(2);
		expect(exitCodeFor(new ZodError([]))).toBe(2);
		expect(exitCodeFor(new CommanderError(1, "commander.unknownOption", "bad"))).toBe(2);
		expect(exitCodeFor(new CommanderError(0, "commander.helpDisplayed", "help"))).toBe(0);
	});

	test("maps everything else to 1", () => {
		expect(exitCodeFor(new OrchestratorError("push failed"))).toBe(1);
		expect(exitCodeFor("boom")).toBe(1);
	});

	test("adds detail in verbose mode", () => {
		const error = new OrchestratorError("push failed", { context: { branch: "main" } });
		expect(describeError(error, false)).toBe("push failed");
		expect(describeError(error, true)).toBe('OrchestratorError: push failed\n  Context: {"branch":"main"}');
	});

	test("summarizes validation issues", () => {
		const result = z.object({ fetchDepth: z.number() }).safeParse({ fetchDepth: "x" });
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(describeError(result.error, false)).toBe(
				"Invalid configuration: fetchDepth: Expected number, received string",
			);
		}
	});
});
