/**
 * @fileoverview Unit Tests for the VCS History Service
 *
 * @module vcs/services/history-service.test
 */

import { afterEach, describe, expect, test } from "vitest";
import { ScriptedRunner } from "../../../tests/helpers/scripted-runner.ts";
import { bus } from "../../events/bus.ts";
import { GitOperationFailure, parseTrailers } from "../backends/git-cli.ts";
import { GitHistory } from "./history-service.ts";

function setup() {
	const runner = new ScriptedRunner();
	const history = new GitHistory({ workspace: "/work/repo", runner: runner.run });
	return { runner, history };
}

afterEach(() => {
	bus.clear();
});

describe("parseTrailers", () => {
	test("splits on the first colon and trims", () => {
		const message = "Fix login\n\nLink: https://example.org/x\nChange-Id: I0123abcd\nSigned-off-by: Dev <dev@example.org>\n";

		expect(parseTrailers(message)).toEqual({
			Link: ["https://example.org/x"],
			"Change-Id": ["I0123abcd"],
			"Signed-off-by": ["Dev <dev@example.org>"],
		});
	});

	test("ignores lines with an empty key or value", () => {
		expect(parseTrailers(": value\nKey:\nno colon here\n")).toEqual({});
	});

	test("gives the same map on every parse", () => {
		const message = "Change-Id: Iabc\nChange-Id: Idef\nReviewed-by: A <a@example.org>";
		expect(parseTrailers(message)).toEqual(parseTrailers(message));
		expect(parseTrailers(message)).toEqual({
			"Change-Id": ["Iabc", "Idef"],
			"Reviewed-by": ["A <a@example.org>"],
		});
	});
});

describe("GitHistory", () => {
	test("commitRange lists commits oldest first", async () => {
		const { runner, history } = setup();
		runner.on(["git", "rev-list"], { stdout: "aaa\nbbb\n\n" });

		expect(await history.commitRange("origin/main", "HEAD")).toEqual(["aaa", "bbb"]);
		expect(runner.commands()).toEqual(["git rev-list --reverse origin/main..HEAD"]);
		expect(runner.calls[0]?.options.cwd).toBe("/work/repo");
	});

	test("commitNew signs off by default and sets author", async () => {
		const { runner, history } = setup();

		await history.commitNew({ message: "Squashed", author: "Dev <dev@example.org>" });

		expect(runner.calls[0]?.argv).toEqual([
			"git",
			"commit",
			"--signoff",
			"--author",
			"Dev <dev@example.org>",
			"-m",
			"Squashed",
		]);
	});

	test("commitAmend keeps the message without an explicit one", async () => {
		const { runner, history } = setup();

		await history.commitAmend({ author: "Dev <dev@example.org>" });
		await history.commitAmend({ message: "New title", signoff: false });

		expect(runner.calls.map((call) => call.argv)).toEqual([
			["git", "commit", "--amend", "--no-edit", "--signoff", "--author", "Dev <dev@example.org>"],
			["git", "commit", "--amend", "-m", "New title"],
		]);
	});

	test("trailers filters to the requested keys", async () => {
		const { runner, history } = setup();
		runner.on(["git", "show"], { stdout: "Title\n\nChange-Id: I1\nSigned-off-by: Dev <dev@example.org>\n" });

		expect(await history.trailers("abc", ["Change-Id"])).toEqual({ "Change-Id": ["I1"] });
		expect(runner.commands()).toEqual(["git show -s --format=%B abc"]);
	});

	test("lastCommitTrailers is empty when HEAD does not exist", async () => {
		const { runner, history } = setup();
		runner.on(["git", "show"], { exitCode: 128, stderr: "fatal: ambiguous argument 'HEAD'" });

		expect(await history.lastCommitTrailers(["Change-Id"])).toEqual({});
	});

	test("failures surface as GitOperationFailure with stderr", async () => {
		const { runner, history } = setup();
		runner.on(["git", "cherry-pick"], { exitCode: 1, stderr: "error: could not apply abc\n" });

		const failure = await history.cherryPick("abc").catch((error: unknown) => error);

		expect(failure).toBeInstanceOf(GitOperationFailure);
		if (failure instanceof GitOperationFailure) {
			expect(failure.message).toBe("git cherry-pick failed: error: could not apply abc");
		}
	});

	test("configGet returns null for unset keys", async () => {
		const { runner, history } = setup();
		runner.on(["git", "config", "--get"], { exitCode: 1 });

		expect(await history.configGet("gitreview.username")).toBeNull();
	});

	test("branch lifecycle emits events", async () => {
		const { runner, history } = setup();
		const created: string[] = [];
		const deleted: string[] = [];
		bus.on("git:branch:create", ({ name }) => created.push(name));
		bus.on("git:branch:delete", ({ name }) => deleted.push(name));

		await history.createBranch("tmp_1", "abc123");
		await history.deleteBranch("tmp_1", true);

		expect(runner.commands()).toEqual(["git checkout -b tmp_1 abc123", "git branch -D tmp_1"]);
		expect(created).toEqual(["tmp_1"]);
		expect(deleted).toEqual(["tmp_1"]);
	});

	test("enumerateReviewerEmails merges config sources in order", async () => {
		const { runner, history } = setup();
		runner.on(["git", "config", "--get", "pr2gerrit.reviewersEmail"], {
			stdout: "a@example.org, b@example.org\n",
		});
		runner.on(["git", "config", "--get-all", "reviewers.email"], { stdout: "b@example.org\n" });
		runner.on(["git", "config", "--global", "--get-all", "reviewers.email"], { exitCode: 1 });
		runner.on(["git", "config", "--get", "user.email"], { stdout: "c@example.org\n" });
		runner.on(["git", "config", "--global", "--get", "user.email"], { stdout: "a@example.org\n" });

		expect(await history.enumerateReviewerEmails()).toEqual(["a@example.org", "b@example.org", "c@example.org"]);
	});
});
