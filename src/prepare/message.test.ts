/**
 * @fileoverview Unit Tests for commit message synthesis
 *
 * @module prepare/message.test
 */

import { describe, expect, test } from "vitest";
import { composePrTitleMessage, composeSquashMessage, splitSquashMessage } from "./message.ts";

const TWO_COMMITS = [
	"Add foo",
	"",
	"Details here",
	"Signed-off-by: B <b@example.org>",
	"Change-Id: I111",
	"",
	"Fix bar",
	"Signed-off-by: A <a@example.org>",
	"Signed-off-by: B <b@example.org>",
	"",
].join("\n");

describe("splitSquashMessage", () => {
	test("separates body, Change-Ids and sorted unique sign-offs", () => {
		expect(splitSquashMessage(TWO_COMMITS)).toEqual({
			bodyLines: ["Add foo", "Details here", "Fix bar"],
			changeIds: ["I111"],
			signedOff: ["Signed-off-by: A <a@example.org>", "Signed-off-by: B <b@example.org>"],
		});
	});

	test("drops dependency metadata sections", () => {
		const message = [
			"Bump lodash from 1.0.0 to 2.0.0",
			"Bumps lodash.",
			"---",
			"updated-dependencies:",
			"- dependency-name: lodash",
			"  dependency-type: direct:production",
			"  update-type: version-update:semver-major",
			"...",
			"Signed-off-by: bot <bot@example.org>",
		].join("\n");

		expect(splitSquashMessage(message)).toEqual({
			bodyLines: ["Bump lodash from 1.0.0 to 2.0.0", "Bumps lodash.", "..."],
			changeIds: [],
			signedOff: ["Signed-off-by: bot <bot@example.org>"],
		});
	});

	test("treats a fenced line as a section opener", () => {
		expect(splitSquashMessage("Title\n```\n  indented code\nAfter fence").bodyLines).toEqual([
			"Title",
			"After fence",
		]);
	});
});

describe("composeSquashMessage", () => {
	test("drops prior Change-Ids without a reused one", () => {
		expect(composeSquashMessage(TWO_COMMITS)).toBe(
			"Add foo\nDetails here\nFix bar\n\nSigned-off-by: A <a@example.org>\nSigned-off-by: B <b@example.org>",
		);
	});

	test("appends the reused Change-Id last", () => {
		expect(composeSquashMessage("Only title\n", "Iabc")).toBe("Only title\n\nChange-Id: Iabc");
	});
});

describe("composePrTitleMessage", () => {
	test("keeps sign-offs and Change-Id of the current message", () => {
		expect(
			composePrTitleMessage(
				"  Title ",
				"Body text\n",
				"Old\n\nSigned-off-by: A <a@example.org>\nChange-Id: I1\n",
			),
		).toEqual({
			message: "Title\n\nBody text\n\nSigned-off-by: A <a@example.org>\nChange-Id: I1",
			signoff: false,
		});
	});

	test("asks for a sign-off when the current message has none", () => {
		expect(composePrTitleMessage("Title", "", "Old\n")).toEqual({ message: "Title", signoff: true });
	});

	test("keeps the current message when title and body are empty", () => {
		expect(composePrTitleMessage(" ", "", "Old message\n")).toEqual({ message: "Old message", signoff: true });
	});
});
