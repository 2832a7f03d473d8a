/**
 * Unit tests for the Gerrit REST client and change query
 *
 * @module tests/unit/gerrit/query.test.ts
 */

import { describe, expect, it, vi } from "vitest";
import { changeQueryPath, getWithRootFallback, queryGerritResults } from "../../../src/gerrit/query.ts";
import { type FetchLike, gerritBaseUrl, GerritRestClient, parseGerritJson } from "../../../src/gerrit/rest-client.ts";

const gerrit = { host: "review.example.org", port: 29418, project: "foo/bar" };
const repo = { gerritPath: "foo/bar", githubName: "foo-bar" };
const anonymous = { basePath: "", username: "", password: "" };

function gerritBody(value: unknown): string {
	return `)]}'\n${JSON.stringify(value)}`;
}

/**
 * fetch stand-in answering by URL
 */
function fakeFetch(routes: Record<string, { status: number; body: string }>) {
	return vi.fn<FetchLike>(async (input) => {
		const url = String(input);
		const route = routes[url];
		if (!route) return new Response("not found", { status: 404 });
		return new Response(route.body, { status: route.status });
	});
}

describe("rest client", () => {
	it("builds base URLs with and without a path", () => {
		expect(gerritBaseUrl("review.example.org")).toBe("https://review.example.org/");
		expect(gerritBaseUrl("review.example.org", "/r/")).toBe("https://review.example.org/r/");
	});

	it("strips the magic prefix", () => {
		expect(parseGerritJson(")]}'\n[1,2]")).toEqual([1, 2]);
		expect(parseGerritJson('{"a":1}')).toEqual({ a: 1 });
	});

	it("sends basic auth when credentials are set", async () => {
		const fetchMock = vi.fn<FetchLike>(async () => new Response(gerritBody({ name: "bot" })));
		const client = new GerritRestClient({
			baseUrl: "https://review.example.org/",
			username: "bot",
			password: "test-secret",
			fetch: fetchMock,
		});

		await client.get("/accounts/self");

		const init = fetchMock.mock.calls[0]?.[1];
		expect(fetchMock.mock.calls[0]?.[0]).toBe("https://review.example.org/accounts/self");
		expect(init?.headers).toEqual({
			Accept: "application/json",
			Authorization: `Basic ${Buffer.from("bot:test-secret").toString("base64")}`,
		});
	});
});

describe("queryGerritResults", () => {
	const path = changeQueryPath("foo/bar", "Iabcd1234");

	it("encodes the search query", () => {
		expect(path).toBe(
			"/changes/?q=limit%3A1%20is%3Aopen%20project%3Afoo%2Fbar%20Iabcd1234&o=CURRENT_REVISION&n=1",
		);
	});

	it("maps a hit to URL, number and revision", async () => {
		const fetchMock = fakeFetch({
			[`https://review.example.org${path}`]: {
				status: 200,
				body: gerritBody([{ _number: 12345, current_revision: "abcd1234" }]),
			},
		});

		const result = await queryGerritResults({
			gerrit,
			repo,
			changeIds: ["Iabcd1234"],
			rest: { ...anonymous, fetch: fetchMock },
		});

		expect(result).toEqual({
			changeUrls: ["https://review.example.org/c/foo/bar/+/12345"],
			changeNumbers: ["12345"],
			commitShas: ["abcd1234"],
		});
	});

	it("retries under /r/ after a 404 at the root", async () => {
		const fetchMock = fakeFetch({
			[`https://review.example.org/r${path}`]: {
				status: 200,
				body: gerritBody([{ _number: 7, current_revision: "ffff" }]),
			},
		});

		const result = await queryGerritResults({
			gerrit,
			repo,
			changeIds: ["Iabcd1234"],
			rest: { ...anonymous, fetch: fetchMock },
		});

		expect(fetchMock).toHaveBeenCalledTimes(2);
		expect(result.changeNumbers).toEqual(["7"]);
	});

	it("does not fall back when a base path is configured", async () => {
		const fetchMock = fakeFetch({});

		await expect(
			getWithRootFallback("review.example.org", "/dashboard/self", { ...anonymous, basePath: "gerrit", fetch: fetchMock }),
		).rejects.toThrow("Gerrit API returned HTTP 404");
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(fetchMock.mock.calls[0]?.[0]).toBe("https://review.example.org/gerrit/dashboard/self");
	});

	it("omits ids that fail, are invalid or have no hits", async () => {
		const okPath = changeQueryPath("foo/bar", "Igood");
		const emptyPath = changeQueryPath("foo/bar", "Iempty");
		const fetchMock = fakeFetch({
			[`https://review.example.org${okPath}`]: { status: 200, body: gerritBody([{ _number: 1 }]) },
			[`https://review.example.org${emptyPath}`]: { status: 200, body: gerritBody([]) },
			[`https://review.example.org${changeQueryPath("foo/bar", "Ibroken")}`]: { status: 500, body: "oops" },
		});

		const result = await queryGerritResults({
			gerrit,
			repo,
			changeIds: ["", "bad id!", "Ibroken", "Iempty", "Igood"],
			rest: { ...anonymous, fetch: fetchMock },
		});

		expect(result).toEqual({
			changeUrls: ["https://review.example.org/c/foo/bar/+/1"],
			changeNumbers: ["1"],
			commitShas: [],
		});
	});
});
