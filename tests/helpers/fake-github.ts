/**
 * In-memory GitHubGateway for tests
 */

import type { GitHubGateway, PullRequestInfo } from "../../src/github/types.ts";

export function makePull(overrides: Partial<PullRequestInfo> = {}): PullRequestInfo {
	const number = overrides.number ?? 7;
	return {
		number,
		title: "Add feature",
		body: "Feature description",
		state: "open",
		htmlUrl: `https://github.com/acme/widgets/pull/${number}`,
		headRef: "feature",
		headSha: "headsha",
		baseRef: "main",
		...overrides,
	};
}

export class FakeGitHub implements GitHubGateway {
	readonly repository: string;
	pulls = new Map<number, PullRequestInfo>();
	comments = new Map<number, string[]>();
	files = new Map<string, string>();
	closed: number[] = [];
	defaultBranch = "main";
	/** Operations that throw, by method name */
	failing = new Set<string>();

	constructor(repository = "acme/widgets") {
		this.repository = repository;
	}

	private guard(method: string): void {
		if (this.failing.has(method)) {
			throw new Error(`${method} unavailable`);
		}
	}

	async getPull(number: number): Promise<PullRequestInfo> {
		this.guard("getPull");
		const pull = this.pulls.get(number);
		if (!pull) throw new Error(`PR ${number} not found`);
		return pull;
	}

	async listOpenPulls(): Promise<PullRequestInfo[]> {
		this.guard("listOpenPulls");
		return [...this.pulls.values()].filter((pull) => pull.state === "open");
	}

	async listCommentBodies(number: number): Promise<string[]> {
		this.guard("listCommentBodies");
		return [...(this.comments.get(number) ?? [])];
	}

	async createComment(number: number, body: string): Promise<void> {
		this.guard("createComment");
		const list = this.comments.get(number) ?? [];
		list.push(body);
		this.comments.set(number, list);
	}

	async closePull(number: number): Promise<void> {
		this.guard("closePull");
		this.closed.push(number);
	}

	async getFileContent(path: string, ref?: string): Promise<string | null> {
		this.guard("getFileContent");
		return this.files.get(`${ref ?? this.defaultBranch}:${path}`) ?? null;
	}

	async getDefaultBranch(): Promise<string> {
		this.guard("getDefaultBranch");
		return this.defaultBranch;
	}
}
