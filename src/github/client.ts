/**
 * Octokit-backed GitHub gateway
 *
 * Every call goes through a Bottleneck limiter (one request at a time)
 * and the GitHub retry policy.
 *
 * @module github/client
 */

import { Octokit } from "@octokit/rest";
import Bottleneck from "bottleneck";
import { ConfigurationError } from "../domain/errors.ts";
import { loggers } from "../observability/index.ts";
import { errorStatus, withGitHubRetry } from "./retry.ts";
import type { GitHubGateway, PullRequestInfo } from "./types.ts";

interface PullLike {
	number: number;
	title: string;
	body?: string | null;
	state: string;
	html_url: string;
	head: { ref: string; sha: string };
	base: { ref: string };
}

function toPullRequestInfo(pull: PullLike): PullRequestInfo {
	return {
		number: pull.number,
		title: pull.title,
		body: pull.body ?? "",
		state: pull.state,
		htmlUrl: pull.html_url,
		headRef: pull.head.ref,
		headSha: pull.head.sha,
		baseRef: pull.base.ref,
	};
}

/**
 * Split "owner/repo"
 */
export function splitRepository(repository: string): { owner: string; repo: string } {
	const [owner, repo, ...rest] = repository.split("/");
	if (!owner || !repo || rest.length > 0) {
		throw new ConfigurationError(`Invalid repository: ${repository}. Expected owner/repo`);
	}
	return { owner, repo };
}

export interface OctokitGatewayOptions {
	repository: string;
	token?: string;
	/** API base URL for GitHub Enterprise */
	baseUrl?: string;
	octokit?: Octokit;
}

export class OctokitGitHubGateway implements GitHubGateway {
	readonly repository: string;
	private readonly owner: string;
	private readonly repo: string;
	private readonly octokit: Octokit;
	private readonly limiter = new Bottleneck({ maxConcurrent: 1, minTime: 100 });

	constructor(options: OctokitGatewayOptions) {
		const { owner, repo } = splitRepository(options.repository);
		this.repository = options.repository;
		this.owner = owner;
		this.repo = repo;
		this.octokit =
			options.octokit ??
			new Octokit({
				auth: options.token || undefined,
				baseUrl: options.baseUrl,
				userAgent: "pr2gerrit",
			});
	}

	private call<T>(label: string, fn: () => Promise<T>): Promise<T> {
		return withGitHubRetry(label, () => this.limiter.schedule(fn));
	}

	async getPull(number: number): Promise<PullRequestInfo> {
		const { data } = await this.call("pulls.get", () =>
			this.octokit.pulls.get({ owner: this.owner, repo: this.repo, pull_number: number }),
		);
		return toPullRequestInfo(data);
	}

	async listOpenPulls(): Promise<PullRequestInfo[]> {
		const pulls = await this.call("pulls.list", () =>
			this.octokit.paginate(this.octokit.pulls.list, {
				owner: this.owner,
				repo: this.repo,
				state: "open",
				per_page: 100,
			}),
		);
		return pulls.map(toPullRequestInfo);
	}

	async listCommentBodies(number: number): Promise<string[]> {
		const comments = await this.call("issues.listComments", () =>
			this.octokit.paginate(this.octokit.issues.listComments, {
				owner: this.owner,
				repo: this.repo,
				issue_number: number,
				per_page: 100,
			}),
		);
		return comments.map((comment) => comment.body ?? "");
	}

	async createComment(number: number, body: string): Promise<void> {
		if (!body.trim()) return;
		await this.call("issues.createComment", () =>
			this.octokit.issues.createComment({ owner: this.owner, repo: this.repo, issue_number: number, body }),
		);
	}

	async closePull(number: number): Promise<void> {
		await this.call("pulls.update", () =>
			this.octokit.pulls.update({ owner: this.owner, repo: this.repo, pull_number: number, state: "closed" }),
		);
	}

	async getFileContent(path: string, ref?: string): Promise<string | null> {
		try {
			const { data } = await this.call("repos.getContent", () =>
				this.octokit.repos.getContent({ owner: this.owner, repo: this.repo, path, ref }),
			);
			if (Array.isArray(data) || data.type !== "file" || !("content" in data)) {
				return null;
			}
			return Buffer.from(data.content, "base64").toString("utf-8");
		} catch (error) {
			if (errorStatus(error) === 404) {
				loggers.github.debug({ path, ref }, "File not found in repository");
				return null;
			}
			throw error;
		}
	}

	async getDefaultBranch(): Promise<string> {
		const { data } = await this.call("repos.get", () =>
			this.octokit.repos.get({ owner: this.owner, repo: this.repo }),
		);
		return data.default_branch;
	}
}
