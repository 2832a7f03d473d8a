/**
 * GitHub gateway types
 *
 * @module github/types
 */

/**
 * Pull request fields the pipeline reads
 */
export interface PullRequestInfo {
	number: number;
	title: string;
	body: string;
	state: string;
	htmlUrl: string;
	headRef: string;
	headSha: string;
	baseRef: string;
}

/**
 * GitHub operations for one repository.
 *
 * The Octokit implementation lives in client.ts; tests use an in-process fake.
 */
export interface GitHubGateway {
	/** owner/repo */
	readonly repository: string;
	getPull(number: number): Promise<PullRequestInfo>;
	listOpenPulls(): Promise<PullRequestInfo[]>;
	/** Issue comment bodies of a PR, oldest first */
	listCommentBodies(number: number): Promise<string[]>;
	createComment(number: number, body: string): Promise<void>;
	closePull(number: number): Promise<void>;
	/** File content at a ref (default branch when omitted); null when absent */
	getFileContent(path: string, ref?: string): Promise<string | null>;
	getDefaultBranch(): Promise<string>;
}
