/**
 * @fileoverview Domain Config Types
 *
 * Plain TypeScript shapes for validated run inputs and the GitHub event
 * context. Schemas live in schema.ts and are checked against these with
 * `satisfies`.
 *
 * @module domain/config/types
 */

/**
 * Validated inputs for one submission run
 */
export interface Inputs {
	/** Submit each PR commit as its own Gerrit change */
	submitSingleCommits: boolean;
	/** Replace the commit message with the PR title and body */
	usePrAsCommit: boolean;
	/** Clone depth used by the surrounding workflow */
	fetchDepth: number;
	/** known_hosts entries for the Gerrit SSH endpoint */
	gerritKnownHosts: string;
	/** SSH private key content */
	gerritSshPrivkey: string;
	/** Gerrit SSH user */
	gerritSshUser: string;
	/** Email of the Gerrit SSH user */
	gerritSshUserEmail: string;
	/** GitHub organization */
	organization: string;
	/** Comma-separated reviewer emails */
	reviewersEmail: string;
	/** Keep the GitHub PR open after submission */
	preserveGithubPrs: boolean;
	/** Validate only, never write */
	dryRun: boolean;
	/** Skip network probes during a dry run */
	dryRunDisableNetwork: boolean;
	gerritServer: string;
	gerritServerPort: string;
	gerritProject: string;
	/** Explicit target branch override */
	gerritBranch: string;
	/** REST base path below the host, e.g. "r" */
	gerritHttpBasePath: string;
	gerritHttpUser: string;
	gerritHttpPassword: string;
	/** Prefix of the Gerrit topic name */
	topicPrefix: string;
	githubToken: string;
	/** Process every open PR of the repository */
	syncAllOpenPrs: boolean;
	/** Set when invoked with a GitHub URL instead of a workflow event */
	targetUrl: string;
}

/**
 * GitHub event context of the invocation
 */
export interface GitHubContext {
	eventName: string;
	eventAction: string;
	eventPath: string | null;
	/** owner/repo */
	repository: string;
	repositoryOwner: string;
	serverUrl: string;
	runId: string;
	sha: string;
	baseRef: string;
	headRef: string;
	prNumber: number | null;
}

/**
 * Organization config file: env-style keys per section
 */
export interface OrgConfigFile {
	default: Record<string, string>;
	organizations: Record<string, Record<string, string>>;
}
