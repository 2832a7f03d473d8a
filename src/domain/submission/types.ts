/**
 * Value records produced and consumed by one submission run.
 *
 * @module domain/submission/types
 */

/**
 * Gerrit connection details, immutable once resolved
 */
export interface GerritInfo {
	readonly host: string;
	readonly port: number;
	readonly project: string;
}

/**
 * Repository naming on both sides of the bridge
 */
export interface RepoNames {
	/** Gerrit project path, e.g. "releng/builder" */
	readonly gerritPath: string;
	/** GitHub repository name without owner, e.g. "releng-builder" */
	readonly githubName: string;
}

/**
 * Result of reshaping the PR commits, in submission order
 */
export interface PreparedChange {
	readonly changeIds: readonly string[];
	readonly commitShas: readonly string[];
}

/**
 * Confirmed Gerrit changes as order-aligned parallel sequences
 */
export interface SubmissionResult {
	readonly changeUrls: readonly string[];
	readonly changeNumbers: readonly string[];
	readonly commitShas: readonly string[];
}

/**
 * Commit trailer key to its values in source order
 */
export type TrailerMap = Record<string, string[]>;

/** Default Gerrit SSH port */
export const DEFAULT_GERRIT_SSH_PORT = 29418;

export const EMPTY_SUBMISSION_RESULT: SubmissionResult = Object.freeze({
	changeUrls: [],
	changeNumbers: [],
	commitShas: [],
});
