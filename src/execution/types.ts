/**
 * Submission Pipeline Types
 *
 * @module execution/types
 */

import type { GitHubContext, Inputs } from "../domain/config/types.ts";
import type { GerritInfo, RepoNames } from "../domain/submission/types.ts";
import type { FetchLike } from "../gerrit/rest-client.ts";
import type { GitHubGateway } from "../github/types.ts";
import type { CommandRunner } from "../vcs/types.ts";
import type { GitHistory } from "../vcs/services/history-service.ts";
import type { NetworkProbes } from "./preflight.ts";

// ============================================================================
// State Machine
// ============================================================================

/**
 * Pipeline states, in the order a live run visits them
 */
export type PipelineState =
	| "Init"
	| "ContextGuard"
	| "ResolveGerrit"
	| "DryRunPreflight"
	| "SetupSsh"
	| "ConfigureGit"
	| "PrepareCommits"
	| "ApplyTitleOverride"
	| "Push"
	| "QueryResults"
	| "BackrefComment"
	| "PrCommentAndClose"
	| "Done"
	| "Failed";

/**
 * Mutable record of one pipeline run, threaded through every step
 */
export interface PipelineRunContext {
	readonly inputs: Inputs;
	readonly github: GitHubContext;
	readonly workspace: string;
	/** Gerrit branch the change targets */
	targetBranch: string;
	/** Scratch branch created while preparing commits */
	tmpBranch?: string;
	/** Private key staged for this run */
	sshKeyPath?: string;
	gerrit?: GerritInfo;
	repoNames?: RepoNames;
	state: PipelineState;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * External collaborators of a run. Tests replace each with an in-process fake.
 */
export interface PipelineDeps {
	history: GitHistory;
	/** Runs non-git commands: git review, ssh */
	runner: CommandRunner;
	gateway: GitHubGateway;
	fetch?: FetchLike;
	/** Process id used in scratch branch names */
	pid?: number;
	/** Home directory for SSH staging */
	homeDir?: string;
	/** DNS and TCP checks of the dry-run preflight */
	probes?: NetworkProbes;
}

// ============================================================================
// Step Outcomes
// ============================================================================

/**
 * Result of a best-effort step. Failures are reported, never thrown.
 */
export type StepOutcome = { ok: true } | { ok: false; step: string; message: string };

export const STEP_OK: StepOutcome = { ok: true };

export function advisory(step: string, error: unknown): StepOutcome {
	return { ok: false, step, message: error instanceof Error ? error.message : String(error) };
}
