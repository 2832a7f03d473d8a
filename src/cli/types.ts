/**
 * @fileoverview CLI Types
 *
 * @module cli/types
 */

import type { EnvMap } from "../config/env.ts";

/**
 * CLI version
 */
export const CLI_VERSION = "0.3.0";

/**
 * Process exit codes
 */
export const EXIT_CODES = {
	SUCCESS: 0,
	/** Runtime failure of the pipeline */
	FAILURE: 1,
	/** Invalid usage or configuration */
	USAGE: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Repository and PR named by a GitHub URL
 */
export interface GitHubTarget {
	owner: string;
	repo: string;
	/** Null for a repository URL */
	prNumber: number | null;
}

/**
 * Parsed command line
 */
export interface ParsedArgs {
	/** GitHub repository or PR URL given as the positional argument */
	targetUrl?: string;
	/** Environment variables set by CLI options; these win over the environment */
	overrides: EnvMap;
	verbose: boolean;
}
