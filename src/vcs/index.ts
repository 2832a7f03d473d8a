/**
 * VCS Layer
 *
 * Process execution and git history operations.
 *
 * Architecture:
 * - `backends/` - command execution, git invocation and trailer parsing
 * - `services/` - history inspection and mutation used by the pipeline
 * - `types.ts` - result, error and command types
 *
 * @module vcs
 */

// ============================================================================
// Type Exports
// ============================================================================

export type {
	CommandOptions,
	CommandResult,
	CommandRunner,
	VcsError,
	VcsErrorCode,
	VcsResult,
} from "./types.ts";

export { createVcsError, err, ok } from "./types.ts";

// ============================================================================
// Backends
// ============================================================================

export {
	CommandFailure,
	isTransientGitError,
	maskText,
	retryingRunner,
	runCommand,
	runCommandWithRetries,
} from "./backends/command-runner.ts";

export { DEFAULT_GIT_ENV, GitCli, GitOperationFailure, parseTrailers } from "./backends/git-cli.ts";

// ============================================================================
// Services
// ============================================================================

export { GitHistory } from "./services/history-service.ts";
