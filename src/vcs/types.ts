/**
 * VCS Abstraction Layer Types
 *
 * Core result, error and command types for the git and process layer.
 *
 * @module vcs/types
 */

// ============================================================================
// Core Result Types
// ============================================================================

/**
 * Discriminated union for operation results
 * Provides type-safe success/failure handling
 */
export type VcsResult<T, E = VcsError> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Base error type for VCS operations
 */
export interface VcsError {
	/** Error code for programmatic handling */
	code: VcsErrorCode;
	/** Human-readable error message */
	message: string;
	/** Original error if wrapped */
	cause?: Error;
	/** Additional context for debugging */
	context?: Record<string, unknown>;
}

/**
 * Error codes for VCS operations
 */
export type VcsErrorCode =
	/** git ran and exited non-zero */
	| "COMMAND_FAILED"
	/** git could not be started or timed out */
	| "COMMAND_NOT_RUN";

// ============================================================================
// Command Types
// ============================================================================

/**
 * Options for running an external command
 */
export interface CommandOptions {
	/** Working directory */
	cwd?: string;
	/** Extra environment merged over process.env */
	env?: Record<string, string>;
	/** Timeout in milliseconds; no timeout when omitted */
	timeout?: number;
	/** Throw CommandFailure on non-zero exit (default: true) */
	check?: boolean;
	/** Secret values replaced in logged output */
	masks?: readonly string[];
	/** Data written to stdin */
	stdin?: string;
}

/**
 * Captured result of a finished command
 */
export interface CommandResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

/**
 * Runs one command. The seam every git and ssh call goes through.
 */
export type CommandRunner = (argv: readonly string[], options?: CommandOptions) => Promise<CommandResult>;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a successful result
 */
export function ok<T>(value: T): VcsResult<T> {
	return { ok: true, value };
}

/**
 * Create a failed result
 */
export function err<E extends VcsError>(error: E): VcsResult<never, E> {
	return { ok: false, error };
}

/**
 * Create a VCS error
 */
export function createVcsError(
	code: VcsErrorCode,
	message: string,
	options?: { cause?: Error; context?: Record<string, unknown> },
): VcsError {
	return {
		code,
		message,
		cause: options?.cause,
		context: options?.context,
	};
}
