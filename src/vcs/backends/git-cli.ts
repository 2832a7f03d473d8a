/**
 * Git CLI Backend
 *
 * Thin layer over the command runner for git invocations, plus the pure
 * parsers for commit trailers.
 *
 * @module vcs/backends/git-cli
 */

import { Pr2GerritError } from "../../domain/errors.ts";
import type { TrailerMap } from "../../domain/submission/types.ts";
import type { CommandOptions, CommandResult, CommandRunner, VcsResult } from "../types.ts";
import { createVcsError, err, ok } from "../types.ts";
import { CommandFailure, retryingRunner } from "./command-runner.ts";

/** Environment forced onto every git invocation */
export const DEFAULT_GIT_ENV: Record<string, string> = {
	GIT_TERMINAL_PROMPT: "0",
	LC_ALL: "C",
};

/**
 * A git operation failed. Wraps the underlying CommandFailure.
 */
export class GitOperationFailure extends Pr2GerritError {
	readonly operation: string;
	readonly stderr: string;

	constructor(operation: string, cause: unknown) {
		const stderr = cause instanceof CommandFailure ? cause.stderr.trim() : "";
		const reason = stderr || (cause instanceof Error ? cause.message : String(cause));
		super(`git ${operation} failed: ${reason}`, { cause, context: { operation } });
		this.name = "GitOperationFailure";
		this.operation = operation;
		this.stderr = stderr;
	}
}

/**
 * Runs git commands in one workspace through a command runner
 */
export class GitCli {
	constructor(
		readonly workspace: string,
		private readonly runner: CommandRunner = retryingRunner,
	) {}

	/**
	 * Run `git <args>`; any failure becomes a GitOperationFailure
	 */
	async run(args: readonly string[], options: Omit<CommandOptions, "cwd"> = {}): Promise<CommandResult> {
		try {
			return await this.runner(["git", ...args], {
				...options,
				cwd: this.workspace,
				env: { ...DEFAULT_GIT_ENV, ...options.env },
			});
		} catch (error) {
			throw new GitOperationFailure(args[0] ?? "", error);
		}
	}

	/**
	 * Run `git <args>` and report failure as a value instead of throwing
	 */
	async tryRun(args: readonly string[]): Promise<VcsResult<CommandResult>> {
		try {
			const result = await this.run(args, { check: false });
			if (result.exitCode !== 0) {
				return err(
					createVcsError("COMMAND_FAILED", `git ${args.join(" ")} exited ${result.exitCode}`, {
						context: { stderr: result.stderr.trim() },
					}),
				);
			}
			return ok(result);
		} catch (error) {
			return err(
				createVcsError("COMMAND_NOT_RUN", `git ${args.join(" ")} could not run`, {
					cause: error instanceof Error ? error : undefined,
				}),
			);
		}
	}
}

/**
 * Parse `Key: value` trailers from a commit message.
 *
 * Each non-empty line is split on its first colon; key and value are
 * trimmed and lines with an empty key or value are ignored.
 */
export function parseTrailers(message: string): TrailerMap {
	const trailers: TrailerMap = {};
	for (const line of message.split(/\r?\n/)) {
		const colon = line.indexOf(":");
		if (colon < 0) continue;
		const key = line.slice(0, colon).trim();
		const value = line.slice(colon + 1).trim();
		if (!key || !value) continue;
		const values = trailers[key] ?? [];
		values.push(value);
		trailers[key] = values;
	}
	return trailers;
}

/**
 * Keep only the requested trailer keys
 */
export function filterTrailers(trailers: TrailerMap, keys?: readonly string[]): TrailerMap {
	if (!keys) return trailers;
	const filtered: TrailerMap = {};
	for (const key of keys) {
		const values = trailers[key];
		if (values) filtered[key] = [...values];
	}
	return filtered;
}
