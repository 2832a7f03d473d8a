/**
 * @fileoverview Mapping of fatal errors to exit codes and messages
 *
 * @module cli/errors
 */

import { CommanderError } from "commander";
import { ZodError } from "zod";
import { ConfigurationError, Pr2GerritError } from "../domain/errors.ts";
import { EXIT_CODES, type ExitCode } from "./types.ts";

/**
 * Configuration and usage problems exit with 2, everything else with 1
 */
export function exitCodeFor(error: unknown): ExitCode {
	if (error instanceof CommanderError) {
		return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE;
	}
	if (error instanceof ConfigurationError || error instanceof ZodError) {
		return EXIT_CODES.USAGE;
	}
	return EXIT_CODES.FAILURE;
}

/**
 * Message for the console; verbose mode adds context and cause
 */
export function describeError(error: unknown, verbose: boolean): string {
	if (error instanceof ZodError) {
		return `Invalid configuration: ${error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`;
	}
	if (verbose && error instanceof Pr2GerritError) {
		return error.toDetailedString();
	}
	return error instanceof Error ? error.message : String(error);
}
