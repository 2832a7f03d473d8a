/**
 * @fileoverview CLI Module
 *
 * @module cli
 */

export { createProgram, parseArgs, parseGithubTarget, targetOverrides } from "./args.ts";
export { resolveConfiguration, runSubmit, type SubmitEnvironment } from "./commands/submit.ts";
export { describeError, exitCodeFor } from "./errors.ts";
export { CLI_VERSION, EXIT_CODES, type ExitCode, type GitHubTarget, type ParsedArgs } from "./types.ts";
