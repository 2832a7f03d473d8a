/**
 * Command Runner Backend
 *
 * Runs external processes (git, ssh, git-review) with child_process.spawn,
 * captures their output, masks secrets in everything it logs and retries
 * transient network failures with capped exponential backoff.
 *
 * @module vcs/backends/command-runner
 */

import { spawn } from "node:child_process";
import { Pr2GerritError } from "../../domain/errors.ts";
import { loggers } from "../../observability/index.ts";
import type { CommandOptions, CommandResult, CommandRunner } from "../types.ts";

/** Replacement for masked secret values */
export const MASK = "***";

/** Grace period between SIGTERM and SIGKILL on timeout */
const KILL_GRACE_MS = 5000;

/**
 * stderr fragments that indicate a network blip rather than a real failure
 */
export const TRANSIENT_ERROR_PATTERNS: readonly string[] = [
	"unable to access",
	"could not resolve host",
	"failed to connect",
	"connection timed out",
	"connection reset by peer",
	"early eof",
	"the remote end hung up unexpectedly",
	"http/2 stream",
	"transport endpoint is not connected",
	"network is unreachable",
	"temporary failure",
	"ssl: couldn't",
	"ssl: certificate",
];

/**
 * A command exited non-zero, timed out or could not be started
 */
export class CommandFailure extends Pr2GerritError {
	readonly argv: readonly string[];
	readonly exitCode: number | null;
	readonly stdout: string;
	readonly stderr: string;
	readonly timedOut: boolean;

	constructor(
		message: string,
		options: {
			argv: readonly string[];
			exitCode?: number | null;
			stdout?: string;
			stderr?: string;
			timedOut?: boolean;
			cause?: unknown;
		},
	) {
		super(message, {
			cause: options.cause,
			context: { exitCode: options.exitCode ?? null, timedOut: options.timedOut ?? false },
		});
		this.name = "CommandFailure";
		this.argv = options.argv;
		this.exitCode = options.exitCode ?? null;
		this.stdout = options.stdout ?? "";
		this.stderr = options.stderr ?? "";
		this.timedOut = options.timedOut ?? false;
	}
}

/**
 * Replace each non-empty mask value in text with the fixed mask
 */
export function maskText(text: string, masks: Iterable<string>): string {
	let masked = text;
	for (const token of masks) {
		if (!token) continue;
		masked = masked.split(token).join(MASK);
	}
	return masked;
}

/**
 * Quote one argument the way a POSIX shell would need it
 */
export function quoteArg(arg: string): string {
	if (arg === "") return "''";
	if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
	return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Render a command line for logs with secrets masked
 */
export function formatCommandForLog(argv: readonly string[], masks: Iterable<string> = []): string {
	return maskText(argv.map(quoteArg).join(" "), masks);
}

/**
 * Heuristic check for transient git/network errors
 */
export function isTransientGitError(stderr: string): boolean {
	const text = stderr.toLowerCase();
	return TRANSIENT_ERROR_PATTERNS.some((pattern) => text.includes(pattern));
}

/**
 * Exponential backoff: base * 2^(attempt-1), capped. Delays in milliseconds.
 */
export function backoffDelay(attempt: number, baseMs = 500, capMs = 5000): number {
	return Math.min(baseMs * 2 ** Math.max(0, attempt - 1), capMs);
}

/**
 * Backoff delay plus uniform jitter in [0, delay/2)
 */
export function backoffDelayWithJitter(
	attempt: number,
	baseMs = 500,
	capMs = 5000,
	random: () => number = Math.random,
): number {
	const delay = backoffDelay(attempt, baseMs, capMs);
	return Math.round(delay + random() * (delay / 2));
}

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a command and capture its output.
 *
 * The command line is logged at debug level with secrets masked. When
 * `check` is true (the default) a non-zero exit throws CommandFailure;
 * timeouts and spawn errors always throw.
 */
export async function runCommand(
	argv: readonly string[],
	options: CommandOptions = {},
): Promise<CommandResult> {
	const [command, ...args] = argv;
	if (!command) {
		throw new CommandFailure("Empty command line", { argv });
	}

	const masks = options.masks ?? [];
	const check = options.check ?? true;
	const printable = formatCommandForLog(argv, masks);
	loggers.git.debug({ cmd: printable, cwd: options.cwd }, "Executing command");

	const result = await new Promise<CommandResult>((resolve, reject) => {
		const child = spawn(command, args, {
			cwd: options.cwd,
			env: { ...process.env, ...options.env },
			stdio: [options.stdin === undefined ? "ignore" : "pipe", "pipe", "pipe"],
		});

		let stdout = "";
		let stderr = "";
		let timedOut = false;
		let killTimer: NodeJS.Timeout | undefined;

		const timeoutId =
			options.timeout === undefined
				? undefined
				: setTimeout(() => {
						timedOut = true;
						child.kill("SIGTERM");
						killTimer = setTimeout(() => {
							if (child.exitCode === null) {
								child.kill("SIGKILL");
							}
						}, KILL_GRACE_MS);
					}, options.timeout);

		const clearTimers = () => {
			if (timeoutId) clearTimeout(timeoutId);
			if (killTimer) clearTimeout(killTimer);
		};

		child.stdout?.on("data", (data: Buffer) => {
			stdout += data.toString();
		});

		child.stderr?.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		if (options.stdin !== undefined && child.stdin) {
			child.stdin.end(options.stdin);
		}

		child.on("error", (error: Error) => {
			clearTimers();
			loggers.git.error({ cmd: printable, error: error.message }, "Failed to execute command");
			reject(
				new CommandFailure(`Failed to execute command: ${printable} (${error.message})`, {
					argv,
					cause: error,
				}),
			);
		});

		child.on("close", (exitCode: number | null) => {
			clearTimers();
			if (timedOut) {
				loggers.git.error({ cmd: printable, timeout: options.timeout }, "Command timed out");
				reject(
					new CommandFailure(`Command timed out after ${options.timeout}ms: ${printable}`, {
						argv,
						stdout,
						stderr,
						timedOut: true,
					}),
				);
				return;
			}
			resolve({ exitCode: exitCode ?? 1, stdout, stderr });
		});
	});

	if (result.exitCode !== 0) {
		loggers.git.debug(
			{ cmd: printable, exitCode: result.exitCode, stderr: maskText(result.stderr, masks) },
			"Command failed",
		);
		if (check) {
			throw new CommandFailure(`Command failed: ${printable}`, { argv, ...result });
		}
		return result;
	}

	if (result.stdout) {
		loggers.git.debug({ stdout: maskText(result.stdout, masks) }, "stdout");
	}
	if (result.stderr) {
		loggers.git.debug({ stderr: maskText(result.stderr, masks) }, "stderr");
	}
	return result;
}

/**
 * Options for running a command with retries
 */
export interface RetryCommandOptions extends CommandOptions {
	/** Retries after the first attempt (default: 2) */
	retries?: number;
	/** Decides whether a failed result is worth retrying */
	isTransient?: (result: CommandResult) => boolean;
	/** Base command runner (default: runCommand) */
	runner?: CommandRunner;
	/** Sleep implementation, replaceable in tests */
	sleep?: (ms: number) => Promise<void>;
}

function defaultIsTransient(result: CommandResult): boolean {
	return result.exitCode !== 0 && isTransientGitError(result.stderr);
}

/**
 * Run a command, retrying transient failures with backoff and jitter.
 *
 * Spawn errors and timeouts from the base runner propagate immediately.
 * A non-transient failure or an exhausted retry budget throws
 * CommandFailure when `check` is true; otherwise the last result is returned.
 */
export async function runCommandWithRetries(
	argv: readonly string[],
	options: RetryCommandOptions = {},
): Promise<CommandResult> {
	const {
		retries = 2,
		isTransient = defaultIsTransient,
		runner = runCommand,
		sleep: wait = sleep,
		check = true,
		...commandOptions
	} = options;
	const masks = commandOptions.masks ?? [];

	for (let attempt = 1; ; attempt++) {
		const result = await runner(argv, { ...commandOptions, check: false });

		if (result.exitCode === 0) {
			return result;
		}

		if (!isTransient(result)) {
			if (check) {
				throw new CommandFailure(`Command failed (non-retryable): ${formatCommandForLog(argv, masks)}`, {
					argv,
					...result,
				});
			}
			return result;
		}

		if (attempt > retries) {
			if (check) {
				throw new CommandFailure(`Command failed after retries: ${formatCommandForLog(argv, masks)}`, {
					argv,
					...result,
				});
			}
			return result;
		}

		const delay = backoffDelayWithJitter(attempt);
		loggers.git.warn(
			{ attempt, retries, delay, cmd: formatCommandForLog(argv, masks) },
			"Retrying after transient error",
		);
		await wait(delay);
	}
}

/**
 * Default command runner: retries transient failures
 */
export const retryingRunner: CommandRunner = (argv, options) => runCommandWithRetries(argv, options);
