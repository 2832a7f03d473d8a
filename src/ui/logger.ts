/**
 * Console output for the CLI
 *
 * Every helper prints a tagged line and forwards the same text to the
 * pino `cli` logger.
 *
 * @module ui/logger
 */

import pc from "picocolors";
import { loggers } from "../observability/index.ts";

let verboseMode = false;

/**
 * Set verbose mode
 */
export function setVerbose(verbose: boolean): void {
	verboseMode = verbose;
}

/**
 * Log info message
 */
export function logInfo(...args: unknown[]): void {
	console.log(pc.blue("[INFO]"), ...args);
	loggers.cli.info({ args }, args.join(" "));
}

/**
 * Log success message
 */
export function logSuccess(...args: unknown[]): void {
	console.log(pc.green("[OK]"), ...args);
	loggers.cli.info({ success: true, args }, args.join(" "));
}

/**
 * Log warning message
 */
export function logWarn(...args: unknown[]): void {
	console.log(pc.yellow("[WARN]"), ...args);
	loggers.cli.warn({ args }, args.join(" "));
}

/**
 * Log error message
 */
export function logError(...args: unknown[]): void {
	console.error(pc.red("[ERROR]"), ...args);
	loggers.cli.error({ args }, args.join(" "));
}

/**
 * Log debug message (only in verbose mode)
 */
export function logDebug(...args: unknown[]): void {
	if (verboseMode) {
		console.log(pc.dim("[DEBUG]"), ...args);
	}
	loggers.cli.debug({ args }, args.join(" "));
}

/**
 * Report a pipeline state change. Printed only in verbose mode.
 */
export function logStep(state: string, prNumber: number | null): void {
	const label = prNumber === null ? state : `PR #${prNumber}: ${state}`;
	if (verboseMode) {
		console.log(pc.cyan("[STEP]"), label);
	}
	loggers.cli.debug({ state, prNumber }, label);
}

/**
 * Mask a secret for display, keeping a short visible prefix
 */
export function maskSecret(value: string, keep = 4): string {
	if (!value) return "";
	if (value.length <= keep) return "*".repeat(value.length);
	return `${value.slice(0, keep)}${"*".repeat(value.length - keep)}`;
}

/**
 * Format duration in human readable format
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms}ms`;
	const secs = Math.floor(ms / 1000);
	const mins = Math.floor(secs / 60);
	const remainingSecs = secs % 60;
	if (mins === 0) return `${secs}s`;
	return `${mins}m ${remainingSecs}s`;
}
