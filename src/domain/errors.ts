/**
 * Error classes shared across the submission pipeline
 *
 * Every error carries optional structured context so the CLI can print a
 * detailed report in verbose mode.
 *
 * @module domain/errors
 */

/**
 * Base class for all pr2gerrit errors
 */
export class Pr2GerritError extends Error {
	/** Additional context for debugging */
	public readonly context?: Record<string, unknown>;

	constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
		super(message, { cause: options.cause });
		this.name = "Pr2GerritError";
		this.context = options.context;
	}

	/**
	 * Get a formatted error message with context
	 */
	toDetailedString(): string {
		const parts = [`${this.name}: ${this.message}`];
		if (this.context) {
			parts.push(`  Context: ${JSON.stringify(this.context)}`);
		}
		if (this.cause instanceof Error) {
			parts.push(`  Cause: ${this.cause.message}`);
		} else if (this.cause !== undefined) {
			parts.push(`  Cause: ${String(this.cause)}`);
		}
		return parts.join("\n");
	}
}

/**
 * Missing, malformed or conflicting configuration. Never retried.
 */
export class ConfigurationError extends Pr2GerritError {
	constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

/**
 * Unrecoverable failure of a pipeline step
 */
export class OrchestratorError extends Pr2GerritError {
	constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
		super(message, options);
		this.name = "OrchestratorError";
	}
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
