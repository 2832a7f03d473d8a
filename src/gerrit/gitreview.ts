/**
 * .gitreview parsing
 *
 * @module gerrit/gitreview
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { GITREVIEW_FILE } from "../domain/config/directories.ts";
import { ConfigurationError } from "../domain/errors.ts";
import { DEFAULT_GERRIT_SSH_PORT, type GerritInfo } from "../domain/submission/types.ts";
import { loggers } from "../observability/index.ts";

function firstGroup(pattern: RegExp, text: string): string | null {
	const match = pattern.exec(text);
	const value = match?.[1]?.trim();
	return value ? value : null;
}

/**
 * Parse .gitreview text; null when host or project is missing
 */
export function parseGitreview(text: string): GerritInfo | null {
	const host = firstGroup(/^host=(.+)$/m, text);
	const port = firstGroup(/^port=(\d+)$/m, text);
	const project = firstGroup(/^project=(.+)$/m, text);
	if (!host || !project) return null;

	return {
		host,
		port: port ? Number.parseInt(port, 10) : DEFAULT_GERRIT_SSH_PORT,
		project: project.replace(/\.git$/, "").trim(),
	};
}

/**
 * Read .gitreview from the workspace root.
 *
 * Returns null when the file does not exist; a file without host or
 * project is a configuration error.
 */
export async function readLocalGitreview(workspace: string): Promise<GerritInfo | null> {
	const path = join(workspace, GITREVIEW_FILE);
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			loggers.gerrit.info(".gitreview not found locally");
			return null;
		}
		throw error;
	}

	const info = parseGitreview(text);
	if (!info) {
		throw new ConfigurationError("invalid .gitreview", { context: { path } });
	}
	loggers.gerrit.debug({ info }, "Parsed local .gitreview");
	return info;
}
