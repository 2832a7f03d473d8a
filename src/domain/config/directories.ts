/**
 * @fileoverview Domain Config Directories
 *
 * File and directory name constants. Pure constants, no dependencies.
 *
 * @module domain/config/directories
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Gerrit review metadata file at the repository root
 */
export const GITREVIEW_FILE = ".gitreview";

/**
 * Configuration directory name below the XDG config home
 */
export const CONFIG_DIR = "pr2gerrit";

/**
 * Organization configuration file name
 */
export const CONFIG_FILE = "configuration.yaml";

/**
 * Environment variable that overrides the config file location
 */
export const CONFIG_PATH_ENV = "PR2GERRIT_CONFIG";

/**
 * Resolve the organization config file path
 */
export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
	const explicit = env[CONFIG_PATH_ENV]?.trim();
	if (explicit) return explicit;
	const base = env.XDG_CONFIG_HOME?.trim() || join(homedir(), ".config");
	return join(base, CONFIG_DIR, CONFIG_FILE);
}
