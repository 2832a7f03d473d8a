/**
 * @fileoverview Organization configuration file
 *
 * A YAML file with a `default` section and one section per organization,
 * each mapping environment variable names to values:
 *
 * ```yaml
 * default:
 *   PRESERVE_GITHUB_PRS: true
 * organizations:
 *   acme:
 *     GERRIT_SERVER: review.acme.org
 * ```
 *
 * @module config/org-config
 */

import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { getConfigFilePath } from "../domain/config/directories.ts";
import { OrgConfigFileSchema } from "../domain/config/schema.ts";
import type { OrgConfigFile } from "../domain/config/types.ts";
import { ConfigurationError } from "../domain/errors.ts";
import { loggers } from "../observability/index.ts";
import type { EnvMap } from "./env.ts";

/**
 * Parse and validate config file text
 */
export function parseOrgConfig(text: string, path = "<inline>"): OrgConfigFile {
	let parsed: unknown;
	try {
		parsed = YAML.parse(text);
	} catch (error) {
		throw new ConfigurationError("Organization config is not valid YAML", { cause: error, context: { path } });
	}

	const result = OrgConfigFileSchema.safeParse(parsed ?? {});
	if (!result.success) {
		throw new ConfigurationError("Organization config has an invalid shape", {
			cause: result.error,
			context: { path, issues: result.error.issues.map((issue) => issue.message) },
		});
	}
	return result.data;
}

/**
 * Settings for one organization: defaults overlaid with the organization's
 * own section. Organization names match case-insensitively.
 */
export function settingsForOrganization(config: OrgConfigFile, organization: string): Record<string, string> {
	const wanted = organization.trim().toLowerCase();
	const entry = Object.entries(config.organizations).find(([name]) => name.toLowerCase() === wanted);
	return { ...config.default, ...(entry ? entry[1] : {}) };
}

/**
 * Load settings for an organization; empty when the file does not exist
 */
export async function loadOrgConfig(
	organization: string,
	path: string = getConfigFilePath(),
): Promise<Record<string, string>> {
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			loggers.config.debug({ path }, "No organization config file");
			return {};
		}
		throw new ConfigurationError("Cannot read organization config", { cause: error, context: { path } });
	}

	const settings = settingsForOrganization(parseOrgConfig(text, path), organization);
	loggers.config.debug({ path, organization, keys: Object.keys(settings) }, "Loaded organization config");
	return settings;
}

/**
 * Fill variables that are unset or empty in `env` from the config settings.
 * Returns a new map.
 */
export function applyOrgConfig(env: EnvMap, settings: Record<string, string>): EnvMap {
	const merged: EnvMap = { ...env };
	for (const [key, value] of Object.entries(settings)) {
		if (!merged[key]) {
			merged[key] = value;
		}
	}
	return merged;
}
