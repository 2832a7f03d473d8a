/**
 * @fileoverview Config Module Barrel Export
 *
 * Runtime configuration: environment mapping, the organization config
 * file, the GitHub event context and input validation. Types and schemas
 * live in `domain/config`.
 *
 * @module config
 */

export { buildInputsFromEnv, envBool, inputsFromEnv, type EnvMap } from "./env.ts";
export { applyOrgConfig, loadOrgConfig, parseOrgConfig, settingsForOrganization } from "./org-config.ts";
export { extractPrNumber, loadEventPayload, readGitHubContext } from "./context.ts";
export { effectiveConfig, logEffectiveConfig, validateInputs } from "./validate.ts";
