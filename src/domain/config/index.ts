/**
 * @fileoverview Domain Config Barrel Export
 *
 * @module domain/config
 */

export type { GitHubContext, Inputs, OrgConfigFile } from "./types.ts";

export {
	CONFIG_DIR,
	CONFIG_FILE,
	CONFIG_PATH_ENV,
	GITREVIEW_FILE,
	getConfigFilePath,
} from "./directories.ts";

export {
	DEFAULT_INPUTS,
	EventPayloadSchema,
	GitHubContextSchema,
	InputsSchema,
	OrgConfigFileSchema,
	parseInputs,
} from "./schema.ts";

export type { EventPayload, InputsInput } from "./schema.ts";
