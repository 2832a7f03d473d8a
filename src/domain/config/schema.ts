/**
 * @fileoverview Domain Config Schema
 *
 * Zod schemas for run inputs and the organization config file.
 *
 * @module domain/config/schema
 */

import { z } from "zod";
import type { GitHubContext, Inputs, OrgConfigFile } from "./types.ts";

const PortStringSchema = z
	.string()
	.trim()
	.regex(/^\d*$/, "port must be numeric")
	.transform((value) => value || "29418");

/**
 * Inputs schema
 */
export const InputsSchema = z.object({
	submitSingleCommits: z.boolean().default(false),
	usePrAsCommit: z.boolean().default(false),
	fetchDepth: z.number().int().min(1).default(10),
	gerritKnownHosts: z.string().default(""),
	gerritSshPrivkey: z.string().default(""),
	gerritSshUser: z.string().trim().default(""),
	gerritSshUserEmail: z.string().trim().default(""),
	organization: z.string().trim().default(""),
	reviewersEmail: z.string().trim().default(""),
	preserveGithubPrs: z.boolean().default(false),
	dryRun: z.boolean().default(false),
	dryRunDisableNetwork: z.boolean().default(false),
	gerritServer: z.string().trim().default(""),
	gerritServerPort: PortStringSchema.default("29418"),
	gerritProject: z.string().trim().default(""),
	gerritBranch: z.string().trim().default(""),
	gerritHttpBasePath: z
		.string()
		.default("")
		.transform((value) => value.trim().replace(/^\/+|\/+$/g, "")),
	gerritHttpUser: z.string().trim().default(""),
	gerritHttpPassword: z.string().trim().default(""),
	topicPrefix: z
		.string()
		.default("GH")
		.transform((value) => value.trim() || "GH"),
	githubToken: z.string().trim().default(""),
	syncAllOpenPrs: z.boolean().default(false),
	targetUrl: z.string().trim().default(""),
}) satisfies z.ZodType<Inputs, z.ZodTypeDef, unknown>;

export type InputsInput = z.input<typeof InputsSchema>;

/**
 * GitHub context schema
 */
export const GitHubContextSchema = z.object({
	eventName: z.string().default(""),
	eventAction: z.string().default(""),
	eventPath: z.string().nullable().default(null),
	repository: z.string().default(""),
	repositoryOwner: z.string().default(""),
	serverUrl: z.string().default("https://github.com"),
	runId: z.string().default(""),
	sha: z.string().default(""),
	baseRef: z.string().default(""),
	headRef: z.string().default(""),
	prNumber: z.number().int().positive().nullable().default(null),
}) satisfies z.ZodType<GitHubContext, z.ZodTypeDef, unknown>;

const ConfigSectionSchema = z.record(
	z.string(),
	z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)),
);

/**
 * Organization config file schema
 */
export const OrgConfigFileSchema = z.object({
	default: ConfigSectionSchema.default({}),
	organizations: z.record(z.string(), ConfigSectionSchema).default({}),
}) satisfies z.ZodType<OrgConfigFile, z.ZodTypeDef, unknown>;

/**
 * Minimal shape of a GitHub Actions event payload
 */
export const EventPayloadSchema = z
	.object({
		action: z.string().optional(),
		number: z.number().int().optional(),
		pull_request: z.object({ number: z.number().int() }).partial().optional(),
		issue: z.object({ number: z.number().int() }).partial().optional(),
	})
	.passthrough();

export type EventPayload = z.infer<typeof EventPayloadSchema>;

/**
 * Parse inputs, throwing a ZodError on invalid values
 */
export function parseInputs(input: InputsInput): Inputs {
	return InputsSchema.parse(input);
}

export const DEFAULT_INPUTS: Inputs = InputsSchema.parse({});
