/**
 * @fileoverview CLI Argument Parser
 *
 * Commander program for `pr2gerrit [target-url] [options]`. Every option
 * maps onto the environment variable of the same input, so options, the
 * environment and the organization config all feed one parser.
 *
 * @module cli/args
 *
 * @example
 * ```typescript
 * const { targetUrl, overrides } = parseArgs(process.argv);
 * ```
 */

import { Command } from "commander";
import type { EnvMap } from "../config/env.ts";
import { CLI_VERSION, type GitHubTarget, type ParsedArgs } from "./types.ts";

const GITHUB_HOSTS = new Set(["github.com", "www.github.com"]);

/**
 * Value options and the variable each one sets
 */
const VALUE_OPTIONS = [
	["--fetch-depth <n>", "FETCH_DEPTH", "Fetch depth of the workflow checkout"],
	["--gerrit-known-hosts <entries>", "GERRIT_KNOWN_HOSTS", "known_hosts entries for Gerrit SSH"],
	["--gerrit-ssh-privkey <key>", "GERRIT_SSH_PRIVKEY_G2G", "SSH private key content for Gerrit"],
	["--gerrit-ssh-user <user>", "GERRIT_SSH_USER_G2G", "Gerrit SSH user"],
	["--gerrit-ssh-user-email <email>", "GERRIT_SSH_USER_G2G_EMAIL", "Email address of the Gerrit SSH user"],
	["--organization <org>", "ORGANIZATION", "GitHub organization (default: repository owner)"],
	["--reviewers-email <emails>", "REVIEWERS_EMAIL", "Comma-separated reviewer emails"],
	["--gerrit-server <host>", "GERRIT_SERVER", "Gerrit host when .gitreview is absent"],
	["--gerrit-server-port <port>", "GERRIT_SERVER_PORT", "Gerrit SSH port (default: 29418)"],
	["--gerrit-project <project>", "GERRIT_PROJECT", "Gerrit project when .gitreview is absent"],
	["--gerrit-branch <branch>", "GERRIT_BRANCH", "Target Gerrit branch"],
	["--gerrit-http-base-path <path>", "GERRIT_HTTP_BASE_PATH", "REST path prefix, e.g. r"],
	["--gerrit-http-user <user>", "GERRIT_HTTP_USER", "Gerrit REST user (default: SSH user)"],
	["--gerrit-http-password <password>", "GERRIT_HTTP_PASSWORD", "Gerrit REST HTTP password"],
	["--topic-prefix <prefix>", "G2G_TOPIC_PREFIX", "Gerrit topic prefix (default: GH)"],
] as const;

/**
 * Boolean flags and the variable each one sets to "true"
 */
const FLAG_OPTIONS = [
	["--submit-single-commits", "SUBMIT_SINGLE_COMMITS", "Submit one Gerrit change per commit"],
	["--use-pr-as-commit", "USE_PR_AS_COMMIT", "Use the PR title and body as the commit message"],
	["--preserve-github-prs", "PRESERVE_GITHUB_PRS", "Do not close GitHub PRs after submission"],
	["--dry-run", "DRY_RUN", "Validate settings and connectivity; write nothing"],
	["--dry-run-disable-network", "G2G_DRYRUN_DISABLE_NETWORK", "Skip network checks during a dry run"],
] as const;

/**
 * Commander attribute name of a long flag: "--gerrit-ssh-user <user>" → "gerritSshUser"
 */
function attributeName(flags: string): string {
	const long = flags.split(" ")[0] ?? "";
	return long.replace(/^--/, "").replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/**
 * Parse a GitHub repository or pull request URL.
 * Null for anything that is not a github.com URL with owner and repo.
 */
export function parseGithubTarget(url: string): GitHubTarget | null {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return null;
	}
	if (!GITHUB_HOSTS.has(parsed.hostname)) return null;

	const [owner, repo, kind, number] = parsed.pathname.split("/").filter((part) => part.length > 0);
	if (!owner || !repo) return null;

	let prNumber: number | null = null;
	if ((kind === "pull" || kind === "pulls") && number && /^\d+$/.test(number)) {
		prNumber = Number.parseInt(number, 10);
	}
	return { owner, repo, prNumber };
}

/**
 * Variables implied by a target URL: repository, organization and either
 * a PR number or bulk mode
 */
export function targetOverrides(url: string): EnvMap {
	const overrides: EnvMap = { G2G_TARGET_URL: url };
	const target = parseGithubTarget(url);
	if (!target) return overrides;

	overrides.ORGANIZATION = target.owner;
	overrides.GITHUB_REPOSITORY_OWNER = target.owner;
	overrides.GITHUB_REPOSITORY = `${target.owner}/${target.repo}`;
	if (target.prNumber !== null) {
		overrides.PR_NUMBER = String(target.prNumber);
		overrides.SYNC_ALL_OPEN_PRS = "false";
	} else {
		overrides.SYNC_ALL_OPEN_PRS = "true";
	}
	return overrides;
}

/**
 * Create the CLI program with all options
 */
export function createProgram(): Command {
	const program = new Command();

	program
		.name("pr2gerrit")
		.description("Submit a GitHub pull request to Gerrit as a change")
		.version(CLI_VERSION)
		.argument("[target-url]", "GitHub repository or pull request URL")
		.option("-v, --verbose", "Verbose output")
		.exitOverride();

	for (const [flags, , description] of VALUE_OPTIONS) {
		program.option(flags, description);
	}
	for (const [flags, , description] of FLAG_OPTIONS) {
		program.option(flags, description);
	}

	return program;
}

/**
 * Parse argv into the target URL and environment overrides.
 * Throws a CommanderError on invalid usage.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const program = createProgram();
	program.parse(argv);

	const opts = program.opts();
	const [targetUrl] = program.args;

	const overrides: EnvMap = targetUrl ? targetOverrides(targetUrl) : {};
	for (const [flags, variable] of VALUE_OPTIONS) {
		const value: unknown = opts[attributeName(flags)];
		if (typeof value === "string") {
			overrides[variable] = value;
		}
	}
	for (const [flags, variable] of FLAG_OPTIONS) {
		if (opts[attributeName(flags)] === true) {
			overrides[variable] = "true";
		}
	}

	return { targetUrl, overrides, verbose: opts.verbose === true };
}
