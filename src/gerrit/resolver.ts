/**
 * Gerrit Connection Resolver
 *
 * Finds the Gerrit host, port and project for a run: the local .gitreview
 * first, then the repository's .gitreview fetched from GitHub, then the
 * explicit inputs.
 *
 * @module gerrit/resolver
 */

import { GITREVIEW_FILE } from "../domain/config/directories.ts";
import type { GitHubContext, Inputs } from "../domain/config/types.ts";
import { ConfigurationError } from "../domain/errors.ts";
import { dedupePreservingOrder } from "../domain/submission/change-id.ts";
import { DEFAULT_GERRIT_SSH_PORT, type GerritInfo, type RepoNames } from "../domain/submission/types.ts";
import { fetchRawFile } from "../github/raw.ts";
import type { GitHubGateway } from "../github/types.ts";
import { loggers } from "../observability/index.ts";
import { parseGitreview, readLocalGitreview } from "./gitreview.ts";
import type { FetchLike } from "./rest-client.ts";

export interface GitreviewSources {
	workspace: string;
	github: GitHubContext;
	inputs: Inputs;
	/** Null when no GitHub API access is configured */
	gateway: GitHubGateway | null;
	fetch?: FetchLike;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

async function fromGitHubApi(sources: GitreviewSources): Promise<GerritInfo | null> {
	const { gateway, github } = sources;
	if (!gateway) return null;
	try {
		const ref = github.headRef || github.sha || (await gateway.getDefaultBranch());
		const text = await gateway.getFileContent(GITREVIEW_FILE, ref);
		if (text === null) return null;
		const info = parseGitreview(text);
		if (!info) {
			loggers.gerrit.info("Remote .gitreview missing required keys; ignoring");
		}
		return info;
	} catch (error) {
		loggers.gerrit.debug({ error: describe(error) }, "Remote .gitreview not available");
		return null;
	}
}

async function candidateBranches(sources: GitreviewSources): Promise<string[]> {
	const { gateway, github, inputs } = sources;
	const branches: string[] = [];

	if (gateway && github.prNumber !== null && inputs.targetUrl && inputs.githubToken) {
		try {
			const pull = await gateway.getPull(github.prNumber);
			branches.push(pull.headRef, pull.baseRef);
		} catch (error) {
			loggers.gerrit.debug({ error: describe(error) }, "Could not resolve PR refs for .gitreview");
		}
	}
	branches.push(github.headRef, github.baseRef, "master", "main");

	return dedupePreservingOrder(branches.filter((branch) => branch.length > 0));
}

async function fromRawUrls(sources: GitreviewSources): Promise<GerritInfo | null> {
	const repository = sources.github.repository.trim();
	if (!repository) return null;

	for (const branch of await candidateBranches(sources)) {
		try {
			const text = await fetchRawFile(repository, branch, GITREVIEW_FILE, sources.fetch);
			if (text === null) continue;
			const info = parseGitreview(text);
			if (info) return info;
		} catch (error) {
			loggers.gerrit.debug({ branch, error: describe(error) }, "Raw .gitreview fetch failed");
		}
	}
	return null;
}

/**
 * Locate .gitreview: workspace file, then GitHub API, then raw URLs.
 * Null when none is available.
 */
export async function resolveGitreview(sources: GitreviewSources): Promise<GerritInfo | null> {
	const local = await readLocalGitreview(sources.workspace);
	if (local) return local;

	loggers.gerrit.info(".gitreview not found locally; attempting remote fetch");
	const remote = (await fromGitHubApi(sources)) ?? (await fromRawUrls(sources));
	if (remote) {
		loggers.gerrit.debug({ info: remote }, "Parsed remote .gitreview");
		return remote;
	}

	loggers.gerrit.info("Remote .gitreview not available; falling back to inputs");
	return null;
}

/**
 * Gerrit and GitHub repository names.
 *
 * From .gitreview the GitHub name is the project with "/" mapped to "-";
 * without one the Gerrit path is the repository name with "-" mapped to "/".
 */
export function deriveRepoNames(gitreview: GerritInfo | null, github: GitHubContext): RepoNames {
	if (gitreview) {
		return {
			gerritPath: gitreview.project,
			githubName: gitreview.project.replaceAll("/", "-"),
		};
	}

	const repository = github.repository;
	const slash = repository.indexOf("/");
	const name = slash >= 0 ? repository.slice(slash + 1) : "";
	if (!name) {
		throw new ConfigurationError("bad repository context", { context: { repository } });
	}
	return { gerritPath: name.replaceAll("-", "/"), githubName: name };
}

/**
 * Final connection info: .gitreview when present, else explicit inputs
 */
export function resolveGerritInfo(gitreview: GerritInfo | null, inputs: Inputs, repo: RepoNames): GerritInfo {
	if (gitreview) return gitreview;

	const host = inputs.gerritServer.trim();
	if (!host) {
		throw new ConfigurationError("missing GERRIT_SERVER");
	}

	const portText = inputs.gerritServerPort.trim() || String(DEFAULT_GERRIT_SSH_PORT);
	if (!/^\d+$/.test(portText)) {
		throw new ConfigurationError("bad GERRIT_SERVER_PORT", { context: { port: portText } });
	}
	const port = Number.parseInt(portText, 10);

	let project = inputs.gerritProject.trim();
	if (!project) {
		if (inputs.dryRun || inputs.targetUrl) {
			project = repo.gerritPath;
			loggers.gerrit.info({ project }, "Using Gerrit project derived from repository name");
		} else {
			throw new ConfigurationError("missing GERRIT_PROJECT");
		}
	}

	const info: GerritInfo = { host, port, project };
	loggers.gerrit.debug({ info }, "Resolved Gerrit info");
	return info;
}
