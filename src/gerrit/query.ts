/**
 * Remote result query
 *
 * Looks up each pushed Change-Id through Gerrit's change search and turns
 * the hits into web URLs, change numbers and patchset shas.
 *
 * @module gerrit/query
 */

import { z } from "zod";
import { isValidChangeId } from "../domain/submission/change-id.ts";
import type { GerritInfo, RepoNames, SubmissionResult } from "../domain/submission/types.ts";
import { loggers } from "../observability/index.ts";
import { type FetchLike, gerritBaseUrl, GerritHttpError, GerritRestClient } from "./rest-client.ts";

const ChangeInfoSchema = z
	.object({
		_number: z.union([z.number(), z.string()]).optional(),
		current_revision: z.string().optional(),
	})
	.passthrough();

const ChangeListSchema = z.array(ChangeInfoSchema);

/**
 * REST access settings shared by the query and the dry-run probe
 */
export interface GerritRestSettings {
	/** Path prefix below the host, e.g. "r"; empty for the root */
	basePath: string;
	username: string;
	password: string;
	fetch?: FetchLike;
}

/**
 * GET a path, retrying once under "/r/" on 404 when no base path is set
 */
export async function getWithRootFallback(
	host: string,
	path: string,
	settings: GerritRestSettings,
): Promise<unknown> {
	const client = new GerritRestClient({
		baseUrl: gerritBaseUrl(host, settings.basePath),
		username: settings.username,
		password: settings.password,
		fetch: settings.fetch,
	});
	try {
		return await client.get(path);
	} catch (error) {
		if (settings.basePath || !(error instanceof GerritHttpError) || error.status !== 404) {
			throw error;
		}
		loggers.gerrit.debug({ path }, "Gerrit REST 404 at root; retrying under /r/");
		const fallback = new GerritRestClient({
			baseUrl: gerritBaseUrl(host, "r"),
			username: settings.username,
			password: settings.password,
			fetch: settings.fetch,
		});
		return fallback.get(path);
	}
}

/**
 * Search path for one open change of a project
 */
export function changeQueryPath(project: string, changeId: string): string {
	const query = `limit:1 is:open project:${project} ${changeId}`;
	return `/changes/?q=${encodeURIComponent(query)}&o=CURRENT_REVISION&n=1`;
}

/**
 * Web URL of a change
 */
export function changeWebUrl(host: string, project: string, number: string): string {
	return `https://${host}/c/${project}/+/${number}`;
}

/**
 * Query Gerrit for every Change-Id in order.
 *
 * Ids that are empty, invalid, unknown or whose lookup fails are left out
 * with a warning; the three output sequences stay order-aligned per hit.
 */
export async function queryGerritResults(options: {
	gerrit: GerritInfo;
	repo: RepoNames;
	changeIds: readonly string[];
	rest: GerritRestSettings;
}): Promise<SubmissionResult> {
	const { gerrit, repo, changeIds, rest } = options;
	const changeUrls: string[] = [];
	const changeNumbers: string[] = [];
	const commitShas: string[] = [];

	loggers.gerrit.info({ count: changeIds.length }, "Querying Gerrit for submitted changes");

	for (const changeId of changeIds) {
		if (!changeId) continue;
		if (!isValidChangeId(changeId)) {
			loggers.gerrit.warn({ changeId }, "Skipping invalid Change-Id");
			continue;
		}

		let changes: z.infer<typeof ChangeListSchema>;
		try {
			const body = await getWithRootFallback(gerrit.host, changeQueryPath(repo.gerritPath, changeId), rest);
			changes = ChangeListSchema.parse(body);
		} catch (error) {
			loggers.gerrit.warn(
				{ changeId, error: error instanceof Error ? error.message : String(error) },
				"Failed to query change via REST",
			);
			continue;
		}

		const change = changes[0];
		if (!change) continue;

		const number = change._number === undefined ? "" : String(change._number);
		if (number) {
			changeUrls.push(changeWebUrl(gerrit.host, repo.gerritPath, number));
			changeNumbers.push(number);
		}
		if (change.current_revision) {
			commitShas.push(change.current_revision);
		}
	}

	return { changeUrls, changeNumbers, commitShas };
}
