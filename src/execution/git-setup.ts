/**
 * Git and git-review configuration for a live run
 *
 * @module execution/git-setup
 */

import { join } from "node:path";
import type { Inputs } from "../domain/config/types.ts";
import { OrchestratorError } from "../domain/errors.ts";
import type { GerritInfo } from "../domain/submission/types.ts";
import { loggers } from "../observability/index.ts";
import { GitOperationFailure } from "../vcs/backends/git-cli.ts";
import type { GitHistory } from "../vcs/services/history-service.ts";
import type { CommandRunner } from "../vcs/types.ts";
import { gitSshEnv } from "./ssh.ts";

/**
 * Set a config key in the repository, falling back to global config
 */
async function configLocalOrGlobal(history: GitHistory, key: string, value: string): Promise<void> {
	try {
		await history.configSet(key, value);
	} catch (error) {
		if (!(error instanceof GitOperationFailure)) throw error;
		loggers.git.debug({ key }, "Local git config failed; writing global config");
		await history.configSet(key, value, { global: true });
	}
}

export function gerritRemoteUrl(user: string, gerrit: GerritInfo): string {
	return `ssh://${user}@${gerrit.host}:${gerrit.port}/${gerrit.project}`;
}

/**
 * Identity, git-review settings, the "gerrit" remote and the commit-msg hook
 */
export async function configureGit(options: {
	gerrit: GerritInfo;
	inputs: Inputs;
	history: GitHistory;
	runner: CommandRunner;
	sshKeyPath?: string;
}): Promise<void> {
	const { gerrit, inputs, history, runner } = options;
	const user = inputs.gerritSshUser.trim();
	loggers.pipeline.info({ host: gerrit.host }, "Configuring git and git-review");

	await configLocalOrGlobal(history, "gitreview.username", user);
	await configLocalOrGlobal(history, "user.name", user);
	await configLocalOrGlobal(history, "user.email", inputs.gerritSshUserEmail.trim());
	await configLocalOrGlobal(history, "gitreview.hostname", gerrit.host);
	await configLocalOrGlobal(history, "gitreview.port", String(gerrit.port));
	await configLocalOrGlobal(history, "gitreview.project", gerrit.project);

	if ((await history.configGet("remote.gerrit.url")) === null) {
		const url = gerritRemoteUrl(user, gerrit);
		loggers.pipeline.info({ url }, "Adding 'gerrit' remote");
		try {
			await history.addRemote("gerrit", url);
		} catch (error) {
			loggers.git.warn({ error: String(error) }, "Could not add 'gerrit' remote");
		}
	}

	const toplevel = await history.showToplevel();
	await configLocalOrGlobal(history, "core.hooksPath", join(toplevel, ".git", "hooks"));

	try {
		await runner(["git", "review", "-s", "-v"], { cwd: history.workspace, env: gitSshEnv(options.sshKeyPath) });
	} catch (error) {
		throw new OrchestratorError("Failed to initialize git-review", { cause: error });
	}
}
