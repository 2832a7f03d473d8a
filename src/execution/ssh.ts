/**
 * SSH key and known_hosts staging for the Gerrit push
 *
 * @module execution/ssh
 */

import { appendFile, chmod, mkdir, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import type { Inputs } from "../domain/config/types.ts";
import { loggers } from "../observability/index.ts";
import { quoteArg } from "../vcs/backends/command-runner.ts";

export const SSH_KEY_FILE = "id_rsa_pr2gerrit";

export function sshConfigContent(keyPath: string): string {
	return [
		"# Generated by pr2gerrit",
		"Host *",
		"    StrictHostKeyChecking yes",
		"    UserKnownHostsFile ~/.ssh/known_hosts",
		`    IdentityFile ${keyPath}`,
		"    PubkeyAcceptedKeyTypes +ssh-rsa",
		"",
	].join("\n");
}

/**
 * Environment that makes git (and git-review) offer the staged key.
 * Empty when no key was staged.
 */
export function gitSshEnv(keyPath: string | undefined): Record<string, string> {
	return keyPath ? { GIT_SSH_COMMAND: `ssh -i ${quoteArg(keyPath)}` } : {};
}

/**
 * Write the private key and known hosts under ~/.ssh.
 *
 * Skipped when either is missing. An existing ssh config is left alone, so
 * callers pass the returned key path to ssh themselves (see `gitSshEnv`).
 * Returns the key path, or null when nothing was staged.
 */
export async function setupSsh(inputs: Inputs, home: string = homedir()): Promise<string | null> {
	if (!inputs.gerritSshPrivkey.trim() || !inputs.gerritKnownHosts.trim()) {
		loggers.pipeline.debug("SSH key or known hosts not provided; skipping SSH setup");
		return null;
	}

	const sshDir = join(home, ".ssh");
	await mkdir(sshDir, { recursive: true, mode: 0o700 });

	const keyPath = join(sshDir, SSH_KEY_FILE);
	await writeFile(keyPath, `${inputs.gerritSshPrivkey.trim()}\n`, { encoding: "utf-8", mode: 0o600 });
	await chmod(keyPath, 0o600);

	const knownHostsPath = join(sshDir, "known_hosts");
	await appendFile(knownHostsPath, `${inputs.gerritKnownHosts.trim()}\n`, "utf-8");
	await chmod(knownHostsPath, 0o644);

	const configPath = join(sshDir, "config");
	try {
		await writeFile(configPath, sshConfigContent(keyPath), { encoding: "utf-8", mode: 0o600, flag: "wx" });
		loggers.pipeline.debug({ configPath }, "SSH config created");
	} catch (error) {
		if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
			throw error;
		}
		loggers.pipeline.debug({ configPath }, "Keeping existing SSH config");
	}

	loggers.pipeline.info({ keyPath }, "SSH key and known hosts staged");
	return keyPath;
}
