/**
 * VCS History Service
 *
 * Commit range inspection and history mutation for the submission
 * pipeline: cherry-picks, new and amended commits, squash merges,
 * trailers, authorship and the branch/config primitives around them.
 *
 * @module vcs/services/history-service
 */

import { bus } from "../../events/bus.ts";
import { dedupePreservingOrder } from "../../domain/submission/change-id.ts";
import type { TrailerMap } from "../../domain/submission/types.ts";
import { loggers } from "../../observability/index.ts";
import { retryingRunner } from "../backends/command-runner.ts";
import { filterTrailers, GitCli, GitOperationFailure, parseTrailers } from "../backends/git-cli.ts";
import type { CommandRunner } from "../types.ts";

/**
 * Options for a brand new commit
 */
export interface CommitNewOptions {
	message: string;
	/** "Name <email>" */
	author?: string;
	signoff?: boolean;
	allowEmpty?: boolean;
}

/**
 * Options for amending HEAD
 */
export interface CommitAmendOptions {
	/** Replacement message; the current one is kept when omitted */
	message?: string;
	author?: string;
	signoff?: boolean;
	noEdit?: boolean;
}

/**
 * Scope of a git config read or write
 */
export interface ConfigScope {
	global?: boolean;
}

function lines(output: string): string[] {
	return output
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

function scopeArgs(scope: ConfigScope): string[] {
	return scope.global ? ["config", "--global"] : ["config"];
}

/**
 * Git history inspector and mutator bound to one workspace
 */
export class GitHistory {
	private readonly git: GitCli;

	constructor(options: { workspace: string; runner?: CommandRunner }) {
		this.git = new GitCli(options.workspace, options.runner ?? retryingRunner);
	}

	get workspace(): string {
		return this.git.workspace;
	}

	// ==========================================================================
	// Inspection
	// ==========================================================================

	/**
	 * Commits reachable from head but not base, oldest first
	 */
	async commitRange(baseRef: string, headRef: string): Promise<string[]> {
		const result = await this.git.run(["rev-list", "--reverse", `${baseRef}..${headRef}`]);
		return lines(result.stdout);
	}

	async revParse(ref: string): Promise<string> {
		const result = await this.git.run(["rev-parse", ref]);
		return result.stdout.trim();
	}

	async refExists(ref: string): Promise<boolean> {
		const result = await this.git.tryRun(["rev-parse", "--verify", "--quiet", ref]);
		return result.ok;
	}

	/**
	 * Symbolic short name of a ref, or null when it does not resolve
	 */
	async abbrevRef(ref: string): Promise<string | null> {
		const result = await this.git.tryRun(["rev-parse", "--abbrev-ref", ref]);
		if (!result.ok) return null;
		const name = result.value.stdout.trim();
		return name || null;
	}

	async showToplevel(): Promise<string> {
		const result = await this.git.run(["rev-parse", "--show-toplevel"]);
		return result.stdout.trim();
	}

	/**
	 * Author of a commit as "Name <email>"
	 */
	async authorOf(rev: string): Promise<string> {
		const result = await this.git.run(["log", "-n", "1", "--format=%an <%ae>", rev]);
		return result.stdout.trim();
	}

	/** Full raw message of a commit */
	async messageBody(rev: string): Promise<string> {
		const result = await this.git.run(["show", "-s", "--format=%B", rev]);
		return result.stdout;
	}

	/**
	 * Concatenated messages of a range, oldest first
	 */
	async logMessages(range: string): Promise<string> {
		const result = await this.git.run(["log", "--format=%B", "--reverse", range]);
		return result.stdout;
	}

	/**
	 * Trailers of a commit, optionally restricted to some keys
	 */
	async trailers(commitId: string, keys?: readonly string[]): Promise<TrailerMap> {
		return filterTrailers(parseTrailers(await this.messageBody(commitId)), keys);
	}

	/**
	 * Trailers of HEAD; empty when there is no HEAD yet
	 */
	async lastCommitTrailers(keys?: readonly string[]): Promise<TrailerMap> {
		try {
			return await this.trailers("HEAD", keys);
		} catch (error) {
			if (error instanceof GitOperationFailure) {
				loggers.git.debug({ error: error.message }, "No readable HEAD commit");
				return {};
			}
			throw error;
		}
	}

	// ==========================================================================
	// Mutation
	// ==========================================================================

	async cherryPick(commitId: string): Promise<void> {
		await this.git.run(["cherry-pick", commitId]);
	}

	async commitNew(options: CommitNewOptions): Promise<void> {
		const args = ["commit"];
		if (options.signoff ?? true) args.push("--signoff");
		if (options.allowEmpty) args.push("--allow-empty");
		if (options.author) args.push("--author", options.author);
		args.push("-m", options.message);
		await this.git.run(args);
	}

	async commitAmend(options: CommitAmendOptions = {}): Promise<void> {
		const args = ["commit", "--amend"];
		if (options.message !== undefined) {
			args.push("-m", options.message);
		} else if (options.noEdit ?? true) {
			args.push("--no-edit");
		}
		if (options.signoff ?? true) args.push("--signoff");
		if (options.author) args.push("--author", options.author);
		await this.git.run(args);
	}

	async mergeSquash(ref: string): Promise<void> {
		await this.git.run(["merge", "--squash", ref]);
	}

	async fetch(remote: string, ref: string, options: { depth?: number } = {}): Promise<void> {
		const args = ["fetch"];
		if (options.depth !== undefined) args.push(`--depth=${options.depth}`);
		args.push(remote, ref);
		await this.git.run(args);
	}

	async checkout(ref: string): Promise<void> {
		await this.git.run(["checkout", ref]);
	}

	async createBranch(name: string, startPoint: string): Promise<void> {
		await this.git.run(["checkout", "-b", name, startPoint]);
		bus.emit("git:branch:create", { name });
	}

	async deleteBranch(name: string, force = false): Promise<void> {
		await this.git.run(["branch", force ? "-D" : "-d", name]);
		bus.emit("git:branch:delete", { name });
	}

	// ==========================================================================
	// Config and remotes
	// ==========================================================================

	async configSet(key: string, value: string, scope: ConfigScope = {}): Promise<void> {
		await this.git.run([...scopeArgs(scope), key, value]);
	}

	/**
	 * Single config value, or null when unset
	 */
	async configGet(key: string, scope: ConfigScope = {}): Promise<string | null> {
		const result = await this.git.tryRun([...scopeArgs(scope), "--get", key]);
		if (!result.ok) return null;
		const value = result.value.stdout.trim();
		return value || null;
	}

	async configGetAll(key: string, scope: ConfigScope = {}): Promise<string[]> {
		const result = await this.git.tryRun([...scopeArgs(scope), "--get-all", key]);
		return result.ok ? lines(result.value.stdout) : [];
	}

	async addRemote(name: string, url: string): Promise<void> {
		await this.git.run(["remote", "add", name, url]);
	}

	async remoteUrl(name: string): Promise<string | null> {
		const result = await this.git.tryRun(["remote", "get-url", name]);
		if (!result.ok) return null;
		return result.value.stdout.trim() || null;
	}

	/**
	 * Reviewer emails from git config, in priority order without duplicates:
	 * pr2gerrit.reviewersEmail, reviewers.email (local then global, comma
	 * separated), then user.email local and global.
	 */
	async enumerateReviewerEmails(): Promise<string[]> {
		const emails: string[] = [];
		const addCsv = (value: string | null) => {
			if (!value) return;
			for (const part of value.split(",")) {
				const email = part.trim();
				if (email) emails.push(email);
			}
		};

		addCsv(await this.configGet("pr2gerrit.reviewersEmail"));
		for (const value of await this.configGetAll("reviewers.email")) addCsv(value);
		for (const value of await this.configGetAll("reviewers.email", { global: true })) addCsv(value);
		addCsv(await this.configGet("user.email"));
		addCsv(await this.configGet("user.email", { global: true }));

		return dedupePreservingOrder(emails);
	}
}
