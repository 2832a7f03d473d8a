/**
 * Dry-run preflight checks
 *
 * Validates DNS, SSH reachability, the Gerrit REST endpoint and GitHub
 * access without writing anything.
 *
 * @module execution/preflight
 */

import { lookup } from "node:dns/promises";
import { connect } from "node:net";
import { OrchestratorError } from "../domain/errors.ts";
import { getWithRootFallback } from "../gerrit/query.ts";
import { loggers } from "../observability/index.ts";
import { buildTopic } from "./push.ts";
import { resolveReviewers } from "./target-branch.ts";
import type { PipelineDeps, PipelineRunContext } from "./types.ts";

const TCP_TIMEOUT_MS = 5000;

/**
 * Low-level network checks, replaceable in tests
 */
export interface NetworkProbes {
	resolveHost(host: string): Promise<void>;
	connectTcp(host: string, port: number, timeoutMs: number): Promise<void>;
}

export const nodeNetworkProbes: NetworkProbes = {
	async resolveHost(host) {
		await lookup(host);
	},
	connectTcp(host, port, timeoutMs) {
		return new Promise<void>((resolve, reject) => {
			const socket = connect({ host, port });
			socket.setTimeout(timeoutMs);
			socket.once("connect", () => {
				socket.destroy();
				resolve();
			});
			socket.once("timeout", () => {
				socket.destroy();
				reject(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`));
			});
			socket.once("error", (error) => {
				socket.destroy();
				reject(error);
			});
		});
	},
};

function logTargets(ctx: PipelineRunContext): void {
	loggers.pipeline.info(
		{
			project: ctx.repoNames?.gerritPath,
			branch: ctx.targetBranch,
			topic: buildTopic(ctx.inputs.topicPrefix, ctx.repoNames?.githubName ?? "", ctx.github.prNumber),
			reviewers: resolveReviewers(ctx.inputs),
		},
		"Dry-run targets",
	);
}

/**
 * Run every preflight check. DNS, TCP and GitHub failures are fatal; a
 * failing REST probe is only a warning.
 */
export async function dryRunPreflight(ctx: PipelineRunContext, deps: PipelineDeps): Promise<void> {
	const { gerrit } = ctx;
	if (!gerrit) throw new OrchestratorError("Gerrit connection not resolved before preflight");
	loggers.pipeline.info("Dry-run: starting preflight checks");

	if (ctx.inputs.dryRunDisableNetwork) {
		loggers.pipeline.info("Dry-run: network checks disabled");
		logTargets(ctx);
		return;
	}

	const probes = deps.probes ?? nodeNetworkProbes;

	try {
		await probes.resolveHost(gerrit.host);
		loggers.pipeline.info({ host: gerrit.host }, "DNS resolution for Gerrit host succeeded");
	} catch (error) {
		throw new OrchestratorError("DNS resolution failed", { cause: error, context: { host: gerrit.host } });
	}

	try {
		await probes.connectTcp(gerrit.host, gerrit.port, TCP_TIMEOUT_MS);
		loggers.pipeline.info({ host: gerrit.host, port: gerrit.port }, "SSH TCP connectivity verified");
	} catch (error) {
		throw new OrchestratorError("SSH TCP connectivity failed", {
			cause: error,
			context: { host: gerrit.host, port: gerrit.port },
		});
	}

	const username = ctx.inputs.gerritHttpUser || ctx.inputs.gerritSshUser;
	const password = ctx.inputs.gerritHttpPassword;
	const authenticated = Boolean(username && password);
	try {
		await getWithRootFallback(gerrit.host, authenticated ? "/accounts/self" : "/dashboard/self", {
			basePath: ctx.inputs.gerritHttpBasePath,
			username,
			password,
			fetch: deps.fetch,
		});
		loggers.pipeline.info({ authenticated }, "Gerrit REST endpoint reachable");
	} catch (error) {
		loggers.pipeline.warn({ error: String(error) }, "Gerrit REST probe did not succeed");
	}

	try {
		if (ctx.github.prNumber !== null) {
			const pull = await deps.gateway.getPull(ctx.github.prNumber);
			loggers.pipeline.info({ prNumber: pull.number, title: pull.title }, "GitHub PR metadata loaded");
		} else {
			const pulls = await deps.gateway.listOpenPulls();
			loggers.pipeline.info({ repository: ctx.github.repository, count: pulls.length }, "GitHub open PR count");
		}
	} catch (error) {
		throw new OrchestratorError("GitHub API validation failed", { cause: error });
	}

	logTargets(ctx);
}
