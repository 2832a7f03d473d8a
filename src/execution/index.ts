/**
 * Execution Module
 *
 * ## Module Structure
 *
 * - **pipeline**: the submission state machine (`Orchestrator`)
 * - **bulk**: sequential runs over every open PR
 * - **preflight**: dry-run network and API checks
 * - **ssh / git-setup / push**: live submission steps
 * - **backref**: advisory cross-links after the push
 * - **outputs**: workflow step outputs
 *
 * @module execution
 */

export { addBackrefComments, actionRunUrl, backrefArgv, closePullRequestIfRequired, commentOnPullRequest, pullRequestUrl } from "./backref.ts";
export { isBulkMode, pullContext, runBulkSubmission } from "./bulk.ts";
export { configureGit, gerritRemoteUrl } from "./git-setup.ts";
export { formatOutput, formatSubmissionOutputs, writeSubmissionOutputs } from "./outputs.ts";
export { Orchestrator } from "./pipeline.ts";
export { dryRunPreflight, nodeNetworkProbes } from "./preflight.ts";
export type { NetworkProbes } from "./preflight.ts";
export { buildTopic, cleanupScratchBranch, gitReviewArgv, pushToGerrit } from "./push.ts";
export { gitSshEnv, SSH_KEY_FILE, setupSsh, sshConfigContent } from "./ssh.ts";
export { resolveReviewers, resolveTargetBranch } from "./target-branch.ts";
export { STEP_OK, advisory } from "./types.ts";
export type { PipelineDeps, PipelineRunContext, PipelineState, StepOutcome } from "./types.ts";
