import type { PipelineState } from "../execution/types.ts";

/**
 * Run identification attached to every pipeline event.
 */
export interface SubmissionEventContext {
	/** Pull request number the pipeline is working on */
	prNumber?: number;
	/** Repository in owner/repo form */
	repository?: string;
}

// Strongly typed event map for all pipeline events
export type SubmissionEvents = {
	"pipeline:start": { dryRun: boolean } & SubmissionEventContext;
	"pipeline:state": { state: PipelineState } & SubmissionEventContext;
	"pipeline:advisory": { step: string; message: string } & SubmissionEventContext;
	"pipeline:complete": { changeUrls: string[]; duration: number } & SubmissionEventContext;
	"pipeline:error": { state: PipelineState; error: Error } & SubmissionEventContext;

	"git:branch:create": { name: string };
	"git:branch:delete": { name: string };
	"gerrit:push": { topic: string; branch: string };
};

export type EventName = keyof SubmissionEvents;
export type EventPayload<E extends EventName> = SubmissionEvents[E];
