export { bus } from "./bus.ts";
export type { EventName, EventPayload, SubmissionEventContext, SubmissionEvents } from "./types.ts";
