import mitt from "mitt";
import type { EventName, EventPayload, SubmissionEvents } from "./types.ts";

const emitter = mitt<SubmissionEvents>();

export const bus = {
	emit: <E extends EventName>(event: E, payload: EventPayload<E>) => {
		emitter.emit(event, payload);
	},
	on: <E extends EventName>(event: E, handler: (payload: EventPayload<E>) => void) => {
		emitter.on(event, handler);
		return () => emitter.off(event, handler);
	},
	off: <E extends EventName>(event: E, handler: (payload: EventPayload<E>) => void) => {
		emitter.off(event, handler);
	},
	clear: () => emitter.all.clear(),
};
