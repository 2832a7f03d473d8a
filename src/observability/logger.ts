import pino from "pino";

// Determine if we're in development mode (only when explicitly set)
const isDev = process.env.NODE_ENV === "development";

export const logger = pino({
	name: "pr2gerrit",
	level: process.env.LOG_LEVEL || "warn",
	transport: isDev
		? {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "HH:MM:ss",
					ignore: "pid,hostname",
				},
			}
		: undefined,
});

export const createLogger = (component: string) => logger.child({ component });

export const loggers = {
	pipeline: createLogger("pipeline"),
	git: createLogger("git"),
	gerrit: createLogger("gerrit"),
	github: createLogger("github"),
	config: createLogger("config"),
	cli: createLogger("cli"),
};
