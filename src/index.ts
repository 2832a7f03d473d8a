#!/usr/bin/env -S node --import tsx
import { CommanderError } from "commander";
import { describeError, EXIT_CODES, exitCodeFor, parseArgs, runSubmit, type ExitCode } from "./cli/index.ts";
import { logError, setVerbose } from "./ui/logger.ts";

async function main(): Promise<ExitCode> {
	let verbose = false;
	try {
		const args = parseArgs(process.argv);
		verbose = args.verbose;
		setVerbose(verbose);

		await runSubmit(args, { env: process.env, workspace: process.cwd() });
		return EXIT_CODES.SUCCESS;
	} catch (error) {
		// Commander already printed help, version or the usage error
		if (!(error instanceof CommanderError)) {
			logError(describeError(error, verbose));
		}
		return exitCodeFor(error);
	}
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		logError(String(error));
		process.exitCode = EXIT_CODES.FAILURE;
	},
);
