import {
	getErrorMessage,
	loadEnvFiles,
	openJobLogger,
	readLoggerSettings,
} from "@rolling-signal/core";
import type { JobLogger } from "@rolling-signal/core";
import { runJob } from "@rolling-signal/runtime";
import { CliUsageError, USAGE, parseCliArgs, resolveJobArgs } from "./cliArgs";
import type { JobArgs } from "./cliArgs";

export const EXIT_USAGE = 2;
export const EXIT_FAILURE = 1;

export interface CliOptions {
	/** Directory searched for `.env` files. */
	cwd?: string;
	env?: NodeJS.ProcessEnv;
}

export const runCli = (argv: string[], options: CliOptions = {}): number => {
	const argMap = parseCliArgs(argv);
	if (argMap.help) {
		console.log(USAGE);
		return 0;
	}

	let jobArgs: JobArgs;
	try {
		jobArgs = resolveJobArgs(argMap);
	} catch (error) {
		if (error instanceof CliUsageError) {
			console.error(`${error.message}\n\n${USAGE}`);
			return EXIT_USAGE;
		}
		throw error;
	}

	loadEnvFiles(options.cwd ?? process.cwd());
	const settings = readLoggerSettings(options.env ?? process.env);

	let logger: JobLogger;
	try {
		logger = openJobLogger({ logFile: jobArgs.logFile, ...settings });
	} catch (error) {
		console.error(`Unable to open log file: ${getErrorMessage(error)}`);
		return EXIT_FAILURE;
	}

	try {
		return runJob({
			inputPath: jobArgs.inputPath,
			configPath: jobArgs.configPath,
			outputPath: jobArgs.outputPath,
			logger,
		}).exitCode;
	} catch (error) {
		logger.error("Job aborted", { error: getErrorMessage(error) });
		console.error(`Job aborted: ${getErrorMessage(error)}`);
		return EXIT_FAILURE;
	} finally {
		logger.close();
	}
};
