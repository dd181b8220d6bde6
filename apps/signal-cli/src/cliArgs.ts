export type ArgValue = string | boolean;

export const REQUIRED_FLAGS = ["input", "config", "output", "log-file"] as const;

export type RequiredFlag = (typeof REQUIRED_FLAGS)[number];

export interface JobArgs {
	inputPath: string;
	configPath: string;
	outputPath: string;
	logFile: string;
}

export class CliUsageError extends Error {
	constructor(message: string, public readonly missing: RequiredFlag[] = []) {
		super(message);
		this.name = "CliUsageError";
	}
}

export const USAGE = `Usage:
  signal-job --input <csv> --config <yaml> --output <json> --log-file <path>

Options:
  --input <path>       CSV file with a header row and a close column (required)
  --config <path>      YAML or JSON document with seed, window and version (required)
  --output <path>      Where the JSON report is written (required)
  --log-file <path>    Log file, appended to on every run (required)
  --help               Show this message
`;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length > 0 ? value : undefined;
};

/** Resolves the four required flags; a flag given without a value counts as missing. */
export const resolveJobArgs = (args: Record<string, ArgValue>): JobArgs => {
	const missing = REQUIRED_FLAGS.filter((flag) => !getStringArg(args, flag));
	if (missing.length) {
		throw new CliUsageError(
			`Missing required arguments: ${missing.map((flag) => `--${flag}`).join(", ")}`,
			missing
		);
	}
	return {
		inputPath: getStringArg(args, "input") ?? "",
		configPath: getStringArg(args, "config") ?? "",
		outputPath: getStringArg(args, "output") ?? "",
		logFile: getStringArg(args, "log-file") ?? "",
	};
};
