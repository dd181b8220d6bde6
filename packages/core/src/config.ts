import fs from "node:fs";
import { YAMLParseError, parse as parseYaml } from "yaml";
import { FormatError, NotFoundError, ValidationError } from "./errors";

export const REQUIRED_CONFIG_KEYS = ["seed", "window", "version"] as const;

export type RequiredConfigKey = (typeof REQUIRED_CONFIG_KEYS)[number];

export interface JobConfig {
	seed: number;
	window: number;
	version: string;
	/** Keys present in the document beyond the required ones; unused by the job. */
	extras: Record<string, unknown>;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const ensureInteger = (value: unknown, field: RequiredConfigKey): number => {
	if (typeof value === "number" && Number.isInteger(value)) {
		return value;
	}
	if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
		return Number(value.trim());
	}
	throw new ValidationError(
		`Invalid configuration value for ${field}: expected an integer`,
		field
	);
};

const ensureVersion = (value: unknown): string => {
	if (typeof value === "string") {
		return value;
	}
	if (typeof value === "number" && Number.isFinite(value)) {
		return String(value);
	}
	throw new ValidationError(
		"Invalid configuration value for version: expected a string",
		"version"
	);
};

const readConfigDocument = (configPath: string): unknown => {
	const contents = fs.readFileSync(configPath, "utf-8");
	try {
		return parseYaml(contents);
	} catch (error) {
		if (error instanceof YAMLParseError) {
			throw new FormatError(
				`Invalid configuration file format: ${error.message}`,
				error.code
			);
		}
		throw error;
	}
};

/**
 * Reads a YAML (or JSON) job configuration and coerces the required keys.
 *
 * Throws `NotFoundError` when the file is absent, `FormatError` when it is not
 * a key-value document and `ValidationError` when a required key is missing or
 * cannot be coerced.
 */
export const loadJobConfig = (configPath: string): JobConfig => {
	if (!fs.existsSync(configPath)) {
		throw new NotFoundError("Configuration file not found", configPath);
	}

	const document = readConfigDocument(configPath);
	if (!isRecord(document)) {
		throw new FormatError(
			"Invalid configuration file format: expected a key-value mapping"
		);
	}

	for (const key of REQUIRED_CONFIG_KEYS) {
		if (!(key in document)) {
			throw new ValidationError(
				`Invalid configuration file structure: missing key ${key}`,
				key
			);
		}
	}

	const { seed, window, version, ...extras } = document;
	return {
		seed: ensureInteger(seed, "seed"),
		window: ensureInteger(window, "window"),
		version: ensureVersion(version),
		extras,
	};
};
