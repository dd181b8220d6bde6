import fs from "node:fs";
import path from "node:path";
import { getErrorMessage } from "@rolling-signal/core";
import type { JobConfig } from "@rolling-signal/core";
import { SIGNAL_RATE_METRIC, UNKNOWN_VERSION } from "./metricsSchema";
import type { ErrorReport, JobReport, SuccessReport } from "./metricsSchema";

const VALUE_DECIMALS = 4;
const JSON_INDENT = 4;

export interface SuccessReportInput {
	version: string;
	rowsProcessed: number;
	signalRate: number;
	latencyMs: number;
	seed: number;
}

/**
 * Rounds half to even on exact ties (e.g. 0.03125 -> 0.0312) and defers to
 * `toFixed` otherwise.
 */
export const roundTo = (value: number, decimals: number): number => {
	const scale = 10 ** decimals;
	const doubled = Math.round(value * 2 * scale);
	// value is exactly doubled / (2 * scale) only when 5^decimals divides doubled
	const isTie =
		Math.abs(doubled) % 2 === 1 &&
		doubled % 5 ** decimals === 0 &&
		doubled / (2 * scale) === value;
	if (!isTie) {
		return Number(value.toFixed(decimals));
	}
	const lower = (doubled - 1) / 2;
	const even = lower % 2 === 0 ? lower : lower + 1;
	return even / scale;
};

// Object literals below fix the key order of the serialized report.
export const buildSuccessReport = (input: SuccessReportInput): SuccessReport => ({
	version: input.version,
	rows_processed: input.rowsProcessed,
	metric: SIGNAL_RATE_METRIC,
	value: roundTo(input.signalRate, VALUE_DECIMALS),
	latency_ms: Math.max(0, Math.floor(input.latencyMs)),
	seed: input.seed,
	status: "success",
});

export const buildErrorReport = (
	error: unknown,
	config: Pick<JobConfig, "version"> | null
): ErrorReport => ({
	version: config?.version ?? UNKNOWN_VERSION,
	status: "error",
	error_message: getErrorMessage(error),
});

export const serializeReport = (report: JobReport): string =>
	JSON.stringify(report, null, JSON_INDENT);

/** Overwrites `outputPath` with the serialized report and returns the text written. */
export const writeReport = (outputPath: string, report: JobReport): string => {
	const payload = serializeReport(report);
	fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
	fs.writeFileSync(outputPath, payload, "utf8");
	return payload;
};
