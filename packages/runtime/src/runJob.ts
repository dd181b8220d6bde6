import { getErrorMessage, loadJobConfig } from "@rolling-signal/core";
import type { JobConfig, ModuleLogger } from "@rolling-signal/core";
import { loadDataset } from "@rolling-signal/data";
import {
	buildErrorReport,
	buildPreviewRows,
	buildSuccessReport,
	computeSignals,
	printPreview,
	roundTo,
	writeReport,
} from "@rolling-signal/metrics";
import type { JobReport, PreviewRow } from "@rolling-signal/metrics";

export interface JobPaths {
	inputPath: string;
	configPath: string;
	outputPath: string;
}

export interface RunJobOptions extends JobPaths {
	logger: ModuleLogger;
	/** Milliseconds clock; defaults to `Date.now`. */
	clock?: () => number;
	stdout?: (text: string) => void;
	preview?: (rows: PreviewRow[]) => void;
}

export type JobExitCode = 0 | 1;

export interface JobOutcome {
	exitCode: JobExitCode;
	report: JobReport;
}

/**
 * Runs config → dataset → signals → report once. Any failure from the first
 * three stages is reported through the error report with exit code 1.
 */
export const runJob = (options: RunJobOptions): JobOutcome => {
	const { logger } = options;
	const clock = options.clock ?? Date.now;
	const stdout = options.stdout ?? ((text: string) => console.log(text));
	const preview = options.preview ?? printPreview;
	const startedAt = clock();

	logger.info("Job started");

	let config: JobConfig | null = null;
	try {
		config = loadJobConfig(options.configPath);
		const { seed, window, version } = config;
		logger.info("Config loaded", { seed, window, version });

		const dataset = loadDataset(options.inputPath);
		const rowsProcessed = dataset.rows.length;
		logger.info(`Data loaded: ${rowsProcessed} rows`);

		const result = computeSignals(dataset, window);
		preview(buildPreviewRows(dataset.closes, result.rollingMean));
		logger.info(`Rolling mean calculated with window=${window}`);
		logger.info("Signals generated");

		const latencyMs = clock() - startedAt;
		const report = buildSuccessReport({
			version,
			rowsProcessed,
			signalRate: result.signalRate,
			latencyMs,
			seed,
		});
		const payload = writeReport(options.outputPath, report);

		logger.info("Metrics", {
			signal_rate: roundTo(result.signalRate, 4).toFixed(4),
			rows_processed: rowsProcessed,
		});
		logger.info(`Job completed successfully in ${report.latency_ms}ms`);
		stdout(payload);
		return { exitCode: 0, report };
	} catch (error) {
		const latencyMs = Math.floor(clock() - startedAt);
		const report = buildErrorReport(error, config);
		logger.error(`Error occurred: ${getErrorMessage(error)}`);
		const payload = writeReport(options.outputPath, report);
		logger.info(`Job failed in ${latencyMs}ms`);
		stdout(payload);
		return { exitCode: 1, report };
	}
};
