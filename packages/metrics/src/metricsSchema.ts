export const SIGNAL_RATE_METRIC = "signal_rate";

/** Version reported when the job failed before its configuration loaded. */
export const UNKNOWN_VERSION = "unknown";

export interface SuccessReport {
	version: string;
	rows_processed: number;
	metric: typeof SIGNAL_RATE_METRIC;
	value: number;
	latency_ms: number;
	seed: number;
	status: "success";
}

export interface ErrorReport {
	version: string;
	status: "error";
	error_message: string;
}

export type JobReport = SuccessReport | ErrorReport;

export interface PreviewRow {
	close: number | null;
	rolling_mean: number | null;
}
