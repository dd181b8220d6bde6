import type { PreviewRow } from "./metricsSchema";

export const DEFAULT_PREVIEW_ROWS = 10;

export const buildPreviewRows = (
	closes: readonly (number | null)[],
	rollingMean: readonly (number | null)[],
	limit = DEFAULT_PREVIEW_ROWS
): PreviewRow[] =>
	closes.slice(0, Math.max(0, limit)).map((close, idx) => ({
		close,
		rolling_mean: rollingMean[idx] ?? null,
	}));

/** Prints the `(close, rolling_mean)` head of the run to stdout. */
export const printPreview = (rows: PreviewRow[]): void => {
	console.table(rows);
};
