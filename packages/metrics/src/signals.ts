import { ValidationError } from "@rolling-signal/core";
import type { Dataset } from "@rolling-signal/data";
import { rollingMean } from "@rolling-signal/indicators";

export type Signal = 0 | 1;

export interface SignalResult {
	rollingMean: (number | null)[];
	signals: Signal[];
	signalCount: number;
	rowCount: number;
	/** Share of rows with a long signal, in [0, 1]. */
	signalRate: number;
}

export const assertWindow = (window: number): number => {
	if (!Number.isInteger(window) || window <= 0) {
		throw new ValidationError(
			`Invalid window size: ${window} (must be a positive integer)`,
			"window"
		);
	}
	return window;
};

/**
 * A row signals `1` when its close is strictly above the rolling mean. Rows
 * without a mean (warm-up rows or windows with gaps) never signal.
 */
export const computeSignals = (
	dataset: Pick<Dataset, "closes">,
	window: number
): SignalResult => {
	const period = assertWindow(window);
	const closes = dataset.closes;
	const means = rollingMean(closes, period);
	const signals = closes.map((close, idx): Signal => {
		const mean = means[idx];
		return close !== null && mean !== null && close > mean ? 1 : 0;
	});
	const signalCount = signals.reduce<number>((acc, signal) => acc + signal, 0);
	const rowCount = closes.length;
	return {
		rollingMean: means,
		signals,
		signalCount,
		rowCount,
		signalRate: rowCount > 0 ? signalCount / rowCount : 0,
	};
};
