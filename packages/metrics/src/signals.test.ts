import { ValidationError } from "@rolling-signal/core";
import { describe, expect, it } from "vitest";
import { computeSignals } from "./signals";

const dataset = (closes: (number | null)[]) => ({ closes });

describe("computeSignals", () => {
	it("signals when the close is strictly above the rolling mean", () => {
		const result = computeSignals(dataset([10, 12, 11, 15, 14, 13]), 3);

		expect(result.rollingMean).toEqual([null, null, 11, 38 / 3, 40 / 3, 14]);
		expect(result.signals).toEqual([0, 0, 0, 1, 1, 0]);
		expect(result.signalCount).toBe(2);
		expect(result.rowCount).toBe(6);
		expect(result.signalRate).toBeCloseTo(1 / 3, 12);
	});

	it("never signals on warm-up rows", () => {
		const result = computeSignals(dataset([1, 100, 1000]), 2);
		expect(result.signals[0]).toBe(0);
		expect(result.signals).toEqual([0, 1, 1]);
	});

	it("does not signal when the close equals the mean", () => {
		const result = computeSignals(dataset([5, 5, 5, 5]), 2);
		expect(result.signals).toEqual([0, 0, 0, 0]);
		expect(result.signalRate).toBe(0);
	});

	it("yields a zero rate when the window exceeds the row count", () => {
		const result = computeSignals(dataset([1, 2, 3]), 10);
		expect(result.rollingMean).toEqual([null, null, null]);
		expect(result.signals).toEqual([0, 0, 0]);
		expect(result.signalRate).toBe(0);
	});

	it("treats missing closes as non-signalling", () => {
		const result = computeSignals(dataset([1, null, 3, 5]), 1);
		expect(result.signals).toEqual([0, 0, 0, 0]);

		const widened = computeSignals(dataset([1, null, 3, 5, 9]), 2);
		expect(widened.rollingMean).toEqual([null, null, null, 4, 7]);
		expect(widened.signals).toEqual([0, 0, 0, 1, 1]);
		expect(widened.signalRate).toBe(0.4);
	});

	it("keeps the rate within [0, 1]", () => {
		const rising = computeSignals(dataset([1, 2, 3, 4, 5, 6, 7, 8]), 1);
		expect(rising.signalRate).toBe(0);

		const steps = computeSignals(dataset([1, 2, 3, 4, 5, 6, 7, 8]), 2);
		expect(steps.signalRate).toBe(7 / 8);
	});

	it("rejects a non-positive window with a ValidationError", () => {
		expect(() => computeSignals(dataset([1, 2]), 0)).toThrowError(
			new ValidationError("Invalid window size: 0 (must be a positive integer)")
		);
		expect(() => computeSignals(dataset([1, 2]), -3)).toThrowError(
			ValidationError
		);
	});
});
