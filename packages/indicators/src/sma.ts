/**
 * Simple moving average over each trailing window of `period` values.
 *
 * Entry `i` is the mean of `values[i - period + 1 .. i]`. Entries before the
 * first full window, and windows containing a `null`, are `null`.
 */
export function rollingMean(
	values: readonly (number | null)[],
	period: number
): (number | null)[] {
	if (!Number.isInteger(period) || period <= 0) {
		throw new RangeError(`period must be a positive integer, got ${period}`);
	}

	return values.map((_, idx) => {
		if (idx < period - 1) {
			return null;
		}
		let sum = 0;
		for (let j = idx - period + 1; j <= idx; j += 1) {
			const value = values[j];
			if (value === null) {
				return null;
			}
			sum += value;
		}
		return sum / period;
	});
}
