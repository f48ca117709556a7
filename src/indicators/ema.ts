export function emaAlpha(period: number): number {
	if (period <= 0) {
		throw new Error(`EMA period must be positive, got ${period}`);
	}
	return 2 / (period + 1);
}

/**
 * Exponential moving average seeded with the first value:
 * ema[0] = x[0], ema[i] = alpha * x[i] + (1 - alpha) * ema[i - 1]
 */
export function ema(values: number[], period: number): number[] {
	const alpha = emaAlpha(period);
	const result: number[] = [];

	for (let i = 0; i < values.length; i++) {
		const prev = i === 0 ? values[0] : result[i - 1];
		result.push(alpha * values[i] + (1 - alpha) * prev);
	}

	return result;
}

/** Last EMA value, or null with fewer than period + 1 values. */
export function emaLatest(values: number[], period: number): number | null {
	if (values.length < period + 1) return null;
	const series = ema(values, period);
	return series[series.length - 1];
}
