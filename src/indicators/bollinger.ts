export type BollingerSeries = {
	upper: Array<number | null>;
	middle: Array<number | null>;
	lower: Array<number | null>;
};

/** SMA(period) plus/minus `stdDev` sample standard deviations. */
export function bollingerBands(
	values: number[],
	period: number,
	stdDev: number,
): BollingerSeries {
	if (period < 2) {
		throw new Error(`Bollinger period must be at least 2, got ${period}`);
	}

	const upper: Array<number | null> = [];
	const middle: Array<number | null> = [];
	const lower: Array<number | null> = [];

	for (let i = 0; i < values.length; i++) {
		if (i < period - 1) {
			upper.push(null);
			middle.push(null);
			lower.push(null);
			continue;
		}

		const window = values.slice(i - period + 1, i + 1);
		const mean = window.reduce((acc, v) => acc + v, 0) / period;
		const variance =
			window.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (period - 1);
		const deviation = Math.sqrt(variance) * stdDev;

		upper.push(mean + deviation);
		middle.push(mean);
		lower.push(mean - deviation);
	}

	return { upper, middle, lower };
}
