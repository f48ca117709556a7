/**
 * RSI over simple rolling means of gains and losses.
 * Entries before index `period` are null; a flat window yields null.
 */
export function rsi(values: number[], period: number): Array<number | null> {
	if (period <= 0) {
		throw new Error(`RSI period must be positive, got ${period}`);
	}

	const result: Array<number | null> = values.map(() => null);
	if (values.length < period + 1) return result;

	const gains: number[] = [0];
	const losses: number[] = [0];
	for (let i = 1; i < values.length; i++) {
		const delta = values[i] - values[i - 1];
		gains.push(delta > 0 ? delta : 0);
		losses.push(delta < 0 ? -delta : 0);
	}

	for (let i = period; i < values.length; i++) {
		let gainSum = 0;
		let lossSum = 0;
		for (let j = i - period + 1; j <= i; j++) {
			gainSum += gains[j];
			lossSum += losses[j];
		}
		const avgGain = gainSum / period;
		const avgLoss = lossSum / period;

		if (avgLoss === 0) {
			result[i] = avgGain === 0 ? null : 100;
			continue;
		}
		result[i] = 100 - 100 / (1 + avgGain / avgLoss);
	}

	return result;
}
