import { ema } from "./ema";

export type MacdSeries = {
	macd: Array<number | null>;
	signal: Array<number | null>;
	histogram: Array<number | null>;
};

export function macd(
	values: number[],
	fastPeriod: number,
	slowPeriod: number,
	signalPeriod: number,
): MacdSeries {
	const minLength = Math.max(fastPeriod, slowPeriod) + signalPeriod;
	if (values.length < minLength) {
		const empty = values.map(() => null);
		return { macd: empty, signal: [...empty], histogram: [...empty] };
	}

	const fast = ema(values, fastPeriod);
	const slow = ema(values, slowPeriod);
	const line = fast.map((value, i) => value - slow[i]);
	const signal = ema(line, signalPeriod);
	const histogram = line.map((value, i) => value - signal[i]);

	return { macd: line, signal, histogram };
}
