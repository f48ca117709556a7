import type { Signal } from "../types";

export function rsiSignal(
	value: number | null,
	oversold: number,
	overbought: number,
): Signal {
	if (value === null) return "neutral";
	if (value < oversold) return "buy";
	if (value > overbought) return "sell";
	return "neutral";
}

/** Buy when MACD crosses above its signal line on the last candle, sell on the opposite cross. */
export function macdCrossSignal(
	previousMacd: number | null,
	previousSignal: number | null,
	macd: number | null,
	signal: number | null,
): Signal {
	if (
		previousMacd === null ||
		previousSignal === null ||
		macd === null ||
		signal === null
	) {
		return "neutral";
	}
	if (macd > signal && previousMacd <= previousSignal) return "buy";
	if (macd < signal && previousMacd >= previousSignal) return "sell";
	return "neutral";
}

export function bollingerSignal(
	close: number,
	upper: number | null,
	lower: number | null,
): Signal {
	if (upper === null || lower === null) return "neutral";
	if (close <= lower) return "buy";
	if (close >= upper) return "sell";
	return "neutral";
}

/**
 * Majority vote: a side wins with at least `minAgreement` votes and more votes
 * than the opposite side.
 */
export function combineSignals(signals: Signal[], minAgreement: number): Signal {
	const buys = signals.filter((s) => s === "buy").length;
	const sells = signals.filter((s) => s === "sell").length;

	if (buys >= minAgreement && buys > sells) return "buy";
	if (sells >= minAgreement && sells > buys) return "sell";
	return "neutral";
}
