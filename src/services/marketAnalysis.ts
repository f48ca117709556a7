import type { StrategyConfig } from "../config";
import { adaptivePeriods, type MomentumPeriods } from "../indicators/adaptive";
import { bollingerBands } from "../indicators/bollinger";
import { emaLatest } from "../indicators/ema";
import { macd } from "../indicators/macd";
import { rsi } from "../indicators/rsi";
import type {
	Candle,
	IndicatorParameters,
	IndicatorSnapshot,
	Timeframe,
} from "../types";
import { logger } from "../utils/logger";
import {
	bollingerSignal,
	combineSignals,
	macdCrossSignal,
	rsiSignal,
} from "./signalEngine";

export type AnalysisSettings = Pick<
	StrategyConfig,
	| "adaptivePeriods"
	| "rsiPeriod"
	| "rsiOversold"
	| "rsiOverbought"
	| "macdFast"
	| "macdSlow"
	| "macdSignal"
	| "emaShortPeriod"
	| "emaLongPeriod"
	| "bollingerPeriod"
	| "bollingerStdDev"
	| "minAgreement"
>;

function last<T>(values: T[], offset = 1): T | null {
	const index = values.length - offset;
	return index >= 0 ? values[index] : null;
}

function momentumPeriods(
	count: number,
	settings: AnalysisSettings,
): MomentumPeriods | null {
	const configured: MomentumPeriods = {
		rsiPeriod: settings.rsiPeriod,
		macdFast: settings.macdFast,
		macdSlow: settings.macdSlow,
		macdSignal: settings.macdSignal,
	};
	if (!settings.adaptivePeriods) {
		return count > settings.rsiPeriod ? configured : null;
	}
	return adaptivePeriods(count, configured);
}

/**
 * Indicator snapshot for the last closed candle. Candles still open at `now`
 * are ignored; returns null when too little history remains.
 */
export function analyzeCandles(
	symbol: string,
	timeframe: Timeframe,
	candles: Candle[],
	settings: AnalysisSettings,
	now: number = Date.now(),
): IndicatorSnapshot | null {
	const closed = candles.filter((c) => c.closeTime < now);
	const periods = momentumPeriods(closed.length, settings);
	const lastCandle = last(closed);
	if (!periods || !lastCandle) {
		logger.warn(
			{ symbol, timeframe, candles: closed.length },
			"Not enough closed candles for indicators",
		);
		return null;
	}

	const closes = closed.map((c) => c.close);
	const rsiSeries = rsi(closes, periods.rsiPeriod);
	const macdSeries = macd(
		closes,
		periods.macdFast,
		periods.macdSlow,
		periods.macdSignal,
	);
	const bands = bollingerBands(
		closes,
		settings.bollingerPeriod,
		settings.bollingerStdDev,
	);

	const rsiValue = last(rsiSeries);
	const macdValue = last(macdSeries.macd);
	const signalValue = last(macdSeries.signal);
	const upper = last(bands.upper);
	const lower = last(bands.lower);

	const rsiVote = rsiSignal(
		rsiValue,
		settings.rsiOversold,
		settings.rsiOverbought,
	);
	const macdVote = macdCrossSignal(
		last(macdSeries.macd, 2),
		last(macdSeries.signal, 2),
		macdValue,
		signalValue,
	);
	const bbVote = bollingerSignal(lastCandle.close, upper, lower);

	const parameters: IndicatorParameters = {
		...periods,
		emaShortPeriod: settings.emaShortPeriod,
		emaLongPeriod: settings.emaLongPeriod,
		bollingerPeriod: settings.bollingerPeriod,
		bollingerStdDev: settings.bollingerStdDev,
	};

	return {
		symbol,
		timeframe,
		timestamp: lastCandle.openTime,
		closePrice: lastCandle.close,
		rsi: rsiValue,
		macd: macdValue,
		macdSignal: signalValue,
		macdHistogram: last(macdSeries.histogram),
		emaShort: emaLatest(closes, settings.emaShortPeriod),
		emaLong: emaLatest(closes, settings.emaLongPeriod),
		bbUpper: upper,
		bbMiddle: last(bands.middle),
		bbLower: lower,
		rsiSignal: rsiVote,
		macdCrossSignal: macdVote,
		bbSignal: bbVote,
		combinedSignal: combineSignals(
			[rsiVote, macdVote, bbVote],
			settings.minAgreement,
		),
		parameters,
	};
}
