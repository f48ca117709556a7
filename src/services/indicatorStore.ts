import type { Queryable } from "../clients/database";
import type { IndicatorSnapshot } from "../types";
import { logger } from "../utils/logger";
import { appendJsonLine } from "../utils/storage";

export interface IndicatorRepository {
	save(snapshot: IndicatorSnapshot): Promise<void>;
}

const UPSERT_INDICATORS = `
INSERT INTO public.indicators (
	symbol, timestamp, timeframe, close_price,
	rsi, macd, macd_signal, macd_hist,
	ema_short, ema_long, bb_upper, bb_middle, bb_lower,
	rsi_signal, macd_signal_value, bb_signal, combined_signal, parameters
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)
ON CONFLICT (symbol, timestamp, timeframe) DO UPDATE SET
	close_price = EXCLUDED.close_price,
	rsi = EXCLUDED.rsi,
	macd = EXCLUDED.macd,
	macd_signal = EXCLUDED.macd_signal,
	macd_hist = EXCLUDED.macd_hist,
	ema_short = EXCLUDED.ema_short,
	ema_long = EXCLUDED.ema_long,
	bb_upper = EXCLUDED.bb_upper,
	bb_middle = EXCLUDED.bb_middle,
	bb_lower = EXCLUDED.bb_lower,
	rsi_signal = EXCLUDED.rsi_signal,
	macd_signal_value = EXCLUDED.macd_signal_value,
	bb_signal = EXCLUDED.bb_signal,
	combined_signal = EXCLUDED.combined_signal,
	parameters = EXCLUDED.parameters`;

export function indicatorRow(snapshot: IndicatorSnapshot): unknown[] {
	return [
		snapshot.symbol,
		new Date(snapshot.timestamp).toISOString(),
		snapshot.timeframe,
		snapshot.closePrice,
		snapshot.rsi,
		snapshot.macd,
		snapshot.macdSignal,
		snapshot.macdHistogram,
		snapshot.emaShort,
		snapshot.emaLong,
		snapshot.bbUpper,
		snapshot.bbMiddle,
		snapshot.bbLower,
		snapshot.rsiSignal,
		snapshot.macdCrossSignal,
		snapshot.bbSignal,
		snapshot.combinedSignal,
		JSON.stringify(snapshot.parameters),
	];
}

/** One row per (symbol, candle timestamp, timeframe); re-runs overwrite it. */
export class PgIndicatorRepository implements IndicatorRepository {
	constructor(private readonly db: Queryable) {}

	async save(snapshot: IndicatorSnapshot): Promise<void> {
		await this.db.query(UPSERT_INDICATORS, indicatorRow(snapshot));
		logger.debug(
			{ symbol: snapshot.symbol, timestamp: snapshot.timestamp },
			"Indicator snapshot stored",
		);
	}
}

export class FileIndicatorRepository implements IndicatorRepository {
	constructor(private readonly filePath: string) {}

	async save(snapshot: IndicatorSnapshot): Promise<void> {
		await appendJsonLine(this.filePath, snapshot);
	}
}

export function createIndicatorRepository(
	db: Queryable | null,
	fallbackPath: string,
): IndicatorRepository {
	return db
		? new PgIndicatorRepository(db)
		: new FileIndicatorRepository(fallbackPath);
}
