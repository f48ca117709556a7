import { from, lastValueFrom } from "rxjs";
import { mergeMap, toArray } from "rxjs/operators";
import type {
	Candle,
	IndicatorSnapshot,
	Signal,
	Timeframe,
	TradeRecord,
} from "../types";
import { logger } from "../utils/logger";
import type { HealthMonitor } from "./healthMonitor";
import type { IndicatorRepository } from "./indicatorStore";
import { type AnalysisSettings, analyzeCandles } from "./marketAnalysis";
import { isWithinTradingHours } from "./tradingHours";

export type TickSettings = AnalysisSettings & {
	symbols: string[];
	timeframe: Timeframe;
	candleLimit: number;
	analysisConcurrency: number;
	/** UTC hours in which signals may open or close positions. */
	tradingStartHour: number;
	tradingEndHour: number;
};

export type TickDeps = {
	fetchCandles: (
		symbol: string,
		timeframe: Timeframe,
		limit: number,
	) => Promise<Candle[]>;
	indicators: IndicatorRepository;
	/** Acts on a non-neutral signal. Omitted when trading is disabled. */
	trade?: (snapshot: IndicatorSnapshot) => Promise<TradeRecord[]>;
	/** Stop-loss and take-profit review of open positions; runs at any hour. */
	manage?: (snapshot: IndicatorSnapshot) => Promise<TradeRecord[]>;
	notify: (text: string) => Promise<void>;
	health: HealthMonitor;
	now?: () => number;
};

export type SymbolOutcome =
	| { symbol: string; status: "analyzed"; signal: Signal; orderIds: number[] }
	| { symbol: string; status: "skipped"; reason: string }
	| { symbol: string; status: "failed"; error: string };

type FailedOutcome = Extract<SymbolOutcome, { status: "failed" }>;

export type TickSummary = {
	startedAt: number;
	finishedAt: number;
	outcomes: SymbolOutcome[];
};

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function formatSignalMessage(snapshot: IndicatorSnapshot): string {
	const fmt = (value: number | null) =>
		value === null ? "n/a" : value.toFixed(2);
	return [
		`${snapshot.combinedSignal.toUpperCase()} signal ${snapshot.symbol} (${snapshot.timeframe})`,
		`Close: ${snapshot.closePrice}`,
		`RSI: ${fmt(snapshot.rsi)} (${snapshot.rsiSignal})`,
		`MACD: ${fmt(snapshot.macd)} / ${fmt(snapshot.macdSignal)} (${snapshot.macdCrossSignal})`,
		`BB: ${fmt(snapshot.bbLower)} - ${fmt(snapshot.bbUpper)} (${snapshot.bbSignal})`,
	].join("\n");
}

/**
 * One fetch → compute → decide → persist pass over all symbols.
 * A second `run()` while a tick is in flight joins that tick instead of
 * starting another one.
 */
export class TickRunner {
	private inFlight: Promise<TickSummary> | null = null;
	private readonly now: () => number;

	constructor(
		private readonly deps: TickDeps,
		private readonly settings: TickSettings,
	) {
		this.now = deps.now ?? Date.now;
	}

	get running(): boolean {
		return this.inFlight !== null;
	}

	run(): Promise<TickSummary> {
		if (this.inFlight) {
			logger.info("Tick already in flight; joining it");
			return this.inFlight;
		}
		const tick = this.execute().finally(() => {
			this.inFlight = null;
		});
		this.inFlight = tick;
		return tick;
	}

	private async execute(): Promise<TickSummary> {
		const startedAt = this.now();
		const { symbols, analysisConcurrency } = this.settings;
		logger.info({ symbols, timeframe: this.settings.timeframe }, "Tick started");

		const outcomes = await lastValueFrom(
			from(symbols).pipe(
				mergeMap(
					(symbol) => this.processSymbol(symbol),
					Math.max(1, analysisConcurrency),
				),
				toArray(),
			),
		);

		const failed = outcomes.filter(
			(o): o is FailedOutcome => o.status === "failed",
		);
		if (outcomes.length > 0 && failed.length === outcomes.length) {
			await this.deps.health.reportError(
				`Tick failed for all symbols: ${failed
					.map((o) => `${o.symbol}: ${o.error}`)
					.join("; ")}`,
			);
		} else {
			await this.deps.health.recover();
		}

		const summary: TickSummary = {
			startedAt,
			finishedAt: this.now(),
			outcomes,
		};
		logger.info(
			{
				analyzed: outcomes.filter((o) => o.status === "analyzed").length,
				skipped: outcomes.filter((o) => o.status === "skipped").length,
				failed: failed.length,
				durationMs: summary.finishedAt - startedAt,
			},
			"Tick finished",
		);
		return summary;
	}

	private async processSymbol(symbol: string): Promise<SymbolOutcome> {
		const { timeframe, candleLimit } = this.settings;
		try {
			const candles = await this.deps.fetchCandles(symbol, timeframe, candleLimit);
			const snapshot = analyzeCandles(
				symbol,
				timeframe,
				candles,
				this.settings,
				this.now(),
			);
			if (!snapshot) {
				return { symbol, status: "skipped", reason: "insufficient candles" };
			}

			logger.info(
				{
					symbol,
					close: snapshot.closePrice,
					rsi: snapshot.rsi,
					signal: snapshot.combinedSignal,
				},
				"Indicators computed",
			);

			try {
				await this.deps.indicators.save(snapshot);
			} catch (err) {
				logger.error({ symbol, err }, "Failed to persist indicator snapshot");
			}

			const orderIds: number[] = [];
			if (this.deps.manage) {
				try {
					const exits = await this.deps.manage(snapshot);
					orderIds.push(...exits.map((t) => t.orderId));
				} catch (err) {
					logger.error({ symbol, err }, "Failed to manage open positions");
					await this.safeNotify(
						`Failed to manage positions on ${symbol}: ${errorMessage(err)}`,
					);
				}
			}

			if (snapshot.combinedSignal === "neutral") {
				return { symbol, status: "analyzed", signal: "neutral", orderIds };
			}

			await this.safeNotify(formatSignalMessage(snapshot));

			if (this.deps.trade) {
				const { tradingStartHour, tradingEndHour } = this.settings;
				if (!isWithinTradingHours(this.now(), tradingStartHour, tradingEndHour)) {
					logger.info(
						{ symbol, tradingStartHour, tradingEndHour },
						"Outside trading hours; signal not traded",
					);
				} else {
					try {
						const trades = await this.deps.trade(snapshot);
						orderIds.push(...trades.map((t) => t.orderId));
					} catch (err) {
						logger.error({ symbol, err }, "Failed to execute signal");
						await this.safeNotify(
							`Failed to execute ${snapshot.combinedSignal} on ${symbol}: ${errorMessage(err)}`,
						);
					}
				}
			}

			return {
				symbol,
				status: "analyzed",
				signal: snapshot.combinedSignal,
				orderIds,
			};
		} catch (err) {
			logger.error({ symbol, err }, "Symbol analysis failed");
			return { symbol, status: "failed", error: errorMessage(err) };
		}
	}

	private async safeNotify(text: string): Promise<void> {
		try {
			await this.deps.notify(text);
		} catch (err) {
			logger.error({ err }, "Failed to send notification");
		}
	}
}
