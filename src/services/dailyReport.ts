import type { Queryable } from "../clients/database";
import type { AccountBalance, DailyPerformance, TradeRecord } from "../types";
import { logger } from "../utils/logger";
import type { PositionRepository } from "./positionStore";
import type { TradeRepository } from "./tradeStore";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PerformanceRepository {
	save(report: DailyPerformance): Promise<void>;
}

const UPSERT_PERFORMANCE = `
INSERT INTO public.performance (
	date, total_trades, winning_trades, losing_trades, daily_pnl,
	open_positions, quote_balance
) VALUES ($1, $2, $3, $4, $5, $6, $7)
ON CONFLICT (date) DO UPDATE SET
	total_trades = EXCLUDED.total_trades,
	winning_trades = EXCLUDED.winning_trades,
	losing_trades = EXCLUDED.losing_trades,
	daily_pnl = EXCLUDED.daily_pnl,
	open_positions = EXCLUDED.open_positions,
	quote_balance = EXCLUDED.quote_balance,
	updated_at = NOW()`;

export class PgPerformanceRepository implements PerformanceRepository {
	constructor(private readonly db: Queryable) {}

	async save(report: DailyPerformance): Promise<void> {
		await this.db.query(UPSERT_PERFORMANCE, [
			report.date,
			report.totalTrades,
			report.winningTrades,
			report.losingTrades,
			report.dailyPnl,
			report.openPositions,
			report.quoteBalance,
		]);
	}
}

export class LogPerformanceRepository implements PerformanceRepository {
	async save(report: DailyPerformance): Promise<void> {
		logger.info({ ...report }, "Daily performance");
	}
}

export function createPerformanceRepository(
	db: Queryable | null,
): PerformanceRepository {
	return db ? new PgPerformanceRepository(db) : new LogPerformanceRepository();
}

/** The UTC day before the one containing `now`, as [start, end). */
export function previousUtcDay(now: number): {
	date: string;
	start: number;
	end: number;
} {
	const end = Math.floor(now / DAY_MS) * DAY_MS;
	const start = end - DAY_MS;
	return { date: new Date(start).toISOString().slice(0, 10), start, end };
}

export function summarizeTrades(
	trades: TradeRecord[],
	date: string,
	openPositions: number,
	quoteBalance: number | null,
): DailyPerformance {
	return {
		date,
		totalTrades: trades.length,
		winningTrades: trades.filter((t) => (t.pnl ?? 0) > 0).length,
		losingTrades: trades.filter((t) => (t.pnl ?? 0) < 0).length,
		dailyPnl: trades.reduce((sum, t) => sum + (t.pnl ?? 0), 0),
		openPositions,
		quoteBalance,
	};
}

export function formatDailyReport(
	report: DailyPerformance,
	quoteAsset: string,
): string {
	const balance =
		report.quoteBalance === null
			? "n/a"
			: `${report.quoteBalance.toFixed(2)} ${quoteAsset}`;
	return [
		`Daily report ${report.date}`,
		`Trades: ${report.totalTrades} (won ${report.winningTrades}, lost ${report.losingTrades})`,
		`PnL: ${report.dailyPnl.toFixed(2)} ${quoteAsset}`,
		`Open positions: ${report.openPositions}`,
		`Balance: ${balance}`,
	].join("\n");
}

export type DailyReportDeps = {
	trades: TradeRepository;
	positions: PositionRepository;
	performance: PerformanceRepository;
	notify: (text: string) => Promise<void>;
	/** Omitted when no API key is configured. */
	balances?: () => Promise<AccountBalance[]>;
	quoteAsset: string;
	now?: () => number;
};

async function quoteBalanceOf(deps: DailyReportDeps): Promise<number | null> {
	if (!deps.balances) return null;
	try {
		const balances = await deps.balances();
		return balances.find((b) => b.asset === deps.quoteAsset)?.free ?? 0;
	} catch (err) {
		logger.warn({ err }, "Balance unavailable for daily report");
		return null;
	}
}

/** Summarises the previous UTC day, stores it by date and sends it to Telegram. */
export async function sendDailyReport(
	deps: DailyReportDeps,
): Promise<DailyPerformance> {
	const now = deps.now ?? Date.now;
	const day = previousUtcDay(now());
	const [trades, open, quoteBalance] = await Promise.all([
		deps.trades.listBetween(day.start, day.end),
		deps.positions.listOpen(),
		quoteBalanceOf(deps),
	]);

	const report = summarizeTrades(trades, day.date, open.length, quoteBalance);
	await deps.performance.save(report);
	await deps.notify(formatDailyReport(report, deps.quoteAsset));
	logger.info({ date: report.date, trades: report.totalTrades }, "Daily report sent");
	return report;
}
