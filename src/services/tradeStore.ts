import type { Queryable } from "../clients/database";
import {
	SIGNALS,
	TRADE_REASONS,
	TRADE_SIDES,
	type TradeRecord,
} from "../types";
import { finiteNumber, isObject, oneOf } from "../utils/guards";
import { logger } from "../utils/logger";
import { appendJsonLine, readJsonLines } from "../utils/storage";

export interface TradeRepository {
	record(trade: TradeRecord): Promise<void>;
	/** Trades placed in [from, to), oldest first. */
	listBetween(from: number, to: number): Promise<TradeRecord[]>;
}

/** Validates a stored trade; rows written by older versions come back null. */
export function parseTradeRecord(value: unknown): TradeRecord | null {
	if (!isObject(value)) return null;

	const side = oneOf(TRADE_SIDES, value.side);
	const signal = oneOf(SIGNALS, value.signal);
	const reason = oneOf(TRADE_REASONS, value.reason);
	const orderId = finiteNumber(value.orderId);
	const quantity = finiteNumber(value.quantity);
	const quoteQty = finiteNumber(value.quoteQty);
	const averagePrice = finiteNumber(value.averagePrice);
	const placedAt = finiteNumber(value.placedAt);
	const pnl = value.pnl === null ? null : finiteNumber(value.pnl);

	if (
		typeof value.id !== "string" ||
		typeof value.symbol !== "string" ||
		typeof value.orderStatus !== "string" ||
		!side ||
		!signal ||
		!reason ||
		orderId === null ||
		quantity === null ||
		quoteQty === null ||
		averagePrice === null ||
		placedAt === null ||
		(value.pnl !== null && pnl === null)
	) {
		return null;
	}

	return {
		id: value.id,
		symbol: value.symbol,
		side,
		orderId,
		orderStatus: value.orderStatus,
		quantity,
		quoteQty,
		averagePrice,
		signal,
		reason,
		pnl,
		placedAt,
	};
}

const INSERT_TRADE = `
INSERT INTO public.trades (
	id, symbol, side, order_id, order_status, quantity, quote_qty,
	average_price, signal, reason, pnl, placed_at
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
ON CONFLICT (id) DO NOTHING`;

const SELECT_TRADES = `
SELECT
	id::text AS "id",
	symbol AS "symbol",
	side AS "side",
	order_id::float8 AS "orderId",
	order_status AS "orderStatus",
	quantity::float8 AS "quantity",
	quote_qty::float8 AS "quoteQty",
	average_price::float8 AS "averagePrice",
	signal AS "signal",
	reason AS "reason",
	pnl::float8 AS "pnl",
	(EXTRACT(EPOCH FROM placed_at) * 1000)::float8 AS "placedAt"
FROM public.trades
WHERE placed_at >= $1 AND placed_at < $2
ORDER BY placed_at`;

export class PgTradeRepository implements TradeRepository {
	constructor(private readonly db: Queryable) {}

	async record(trade: TradeRecord): Promise<void> {
		await this.db.query(INSERT_TRADE, [
			trade.id,
			trade.symbol,
			trade.side,
			trade.orderId,
			trade.orderStatus,
			trade.quantity,
			trade.quoteQty,
			trade.averagePrice,
			trade.signal,
			trade.reason,
			trade.pnl,
			new Date(trade.placedAt).toISOString(),
		]);
		logger.info(
			{ tradeId: trade.id, symbol: trade.symbol, side: trade.side },
			"Trade recorded",
		);
	}

	async listBetween(from: number, to: number): Promise<TradeRecord[]> {
		const { rows } = await this.db.query(SELECT_TRADES, [
			new Date(from).toISOString(),
			new Date(to).toISOString(),
		]);
		return rows.flatMap((row) => parseTradeRecord(row) ?? []);
	}
}

/** JSON-lines trade log; one document per order. */
export class FileTradeRepository implements TradeRepository {
	constructor(private readonly filePath: string) {}

	async record(trade: TradeRecord): Promise<void> {
		await appendJsonLine(this.filePath, trade);
		logger.info(
			{ tradeId: trade.id, symbol: trade.symbol, side: trade.side },
			"Trade recorded",
		);
	}

	async listBetween(from: number, to: number): Promise<TradeRecord[]> {
		const lines = await readJsonLines(this.filePath);
		return lines
			.flatMap((line) => parseTradeRecord(line) ?? [])
			.filter((trade) => trade.placedAt >= from && trade.placedAt < to)
			.sort((a, b) => a.placedAt - b.placedAt);
	}
}

export function createTradeRepository(
	db: Queryable | null,
	fallbackPath: string,
): TradeRepository {
	return db ? new PgTradeRepository(db) : new FileTradeRepository(fallbackPath);
}
