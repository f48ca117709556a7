import type { Queryable } from "../clients/database";
import type { Position } from "../types";
import { finiteNumber, isObject } from "../utils/guards";
import { logger } from "../utils/logger";
import { Mutex } from "../utils/mutex";
import { readJson, writeJson } from "../utils/storage";

/** Open positions only; a closed position is removed, its trades stay in the trade log. */
export interface PositionRepository {
	listOpen(): Promise<Position[]>;
	save(position: Position): Promise<void>;
	remove(id: string): Promise<void>;
}

export function parsePosition(value: unknown): Position | null {
	if (!isObject(value)) return null;

	const quantity = finiteNumber(value.quantity);
	const entryPrice = finiteNumber(value.entryPrice);
	const stopLoss = finiteNumber(value.stopLoss);
	const takeProfit1 = finiteNumber(value.takeProfit1);
	const takeProfit2 = finiteNumber(value.takeProfit2);
	const openedAt = finiteNumber(value.openedAt);
	const updatedAt = finiteNumber(value.updatedAt);

	if (
		typeof value.id !== "string" ||
		typeof value.symbol !== "string" ||
		typeof value.tp1Filled !== "boolean" ||
		typeof value.tp2Filled !== "boolean" ||
		quantity === null ||
		entryPrice === null ||
		stopLoss === null ||
		takeProfit1 === null ||
		takeProfit2 === null ||
		openedAt === null ||
		updatedAt === null
	) {
		return null;
	}

	return {
		id: value.id,
		symbol: value.symbol,
		quantity,
		entryPrice,
		stopLoss,
		takeProfit1,
		takeProfit2,
		tp1Filled: value.tp1Filled,
		tp2Filled: value.tp2Filled,
		openedAt,
		updatedAt,
	};
}

const UPSERT_POSITION = `
INSERT INTO public.positions (
	id, symbol, quantity, entry_price, stop_loss, take_profit_1, take_profit_2,
	tp1_filled, tp2_filled, opened_at, updated_at
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
ON CONFLICT (id) DO UPDATE SET
	quantity = EXCLUDED.quantity,
	stop_loss = EXCLUDED.stop_loss,
	take_profit_1 = EXCLUDED.take_profit_1,
	take_profit_2 = EXCLUDED.take_profit_2,
	tp1_filled = EXCLUDED.tp1_filled,
	tp2_filled = EXCLUDED.tp2_filled,
	updated_at = EXCLUDED.updated_at`;

const SELECT_POSITIONS = `
SELECT
	id::text AS "id",
	symbol AS "symbol",
	quantity::float8 AS "quantity",
	entry_price::float8 AS "entryPrice",
	stop_loss::float8 AS "stopLoss",
	take_profit_1::float8 AS "takeProfit1",
	take_profit_2::float8 AS "takeProfit2",
	tp1_filled AS "tp1Filled",
	tp2_filled AS "tp2Filled",
	(EXTRACT(EPOCH FROM opened_at) * 1000)::float8 AS "openedAt",
	(EXTRACT(EPOCH FROM updated_at) * 1000)::float8 AS "updatedAt"
FROM public.positions
ORDER BY opened_at`;

export class PgPositionRepository implements PositionRepository {
	constructor(private readonly db: Queryable) {}

	async listOpen(): Promise<Position[]> {
		const { rows } = await this.db.query(SELECT_POSITIONS);
		return rows.flatMap((row) => parsePosition(row) ?? []);
	}

	async save(position: Position): Promise<void> {
		await this.db.query(UPSERT_POSITION, [
			position.id,
			position.symbol,
			position.quantity,
			position.entryPrice,
			position.stopLoss,
			position.takeProfit1,
			position.takeProfit2,
			position.tp1Filled,
			position.tp2Filled,
			new Date(position.openedAt).toISOString(),
			new Date(position.updatedAt).toISOString(),
		]);
	}

	async remove(id: string): Promise<void> {
		await this.db.query("DELETE FROM public.positions WHERE id = $1", [id]);
	}
}

/**
 * Open positions kept as one JSON array. Symbols are processed concurrently,
 * so every read-modify-write runs under a mutex.
 */
export class FilePositionRepository implements PositionRepository {
	private readonly mutex = new Mutex();

	constructor(private readonly filePath: string) {}

	async listOpen(): Promise<Position[]> {
		return this.mutex.runExclusive(() => this.load());
	}

	async save(position: Position): Promise<void> {
		await this.mutex.runExclusive(async () => {
			const positions = await this.load();
			const exists = positions.some((p) => p.id === position.id);
			await writeJson(
				this.filePath,
				exists
					? positions.map((p) => (p.id === position.id ? position : p))
					: [...positions, position],
			);
		});
	}

	async remove(id: string): Promise<void> {
		await this.mutex.runExclusive(async () => {
			const positions = await this.load();
			await writeJson(
				this.filePath,
				positions.filter((p) => p.id !== id),
			);
		});
	}

	private async load(): Promise<Position[]> {
		const data = await readJson(this.filePath, []);
		if (!Array.isArray(data)) {
			logger.warn({ file: this.filePath }, "Positions file is not an array");
			return [];
		}
		return data.flatMap((item) => parsePosition(item) ?? []);
	}
}

export function createPositionRepository(
	db: Queryable | null,
	fallbackPath: string,
): PositionRepository {
	return db
		? new PgPositionRepository(db)
		: new FilePositionRepository(fallbackPath);
}
