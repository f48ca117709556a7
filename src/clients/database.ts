import fs from "node:fs/promises";
import { Pool } from "pg";
import { config } from "../config";
import { logger } from "../utils/logger";

/** Anything that runs parameterised SQL; pg's Pool and PoolClient both qualify. */
export interface Queryable {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

function createPool(): Pool | null {
	if (!config.database.url) {
		logger.warn("DATABASE_URL missing, snapshots and heartbeats stay local");
		return null;
	}

	const pool = new Pool({
		connectionString: config.database.url,
		ssl: config.database.ssl ? { rejectUnauthorized: false } : undefined,
		max: 3,
		connectionTimeoutMillis: 5_000,
	});
	pool.on("error", (err) => {
		logger.error({ err }, "Idle Postgres client errored");
	});
	return pool;
}

export const pool = createPool();

export async function ensureSchema(db: Queryable): Promise<void> {
	const sql = await fs.readFile(config.paths.schema, "utf8");
	await db.query(sql);
	logger.info({ file: config.paths.schema }, "Database schema applied");
}
