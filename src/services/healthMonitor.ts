import os from "node:os";
import type { Queryable } from "../clients/database";
import type { BotStatus, BotStatusRecord } from "../types";
import { logger } from "../utils/logger";

export interface BotStatusRepository {
	upsert(record: BotStatusRecord): Promise<void>;
}

const UPSERT_BOT_STATUS = `
INSERT INTO public.bot_status (
	instance_id, host, status, last_heartbeat, error_message,
	memory_usage, cpu_usage, active_since, version, environment, metadata
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
ON CONFLICT (instance_id) DO UPDATE SET
	host = EXCLUDED.host,
	status = EXCLUDED.status,
	last_heartbeat = EXCLUDED.last_heartbeat,
	error_message = EXCLUDED.error_message,
	memory_usage = EXCLUDED.memory_usage,
	cpu_usage = EXCLUDED.cpu_usage,
	active_since = EXCLUDED.active_since,
	version = EXCLUDED.version,
	environment = EXCLUDED.environment,
	metadata = EXCLUDED.metadata,
	updated_at = NOW()`;

export class PgBotStatusRepository implements BotStatusRepository {
	constructor(private readonly db: Queryable) {}

	async upsert(record: BotStatusRecord): Promise<void> {
		await this.db.query(UPSERT_BOT_STATUS, [
			record.instanceId,
			record.host,
			record.status,
			record.lastHeartbeat,
			record.errorMessage,
			record.memoryUsageMb,
			record.cpuUsagePct,
			record.activeSince,
			record.version,
			record.environment,
			JSON.stringify(record.metadata),
		]);
	}
}

export class LogBotStatusRepository implements BotStatusRepository {
	async upsert(record: BotStatusRecord): Promise<void> {
		logger.debug(
			{ status: record.status, memoryUsageMb: record.memoryUsageMb },
			"Heartbeat",
		);
	}
}

export type HealthMonitorOptions = {
	instanceId: string;
	version: string;
	environment: string;
	now?: () => number;
};

export type HealthSnapshot = {
	status: BotStatus;
	timestamp: string;
	host: string;
	instanceId: string;
	version: string;
	uptimeSeconds: number;
	errorMessage: string | null;
};

function round2(value: number): number {
	return Math.round(value * 100) / 100;
}

/** Bot status plus the heartbeat row kept in `bot_status`. */
export class HealthMonitor {
	private currentStatus: BotStatus = "starting";
	private errorMessage: string | null = null;
	private readonly activeSince: number;
	private readonly now: () => number;
	private cpuSample = process.cpuUsage();
	private cpuSampledAt: number;

	constructor(
		private readonly repository: BotStatusRepository,
		private readonly options: HealthMonitorOptions,
	) {
		this.now = options.now ?? Date.now;
		this.activeSince = this.now();
		this.cpuSampledAt = this.activeSince;
	}

	get status(): BotStatus {
		return this.currentStatus;
	}

	async start(): Promise<void> {
		await this.transition("running", null);
		logger.info({ instanceId: this.options.instanceId }, "Health monitor started");
	}

	async reportError(message: string): Promise<void> {
		logger.error({ message }, "Bot entered error state");
		await this.transition("error", message);
	}

	/** Back to running after a tick that succeeded following an error. */
	async recover(): Promise<void> {
		if (this.currentStatus !== "error") return;
		await this.transition("running", null);
	}

	async stop(): Promise<void> {
		await this.transition("stopped", this.errorMessage);
	}

	async heartbeat(): Promise<void> {
		try {
			await this.repository.upsert(this.record());
		} catch (err) {
			logger.error({ err }, "Failed to record heartbeat");
		}
	}

	snapshot(): HealthSnapshot {
		const now = this.now();
		return {
			status: this.currentStatus,
			timestamp: new Date(now).toISOString(),
			host: os.hostname(),
			instanceId: this.options.instanceId,
			version: this.options.version,
			uptimeSeconds: Math.floor((now - this.activeSince) / 1000),
			errorMessage: this.errorMessage,
		};
	}

	private async transition(
		status: BotStatus,
		errorMessage: string | null,
	): Promise<void> {
		this.currentStatus = status;
		this.errorMessage = errorMessage;
		await this.heartbeat();
	}

	private cpuPercent(now: number): number {
		const usage = process.cpuUsage(this.cpuSample);
		const elapsedMs = now - this.cpuSampledAt;
		this.cpuSample = process.cpuUsage();
		this.cpuSampledAt = now;
		if (elapsedMs <= 0) return 0;
		const percent = ((usage.user + usage.system) / 1000 / elapsedMs) * 100;
		return Math.min(percent, 100 * os.availableParallelism());
	}

	private record(): BotStatusRecord {
		const now = this.now();
		return {
			instanceId: this.options.instanceId,
			host: os.hostname(),
			status: this.currentStatus,
			lastHeartbeat: new Date(now).toISOString(),
			errorMessage: this.errorMessage,
			memoryUsageMb: round2(process.memoryUsage().rss / (1024 * 1024)),
			cpuUsagePct: round2(this.cpuPercent(now)),
			activeSince: new Date(this.activeSince).toISOString(),
			version: this.options.version,
			environment: this.options.environment,
			metadata: {
				nodeVersion: process.version,
				platform: process.platform,
			},
		};
	}
}
