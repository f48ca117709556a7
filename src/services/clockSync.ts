import { TimeSyncError } from "../errors";
import { logger } from "../utils/logger";
import { Mutex } from "../utils/mutex";

export type ClockState = "unsynced" | "synced" | "stale";

export type ClockOffset = {
	/** serverTime - (sentAt + roundTrip / 2) */
	offsetMs: number;
	/** Estimated one-way latency of the measuring call. */
	latencyMs: number;
	/** Local time the measurement completed; the offset ages from here. */
	measuredAt: number;
	serverTime: number;
};

export type ClockSyncOptions = {
	fetchServerTime: () => Promise<number>;
	maxAgeMs: number;
	/**
	 * After a failed measurement, implicit re-syncs from `timestampNow` wait this
	 * long and the retained offset is used meanwhile. Forced syncs ignore it.
	 */
	failureCooldownMs?: number;
	now?: () => number;
};

const DEFAULT_FAILURE_COOLDOWN_MS = 30_000;

/** What the signer needs from a clock. */
export interface TimestampSource {
	timestampNow(): Promise<number>;
}

/** What the signed client needs: timestamps plus an unconditional re-sync. */
export interface SyncedClock extends TimestampSource {
	forceSync(): Promise<void>;
}

/**
 * Tracks the offset between the local clock and the exchange clock.
 *
 * Unsynced until the first successful measurement, Synced while the offset is
 * younger than `maxAgeMs`, Stale afterwards. Every measurement runs under one
 * mutex, so overlapping ticks never race on the offset.
 */
export class ClockSync implements SyncedClock {
	private offset: ClockOffset | null = null;
	private lastFailureAt: number | null = null;
	private readonly mutex = new Mutex();
	private readonly now: () => number;

	constructor(private readonly options: ClockSyncOptions) {
		this.now = options.now ?? Date.now;
	}

	get state(): ClockState {
		if (!this.offset) return "unsynced";
		const age = this.now() - this.offset.measuredAt;
		return age > this.options.maxAgeMs ? "stale" : "synced";
	}

	get current(): ClockOffset | null {
		return this.offset ? { ...this.offset } : null;
	}

	/**
	 * Measures the offset against the exchange. Throws TimeSyncError when the
	 * time endpoint fails; the previous offset is left untouched in that case.
	 */
	async sync(): Promise<ClockOffset> {
		return this.mutex.runExclusive(() => this.measure());
	}

	/** Re-syncs unconditionally. Failures are logged and the old offset kept. */
	async forceSync(): Promise<void> {
		await this.refresh(true);
	}

	/**
	 * Exchange-aligned "now", re-syncing first when the offset is missing or
	 * stale, unless a sync failed within the cooldown.
	 */
	async timestampNow(): Promise<number> {
		if (this.state !== "synced" && !this.coolingDown()) {
			await this.refresh(false);
		}
		return Math.round(this.now() + (this.offset?.offsetMs ?? 0));
	}

	/**
	 * Forces a sync every `intervalMs` until the returned stop function is called.
	 * Failures are logged; the timer does not keep the process alive.
	 */
	startAutoSync(intervalMs: number = this.options.maxAgeMs): () => void {
		const timer = setInterval(() => {
			this.forceSync().catch((err: unknown) => {
				logger.error({ err }, "Background clock sync failed");
			});
		}, intervalMs);
		timer.unref();
		return () => clearInterval(timer);
	}

	private coolingDown(): boolean {
		if (this.lastFailureAt === null) return false;
		const cooldown =
			this.options.failureCooldownMs ?? DEFAULT_FAILURE_COOLDOWN_MS;
		return this.now() - this.lastFailureAt < cooldown;
	}

	private async refresh(force: boolean): Promise<void> {
		await this.mutex.runExclusive(async () => {
			// another caller may have synced or failed while we waited for the lock
			if (!force && (this.state === "synced" || this.coolingDown())) return;
			try {
				await this.measure();
			} catch (err) {
				if (!(err instanceof TimeSyncError)) throw err;
				logger.error(
					{ err, offsetMs: this.offset?.offsetMs ?? null, state: this.state },
					"Clock sync failed; keeping previous offset",
				);
			}
		});
	}

	private async measure(): Promise<ClockOffset> {
		try {
			const next = await this.measureOnce();
			this.lastFailureAt = null;
			return next;
		} catch (err) {
			this.lastFailureAt = this.now();
			throw err;
		}
	}

	private async measureOnce(): Promise<ClockOffset> {
		const sentAt = this.now();
		let serverTime: number;
		try {
			serverTime = await this.options.fetchServerTime();
		} catch (err) {
			if (err instanceof TimeSyncError) throw err;
			const reason = err instanceof Error ? err.message : String(err);
			throw new TimeSyncError(`Time endpoint unreachable: ${reason}`, {
				cause: err,
			});
		}
		if (!Number.isFinite(serverTime)) {
			throw new TimeSyncError(`Malformed server time: ${String(serverTime)}`);
		}

		const receivedAt = this.now();
		const roundTrip = Math.max(0, receivedAt - sentAt);
		const previous = this.offset;
		const next: ClockOffset = {
			offsetMs: serverTime - (sentAt + roundTrip / 2),
			latencyMs: roundTrip / 2,
			measuredAt: receivedAt,
			serverTime,
		};
		this.offset = next;

		logger.info(
			{
				offsetMs: next.offsetMs,
				previousOffsetMs: previous?.offsetMs ?? null,
				roundTripMs: roundTrip,
			},
			"Clock offset updated",
		);
		return { ...next };
	}
}
