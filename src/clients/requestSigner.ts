import { createHmac } from "node:crypto";
import type { TimestampSource } from "../services/clockSync";
import { logger } from "../utils/logger";

export type RequestParams = Record<string, string | number | boolean | undefined>;

export type SignedRequest = {
	/** Canonical query string without the signature. */
	query: string;
	signature: string;
	timestamp: number;
	recvWindow: number;
};

export type RequestSignerOptions = {
	recvWindowMs: number;
	maxRecvWindowMs: number;
};

/**
 * Query string in parameter insertion order; `undefined` values are left out.
 * The signature is computed over exactly this string, so it must match the
 * bytes that go on the wire.
 */
export function canonicalQuery(params: RequestParams): string {
	const search = new URLSearchParams();
	for (const [key, value] of Object.entries(params)) {
		if (value === undefined) continue;
		search.append(key, String(value));
	}
	return search.toString();
}

function clampRecvWindow(value: number, ceiling: number): number {
	if (!Number.isFinite(value)) return ceiling;
	return Math.min(Math.max(1, Math.floor(value)), ceiling);
}

/**
 * Binance HMAC-SHA256 signing with clock-compensated timestamps.
 *
 * Reference: https://developers.binance.com/docs/binance-spot-api-docs/rest-api/endpoint-security-type
 */
export class RequestSigner {
	private readonly defaultRecvWindow: number;

	constructor(
		private readonly clock: TimestampSource,
		private readonly apiSecret: string,
		private readonly options: RequestSignerOptions,
	) {
		this.defaultRecvWindow = clampRecvWindow(
			options.recvWindowMs,
			options.maxRecvWindowMs,
		);
		if (this.defaultRecvWindow !== options.recvWindowMs) {
			logger.warn(
				{
					requested: options.recvWindowMs,
					effective: this.defaultRecvWindow,
				},
				"Configured recvWindow clamped to the exchange limit",
			);
		}
	}

	get recvWindow(): number {
		return this.defaultRecvWindow;
	}

	resolveRecvWindow(requested?: number): number {
		if (requested === undefined) return this.defaultRecvWindow;
		return clampRecvWindow(requested, this.options.maxRecvWindowMs);
	}

	async buildSignedRequest(
		params: RequestParams,
		receiveWindow?: number,
	): Promise<SignedRequest> {
		const recvWindow = this.resolveRecvWindow(receiveWindow);
		const timestamp = await this.clock.timestampNow();
		const query = canonicalQuery({ ...params, recvWindow, timestamp });
		return {
			query,
			signature: this.sign(query),
			timestamp,
			recvWindow,
		};
	}

	sign(payload: string): string {
		return createHmac("sha256", this.apiSecret).update(payload).digest("hex");
	}
}
