import axios from "axios";
import { SignedRequestRejected, TimeSyncError } from "../errors";
import type { SyncedClock } from "../services/clockSync";
import type {
	AccountBalance,
	MarketOrderRequest,
	OrderResult,
} from "../types";
import { logger } from "../utils/logger";
import type { RequestParams, RequestSigner } from "./requestSigner";

export type HttpMethod = "GET" | "POST" | "DELETE";

export type HttpRequest = {
	method: HttpMethod;
	path: string;
	query?: string;
	headers?: Record<string, string>;
	timeoutMs?: number;
};

export type HttpResponse = {
	status: number;
	data: unknown;
};

/** Raw HTTP hop. Resolves for any status; rejects only on network failure. */
export interface HttpTransport {
	send(request: HttpRequest): Promise<HttpResponse>;
}

export function createAxiosTransport(
	baseUrl: string,
	timeoutMs: number,
): HttpTransport {
	const http = axios.create({
		baseURL: baseUrl,
		timeout: timeoutMs,
		validateStatus: () => true,
	});

	return {
		async send(request) {
			const url = request.query
				? `${request.path}?${request.query}`
				: request.path;
			const response = await http.request<unknown>({
				method: request.method,
				url,
				headers: request.headers,
				timeout: request.timeoutMs ?? timeoutMs,
			});
			return { status: response.status, data: response.data };
		},
	};
}

type ServerTimePayload = { serverTime: number };

function isServerTimePayload(data: unknown): data is ServerTimePayload {
	if (!data || typeof data !== "object") return false;
	const value = (data as Partial<ServerTimePayload>).serverTime;
	return typeof value === "number" && Number.isFinite(value);
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

async function requestServerTime(
	transport: HttpTransport,
	timeoutMs: number,
): Promise<number> {
	let response: HttpResponse;
	try {
		response = await transport.send({
			method: "GET",
			path: "/api/v3/time",
			timeoutMs,
		});
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new TimeSyncError(`Time endpoint unreachable: ${reason}`, {
			cause: err,
		});
	}

	if (response.status !== 200) {
		throw new TimeSyncError(`Time endpoint returned HTTP ${response.status}`);
	}
	if (!isServerTimePayload(response.data)) {
		throw new TimeSyncError(
			`Malformed time payload: ${JSON.stringify(response.data)}`,
		);
	}
	return response.data.serverTime;
}

export type ServerTimeOptions = {
	/** Per-attempt bound. */
	timeoutMs: number;
	attempts?: number;
	retryDelayMs?: number;
};

/**
 * GET /api/v3/time, retried up to `attempts` times with `retryDelayMs` between
 * tries. Throws the last TimeSyncError once every attempt has failed.
 */
export async function fetchServerTime(
	transport: HttpTransport,
	options: ServerTimeOptions,
): Promise<number> {
	const attempts = Math.max(1, options.attempts ?? 1);
	for (let attempt = 1; ; attempt += 1) {
		try {
			return await requestServerTime(transport, options.timeoutMs);
		} catch (err) {
			if (attempt >= attempts) throw err;
			logger.warn({ err, attempt, attempts }, "Server time attempt failed");
			await sleep(options.retryDelayMs ?? 0);
		}
	}
}

type BinanceErrorBody = { code: number; msg: string };

function isBinanceErrorBody(data: unknown): data is BinanceErrorBody {
	if (!data || typeof data !== "object") return false;
	const body = data as Partial<BinanceErrorBody>;
	return typeof body.code === "number" && typeof body.msg === "string";
}

function toRejection(
	response: HttpResponse,
	path: string,
	attempts: number,
): SignedRequestRejected {
	if (isBinanceErrorBody(response.data)) {
		return new SignedRequestRejected({
			message: `Binance rejected ${path}: ${response.data.code} ${response.data.msg}`,
			code: response.data.code,
			httpStatus: response.status,
			path,
			attempts,
		});
	}
	return new SignedRequestRejected({
		message: `Binance rejected ${path}: HTTP ${response.status}`,
		code: null,
		httpStatus: response.status,
		path,
		attempts,
	});
}

type RawBalance = { asset: string; free: string; locked: string };
type RawAccount = { balances: RawBalance[] };

function isRawAccount(data: unknown): data is RawAccount {
	if (!data || typeof data !== "object") return false;
	const balances = (data as Partial<RawAccount>).balances;
	return (
		Array.isArray(balances) &&
		balances.every(
			(b: unknown) =>
				typeof b === "object" &&
				b !== null &&
				typeof (b as Partial<RawBalance>).asset === "string",
		)
	);
}

type RawOrder = {
	orderId: number;
	status: string;
	executedQty: string;
	cummulativeQuoteQty: string;
};

function isRawOrder(data: unknown): data is RawOrder {
	if (!data || typeof data !== "object") return false;
	const order = data as Partial<RawOrder>;
	return typeof order.orderId === "number" && typeof order.status === "string";
}

export type SignedCallOptions = {
	/** Balance and order calls: re-sync the clock right before sending. */
	critical?: boolean;
	recvWindow?: number;
};

export type SignedRestClientDeps = {
	transport: HttpTransport;
	clock: SyncedClock;
	signer: RequestSigner;
	apiKey: string;
	/** Called once a timestamp rejection outlives the re-sync and retry. */
	onClockDrift?: (error: SignedRequestRejected) => Promise<void> | void;
};

const MAX_ATTEMPTS = 2;

/**
 * Signed Binance spot endpoints.
 *
 * A -1021 answer gets exactly one forced clock re-sync and one retry of the
 * same call; a second -1021 is terminal and escalated through `onClockDrift`.
 * Every other rejection goes straight back to the caller.
 */
export class SignedRestClient {
	constructor(private readonly deps: SignedRestClientDeps) {}

	async signedRequest(
		method: HttpMethod,
		path: string,
		params: RequestParams,
		options: SignedCallOptions = {},
	): Promise<unknown> {
		const { transport, clock, signer, apiKey } = this.deps;
		let syncFirst = options.critical === true;

		for (let attempt = 1; ; attempt += 1) {
			if (syncFirst) {
				await clock.forceSync();
			}

			const signed = await signer.buildSignedRequest(params, options.recvWindow);
			logger.debug(
				{ method, path, attempt, timestamp: signed.timestamp },
				"Sending signed Binance request",
			);
			const response = await transport.send({
				method,
				path,
				query: `${signed.query}&signature=${signed.signature}`,
				headers: { "X-MBX-APIKEY": apiKey },
			});

			if (response.status >= 200 && response.status < 300) {
				return response.data;
			}

			const rejection = toRejection(response, path, attempt);
			if (!rejection.isTimestampRejection) {
				throw rejection;
			}

			if (attempt < MAX_ATTEMPTS) {
				logger.warn(
					{ path, attempt, timestamp: signed.timestamp },
					"Timestamp outside recvWindow; re-syncing clock and retrying",
				);
				await clock.forceSync();
				syncFirst = false;
				continue;
			}

			const terminal = rejection.asTerminal(attempt);
			logger.error(
				{ path, attempts: attempt, err: terminal },
				"Timestamp rejected again after re-sync; host clock is drifting",
			);
			await this.escalate(terminal);
			throw terminal;
		}
	}

	async getAccountBalances(): Promise<AccountBalance[]> {
		const data = await this.signedRequest(
			"GET",
			"/api/v3/account",
			{ omitZeroBalances: true },
			{ critical: true },
		);
		if (!isRawAccount(data)) {
			throw new Error("Unexpected account payload from Binance");
		}
		return data.balances.map((b) => ({
			asset: b.asset,
			free: Number(b.free),
			locked: Number(b.locked),
		}));
	}

	async submitMarketOrder(order: MarketOrderRequest): Promise<OrderResult> {
		const data = await this.signedRequest(
			"POST",
			"/api/v3/order",
			{
				symbol: order.symbol,
				side: order.side,
				type: "MARKET",
				quantity: order.quantity,
				quoteOrderQty: order.quoteOrderQty,
				newOrderRespType: "RESULT",
			},
			{ critical: true },
		);
		if (!isRawOrder(data)) {
			throw new Error(`Unexpected order payload for ${order.symbol}`);
		}
		return {
			orderId: data.orderId,
			status: data.status,
			executedQty: Number(data.executedQty),
			quoteQty: Number(data.cummulativeQuoteQty),
		};
	}

	private async escalate(error: SignedRequestRejected): Promise<void> {
		if (!this.deps.onClockDrift) return;
		try {
			await this.deps.onClockDrift(error);
		} catch (err) {
			logger.error({ err }, "Clock drift escalation failed");
		}
	}
}
