/** Binance code for "Timestamp for this request is outside of the recvWindow". */
export const TIMESTAMP_OUTSIDE_RECV_WINDOW = -1021;

/**
 * The exchange time endpoint could not be reached or answered with something
 * that is not a server time. The previously measured offset stays in use.
 */
export class TimeSyncError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "TimeSyncError";
	}
}

/**
 * A signed call the exchange answered with a non-2xx status.
 *
 * `terminal` is set when a timestamp rejection survived the forced re-sync and
 * retry, which points at a host clock problem rather than a transient one.
 */
export class SignedRequestRejected extends Error {
	readonly code: number | null;
	readonly httpStatus: number;
	readonly path: string;
	readonly attempts: number;
	readonly terminal: boolean;

	constructor(params: {
		message: string;
		code: number | null;
		httpStatus: number;
		path: string;
		attempts: number;
		terminal?: boolean;
	}) {
		super(params.message);
		this.name = "SignedRequestRejected";
		this.code = params.code;
		this.httpStatus = params.httpStatus;
		this.path = params.path;
		this.attempts = params.attempts;
		this.terminal = params.terminal ?? false;
	}

	get isTimestampRejection(): boolean {
		return this.code === TIMESTAMP_OUTSIDE_RECV_WINDOW;
	}

	asTerminal(attempts: number): SignedRequestRejected {
		return new SignedRequestRejected({
			message: this.message,
			code: this.code,
			httpStatus: this.httpStatus,
			path: this.path,
			attempts,
			terminal: true,
		});
	}
}
