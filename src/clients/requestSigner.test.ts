import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { RequestSigner, canonicalQuery } from "./requestSigner";

const fixedClock = { timestampNow: async () => 1_700_000_000_000 };

function hmac(payload: string): string {
	return createHmac("sha256", "test-secret").update(payload).digest("hex");
}

describe("canonicalQuery", () => {
	it("keeps insertion order and drops undefined values", () => {
		expect(
			canonicalQuery({
				symbol: "BTCUSDT",
				side: "BUY",
				quantity: 0.5,
				price: undefined,
				reduceOnly: true,
			}),
		).toBe("symbol=BTCUSDT&side=BUY&quantity=0.5&reduceOnly=true");
	});

	it("form-encodes reserved characters", () => {
		expect(canonicalQuery({ note: "a b&c" })).toBe("note=a+b%26c");
	});
});

describe("RequestSigner", () => {
	it("signs the exact query it returns", async () => {
		const signer = new RequestSigner(fixedClock, "test-secret", {
			recvWindowMs: 5_000,
			maxRecvWindowMs: 60_000,
		});

		const signed = await signer.buildSignedRequest({ symbol: "BTCUSDT" });

		expect(signed.query).toBe(
			"symbol=BTCUSDT&recvWindow=5000&timestamp=1700000000000",
		);
		expect(signed.timestamp).toBe(1_700_000_000_000);
		expect(signed.recvWindow).toBe(5_000);
		expect(signed.signature).toBe(hmac(signed.query));
		expect(signed.signature).toMatch(/^[0-9a-f]{64}$/);
	});

	it("clamps a configured recvWindow above the exchange ceiling", async () => {
		const signer = new RequestSigner(fixedClock, "test-secret", {
			recvWindowMs: 120_000,
			maxRecvWindowMs: 60_000,
		});

		expect(signer.recvWindow).toBe(60_000);
		const signed = await signer.buildSignedRequest({});
		expect(signed.query).toBe("recvWindow=60000&timestamp=1700000000000");
	});

	it("resolves per-call recvWindow overrides within bounds", () => {
		const signer = new RequestSigner(fixedClock, "test-secret", {
			recvWindowMs: 10_000,
			maxRecvWindowMs: 60_000,
		});

		expect(signer.resolveRecvWindow()).toBe(10_000);
		expect(signer.resolveRecvWindow(90_000)).toBe(60_000);
		expect(signer.resolveRecvWindow(5_000.7)).toBe(5_000);
		expect(signer.resolveRecvWindow(0)).toBe(1);
		expect(signer.resolveRecvWindow(Number.NaN)).toBe(60_000);
	});

	it("stamps each request with the clock's current time", async () => {
		let now = 1_000;
		const signer = new RequestSigner(
			{ timestampNow: async () => now },
			"test-secret",
			{ recvWindowMs: 5_000, maxRecvWindowMs: 60_000 },
		);

		const first = await signer.buildSignedRequest({ symbol: "ETHUSDT" });
		now = 4_500;
		const second = await signer.buildSignedRequest({ symbol: "ETHUSDT" });

		expect(second.timestamp - first.timestamp).toBe(3_500);
		expect(second.signature).not.toBe(first.signature);
	});
});
