import { describe, expect, it } from "vitest";
import { ema, emaAlpha, emaLatest } from "./ema";
import { macd } from "./macd";

describe("ema", () => {
	it("uses alpha = 2 / (period + 1)", () => {
		expect(emaAlpha(9)).toBe(0.2);
		expect(() => emaAlpha(0)).toThrow("EMA period must be positive, got 0");
	});

	it("seeds with the first value", () => {
		expect(ema([1, 2, 3, 4], 3)).toEqual([1, 1.5, 2.25, 3.125]);
		expect(ema([], 3)).toEqual([]);
	});

	it("needs period + 1 values for a latest value", () => {
		expect(emaLatest([1, 2, 3], 3)).toBeNull();
		expect(emaLatest([1, 2, 3, 4], 3)).toBe(3.125);
	});
});

describe("macd", () => {
	const closes = [1, 2, 3, 4, 5, 6, 7];

	it("is the fast EMA minus the slow EMA with an EMA signal line", () => {
		const result = macd(closes, 1, 3, 3);

		expect(result.macd).toEqual([
			0, 0.5, 0.75, 0.875, 0.9375, 0.96875, 0.984375,
		]);
		expect(result.signal).toEqual([
			0, 0.25, 0.5, 0.6875, 0.8125, 0.890625, 0.9375,
		]);
		expect(result.histogram[6]).toBe(0.046875);
	});

	it("returns nulls when the series is shorter than slow + signal", () => {
		const result = macd(closes.slice(0, 5), 3, 5, 2);

		expect(result.macd).toEqual([null, null, null, null, null]);
		expect(result.signal).toEqual([null, null, null, null, null]);
		expect(result.histogram).toEqual([null, null, null, null, null]);
	});

	it("is flat on a constant series", () => {
		const result = macd(Array.from({ length: 40 }, () => 10), 12, 26, 9);

		for (const value of [...result.macd, ...result.histogram]) {
			expect(Math.abs(value ?? Number.NaN)).toBeLessThan(1e-9);
		}
	});
});
