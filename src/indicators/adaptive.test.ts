import { describe, expect, it } from "vitest";
import { MIN_ADAPTIVE_CANDLES, adaptivePeriods } from "./adaptive";

describe("adaptivePeriods", () => {
	const configured = { rsiPeriod: 14, macdFast: 12, macdSlow: 26, macdSignal: 9 };

	it("gives up below the minimum history", () => {
		expect(adaptivePeriods(MIN_ADAPTIVE_CANDLES - 1, configured)).toBeNull();
	});

	it("shortens periods as history shrinks", () => {
		expect(adaptivePeriods(25, configured)).toEqual({
			rsiPeriod: 10,
			macdFast: 8,
			macdSlow: 17,
			macdSignal: 9,
		});
		expect(adaptivePeriods(30, configured)).toEqual({
			rsiPeriod: 12,
			macdFast: 10,
			macdSlow: 22,
			macdSignal: 9,
		});
		expect(adaptivePeriods(49, configured)?.rsiPeriod).toBe(12);
		expect(adaptivePeriods(50, configured)).toBe(configured);
	});
});
