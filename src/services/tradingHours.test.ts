import { describe, expect, it } from "vitest";
import { isWithinTradingHours } from "./tradingHours";

function at(hour: number, minute = 0): number {
	return Date.UTC(2024, 0, 1, hour, minute);
}

describe("isWithinTradingHours", () => {
	it("includes both ends of a daytime window", () => {
		expect(isWithinTradingHours(at(8), 8, 20)).toBe(true);
		expect(isWithinTradingHours(at(20, 59), 8, 20)).toBe(true);
		expect(isWithinTradingHours(at(7, 59), 8, 20)).toBe(false);
		expect(isWithinTradingHours(at(21), 8, 20)).toBe(false);
	});

	it("wraps a window that crosses midnight", () => {
		expect(isWithinTradingHours(at(23), 22, 3)).toBe(true);
		expect(isWithinTradingHours(at(2), 22, 3)).toBe(true);
		expect(isWithinTradingHours(at(12), 22, 3)).toBe(false);
	});

	it("treats 0-23 as always open", () => {
		for (let hour = 0; hour < 24; hour++) {
			expect(isWithinTradingHours(at(hour), 0, 23)).toBe(true);
		}
	});
});
