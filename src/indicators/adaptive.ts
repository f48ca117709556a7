export type MomentumPeriods = {
	rsiPeriod: number;
	macdFast: number;
	macdSlow: number;
	macdSignal: number;
};

export const MIN_ADAPTIVE_CANDLES = 25;

/**
 * Shorter RSI/MACD periods when little history is available.
 * Returns null below MIN_ADAPTIVE_CANDLES.
 */
export function adaptivePeriods(
	candleCount: number,
	configured: MomentumPeriods,
): MomentumPeriods | null {
	if (candleCount < MIN_ADAPTIVE_CANDLES) return null;
	if (candleCount < 30) {
		return { rsiPeriod: 10, macdFast: 8, macdSlow: 17, macdSignal: 9 };
	}
	if (candleCount < 50) {
		return { rsiPeriod: 12, macdFast: 10, macdSlow: 22, macdSignal: 9 };
	}
	return configured;
}
