/**
 * True when the UTC hour of `now` lies in [startHour, endHour].
 * A start later than the end wraps past midnight (22..3 covers 22:00-03:59).
 */
export function isWithinTradingHours(
	now: number,
	startHour: number,
	endHour: number,
): boolean {
	const hour = new Date(now).getUTCHours();
	if (startHour <= endHour) return hour >= startHour && hour <= endHour;
	return hour >= startHour || hour <= endHour;
}
