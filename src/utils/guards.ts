export function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

export function oneOf<T extends string>(
	allowed: readonly T[],
	value: unknown,
): T | null {
	return allowed.find((candidate) => candidate === value) ?? null;
}

export function finiteNumber(value: unknown): number | null {
	return typeof value === "number" && Number.isFinite(value) ? value : null;
}
