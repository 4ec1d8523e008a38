/**
 * Generic configuration sanitizer helpers shared across config modules.
 */

export function sanitizeBoolean(value: unknown, fallback: boolean): boolean {
	return typeof value === 'boolean' ? value : fallback;
}

/** Integer setting, floored and clamped to `min` (and `max` when given). */
export function sanitizeNumber(value: unknown, fallback: number, min: number, max: number = Number.POSITIVE_INFINITY): number {
	if (typeof value !== 'number' || Number.isNaN(value) || !Number.isFinite(value)) {
		return fallback;
	}
	return Math.min(max, Math.max(min, Math.floor(value)));
}

/** Fractional setting clamped to [min, max]. */
export function sanitizeFloat(value: unknown, fallback: number, min: number, max: number): number {
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		return fallback;
	}
	return Math.min(max, Math.max(min, value));
}

export function sanitizeEnum<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
	return allowed.find((entry) => entry === value) ?? fallback;
}

/** Trimmed string; empty or non-string values fall back. */
export function sanitizeString(value: unknown, fallback: string): string {
	if (typeof value !== 'string') {
		return fallback;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : fallback;
}
