// ─── Interval ────────────────────────────────────────────────────────────────
//
// Intervalles numériques à bornes trivaluées : non bornée, finie ouverte,
// finie fermée. Toutes les comparaisons sont totales.
//
// Sert aux bornes numériques (minimum / maximum) et aux cardinalités
// (longueurs de chaînes, nombre d'items, nombre de propriétés).

export type Endpoint =
	| { readonly bounded: false }
	| { readonly bounded: true; readonly value: number; readonly open: boolean };

export interface Interval {
	readonly lower: Endpoint;
	readonly upper: Endpoint;
}

export const UNBOUNDED: Endpoint = { bounded: false };

export const FULL_INTERVAL: Interval = { lower: UNBOUNDED, upper: UNBOUNDED };

/** Cardinalités : [0, +∞). */
export const FULL_COUNT: Interval = {
	lower: { bounded: true, value: 0, open: false },
	upper: UNBOUNDED,
};

export function closedAt(value: number): Endpoint {
	return { bounded: true, value, open: false };
}

export function openAt(value: number): Endpoint {
	return { bounded: true, value, open: true };
}

export function interval(lower: Endpoint, upper: Endpoint): Interval {
	return { lower, upper };
}

/** Intervalle fermé de cardinalités [min, max] (min défaut 0, max défaut +∞). */
export function countInterval(min?: number, max?: number): Interval {
	return {
		lower: closedAt(Math.max(0, min ?? 0)),
		upper: max === undefined ? UNBOUNDED : closedAt(max),
	};
}

/**
 * Compare deux bornes inférieures.
 * < 0 si `a` admet plus de valeurs que `b` (borne plus basse).
 */
export function compareLower(a: Endpoint, b: Endpoint): number {
	if (!a.bounded) return b.bounded ? -1 : 0;
	if (!b.bounded) return 1;
	if (a.value !== b.value) return a.value < b.value ? -1 : 1;
	if (a.open === b.open) return 0;
	return a.open ? 1 : -1;
}

/**
 * Compare deux bornes supérieures.
 * < 0 si `a` admet moins de valeurs que `b` (borne plus basse).
 */
export function compareUpper(a: Endpoint, b: Endpoint): number {
	if (!a.bounded) return b.bounded ? 1 : 0;
	if (!b.bounded) return -1;
	if (a.value !== b.value) return a.value < b.value ? -1 : 1;
	if (a.open === b.open) return 0;
	return a.open ? -1 : 1;
}

export function isEmptyInterval(i: Interval): boolean {
	if (!i.lower.bounded || !i.upper.bounded) return false;
	if (i.lower.value > i.upper.value) return true;
	if (i.lower.value === i.upper.value) return i.lower.open || i.upper.open;
	return false;
}

export function isFullInterval(i: Interval): boolean {
	return !i.lower.bounded && !i.upper.bounded;
}

export function isFullCount(i: Interval): boolean {
	return compareLower(i.lower, FULL_COUNT.lower) <= 0 && !i.upper.bounded;
}

export function intersectIntervals(a: Interval, b: Interval): Interval {
	return {
		lower: compareLower(a.lower, b.lower) >= 0 ? a.lower : b.lower,
		upper: compareUpper(a.upper, b.upper) <= 0 ? a.upper : b.upper,
	};
}

/** Enveloppe convexe : le plus petit intervalle contenant `a` et `b`. */
export function hullIntervals(a: Interval, b: Interval): Interval {
	if (isEmptyInterval(a)) return b;
	if (isEmptyInterval(b)) return a;
	return {
		lower: compareLower(a.lower, b.lower) <= 0 ? a.lower : b.lower,
		upper: compareUpper(a.upper, b.upper) >= 0 ? a.upper : b.upper,
	};
}

/** `inner ⊆ outer` (l'intervalle vide est contenu partout). */
export function containsInterval(outer: Interval, inner: Interval): boolean {
	if (isEmptyInterval(inner)) return true;
	return (
		compareLower(outer.lower, inner.lower) <= 0 &&
		compareUpper(inner.upper, outer.upper) <= 0
	);
}

export function includesValue(i: Interval, value: number): boolean {
	if (i.lower.bounded) {
		if (value < i.lower.value) return false;
		if (value === i.lower.value && i.lower.open) return false;
	}
	if (i.upper.bounded) {
		if (value > i.upper.value) return false;
		if (value === i.upper.value && i.upper.open) return false;
	}
	return true;
}

/** Valeur unique si l'intervalle est un singleton fermé. */
export function singletonValue(i: Interval): number | undefined {
	if (
		i.lower.bounded &&
		i.upper.bounded &&
		!i.lower.open &&
		!i.upper.open &&
		i.lower.value === i.upper.value
	) {
		return i.lower.value;
	}
	return undefined;
}

/**
 * Resserre un intervalle sur les entiers : bornes fermées entières.
 * (2.5, 7] → [3, 7] ; (2, 7) → [3, 6]
 */
export function toIntegerInterval(i: Interval): Interval {
	const lower: Endpoint = i.lower.bounded
		? closedAt(
				i.lower.open ? Math.floor(i.lower.value) + 1 : Math.ceil(i.lower.value),
			)
		: UNBOUNDED;
	const upper: Endpoint = i.upper.bounded
		? closedAt(
				i.upper.open ? Math.ceil(i.upper.value) - 1 : Math.floor(i.upper.value),
			)
		: UNBOUNDED;
	return { lower, upper };
}

/** Borne supérieure en nombre (+∞ si non bornée). */
export function upperValue(i: Interval): number {
	return i.upper.bounded ? i.upper.value : Number.POSITIVE_INFINITY;
}

/** Borne inférieure en nombre (-∞ si non bornée). */
export function lowerValue(i: Interval): number {
	return i.lower.bounded ? i.lower.value : Number.NEGATIVE_INFINITY;
}

/** Plafonne la borne supérieure d'une cardinalité à `max`. */
export function capCount(i: Interval, max: number): Interval {
	return intersectIntervals(i, countInterval(0, max));
}

/**
 * Complément d'une cardinalité dans [0, +∞), quand il reste un intervalle.
 * [m, +∞) → [0, m-1] ; [0, M] → [M+1, +∞). Sinon `undefined`.
 */
export function complementCount(i: Interval): Interval | undefined {
	const lower = lowerValue(i);
	if (!i.upper.bounded) {
		return lower <= 0 ? undefined : countInterval(0, lower - 1);
	}
	if (lower <= 0) return countInterval(i.upper.value + 1);
	return undefined;
}
