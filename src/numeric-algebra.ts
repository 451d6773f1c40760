import type { KindAlgebra, NumberDescriptor } from "./canonical-types";
import {
	closedAt,
	compareLower,
	containsInterval,
	type Endpoint,
	FULL_INTERVAL,
	hullIntervals,
	includesValue,
	type Interval,
	intersectIntervals,
	isEmptyInterval,
	isFullInterval,
	openAt,
	singletonValue,
	UNBOUNDED,
} from "./interval";

// ─── Numeric Algebra ─────────────────────────────────────────────────────────
//
// Un descripteur number est soit un intervalle (avec drapeau entier et pas
// `multipleOf`), soit un ensemble fini de valeurs (enum / const).
//
// Le drapeau entier est un pas de 1 : le « pas effectif » d'un intervalle
// entier avec multipleOf m est ppcm(m, 1).

const EPSILON = 1e-9;

/** Au-delà, un intervalle fini n'est pas énuméré. */
const MAX_ENUMERATED_VALUES = 1000;

// ─── Arithmetic helpers ──────────────────────────────────────────────────────

function isClose(a: number, b: number): boolean {
	return Math.abs(a - b) <= EPSILON * Math.max(1, Math.abs(a), Math.abs(b));
}

function clean(value: number): number {
	return Number.parseFloat(value.toPrecision(12));
}

function decimalPlaces(value: number): number | undefined {
	const text = String(value);
	if (text.includes("e")) return undefined;
	const dot = text.indexOf(".");
	return dot < 0 ? 0 : text.length - dot - 1;
}

/**
 * `value` est-il un multiple entier de `step` ? Décidé sur les entiers
 * obtenus à l'échelle décimale commune ; tolérance flottante seulement
 * quand cette échelle sort des entiers sûrs.
 */
export function isMultipleOf(value: number, step: number): boolean {
	const dv = decimalPlaces(value);
	const ds = decimalPlaces(step);
	if (dv !== undefined && ds !== undefined) {
		const scale = 10 ** Math.max(dv, ds);
		const iv = Math.round(value * scale);
		const is = Math.round(step * scale);
		if (is !== 0 && Number.isSafeInteger(iv) && Number.isSafeInteger(is)) return iv % is === 0;
	}
	const quotient = value / step;
	return isClose(quotient, Math.round(quotient));
}

function gcdInt(a: number, b: number): number {
	let [x, y] = [Math.abs(a), Math.abs(b)];
	while (y !== 0) [x, y] = [y, x % y];
	return x;
}

/**
 * Plus petit commun multiple de deux pas décimaux.
 * Retombe sur le produit (un multiple commun) si l'échelle décimale
 * n'est pas calculable.
 */
export function lcmOf(a: number, b: number): number {
	if (isMultipleOf(a, b)) return a;
	if (isMultipleOf(b, a)) return b;
	const da = decimalPlaces(a);
	const db = decimalPlaces(b);
	if (da === undefined || db === undefined) return a * b;
	const scale = 10 ** Math.max(da, db);
	const ia = Math.round(a * scale);
	const ib = Math.round(b * scale);
	return clean(((ia / gcdInt(ia, ib)) * ib) / scale);
}

// ─── Construction ────────────────────────────────────────────────────────────

/** Pas effectif : `undefined` pour un intervalle réel sans multipleOf. */
export function effectiveStep(d: NumberDescriptor): number | undefined {
	if (d.form === "values") return undefined;
	if (d.integer) return d.multipleOf ?? 1;
	return d.multipleOf;
}

function tightenLower(bound: Endpoint, step: number): Endpoint {
	if (!bound.bounded) return bound;
	let k = Math.ceil(bound.value / step - EPSILON);
	if (bound.open && isClose(k * step, bound.value)) k += 1;
	return closedAt(clean(k * step));
}

function tightenUpper(bound: Endpoint, step: number): Endpoint {
	if (!bound.bounded) return bound;
	let k = Math.floor(bound.value / step + EPSILON);
	if (bound.open && isClose(k * step, bound.value)) k -= 1;
	return closedAt(clean(k * step));
}

export function makeNumberValues(values: Iterable<number>): NumberDescriptor | null {
	const sorted = Array.from(new Set(values)).sort((a, b) => a - b);
	if (sorted.length === 0) return null;
	return { kind: "number", form: "values", values: sorted };
}

/**
 * Intervalle normalisé : bornes resserrées sur les multiples du pas,
 * `null` si vide, ensemble de valeurs si l'intervalle est un point.
 */
export function makeNumberRange(
	integer: boolean,
	range: Interval,
	multipleOf?: number,
): NumberDescriptor | null {
	let m = multipleOf;
	if (integer && m !== undefined) {
		m = lcmOf(m, 1);
		if (m === 1) m = undefined;
	}
	const step = integer ? (m ?? 1) : m;
	const tightened =
		step === undefined
			? range
			: { lower: tightenLower(range.lower, step), upper: tightenUpper(range.upper, step) };
	if (isEmptyInterval(tightened)) return null;

	const point = singletonValue(tightened);
	if (point !== undefined) return makeNumberValues([point]);

	return m === undefined
		? { kind: "number", form: "range", integer, range: tightened }
		: { kind: "number", form: "range", integer, range: tightened, multipleOf: m };
}

const NUMBER_TOP: NumberDescriptor = {
	kind: "number",
	form: "range",
	integer: false,
	range: FULL_INTERVAL,
};

// ─── Queries ─────────────────────────────────────────────────────────────────

export function includesNumber(d: NumberDescriptor, value: number): boolean {
	if (d.form === "values") return d.values.some((member) => isClose(member, value));
	if (!includesValue(d.range, value)) return false;
	const step = effectiveStep(d);
	return step === undefined || isMultipleOf(value, step);
}

/** Valeurs d'un intervalle fini à pas, `undefined` si infini ou trop grand. */
export function enumerateNumbers(d: NumberDescriptor): number[] | undefined {
	if (d.form === "values") return [...d.values];
	const step = effectiveStep(d);
	if (step === undefined || !d.range.lower.bounded || !d.range.upper.bounded) {
		return undefined;
	}
	const first = d.range.lower.value;
	const count = Math.floor((d.range.upper.value - first) / step + EPSILON) + 1;
	if (count > MAX_ENUMERATED_VALUES) return undefined;
	return Array.from({ length: count }, (_, i) => clean(first + i * step));
}

function combineSteps(a: number | undefined, b: number | undefined): number | undefined {
	if (a === undefined) return b;
	if (b === undefined) return a;
	return lcmOf(a, b);
}

/** Pas commun pour une union : le plus grossier des deux s'il divise l'autre. */
function coarserStep(a: number | undefined, b: number | undefined): number | undefined {
	if (a === undefined || b === undefined) return undefined;
	if (isMultipleOf(a, b)) return b;
	if (isMultipleOf(b, a)) return a;
	return undefined;
}

function fromStep(range: Interval, step: number | undefined): NumberDescriptor {
	const integer = step !== undefined && isMultipleOf(step, 1);
	return (
		makeNumberRange(integer, range, integer && step === 1 ? undefined : step) ??
		NUMBER_TOP
	);
}

function valuesHull(values: readonly number[]): Interval {
	const low = values[0] ?? 0;
	const high = values[values.length - 1] ?? low;
	return { lower: closedAt(low), upper: closedAt(high) };
}

function isNumberTop(d: NumberDescriptor): boolean {
	return (
		d.form === "range" &&
		!d.integer &&
		d.multipleOf === undefined &&
		isFullInterval(d.range)
	);
}

function isNumberSubtype(a: NumberDescriptor, b: NumberDescriptor): boolean {
	if (a.form === "values") return a.values.every((value) => includesNumber(b, value));
	if (b.form === "values") {
		const members = enumerateNumbers(a);
		return members !== undefined && members.every((value) => includesNumber(b, value));
	}
	if (!containsInterval(b.range, a.range)) return false;
	const stepB = effectiveStep(b);
	if (stepB === undefined) return true;
	const stepA = effectiveStep(a);
	return stepA !== undefined && isMultipleOf(stepA, stepB);
}

// ─── Algebra ─────────────────────────────────────────────────────────────────

export const numberAlgebra: KindAlgebra<NumberDescriptor> = {
	top: () => NUMBER_TOP,

	isTop: isNumberTop,

	isSubtype: isNumberSubtype,

	meet(a, b) {
		if (a.form === "values") {
			return makeNumberValues(a.values.filter((value) => includesNumber(b, value)));
		}
		if (b.form === "values") {
			return makeNumberValues(b.values.filter((value) => includesNumber(a, value)));
		}
		return makeNumberRange(
			a.integer || b.integer,
			intersectIntervals(a.range, b.range),
			combineSteps(a.multipleOf, b.multipleOf),
		);
	},

	join(a, b) {
		if (isNumberSubtype(a, b)) return b;
		if (isNumberSubtype(b, a)) return a;
		if (a.form === "values" && b.form === "values") {
			return makeNumberValues([...a.values, ...b.values]) ?? NUMBER_TOP;
		}
		if (a.form === "values" && b.form === "range") return joinValuesIntoRange(a.values, b);
		if (b.form === "values" && a.form === "range") return joinValuesIntoRange(b.values, a);
		if (a.form !== "range" || b.form !== "range") return NUMBER_TOP;
		// convex hull: widening, [0,1] ∨ [5,6] = [0,6]
		return fromStep(
			hullIntervals(a.range, b.range),
			coarserStep(effectiveStep(a), effectiveStep(b)),
		);
	},

	complement(d) {
		if (isNumberTop(d)) return null;
		if (d.form === "values" || d.integer || d.multipleOf !== undefined) {
			return undefined;
		}
		const { lower, upper } = d.range;
		if (lower.bounded && !upper.bounded) {
			return makeNumberRange(false, {
				lower: UNBOUNDED,
				upper: lower.open ? closedAt(lower.value) : openAt(lower.value),
			});
		}
		if (upper.bounded && !lower.bounded) {
			return makeNumberRange(false, {
				lower: upper.open ? closedAt(upper.value) : openAt(upper.value),
				upper: UNBOUNDED,
			});
		}
		return undefined;
	},
};

function joinValuesIntoRange(
	values: readonly number[],
	range: Extract<NumberDescriptor, { form: "range" }>,
): NumberDescriptor {
	const step = effectiveStep(range);
	const keepStep = step !== undefined && values.every((value) => isMultipleOf(value, step));
	return fromStep(
		hullIntervals(range.range, valuesHull(values)),
		keepStep ? step : undefined,
	);
}

// ─── Union coverage ──────────────────────────────────────────────────────────

function lowerAfter(upper: Extract<Endpoint, { bounded: true }>): Endpoint {
	return upper.open ? closedAt(upper.value) : openAt(upper.value);
}

function upperBefore(lower: Extract<Endpoint, { bounded: true }>): Endpoint {
	return lower.open ? closedAt(lower.value) : openAt(lower.value);
}

/**
 * `x ⊆ ⋃ ys`. Balaye les intervalles qui couvrent tous les membres de `x`
 * qu'ils contiennent ; les trous restants sont vérifiés valeur par valeur
 * contre chaque branche. `undefined` quand un trou infini (ou trop grand)
 * reste à énumérer.
 */
export function isNumberCovered(
	x: NumberDescriptor,
	ys: readonly NumberDescriptor[],
): boolean | undefined {
	if (x.form === "values") {
		return x.values.every((value) => ys.some((y) => includesNumber(y, value)));
	}
	const { integer, range: own, multipleOf } = x;
	const step = effectiveStep(x);
	const covering = ys
		.flatMap((y) => {
			if (y.form !== "range") return [];
			const stepY = effectiveStep(y);
			const covers = stepY === undefined || (step !== undefined && isMultipleOf(step, stepY));
			return covers ? [y.range] : [];
		})
		.sort((a, b) => compareLower(a.lower, b.lower));

	const gapCovered = (gap: Interval): boolean | undefined => {
		const within = intersectIntervals(gap, own);
		if (isEmptyInterval(within)) return true;
		let members: readonly number[] | undefined;
		if (step === undefined) {
			const point = singletonValue(within);
			if (point === undefined) return false;
			members = [point];
		} else {
			const part = makeNumberRange(integer, within, multipleOf);
			if (part === null) return true;
			members = enumerateNumbers(part);
			if (members === undefined) return undefined;
		}
		return members.every((value) => ys.some((y) => includesNumber(y, value)));
	};

	let cursor: Endpoint = own.lower;
	for (const range of covering) {
		if (range.lower.bounded) {
			const verdict = gapCovered({ lower: cursor, upper: upperBefore(range.lower) });
			if (verdict !== true) return verdict;
		}
		if (!range.upper.bounded) return true;
		const next = lowerAfter(range.upper);
		if (compareLower(next, cursor) > 0) cursor = next;
	}
	return gapCovered({ lower: cursor, upper: own.upper });
}
