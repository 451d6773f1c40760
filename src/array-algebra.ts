import {
	type ArrayDescriptor,
	type CanonicalSchema,
	hasNestedAnnotations,
	type KindAlgebra,
	type SchemaAlgebra,
} from "./canonical-types";
import { holdsIfDecidable } from "./errors";
import {
	capCount,
	complementCount,
	containsInterval,
	FULL_COUNT,
	hullIntervals,
	type Interval,
	intersectIntervals,
	isEmptyInterval,
	isFullCount,
	toIntegerInterval,
	upperValue,
} from "./interval";

// ─── Array Algebra ───────────────────────────────────────────────────────────
//
// Une liste homogène est un tuple infini d'items identiques : les deux
// formes se comparent position par position via `itemAt`.
//
// Invariants de la forme normale :
//   - une position Bottom tronque le tuple et plafonne la longueur
//   - `rest` Bottom ⇒ longueur max ≤ prefix.length

const TOP_SCHEMA: CanonicalSchema = { type: "top" };
const BOTTOM_SCHEMA: CanonicalSchema = { type: "bottom" };

export const ARRAY_TOP: ArrayDescriptor = {
	kind: "array",
	prefix: [],
	rest: TOP_SCHEMA,
	length: FULL_COUNT,
	unique: false,
};

export function itemAt(d: ArrayDescriptor, index: number): CanonicalSchema {
	return d.prefix[index] ?? d.rest;
}

interface ArrayParts {
	prefix?: readonly CanonicalSchema[];
	rest?: CanonicalSchema;
	length?: Interval;
	unique?: boolean;
}

/** Descripteur normalisé, `null` si aucun tableau ne le satisfait. */
export function makeArray(parts: ArrayParts): ArrayDescriptor | null {
	let prefix = [...(parts.prefix ?? [])];
	let rest = parts.rest ?? TOP_SCHEMA;
	let length = toIntegerInterval(intersectIntervals(parts.length ?? FULL_COUNT, FULL_COUNT));

	const bottomAt = prefix.findIndex((item) => item.type === "bottom");
	if (bottomAt >= 0) {
		prefix = prefix.slice(0, bottomAt);
		rest = BOTTOM_SCHEMA;
	}
	if (rest.type === "bottom") length = capCount(length, prefix.length);

	const max = upperValue(length);
	if (max < prefix.length) {
		prefix = prefix.slice(0, max);
		rest = BOTTOM_SCHEMA;
	}
	if (isEmptyInterval(length)) return null;

	// un seul item possible : l'unicité est triviale
	const unique = (parts.unique ?? false) && max > 1;
	return { kind: "array", prefix, rest, length, unique };
}

function isArraySubtype(a: ArrayDescriptor, b: ArrayDescriptor, algebra: SchemaAlgebra): boolean {
	if (!containsInterval(b.length, a.length)) return false;
	if (b.unique && !a.unique && upperValue(a.length) > 1) return false;

	const maxLength = upperValue(a.length);
	const positions = Math.max(a.prefix.length, b.prefix.length);
	for (let i = 0; i < positions && i < maxLength; i++) {
		if (!algebra.isSubtype(itemAt(a, i), itemAt(b, i))) return false;
	}
	if (maxLength > positions && !algebra.isSubtype(a.rest, b.rest)) return false;
	return true;
}

export const arrayAlgebra: KindAlgebra<ArrayDescriptor> = {
	top: () => ARRAY_TOP,

	isTop: (d) =>
		d.prefix.length === 0 && d.rest.type === "top" && isFullCount(d.length) && !d.unique,

	isSubtype: isArraySubtype,

	meet(a, b, algebra) {
		const positions = Math.max(a.prefix.length, b.prefix.length);
		const prefix: CanonicalSchema[] = [];
		for (let i = 0; i < positions; i++) {
			prefix.push(algebra.meet(itemAt(a, i), itemAt(b, i)));
		}
		return makeArray({
			prefix,
			rest: algebra.meet(a.rest, b.rest),
			length: intersectIntervals(a.length, b.length),
			unique: a.unique || b.unique,
		});
	},

	join(a, b, algebra) {
		// raccourci réservé aux opérandes sans annotation imbriquée : sinon la
		// politique d'annotation doit voir chaque nœud
		if (!hasNestedAnnotations(a) && !hasNestedAnnotations(b)) {
			if (holdsIfDecidable(() => isArraySubtype(a, b, algebra))) return b;
			if (holdsIfDecidable(() => isArraySubtype(b, a, algebra))) return a;
		}
		const positions = Math.max(a.prefix.length, b.prefix.length);
		const prefix: CanonicalSchema[] = [];
		for (let i = 0; i < positions; i++) {
			prefix.push(algebra.join(itemAt(a, i), itemAt(b, i)));
		}
		return (
			makeArray({
				prefix,
				rest: algebra.join(a.rest, b.rest),
				length: hullIntervals(a.length, b.length),
				unique: a.unique && b.unique,
			}) ?? ARRAY_TOP
		);
	},

	complement(d) {
		if (arrayAlgebra.isTop(d)) return null;
		if (d.prefix.length > 0 || d.rest.type !== "top" || d.unique) return undefined;
		const length = complementCount(d.length);
		return length ? makeArray({ length }) : undefined;
	},
};
