import type {
	BooleanDescriptor,
	KindAlgebra,
	NullDescriptor,
} from "./canonical-types";

// ─── Scalar Algebra (null, boolean) ──────────────────────────────────────────
//
// Ensembles finis : inclusion, intersection, union.

export const NULL_TOP: NullDescriptor = { kind: "null" };

export const nullAlgebra: KindAlgebra<NullDescriptor> = {
	top: () => NULL_TOP,
	isTop: () => true,
	isSubtype: () => true,
	meet: (a) => a,
	join: (a) => a,
	complement: () => null,
};

export function makeBoolean(values: Iterable<boolean>): BooleanDescriptor | null {
	const set = new Set(values);
	const sorted = [false, true].filter((value) => set.has(value));
	return sorted.length === 0 ? null : { kind: "boolean", values: sorted };
}

const BOOLEAN_TOP: BooleanDescriptor = { kind: "boolean", values: [false, true] };

export const booleanAlgebra: KindAlgebra<BooleanDescriptor> = {
	top: () => BOOLEAN_TOP,
	isTop: (d) => d.values.length === 2,
	isSubtype: (a, b) => a.values.every((value) => b.values.includes(value)),
	meet: (a, b) => makeBoolean(a.values.filter((value) => b.values.includes(value))),
	join: (a, b) => makeBoolean([...a.values, ...b.values]) ?? BOOLEAN_TOP,
	complement: (d) =>
		makeBoolean([false, true].filter((value) => !d.values.includes(value))),
};
