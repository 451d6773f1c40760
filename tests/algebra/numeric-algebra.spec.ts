import { describe, expect, test } from "vitest";
import { createAlgebra } from "../../src/canonical-algebra";
import type { NumberDescriptor } from "../../src/canonical-types";
import { closedAt, FULL_INTERVAL, interval, openAt, UNBOUNDED } from "../../src/interval";
import {
	enumerateNumbers,
	includesNumber,
	isMultipleOf,
	isNumberCovered,
	lcmOf,
	makeNumberRange,
	makeNumberValues,
	numberAlgebra,
} from "../../src/numeric-algebra";

const algebra = createAlgebra();

const subtype = (a: NumberDescriptor, b: NumberDescriptor) => numberAlgebra.isSubtype(a, b, algebra);

function range(integer: boolean, low?: number, high?: number, multipleOf?: number): NumberDescriptor {
	const d = makeNumberRange(
		integer,
		interval(low === undefined ? UNBOUNDED : closedAt(low), high === undefined ? UNBOUNDED : closedAt(high)),
		multipleOf,
	);
	if (!d) throw new Error("empty number range");
	return d;
}

function values(...members: number[]): NumberDescriptor {
	const d = makeNumberValues(members);
	if (!d) throw new Error("empty number values");
	return d;
}

// ── Arithmetic ──

describe("steps", () => {
	test("decimal multiples", () => {
		expect(isMultipleOf(0.3, 0.1)).toBe(true);
		expect(isMultipleOf(0.35, 0.1)).toBe(false);
	});

	test("divisibility is exact on decimal scales", () => {
		expect(isMultipleOf(1.0000000001, 1)).toBe(false);
		expect(isMultipleOf(2.4, 1.2)).toBe(true);
	});

	test("least common multiple", () => {
		expect(lcmOf(4, 6)).toBe(12);
		expect(lcmOf(0.2, 0.3)).toBe(0.6);
		expect(lcmOf(0.5, 1)).toBe(1);
	});
});

// ── Construction ──

describe("makeNumberRange", () => {
	test("integer bounds are tightened", () => {
		expect(makeNumberRange(true, interval(openAt(2.5), closedAt(7)))).toEqual({
			kind: "number",
			form: "range",
			integer: true,
			range: interval(closedAt(3), closedAt(7)),
		});
	});

	test("no integer in the range", () => {
		expect(makeNumberRange(true, interval(closedAt(1.2), closedAt(1.8)))).toBeNull();
	});

	test("a point becomes a value set", () => {
		expect(makeNumberRange(false, interval(closedAt(5), closedAt(5)))).toEqual({
			kind: "number",
			form: "values",
			values: [5],
		});
	});

	test("bounds snap to multiples", () => {
		expect(makeNumberRange(false, interval(closedAt(1), closedAt(10)), 2.5)).toEqual({
			kind: "number",
			form: "range",
			integer: false,
			range: interval(closedAt(2.5), closedAt(10)),
			multipleOf: 2.5,
		});
	});

	test("integer multipleOf 0.5 is plain integer", () => {
		expect(range(true, 0, 10, 0.5)).toEqual(range(true, 0, 10));
	});

	test("value sets are sorted and deduplicated", () => {
		expect(values(3, 1, 3, 2)).toEqual({ kind: "number", form: "values", values: [1, 2, 3] });
		expect(makeNumberValues([])).toBeNull();
	});
});

// ── Relations ──

describe("isSubtype", () => {
	test("multiples of 4 ⊆ multiples of 2", () => {
		expect(subtype(range(true, undefined, undefined, 4), range(true, undefined, undefined, 2))).toBe(true);
		expect(subtype(range(true, undefined, undefined, 2), range(true, undefined, undefined, 4))).toBe(false);
	});

	test("integer range ⊆ real range", () => {
		expect(subtype(range(true, 0, 10), range(false, -1, 10))).toBe(true);
		expect(subtype(range(false, 0, 10), range(true, 0, 10))).toBe(false);
	});

	test("value set ⊆ range", () => {
		expect(subtype(values(2, 4), range(true, 0, 10))).toBe(true);
		expect(subtype(values(2, 4.5), range(true, 0, 10))).toBe(false);
	});

	test("finite integer range ⊆ value set", () => {
		expect(subtype(range(true, 1, 3), values(1, 2, 3))).toBe(true);
		expect(subtype(range(false, 1, 3), values(1, 2, 3))).toBe(false);
	});

	test("membership", () => {
		expect(includesNumber(range(true, 0, 10, 3), 9)).toBe(true);
		expect(includesNumber(range(true, 0, 10, 3), 10)).toBe(false);
	});
});

// ── Lattice ──

describe("meet", () => {
	test("integer ∧ multipleOf 0.5", () => {
		const half: NumberDescriptor = {
			kind: "number",
			form: "range",
			integer: false,
			range: interval(closedAt(2.2), closedAt(20)),
			multipleOf: 0.5,
		};
		expect(numberAlgebra.meet(range(true, 0, 10), half, algebra)).toEqual(range(true, 3, 10));
	});

	test("values filtered by a range", () => {
		expect(numberAlgebra.meet(values(1, 5, 50), range(false, 0, 10), algebra)).toEqual(values(1, 5));
	});

	test("disjoint ranges", () => {
		expect(numberAlgebra.meet(range(false, 0, 1), range(false, 2, 3), algebra)).toBeNull();
	});
});

describe("join", () => {
	test("value sets are merged", () => {
		expect(numberAlgebra.join(values(1), values(3), algebra)).toEqual(values(1, 3));
	});

	test("disjoint ranges widen to their hull", () => {
		expect(numberAlgebra.join(range(false, 0, 1), range(false, 5, 6), algebra)).toEqual(range(false, 0, 6));
	});

	test("integer values keep the integer step", () => {
		expect(numberAlgebra.join(values(0, 10), range(true, 1, 5), algebra)).toEqual(range(true, 0, 10));
	});

	test("a fractional value drops the step", () => {
		expect(numberAlgebra.join(values(0.5), range(true, 1, 5), algebra)).toEqual({
			kind: "number",
			form: "range",
			integer: false,
			range: interval(closedAt(0.5), closedAt(5)),
		});
	});
});

describe("complement", () => {
	test("half-line", () => {
		expect(numberAlgebra.complement(range(false, 0))).toEqual({
			kind: "number",
			form: "range",
			integer: false,
			range: interval(UNBOUNDED, openAt(0)),
		});
	});

	test("top has an empty complement", () => {
		expect(numberAlgebra.complement(numberAlgebra.top())).toBeNull();
		expect(numberAlgebra.top()).toEqual({
			kind: "number",
			form: "range",
			integer: false,
			range: FULL_INTERVAL,
		});
	});

	test("integers are not complementable", () => {
		expect(numberAlgebra.complement(range(true, 0))).toBeUndefined();
	});
});

// ── Unions ──

describe("isNumberCovered", () => {
	test("adjacent integer ranges cover their hull", () => {
		expect(isNumberCovered(range(true, 0, 10), [range(true, 0, 5), range(true, 6, 10)])).toBe(true);
	});

	test("a real gap between ranges is not covered", () => {
		expect(isNumberCovered(range(false, 0, 10), [range(false, 0, 5), range(false, 6, 10)])).toBe(false);
	});

	test("values are checked one by one", () => {
		expect(isNumberCovered(values(1, 2), [range(false, 0, 1), values(2)])).toBe(true);
		expect(isNumberCovered(values(1, 3), [range(false, 0, 1), values(2)])).toBe(false);
	});

	test("finite integer gaps are filled by values", () => {
		expect(isNumberCovered(range(true, 0, 4), [range(true, 0, 1), values(2), range(true, 3, 4)])).toBe(true);
	});

	test("integer ranges enumerate their members", () => {
		expect(enumerateNumbers(range(true, 1, 3))).toEqual([1, 2, 3]);
		expect(enumerateNumbers(range(false, 1, 3))).toBeUndefined();
	});
});
