import { describe, expect, test } from "vitest";
import { createAlgebra } from "../../src/canonical-algebra";
import type { StringDescriptor } from "../../src/canonical-types";
import { FORMAT_PATTERNS } from "../../src/format-validator";
import { closedAt, countInterval, interval, openAt } from "../../src/interval";
import { patternMatches } from "../../src/pattern-subset";
import {
	enumerateStrings,
	isStringCovered,
	lengthRangeOf,
	makeString,
	STRING_TOP,
	stringAlgebra,
} from "../../src/string-algebra";

const algebra = createAlgebra();

function str(parts: Parameters<typeof makeString>[0]): StringDescriptor {
	const d = makeString(parts);
	if (!d) throw new Error("empty string descriptor");
	return d;
}

const subtype = (a: StringDescriptor, b: StringDescriptor) => stringAlgebra.isSubtype(a, b, algebra);

// ── Construction ──

describe("makeString", () => {
	test("lengths are tightened to integers", () => {
		expect(str({ length: interval(openAt(1.5), closedAt(4.5)) }).length).toEqual(countInterval(2, 4));
	});

	test("empty length range", () => {
		expect(makeString({ length: countInterval(3, 2) })).toBeNull();
	});

	test("contradicting patterns", () => {
		expect(makeString({ patterns: ["^a$", "^b$"] })).toBeNull();
	});

	test("disjoint formats", () => {
		expect(makeString({ formats: ["date", "email"] })).toBeNull();
	});

	test("a format contributes its grammar", () => {
		const date = FORMAT_PATTERNS.date;
		expect(str({ formats: ["date"] }).patterns).toEqual(date === undefined ? [] : [date]);
	});

	test("pattern too short for the length", () => {
		expect(makeString({ patterns: ["^ab$"], length: countInterval(3) })).toBeNull();
	});

	test("reachable lengths", () => {
		expect(lengthRangeOf(str({ patterns: ["^a{2,4}$"] }))).toEqual(countInterval(2, 4));
	});
});

// ── Relations ──

describe("isSubtype", () => {
	test("pattern implies a length bound", () => {
		expect(subtype(str({ patterns: ["^[0-9]{3}$"] }), str({ length: countInterval(0, 5) }))).toBe(true);
	});

	test("length bound not implied", () => {
		expect(subtype(str({ patterns: ["^a+$"], length: countInterval(0, 5) }), str({ length: countInterval(0, 3) }))).toBe(
			false,
		);
	});

	test("pattern languages", () => {
		expect(subtype(str({ patterns: ["^a+$"] }), str({ patterns: ["^a"] }))).toBe(true);
		expect(subtype(str({ patterns: ["^a"] }), str({ patterns: ["^a+$"] }))).toBe(false);
	});

	test("exclusions", () => {
		expect(subtype(str({ patterns: ["^b"] }), str({ excluded: ["^a"] }))).toBe(true);
		expect(subtype(str({ patterns: ["^ab"] }), str({ excluded: ["^a"] }))).toBe(false);
	});

	test("finite language checked against a format word by word", () => {
		const emails = str({ patterns: ["^(?:a@b\\.co|c@d\\.io)$"] });
		expect(subtype(emails, str({ formats: ["email"] }))).toBe(true);
		expect(subtype(str({ formats: ["email"] }), emails)).toBe(false);
	});

	test("format hierarchy", () => {
		expect(subtype(str({ formats: ["email"] }), str({ formats: ["idn-email"] }))).toBe(true);
		expect(subtype(str({ formats: ["idn-email"] }), str({ formats: ["email"] }))).toBe(false);
	});
});

// ── Lattice ──

describe("meet", () => {
	test("lengths intersect", () => {
		expect(stringAlgebra.meet(str({ length: countInterval(2) }), str({ length: countInterval(0, 5) }), algebra)).toEqual({
			kind: "string",
			length: countInterval(2, 5),
			patterns: [],
			excluded: [],
			formats: [],
		});
	});

	test("pattern and its exclusion", () => {
		expect(stringAlgebra.meet(str({ patterns: ["^a"] }), str({ excluded: ["^a"] }), algebra)).toBeNull();
	});
});

describe("join", () => {
	test("a wider side wins", () => {
		const wide = str({ patterns: ["^a"] });
		expect(stringAlgebra.join(str({ patterns: ["^ab"] }), wide, algebra)).toBe(wide);
	});

	test("patterns are united", () => {
		const joined = stringAlgebra.join(str({ patterns: ["^a"] }), str({ patterns: ["^b"] }), algebra);
		const [pattern] = joined.patterns;
		expect(joined.patterns).toHaveLength(1);
		expect(pattern !== undefined && patternMatches(pattern, "ax")).toBe(true);
		expect(pattern !== undefined && patternMatches(pattern, "bx")).toBe(true);
		expect(pattern !== undefined && patternMatches(pattern, "cx")).toBe(false);
	});

	test("lengths widen to their hull", () => {
		expect(stringAlgebra.join(str({ length: countInterval(0, 1) }), str({ length: countInterval(5, 6) }), algebra).length).toEqual(
			countInterval(0, 6),
		);
	});

	test("only shared formats survive", () => {
		expect(stringAlgebra.join(str({ formats: ["email"] }), str({ formats: ["idn-email"] }), algebra).formats).toEqual([
			"idn-email",
		]);
	});
});

describe("complement", () => {
	test("top", () => {
		expect(stringAlgebra.complement(STRING_TOP)).toBeNull();
	});

	test("a single pattern becomes an exclusion", () => {
		expect(stringAlgebra.complement(str({ patterns: ["^a"] }))).toEqual({
			kind: "string",
			length: countInterval(0),
			patterns: [],
			excluded: ["^a"],
			formats: [],
		});
	});

	test("minimum length", () => {
		expect(stringAlgebra.complement(str({ length: countInterval(3) }))?.length).toEqual(countInterval(0, 2));
	});

	test("several constraints are not complementable", () => {
		expect(stringAlgebra.complement(str({ patterns: ["^a"], length: countInterval(3) }))).toBeUndefined();
		expect(stringAlgebra.complement(str({ formats: ["email"] }))).toBeUndefined();
	});
});

// ── Unions ──

describe("isStringCovered", () => {
	test("complementary lengths cover every string", () => {
		expect(isStringCovered(STRING_TOP, [str({ length: countInterval(0, 2) }), str({ length: countInterval(3) })])).toBe(
			true,
		);
	});

	test("long strings outside the pattern branch are not covered", () => {
		expect(
			isStringCovered(str({ length: countInterval(5) }), [str({ length: countInterval(0, 2) }), str({ patterns: ["^a"] })]),
		).toBe(false);
	});

	test("finite languages are enumerated", () => {
		expect(enumerateStrings(str({ patterns: ["^(a|b)$"] }), 10)).toEqual(["a", "b"]);
		expect(enumerateStrings(str({ patterns: ["^a+$"] }), 10)).toBeUndefined();
	});
});
