import { beforeAll, describe, expect, test } from "vitest";
import { arrayAlgebra, makeArray } from "../../src/array-algebra";
import { BOTTOM, TOP } from "../../src/canonical-algebra";
import { canonicalize } from "../../src/canonicalizer";
import { countInterval } from "../../src/interval";
import { SubschemaChecker } from "../../src/subschema-checker";

let checker: SubschemaChecker;

beforeAll(() => {
	checker = new SubschemaChecker();
});

// ── Normal form ──

describe("makeArray", () => {
	test("a Bottom position truncates the tuple", () => {
		const string = canonicalize({ type: "string" });
		expect(makeArray({ prefix: [string, BOTTOM, string] })).toEqual({
			kind: "array",
			prefix: [string],
			rest: BOTTOM,
			length: countInterval(0, 1),
			unique: false,
		});
	});

	test("required items that cannot exist", () => {
		expect(makeArray({ rest: BOTTOM, length: countInterval(1) })).toBeNull();
	});

	test("uniqueness is trivial for at most one item", () => {
		expect(makeArray({ length: countInterval(0, 1), unique: true })?.unique).toBe(false);
	});

	test("complement of a minimum length", () => {
		const atLeastThree = makeArray({ length: countInterval(3) });
		expect(atLeastThree && arrayAlgebra.complement(atLeastThree)).toEqual({
			kind: "array",
			prefix: [],
			rest: TOP,
			length: countInterval(0, 2),
			unique: false,
		});
	});
});

// ── Through the checker ──

describe("arrays", () => {
	test("closed tuple ⊆ bounded list", () => {
		expect(
			checker.isSubschema(
				{ type: "array", items: [{ type: "string" }, { type: "string" }], additionalItems: false },
				{ type: "array", items: { type: "string" }, maxItems: 2 },
			),
		).toBe(true);
	});

	test("open tuple ⊄ bounded list", () => {
		expect(
			checker.isSubschema(
				{ type: "array", items: [{ type: "string" }] },
				{ type: "array", items: { type: "string" } },
			),
		).toBe(false);
	});

	test("meet of a list and a tuple stops at the first empty position", () => {
		expect(
			checker.meet(
				{ type: "array", items: { type: "string" } },
				{ type: "array", items: [{ type: "string", minLength: 1 }, { type: "number" }] },
			),
		).toEqual({ type: "array", items: [{ type: "string", minLength: 1 }], additionalItems: false });
	});

	test("join of two lists unites their items", () => {
		expect(
			checker.join({ type: "array", items: { type: "string" } }, { type: "array", items: { type: "number" } }),
		).toEqual({ type: "array", items: { type: ["number", "string"] } });
	});

	test("unique list ⊆ plain list, not the reverse", () => {
		const unique = { type: "array", uniqueItems: true } as const;
		expect(checker.isSubschema(unique, { type: "array" })).toBe(true);
		expect(checker.isSubschema({ type: "array" }, unique)).toBe(false);
	});
});
