import { beforeAll, describe, expect, test } from "vitest";
import { SubschemaChecker, SubschemaConfig } from "../../src";

let checker: SubschemaChecker;

beforeAll(() => {
	checker = new SubschemaChecker({ config: new SubschemaConfig() });
});

describe("isEquivalent", () => {
	test("integer ≡ number with multipleOf 1", () => {
		expect(checker.isEquivalent({ type: "integer" }, { type: "number", multipleOf: 1 })).toBe(true);
	});

	test("enum order does not matter", () => {
		expect(checker.isEquivalent({ enum: ["a", "b"] }, { enum: ["b", "a"] })).toBe(true);
	});

	test("const ≡ single-valued enum", () => {
		expect(checker.isEquivalent({ const: 3 }, { enum: [3] })).toBe(true);
	});

	test("oneOf of kinds ≡ type list", () => {
		expect(checker.isEquivalent({ oneOf: [{ type: "string" }, { type: "null" }] }, { type: ["null", "string"] })).toBe(
			true,
		);
	});

	test("strict inclusion is not equivalence", () => {
		expect(checker.isEquivalent({ type: "integer" }, { type: "number" })).toBe(false);
	});

	test("not not X ≡ X", () => {
		expect(checker.isEquivalent({ not: { not: { type: "string" } } }, { type: "string" })).toBe(true);
	});
});

describe("normalize", () => {
	test("tightens integer bounds", () => {
		expect(checker.normalize({ type: "integer", minimum: 0.5, exclusiveMaximum: 10 })).toEqual({
			type: "integer",
			minimum: 1,
			maximum: 9,
		});
	});

	test("sorts numeric enum members", () => {
		expect(checker.normalize({ enum: [3, 1, 2] })).toEqual({ type: "integer", enum: [1, 2, 3] });
	});

	test("merges numeric literals across anyOf branches", () => {
		expect(checker.normalize({ anyOf: [{ const: 2 }, { enum: [1, 2] }] })).toEqual({ type: "integer", enum: [1, 2] });
	});

	test("single point range becomes const", () => {
		expect(checker.normalize({ type: "number", minimum: 4, maximum: 4 })).toEqual({ type: "integer", const: 4 });
	});

	test("string const becomes an anchored pattern", () => {
		expect(checker.normalize({ const: "x" })).toEqual({ type: "string", pattern: "^(?:x)$" });
	});

	test("boolean schemas", () => {
		expect(checker.normalize(true)).toEqual({});
		expect(checker.normalize(false)).toEqual({ not: {} });
		expect(checker.normalize({ not: {} })).toEqual({ not: {} });
	});

	test("type list in kind order", () => {
		expect(checker.normalize({ type: ["string", "null"] })).toEqual({ type: ["null", "string"] });
	});

	test("unsatisfiable bounds normalize to Bottom", () => {
		expect(checker.normalize({ type: "integer", minimum: 1.2, maximum: 1.8 })).toEqual({ not: {} });
	});

	test("keeps the stype annotation", () => {
		expect(checker.normalize({ type: "string", stype: "foaf:Person" })).toEqual({
			type: "string",
			stype: "foaf:Person",
		});
	});

	test("tuple with forbidden tail omits the implied maxItems", () => {
		expect(
			checker.normalize({ type: "array", items: [{ type: "string" }], additionalItems: false, maxItems: 3 }),
		).toEqual({ type: "array", items: [{ type: "string" }], additionalItems: false });
	});

	test("unknown format is ignored", () => {
		expect(checker.normalize({ type: "string", format: "x-custom" })).toEqual({ type: "string" });
	});
});

describe("canonicalize", () => {
	test("empty schema is Top", () => {
		expect(checker.canonicalize({})).toEqual({ type: "top" });
	});

	test("false is Bottom", () => {
		expect(checker.canonicalize(false)).toEqual({ type: "bottom" });
	});

	test("one descriptor per kind", () => {
		const canonical = checker.canonicalize({ type: ["boolean", "null"] });
		expect(canonical).toEqual({
			type: "union",
			atoms: [{ kind: "null" }, { kind: "boolean", values: [false, true] }],
		});
	});
});
