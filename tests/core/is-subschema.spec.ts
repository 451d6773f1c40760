import type { JSONSchema7 } from "json-schema";
import { beforeAll, describe, expect, test } from "vitest";
import { SubschemaChecker, SubschemaConfig, UnsupportedUnionError } from "../../src";

let checker: SubschemaChecker;

beforeAll(() => {
	checker = new SubschemaChecker({ config: new SubschemaConfig() });
});

describe("isSubschema", () => {
	// ── Identity ─────────────────────────────────────────────────────────────

	test("A ⊆ A (identity) is always true", () => {
		const schema: JSONSchema7 = {
			type: "object",
			properties: { name: { type: "string" } },
			required: ["name"],
		};
		expect(checker.isSubschema(schema, schema)).toBe(true);
		expect(checker.check(schema, schema).stage).toBe("identity");
	});

	test("empty schema ⊆ empty schema", () => {
		expect(checker.isSubschema({}, {})).toBe(true);
	});

	test("boolean false ⊆ anything", () => {
		expect(checker.isSubschema(false, true)).toBe(true);
		expect(checker.isSubschema(false, { type: "string" })).toBe(true);
		expect(checker.isSubschema(false, false)).toBe(true);
	});

	test("anything ⊆ true", () => {
		expect(checker.isSubschema({ type: "array" }, true)).toBe(true);
		expect(checker.isSubschema(true, { type: "array" })).toBe(false);
	});

	// ── Type compatibility ───────────────────────────────────────────────────

	test("integer ⊆ number", () => {
		expect(checker.isSubschema({ type: "integer" }, { type: "number" })).toBe(true);
	});

	test("number ⊄ integer", () => {
		expect(checker.isSubschema({ type: "number" }, { type: "integer" })).toBe(false);
	});

	test("string ⊄ number", () => {
		expect(checker.isSubschema({ type: "string" }, { type: "number" })).toBe(false);
	});

	test("type list narrows", () => {
		expect(checker.isSubschema({ type: "string" }, { type: ["string", "null"] })).toBe(true);
		expect(checker.isSubschema({ type: ["string", "null"] }, { type: "string" })).toBe(false);
	});

	// ── Numeric ranges ───────────────────────────────────────────────────────

	test("[10, 30] integers ⊆ [0, 100] numbers", () => {
		const sub: JSONSchema7 = { type: "integer", minimum: 10, maximum: 30 };
		const sup: JSONSchema7 = { type: "number", minimum: 0, maximum: 100 };
		expect(checker.isSubschema(sub, sup)).toBe(true);
		expect(checker.isSubschema(sup, sub)).toBe(false);
	});

	test("exclusive bounds on integers tighten to closed bounds", () => {
		expect(
			checker.isSubschema(
				{ type: "integer", exclusiveMinimum: 0, exclusiveMaximum: 10 },
				{ type: "integer", minimum: 1, maximum: 9 },
			),
		).toBe(true);
	});

	test("multipleOf 4 ⊆ multipleOf 2, not the other way", () => {
		expect(checker.isSubschema({ type: "number", multipleOf: 4 }, { type: "number", multipleOf: 2 })).toBe(true);
		expect(checker.isSubschema({ type: "number", multipleOf: 2 }, { type: "number", multipleOf: 4 })).toBe(false);
	});

	test("a step just above an integer is not a multiple of it", () => {
		expect(
			checker.isSubschema({ type: "number", multipleOf: 1.0000000001 }, { type: "number", multipleOf: 1 }),
		).toBe(false);
		expect(checker.isSubschema({ type: "number", multipleOf: 0.3 }, { type: "number", multipleOf: 0.1 })).toBe(true);
	});

	test("finite integer range ⊆ enum of its members", () => {
		expect(checker.isSubschema({ type: "integer", minimum: 1, maximum: 3 }, { enum: [1, 2, 3, 4] })).toBe(true);
		expect(checker.isSubschema({ type: "integer", minimum: 1, maximum: 5 }, { enum: [1, 2, 3, 4] })).toBe(false);
	});

	// ── Objects ──────────────────────────────────────────────────────────────

	test("closed object ⊆ open object", () => {
		const closed: JSONSchema7 = {
			type: "object",
			properties: { name: { type: "string" }, age: { type: "integer" } },
			required: ["name"],
			additionalProperties: false,
		};
		const open: JSONSchema7 = {
			type: "object",
			properties: { name: { type: "string" } },
		};
		expect(checker.isSubschema(closed, open)).toBe(true);
		expect(checker.isSubschema(open, closed)).toBe(false);
	});

	test("more required ⊆ less required", () => {
		const more: JSONSchema7 = {
			type: "object",
			properties: { name: { type: "string" }, age: { type: "number" } },
			required: ["name", "age"],
		};
		const less: JSONSchema7 = {
			type: "object",
			properties: { name: { type: "string" } },
			required: ["name"],
		};
		expect(checker.isSubschema(more, less)).toBe(true);
		expect(checker.isSubschema(less, more)).toBe(false);
	});

	test("property type must narrow", () => {
		expect(
			checker.isSubschema(
				{ type: "object", properties: { id: { type: "string" } } },
				{ type: "object", properties: { id: { type: "integer" } } },
			),
		).toBe(false);
	});

	test("undeclared names fall under patternProperties", () => {
		const sub: JSONSchema7 = {
			type: "object",
			patternProperties: { "^x-": { type: "string" } },
			additionalProperties: false,
		};
		const sup: JSONSchema7 = {
			type: "object",
			additionalProperties: { type: "string" },
		};
		expect(checker.isSubschema(sub, sup)).toBe(true);
		expect(checker.isSubschema(sup, sub)).toBe(false);
	});

	// ── Arrays ───────────────────────────────────────────────────────────────

	test("tuple ⊆ homogeneous list", () => {
		const tuple: JSONSchema7 = {
			type: "array",
			items: [{ type: "string" }, { type: "string", maxLength: 3 }],
			additionalItems: false,
		};
		expect(checker.isSubschema(tuple, { type: "array", items: { type: "string" } })).toBe(true);
		expect(checker.isSubschema({ type: "array", items: { type: "string" } }, tuple)).toBe(false);
	});

	test("array length bounds", () => {
		expect(
			checker.isSubschema({ type: "array", minItems: 2, maxItems: 3 }, { type: "array", maxItems: 5 }),
		).toBe(true);
		expect(checker.isSubschema({ type: "array", maxItems: 5 }, { type: "array", minItems: 1 })).toBe(false);
	});

	test("uniqueItems only narrows", () => {
		expect(checker.isSubschema({ type: "array", uniqueItems: true }, { type: "array" })).toBe(true);
		expect(checker.isSubschema({ type: "array" }, { type: "array", uniqueItems: true })).toBe(false);
	});

	// ── Strings ──────────────────────────────────────────────────────────────

	test("pattern inclusion is decided on languages", () => {
		expect(
			checker.isSubschema({ type: "string", pattern: "^[a-z]{3}$" }, { type: "string", pattern: "^[a-z]+$" }),
		).toBe(true);
		expect(
			checker.isSubschema({ type: "string", pattern: "^[a-z]+$" }, { type: "string", pattern: "^[a-z]{3}$" }),
		).toBe(false);
	});

	test("pattern implies length", () => {
		expect(
			checker.isSubschema({ type: "string", pattern: "^[0-9]{4}$" }, { type: "string", maxLength: 4 }),
		).toBe(true);
	});

	test("enum of strings ⊆ pattern", () => {
		expect(checker.isSubschema({ enum: ["ab", "abc"] }, { type: "string", pattern: "^ab" })).toBe(true);
		expect(checker.isSubschema({ enum: ["ab", "ba"] }, { type: "string", pattern: "^ab" })).toBe(false);
	});

	test("email ⊆ idn-email", () => {
		expect(checker.isSubschema({ type: "string", format: "email" }, { type: "string", format: "idn-email" })).toBe(
			true,
		);
		expect(checker.isSubschema({ type: "string", format: "idn-email" }, { type: "string", format: "email" })).toBe(
			false,
		);
	});

	// ── Connectives ──────────────────────────────────────────────────────────

	test("anyOf on the left requires every branch", () => {
		const sub: JSONSchema7 = { anyOf: [{ type: "integer" }, { type: "string" }] };
		expect(checker.isSubschema(sub, { type: ["number", "string"] })).toBe(true);
		expect(checker.isSubschema(sub, { type: "number" })).toBe(false);
	});

	test("oneOf is read as anyOf", () => {
		expect(checker.isSubschema({ type: "integer" }, { oneOf: [{ type: "number" }, { type: "string" }] })).toBe(true);
	});

	test("allOf narrows", () => {
		expect(
			checker.isSubschema({ allOf: [{ type: "number" }, { minimum: 5 }] }, { type: "number", minimum: 0 }),
		).toBe(true);
	});

	test("not over a half-line", () => {
		expect(checker.isSubschema({ type: "number", minimum: 10 }, { not: { type: "number", maximum: 5 } })).toBe(
			true,
		);
	});

	// ── Unions on the right ──────────────────────────────────────────────────

	test("a range between two disjoint branches is not covered", () => {
		const sup: JSONSchema7 = { anyOf: [{ type: "number", maximum: 1 }, { type: "number", minimum: 4 }] };
		expect(checker.isSubschema({ type: "number", minimum: 2, maximum: 3 }, sup)).toBe(false);
		expect(checker.isSubschema({ type: "number", minimum: 5 }, sup)).toBe(true);
	});

	test("adjacent branches cover their hull", () => {
		expect(
			checker.isSubschema(
				{ type: "integer", minimum: 0, maximum: 10 },
				{ anyOf: [{ type: "integer", minimum: 0, maximum: 5 }, { type: "integer", minimum: 6, maximum: 10 }] },
			),
		).toBe(true);
		expect(
			checker.isSubschema(
				{ type: "number", minimum: 0, maximum: 10 },
				{ anyOf: [{ type: "number", minimum: 0, maximum: 5 }, { type: "number", minimum: 5, maximum: 10 }] },
			),
		).toBe(true);
	});

	test("exclusive bounds leave the shared point uncovered", () => {
		const sup: JSONSchema7 = {
			anyOf: [
				{ type: "number", minimum: 0, exclusiveMaximum: 5 },
				{ type: "number", exclusiveMinimum: 5, maximum: 10 },
			],
		};
		expect(checker.isSubschema({ type: "number", minimum: 0, maximum: 10 }, sup)).toBe(false);
	});

	test("strings outside every branch", () => {
		const sup: JSONSchema7 = { anyOf: [{ type: "string", maxLength: 2 }, { type: "string", pattern: "^a" }] };
		expect(checker.isSubschema({ type: "string", minLength: 5 }, sup)).toBe(false);
		expect(checker.isSubschema({ type: "string", pattern: "^ab" }, sup)).toBe(true);
	});

	test("a pattern split across constants", () => {
		expect(
			checker.isSubschema({ type: "string", pattern: "^(a|b)$" }, { anyOf: [{ const: "a" }, { const: "b" }] }),
		).toBe(true);
	});

	test("object constant outside an enum of objects", () => {
		expect(
			checker.isSubschema(
				{ const: { a: 1, b: 2 } },
				{
					enum: [
						{ a: 1, b: 1 },
						{ a: 2, b: 2 },
					],
				},
			),
		).toBe(false);
		expect(
			checker.isSubschema(
				{ const: { a: 2, b: 2 } },
				{
					enum: [
						{ a: 1, b: 1 },
						{ a: 2, b: 2 },
					],
				},
			),
		).toBe(true);
	});

	test("closed objects are split value by value", () => {
		const sub: JSONSchema7 = {
			type: "object",
			properties: { flag: { type: "boolean" } },
			required: ["flag"],
			additionalProperties: false,
		};
		const branch = (flag: boolean): JSONSchema7 => ({
			type: "object",
			properties: { flag: { const: flag } },
			required: ["flag"],
			additionalProperties: false,
		});
		expect(checker.isSubschema(sub, { anyOf: [branch(true), branch(false)] })).toBe(true);
		expect(checker.isSubschema(sub, { anyOf: [branch(true), { type: "string" }] })).toBe(false);
	});

	test("arrays of a short tuple are split value by value", () => {
		const sub: JSONSchema7 = { type: "array", items: [{ type: "boolean" }], minItems: 1, maxItems: 1 };
		const sup: JSONSchema7 = {
			anyOf: [
				{ type: "array", items: { const: true } },
				{ type: "array", items: { const: false } },
			],
		};
		expect(checker.isSubschema(sub, sup)).toBe(true);
	});

	test("an undecidable object union is reported on the right", () => {
		const sup: JSONSchema7 = {
			anyOf: [
				{ type: "object", required: ["a"] },
				{ type: "object", properties: { a: { type: "string" } } },
			],
		};
		expect(() => checker.isSubschema({ type: "object" }, sup)).toThrow(UnsupportedUnionError);
		expect(() => checker.isSubschema({ type: "object" }, sup)).toThrow(
			"RHS: inclusion in a union of object schemas at $ cannot be decided exactly",
		);
	});

	// ── Local $ref ───────────────────────────────────────────────────────────

	test("local $ref is inlined before comparison", () => {
		const withRef: JSONSchema7 = {
			definitions: { name: { type: "string", minLength: 1 } },
			type: "object",
			properties: { name: { $ref: "#/definitions/name" } },
			required: ["name"],
		};
		const plain: JSONSchema7 = {
			type: "object",
			properties: { name: { type: "string" } },
			required: ["name"],
		};
		expect(checker.isSubschema(withRef, plain)).toBe(true);
		expect(checker.isSubschema(plain, withRef)).toBe(false);
	});
});
