import type { JSONSchema7 } from "json-schema";
import { beforeAll, describe, expect, test } from "vitest";
import { SubschemaChecker, SubschemaConfig } from "../../src";

let checker: SubschemaChecker;

beforeAll(() => {
	checker = new SubschemaChecker({ config: new SubschemaConfig() });
});

describe("meet", () => {
	test("intersects numeric ranges and keeps the integer flag", () => {
		expect(
			checker.meet({ type: "integer", minimum: 0, maximum: 50 }, { type: "number", minimum: 10, maximum: 100 }),
		).toEqual({ type: "integer", minimum: 10, maximum: 50 });
	});

	test("disjoint kinds give Bottom", () => {
		expect(checker.meet({ type: "string" }, { type: "number" })).toEqual({ not: {} });
	});

	test("disjoint ranges give Bottom", () => {
		expect(checker.meet({ type: "number", maximum: 1 }, { type: "number", minimum: 2 })).toEqual({ not: {} });
	});

	test("merges properties and required names", () => {
		expect(
			checker.meet(
				{ type: "object", properties: { a: { type: "string" } }, required: ["a"] },
				{ type: "object", properties: { b: { type: "number" } }, required: ["b"] },
			),
		).toEqual({
			type: "object",
			properties: { a: { type: "string" }, b: { type: "number" } },
			required: ["a", "b"],
		});
	});

	test("required name forbidden by the other side gives Bottom", () => {
		expect(
			checker.meet(
				{ type: "object", required: ["a"] },
				{ type: "object", properties: { b: true }, additionalProperties: false },
			),
		).toEqual({ not: {} });
	});

	test("Top is the identity", () => {
		const schema: JSONSchema7 = { type: "string", minLength: 2 };
		expect(checker.meet(schema, {})).toEqual(schema);
		expect(checker.meet(true, schema)).toEqual(schema);
	});

	test("type lists intersect", () => {
		expect(checker.meet({ type: ["string", "null"] }, { type: ["null", "number"] })).toEqual({ type: "null" });
	});

	test("enum ∧ range keeps the members in range", () => {
		expect(checker.meet({ enum: [1, 5, 10] }, { type: "integer", minimum: 4 })).toEqual({
			type: "integer",
			enum: [5, 10],
		});
	});

	test("meet is a lower bound of both operands", () => {
		const a: JSONSchema7 = { type: "array", items: { type: "number", minimum: 0 }, maxItems: 4 };
		const b: JSONSchema7 = { type: "array", items: { type: "integer" }, minItems: 1 };
		const m = checker.meet(a, b);
		expect(checker.isSubschema(m, a)).toBe(true);
		expect(checker.isSubschema(m, b)).toBe(true);
	});
});

describe("join", () => {
	test("convex hull of numeric ranges", () => {
		expect(
			checker.join({ type: "integer", minimum: 0, maximum: 10 }, { type: "integer", minimum: 20, maximum: 30 }),
		).toEqual({ type: "integer", minimum: 0, maximum: 30 });
	});

	test("different kinds give a type list", () => {
		expect(checker.join({ type: "string" }, { type: "number" })).toEqual({ type: ["number", "string"] });
	});

	test("join with a subschema returns the wider operand", () => {
		expect(checker.join({ type: "integer" }, { type: "number" })).toEqual({ type: "number" });
	});

	test("Bottom is the identity", () => {
		expect(checker.join(false, { type: "boolean" })).toEqual({ type: "boolean" });
	});

	test("booleans join to the whole kind", () => {
		expect(checker.join({ const: true }, { const: false })).toEqual({ type: "boolean" });
	});

	test("keeps only the names required on both sides", () => {
		expect(
			checker.join(
				{ type: "object", properties: { a: { type: "string" } }, required: ["a"], additionalProperties: false },
				{ type: "object", properties: { b: { type: "string" } }, required: ["b"], additionalProperties: false },
			),
		).toEqual({
			type: "object",
			properties: { a: { type: "string" }, b: { type: "string" } },
			additionalProperties: false,
			minProperties: 1,
			maxProperties: 1,
		});
	});

	test("join with annotated properties is the same in both orders", () => {
		const plain: JSONSchema7 = { type: "object", properties: { x: { type: "number" } } };
		const annotated: JSONSchema7 = { type: "object", properties: { x: { type: "number", stype: "ex:Thing" } } };
		const expected: JSONSchema7 = { type: "object", properties: { x: { type: "number" } } };
		expect(checker.join(plain, annotated)).toEqual(expected);
		expect(checker.join(annotated, plain)).toEqual(expected);
		expect(checker.isSubschema(plain, checker.join(plain, annotated))).toBe(true);
	});

	test("join with annotated items stays an upper bound", () => {
		const plain: JSONSchema7 = { type: "array", items: { type: "string" } };
		const annotated: JSONSchema7 = { type: "array", items: { type: "string", stype: "ex:Thing" } };
		expect(checker.join(plain, annotated)).toEqual({ type: "array", items: { type: "string" } });
		expect(checker.isSubschema(plain, checker.join(plain, annotated))).toBe(true);
		expect(checker.isSubschema(annotated, checker.join(annotated, plain))).toBe(true);
	});

	test("join is an upper bound of both operands", () => {
		const a: JSONSchema7 = { type: "string", pattern: "^a+$" };
		const b: JSONSchema7 = { type: "string", pattern: "^b+$" };
		const j = checker.join(a, b);
		expect(checker.isSubschema(a, j)).toBe(true);
		expect(checker.isSubschema(b, j)).toBe(true);
	});
});
