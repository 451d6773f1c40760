import type { JSONSchema7 } from "json-schema";
import { describe, expect, test } from "vitest";
import { findCycle, inlineLocalRefs } from "../../src/dereference";
import { InvalidSchemaError } from "../../src/errors";

describe("inlineLocalRefs", () => {
	test("definitions are inlined and not copied", () => {
		const schema: JSONSchema7 = {
			definitions: { name: { type: "string" } },
			properties: { a: { $ref: "#/definitions/name" } },
		};
		expect(inlineLocalRefs(schema)).toEqual({ properties: { a: { type: "string" } } });
	});

	test("keywords next to $ref are ignored", () => {
		const schema: JSONSchema7 = { $ref: "#/definitions/x", minimum: 3, definitions: { x: { type: "number" } } };
		expect(inlineLocalRefs(schema)).toEqual({ type: "number" });
	});

	test("escaped pointer segments", () => {
		const schema: JSONSchema7 = { definitions: { "a/b": { type: "null" } }, items: { $ref: "#/definitions/a~1b" } };
		expect(inlineLocalRefs(schema)).toEqual({ items: { type: "null" } });
	});

	test("a property named like a keyword is kept", () => {
		const schema: JSONSchema7 = { properties: { definitions: { type: "string" } } };
		expect(inlineLocalRefs(schema)).toEqual({ properties: { definitions: { type: "string" } } });
	});

	test("$ref inside enum is data", () => {
		const schema: JSONSchema7 = { enum: [{ $ref: "#/nowhere" }] };
		expect(inlineLocalRefs(schema)).toEqual({ enum: [{ $ref: "#/nowhere" }] });
	});

	test("external references are left as they are", () => {
		const schema: JSONSchema7 = { items: { $ref: "http://example.com/item.json" } };
		expect(inlineLocalRefs(schema)).toEqual({ items: { $ref: "http://example.com/item.json" } });
	});

	test("unresolvable reference", () => {
		expect(() => inlineLocalRefs({ items: { $ref: "#/definitions/missing" } })).toThrow(InvalidSchemaError);
	});

	test("$ref chain without a schema in between", () => {
		const schema: JSONSchema7 = {
			definitions: { a: { $ref: "#/definitions/b" }, b: { $ref: "#/definitions/a" } },
			items: { $ref: "#/definitions/a" },
		};
		expect(() => inlineLocalRefs(schema)).toThrow(/circular \$ref chain/);
	});

	test("recursive reference becomes a cycle", () => {
		const schema: JSONSchema7 = { type: "object", properties: { child: { $ref: "#" } } };
		expect(findCycle(inlineLocalRefs(schema))).toBe("$.properties.child");
	});
});

describe("findCycle", () => {
	test("shared subschemas are not a cycle", () => {
		const shared: JSONSchema7 = { type: "string" };
		expect(findCycle({ properties: { a: shared, b: shared } })).toBeUndefined();
	});

	test("cycle through an array", () => {
		const node: JSONSchema7 = { anyOf: [] };
		node.anyOf?.push(node);
		expect(findCycle(node)).toBe("$.anyOf[0]");
	});
});
