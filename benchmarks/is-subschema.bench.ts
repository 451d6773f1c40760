import type { JSONSchema7 } from "json-schema";
import { bench, boxplot, run, summary } from "mitata";
import { SubschemaChecker, SubschemaConfig } from "../src";

const checker = new SubschemaChecker({ config: new SubschemaConfig() });
checker.resolver.addRelationship("ex:Employee", "foaf:Person");
checker.resolver.addRelationship("ex:Manager", "ex:Employee");

// ─── Scalars ─────────────────────────────────────────────────────────────────

const narrowRange: JSONSchema7 = { type: "integer", minimum: 10, maximum: 30 };
const wideRange: JSONSchema7 = { type: "number", minimum: 0, maximum: 100 };

const codePattern: JSONSchema7 = { type: "string", pattern: "^[a-z]{3}-[0-9]+$" };
const loosePattern: JSONSchema7 = { type: "string", pattern: "^[a-z]+-" };

// ─── Objects ─────────────────────────────────────────────────────────────────

const closedObject: JSONSchema7 = {
	type: "object",
	properties: { name: { type: "string" }, age: { type: "integer" } },
	required: ["name"],
	additionalProperties: false,
};

const openObject: JSONSchema7 = {
	type: "object",
	properties: { name: { type: "string" } },
};

// ─── Semantic ────────────────────────────────────────────────────────────────

const manager: JSONSchema7 = { ...closedObject, stype: "ex:Manager" };
const person: JSONSchema7 = { ...openObject, stype: "foaf:Person" };

summary(() => {
	bench("identity", () => checker.isSubschema(closedObject, closedObject));
	bench("numeric range", () => checker.isSubschema(narrowRange, wideRange));
	bench("pattern inclusion", () => checker.isSubschema(codePattern, loosePattern));
	bench("closed ⊆ open object", () => checker.isSubschema(closedObject, openObject));
	bench("semantic chain", () => checker.isSubschema(manager, person));
});

boxplot(() => {
	bench("meet objects", () => checker.meet(closedObject, openObject));
	bench("join ranges", () => checker.join(narrowRange, wideRange));
	bench("normalize enum", () => checker.normalize({ enum: ["a", "b", 1, 2, null] }));
});

await run();
