import type { JSONSchema7 } from "json-schema";
import { SubschemaChecker, SubschemaConfig } from "./src";

const checker = new SubschemaChecker({
	config: new SubschemaConfig({ debug: true }),
});

checker.resolver.addRelationship("ex:Employee", "foaf:Person");

const person: JSONSchema7 = {
	type: "object",
	stype: "foaf:Person",
	properties: {
		name: { type: "string" },
		age: { type: "integer", minimum: 0 },
	},
	required: ["name"],
};

const employee: JSONSchema7 = {
	type: "object",
	stype: "ex:Employee",
	properties: {
		name: { type: "string", minLength: 1 },
		age: { type: "integer", minimum: 18, maximum: 70 },
		badge: { type: "string", pattern: "^[A-Z]{2}[0-9]{4}$" },
	},
	required: ["name", "badge"],
	additionalProperties: false,
};

console.log(checker.formatResult("employee ⊆ person", checker.check(employee, person)));
console.log(checker.formatResult("person ⊆ employee", checker.check(person, employee)));
console.log(JSON.stringify(checker.meet(person, employee), null, 2));
console.log(JSON.stringify(checker.join(person, employee), null, 2));
