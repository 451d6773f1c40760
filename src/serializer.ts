import type { JSONSchema7, JSONSchema7Definition, JSONSchema7TypeName } from "json-schema";
import type {
	ArrayDescriptor,
	CanonicalSchema,
	Descriptor,
	NumberDescriptor,
	ObjectDescriptor,
	StringDescriptor,
} from "./canonical-types";
import { FORMAT_PATTERNS } from "./format-validator";
import { type Endpoint, lowerValue } from "./interval";

// ─── Serializer ──────────────────────────────────────────────────────────────
//
// CanonicalSchema → JSON Schema draft-07.
//
//   Top    → {}            (`stype` conservé)
//   Bottom → { not: {} }   (`false` en position imbriquée)
//   union  → un fragment par kind ; plusieurs kinds → `anyOf`, ou une
//            liste `type` si chaque kind est non contraint

const BOTTOM_SCHEMA: JSONSchema7 = { not: {} };

/** Schema racine (jamais booléen). */
export function toJsonSchema(schema: CanonicalSchema): JSONSchema7 {
	if (schema.type === "bottom") return { ...BOTTOM_SCHEMA };
	const body = schema.type === "top" ? {} : unionBody(schema.atoms);
	return schema.stype === undefined ? body : { ...body, stype: schema.stype };
}

function nested(schema: CanonicalSchema): JSONSchema7Definition {
	return schema.type === "bottom" ? false : toJsonSchema(schema);
}

function isTopSchema(schema: CanonicalSchema): boolean {
	return schema.type === "top" && schema.stype === undefined;
}

function unionBody(atoms: readonly Descriptor[]): JSONSchema7 {
	const fragments = atoms.map(fragment);
	const [single] = fragments;
	if (fragments.length === 1 && single) return single;

	const types: JSONSchema7TypeName[] = [];
	for (const item of fragments) {
		const keys = Object.keys(item);
		if (keys.length !== 1 || typeof item.type !== "string") return { anyOf: fragments };
		types.push(item.type);
	}
	return { type: types };
}

function fragment(d: Descriptor): JSONSchema7 {
	switch (d.kind) {
		case "null":
			return { type: "null" };
		case "boolean": {
			const [only] = d.values;
			return d.values.length === 1 && only !== undefined
				? { type: "boolean", const: only }
				: { type: "boolean" };
		}
		case "number":
			return numberFragment(d);
		case "string":
			return stringFragment(d);
		case "array":
			return arrayFragment(d);
		case "object":
			return objectFragment(d);
	}
}

// ─── Kinds ───────────────────────────────────────────────────────────────────

function numberFragment(d: NumberDescriptor): JSONSchema7 {
	if (d.form === "values") {
		const type = d.values.every(Number.isInteger) ? "integer" : "number";
		const [only] = d.values;
		return d.values.length === 1 && only !== undefined
			? { type, const: only }
			: { type, enum: [...d.values] };
	}
	const result: JSONSchema7 = { type: d.integer ? "integer" : "number" };
	const lower: Endpoint = d.range.lower;
	if (lower.bounded) {
		if (lower.open) result.exclusiveMinimum = lower.value;
		else result.minimum = lower.value;
	}
	const upper: Endpoint = d.range.upper;
	if (upper.bounded) {
		if (upper.open) result.exclusiveMaximum = upper.value;
		else result.maximum = upper.value;
	}
	if (d.multipleOf !== undefined) result.multipleOf = d.multipleOf;
	return result;
}

function stringFragment(d: StringDescriptor): JSONSchema7 {
	const result: JSONSchema7 = { type: "string" };
	const minLength = lowerValue(d.length);
	if (minLength > 0) result.minLength = minLength;
	if (d.length.upper.bounded) result.maxLength = d.length.upper.value;

	// les patterns impliqués par un format ne sont pas réécrits
	const implied = new Set(d.formats.map((format) => FORMAT_PATTERNS[format]));
	const [pattern, ...morePatterns] = d.patterns.filter((p) => !implied.has(p));
	const [format, ...moreFormats] = d.formats;
	if (pattern !== undefined) result.pattern = pattern;
	if (format !== undefined) result.format = format;

	const extra: JSONSchema7[] = [
		...morePatterns.map((p): JSONSchema7 => ({ pattern: p })),
		...moreFormats.map((f): JSONSchema7 => ({ format: f })),
	];
	if (extra.length > 0) result.allOf = extra;

	const [excluded, ...moreExcluded] = d.excluded;
	if (excluded !== undefined) {
		result.not =
			moreExcluded.length === 0
				? { pattern: excluded }
				: { anyOf: d.excluded.map((p): JSONSchema7 => ({ pattern: p })) };
	}
	return result;
}

function arrayFragment(d: ArrayDescriptor): JSONSchema7 {
	const result: JSONSchema7 = { type: "array" };
	if (d.prefix.length > 0) {
		result.items = d.prefix.map(nested);
		if (!isTopSchema(d.rest)) result.additionalItems = nested(d.rest);
	} else if (!isTopSchema(d.rest)) {
		result.items = nested(d.rest);
	}
	const minItems = lowerValue(d.length);
	if (minItems > 0) result.minItems = minItems;
	if (d.length.upper.bounded && !(d.rest.type === "bottom" && d.length.upper.value === d.prefix.length)) {
		result.maxItems = d.length.upper.value;
	}
	if (d.unique) result.uniqueItems = true;
	return result;
}

function objectFragment(d: ObjectDescriptor): JSONSchema7 {
	const result: JSONSchema7 = { type: "object" };
	if (d.properties.size > 0) {
		const properties: Record<string, JSONSchema7Definition> = {};
		for (const [name, schema] of d.properties) properties[name] = nested(schema);
		result.properties = properties;
	}
	if (d.required.length > 0) result.required = [...d.required];
	if (d.patternProperties.length > 0) {
		const patternProperties: Record<string, JSONSchema7Definition> = {};
		for (const { pattern, schema } of d.patternProperties) {
			patternProperties[pattern] = nested(schema);
		}
		result.patternProperties = patternProperties;
	}
	if (!isTopSchema(d.additional)) result.additionalProperties = nested(d.additional);

	const minProperties = lowerValue(d.size);
	if (minProperties > d.required.length) result.minProperties = minProperties;
	if (d.size.upper.bounded && d.size.upper.value < closedObjectCap(d)) {
		result.maxProperties = d.size.upper.value;
	}
	return result;
}

/** Nombre maximal de clés implicite d'un objet fermé. */
function closedObjectCap(d: ObjectDescriptor): number {
	if (d.additional.type !== "bottom" || d.patternProperties.length > 0) {
		return Number.POSITIVE_INFINITY;
	}
	const names = new Set(d.required);
	for (const [name, schema] of d.properties) {
		if (schema.type !== "bottom") names.add(name);
	}
	return names.size;
}
