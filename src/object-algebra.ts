import {
	type CanonicalSchema,
	hasNestedAnnotations,
	type KindAlgebra,
	type ObjectDescriptor,
	type PatternProperty,
	type SchemaAlgebra,
} from "./canonical-types";
import { holdsIfDecidable } from "./errors";
import {
	capCount,
	complementCount,
	containsInterval,
	countInterval,
	FULL_COUNT,
	hullIntervals,
	type Interval,
	intersectIntervals,
	isEmptyInterval,
	isFullCount,
	lowerValue,
	toIntegerInterval,
} from "./interval";
import { compilePattern, isPatternCovered, literalPattern, patternMatches } from "./pattern-subset";
import { literalDfa, membershipVectors } from "./regex-automaton";
import { sortedUnique } from "./utils";

// ─── Object Algebra ──────────────────────────────────────────────────────────
//
// Schema effectif d'un nom de propriété k :
//
//   properties[k] ∧ ⋀ { s | (p, s) ∈ patternProperties, k ∈ L(p) }
//
// ou `additional` si k n'est ni déclaré ni couvert par un pattern.
//
// Les noms non déclarés forment une infinité de clés : ils sont traités
// par RÉGIONS, une par vecteur d'appartenance réalisable au produit des
// automates de patterns.

const TOP_SCHEMA: CanonicalSchema = { type: "top" };

export const OBJECT_TOP: ObjectDescriptor = {
	kind: "object",
	properties: new Map(),
	required: [],
	patternProperties: [],
	additional: TOP_SCHEMA,
	size: FULL_COUNT,
};

const isBottom = (schema: CanonicalSchema): boolean => schema.type === "bottom";

const isPlainTop = (schema: CanonicalSchema): boolean =>
	schema.type === "top" && schema.stype === undefined;

function meetAll(
	schemas: readonly CanonicalSchema[],
	fallback: CanonicalSchema,
	algebra: SchemaAlgebra,
): CanonicalSchema {
	const [first, ...rest] = schemas;
	if (!first) return fallback;
	return rest.reduce((acc, schema) => algebra.meet(acc, schema), first);
}

function joinAll(schemas: readonly CanonicalSchema[], algebra: SchemaAlgebra): CanonicalSchema {
	const [first, ...rest] = schemas;
	if (!first) return { type: "bottom" };
	return rest.reduce((acc, schema) => algebra.join(acc, schema), first);
}

/** Schema effectif du nom `name` dans `d`. */
export function propertySchema(
	d: ObjectDescriptor,
	name: string,
	algebra: SchemaAlgebra,
): CanonicalSchema {
	const parts: CanonicalSchema[] = [];
	const declared = d.properties.get(name);
	if (declared) parts.push(declared);
	for (const { pattern, schema } of d.patternProperties) {
		if (patternMatches(pattern, name)) parts.push(schema);
	}
	return meetAll(parts, d.additional, algebra);
}

// ─── Construction ────────────────────────────────────────────────────────────

interface ObjectParts {
	properties?: ReadonlyMap<string, CanonicalSchema>;
	required?: readonly string[];
	patternProperties?: readonly PatternProperty[];
	additional?: CanonicalSchema;
	size?: Interval;
}

/**
 * Descripteur normalisé, `null` si aucun objet ne le satisfait
 * (nom requis interdit, cardinalité vide).
 */
export function makeObject(parts: ObjectParts, algebra: SchemaAlgebra): ObjectDescriptor | null {
	const additional = parts.additional ?? TOP_SCHEMA;

	const byPattern = new Map<string, CanonicalSchema>();
	for (const { pattern, schema } of parts.patternProperties ?? []) {
		const known = byPattern.get(pattern);
		byPattern.set(pattern, known ? algebra.meet(known, schema) : schema);
	}
	const patternProperties = Array.from(byPattern.entries())
		.filter(([, schema]) => !(isPlainTop(schema) && isPlainTop(additional)))
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([pattern, schema]) => ({ pattern, schema }));

	const properties = new Map<string, CanonicalSchema>();
	for (const [name, schema] of parts.properties ?? []) {
		const redundant =
			isPlainTop(schema) &&
			isPlainTop(additional) &&
			!patternProperties.some(({ pattern }) => patternMatches(pattern, name));
		if (!redundant) properties.set(name, schema);
	}

	const required = sortedUnique(parts.required ?? []);
	const draft: ObjectDescriptor = {
		kind: "object",
		properties,
		required,
		patternProperties,
		additional,
		size: FULL_COUNT,
	};
	if (required.some((name) => isBottom(propertySchema(draft, name, algebra)))) {
		return null;
	}

	let size = toIntegerInterval(intersectIntervals(parts.size ?? FULL_COUNT, FULL_COUNT));
	size = intersectIntervals(size, countInterval(required.length));
	if (isBottom(additional) && patternProperties.length === 0) {
		const allowed = new Set(required);
		for (const [name] of properties) {
			if (!isBottom(propertySchema(draft, name, algebra))) allowed.add(name);
		}
		size = capCount(size, allowed.size);
	}
	if (isEmptyInterval(size)) return null;
	return { ...draft, size };
}

// ─── Subtyping ───────────────────────────────────────────────────────────────

function declaredNames(...descriptors: ObjectDescriptor[]): string[] {
	return sortedUnique(descriptors.flatMap((d) => [...d.properties.keys(), ...d.required]));
}

/**
 * Pour chaque région de noms non déclarés, la paire (schema effectif dans
 * `a`, schema effectif dans `b`).
 */
function undeclaredRegions(
	a: ObjectDescriptor,
	b: ObjectDescriptor,
	names: readonly string[],
	algebra: SchemaAlgebra,
): [CanonicalSchema, CanonicalSchema][] {
	const dfas = [
		...a.patternProperties.map(({ pattern }) => compilePattern(pattern)),
		...b.patternProperties.map(({ pattern }) => compilePattern(pattern)),
	];
	const split = a.patternProperties.length;
	const withNames = names.length > 0;
	if (withNames) dfas.push(literalDfa(names));

	const regions: [CanonicalSchema, CanonicalSchema][] = [];
	for (const vector of membershipVectors(dfas)) {
		if (withNames && vector[vector.length - 1] === true) continue;
		const inA = a.patternProperties.filter((_, i) => vector[i] === true);
		const inB = b.patternProperties.filter((_, i) => vector[split + i] === true);
		regions.push([
			meetAll(inA.map(({ schema }) => schema), a.additional, algebra),
			meetAll(inB.map(({ schema }) => schema), b.additional, algebra),
		]);
	}
	return regions;
}

function isObjectSubtype(a: ObjectDescriptor, b: ObjectDescriptor, algebra: SchemaAlgebra): boolean {
	const required = new Set(a.required);
	if (!b.required.every((name) => required.has(name))) return false;
	if (!containsInterval(b.size, a.size)) return false;

	const names = declaredNames(a, b);
	for (const name of names) {
		const own = propertySchema(a, name, algebra);
		if (isBottom(own)) continue;
		if (!algebra.isSubtype(own, propertySchema(b, name, algebra))) return false;
	}
	for (const [own, other] of undeclaredRegions(a, b, names, algebra)) {
		if (isBottom(own)) continue;
		if (!algebra.isSubtype(own, other)) return false;
	}
	return true;
}

// ─── Meet / Join helpers ─────────────────────────────────────────────────────

/**
 * Entrée pattern de `own` dans le meet : les noms de L(p) que `other` ne
 * déclare ni ne couvre par un pattern tombent sous `other.additional`.
 */
function meetPatternEntry(
	entry: PatternProperty,
	other: ObjectDescriptor,
	algebra: SchemaAlgebra,
): PatternProperty {
	if (isPlainTop(other.additional)) return entry;
	const cover = other.patternProperties.map(({ pattern }) => pattern);
	const names = [...other.properties.keys()];
	if (names.length > 0) cover.push(literalPattern(names));
	if (isPatternCovered(entry.pattern, cover)) return entry;
	return { pattern: entry.pattern, schema: algebra.meet(entry.schema, other.additional) };
}

/**
 * Entrée pattern de `own` dans le join : son schema est élargi à tout ce
 * que `other` admet sur les noms de L(p).
 */
function joinPatternEntry(
	entry: PatternProperty,
	other: ObjectDescriptor,
	algebra: SchemaAlgebra,
): PatternProperty {
	const admitted: CanonicalSchema[] = [entry.schema, other.additional];
	for (const { pattern, schema } of other.patternProperties) {
		if (pattern === entry.pattern || patternsIntersect(pattern, entry.pattern)) {
			admitted.push(schema);
		}
	}
	for (const name of other.properties.keys()) {
		if (patternMatches(entry.pattern, name)) {
			admitted.push(propertySchema(other, name, algebra));
		}
	}
	return { pattern: entry.pattern, schema: joinAll(admitted, algebra) };
}

function patternsIntersect(a: string, b: string): boolean {
	return membershipVectors([compilePattern(a), compilePattern(b)]).some(
		([inA, inB]) => inA === true && inB === true,
	);
}

// ─── Algebra ─────────────────────────────────────────────────────────────────

export const objectAlgebra: KindAlgebra<ObjectDescriptor> = {
	top: () => OBJECT_TOP,

	isTop: (d) =>
		d.properties.size === 0 &&
		d.required.length === 0 &&
		d.patternProperties.length === 0 &&
		isPlainTop(d.additional) &&
		isFullCount(d.size),

	isSubtype: isObjectSubtype,

	meet(a, b, algebra) {
		const properties = new Map<string, CanonicalSchema>();
		for (const name of sortedUnique([...a.properties.keys(), ...b.properties.keys()])) {
			properties.set(
				name,
				algebra.meet(propertySchema(a, name, algebra), propertySchema(b, name, algebra)),
			);
		}
		return makeObject(
			{
				properties,
				required: [...a.required, ...b.required],
				patternProperties: [
					...a.patternProperties.map((entry) => meetPatternEntry(entry, b, algebra)),
					...b.patternProperties.map((entry) => meetPatternEntry(entry, a, algebra)),
				],
				additional: algebra.meet(a.additional, b.additional),
				size: intersectIntervals(a.size, b.size),
			},
			algebra,
		);
	},

	join(a, b, algebra) {
		// raccourci réservé aux opérandes sans annotation imbriquée : sinon la
		// politique d'annotation doit voir chaque nœud
		if (!hasNestedAnnotations(a) && !hasNestedAnnotations(b)) {
			if (holdsIfDecidable(() => isObjectSubtype(a, b, algebra))) return b;
			if (holdsIfDecidable(() => isObjectSubtype(b, a, algebra))) return a;
		}

		const properties = new Map<string, CanonicalSchema>();
		for (const name of sortedUnique([...a.properties.keys(), ...b.properties.keys()])) {
			properties.set(
				name,
				algebra.join(propertySchema(a, name, algebra), propertySchema(b, name, algebra)),
			);
		}
		const required = a.required.filter((name) => b.required.includes(name));
		return (
			makeObject(
				{
					properties,
					required,
					patternProperties: [
						...a.patternProperties.map((entry) => joinPatternEntry(entry, b, algebra)),
						...b.patternProperties.map((entry) => joinPatternEntry(entry, a, algebra)),
					],
					additional: algebra.join(a.additional, b.additional),
					size: hullIntervals(a.size, b.size),
				},
				algebra,
			) ?? OBJECT_TOP
		);
	},

	complement(d) {
		if (objectAlgebra.isTop(d)) return null;
		if (d.patternProperties.length > 0 || !isPlainTop(d.additional)) return undefined;

		const [name] = d.required;
		const [property] = d.properties.entries();
		// required: [k]  ⟷  properties: { k: Bottom }
		if (
			d.required.length === 1 &&
			name !== undefined &&
			d.properties.size === 0 &&
			!d.size.upper.bounded &&
			lowerValue(d.size) <= 1
		) {
			return {
				...OBJECT_TOP,
				properties: new Map([[name, { type: "bottom" }]]),
			};
		}
		if (
			d.required.length === 0 &&
			d.properties.size === 1 &&
			property !== undefined &&
			isBottom(property[1]) &&
			isFullCount(d.size)
		) {
			return { ...OBJECT_TOP, required: [property[0]], size: countInterval(1) };
		}
		if (d.required.length === 0 && d.properties.size === 0) {
			const size = complementCount(d.size);
			return size ? { ...OBJECT_TOP, size } : undefined;
		}
		return undefined;
	},
};
