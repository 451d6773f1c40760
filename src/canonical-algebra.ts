import type { JSONSchema7Object, JSONSchema7Type } from "json-schema";
import isEqual from "lodash/isEqual";
import uniqWith from "lodash/uniqWith";
import { arrayAlgebra, itemAt, makeArray } from "./array-algebra";
import {
	type AnnotationPolicy,
	type ArrayDescriptor,
	type CanonicalSchema,
	type Descriptor,
	type Kind,
	KINDS,
	type NumberDescriptor,
	type ObjectDescriptor,
	type SchemaAlgebra,
	type StringDescriptor,
} from "./canonical-types";
import { holdsIfDecidable, UnsupportedUnionError } from "./errors";
import { countInterval, includesValue, lowerValue, upperValue } from "./interval";
import { enumerateNumbers, isNumberCovered, makeNumberValues, numberAlgebra } from "./numeric-algebra";
import { makeObject, objectAlgebra } from "./object-algebra";
import { literalPattern } from "./pattern-subset";
import { booleanAlgebra, makeBoolean, NULL_TOP, nullAlgebra } from "./scalar-algebra";
import { enumerateStrings, isStringCovered, makeString, stringAlgebra } from "./string-algebra";

// ─── Canonical Algebra ───────────────────────────────────────────────────────
//
// Treillis des schemas canoniques. Top et Bottom sont les identités ;
// entre deux unions, chaque opération se fait kind par kind (les kinds
// sont disjoints deux à deux).
//
//   isSubtype  chaque descripteur de `a` couvert par l'union des
//              descripteurs de même kind de `b`
//   meet       distribué sur les paires de descripteurs
//   union      exacte, plusieurs descripteurs par kind
//   join       un descripteur par kind (élargissements des algèbres)

/** Valeurs énumérées au plus pour décider une inclusion dans une union. */
const MAX_ENUMERATED_VALUES = 256;

export const TOP: CanonicalSchema = { type: "top" };
export const BOTTOM: CanonicalSchema = { type: "bottom" };

/** Aucune annotation sur les résultats de meet / join. */
export const DROP_ANNOTATIONS: AnnotationPolicy = {
	meet: () => undefined,
	join: () => undefined,
};

export function stypeOf(schema: CanonicalSchema): string | undefined {
	return schema.type === "bottom" ? undefined : schema.stype;
}

/** Même schema, annotation remplacée (Bottom n'en porte jamais). */
export function withStype(schema: CanonicalSchema, stype: string | undefined): CanonicalSchema {
	if (schema.type === "bottom") return schema;
	if (schema.type === "top") return stype === undefined ? TOP : { type: "top", stype };
	return stype === undefined
		? { type: "union", atoms: schema.atoms }
		: { type: "union", atoms: schema.atoms, stype };
}

// ─── Per-kind dispatch ───────────────────────────────────────────────────────

export function topDescriptor(kind: Kind): Descriptor {
	switch (kind) {
		case "null":
			return nullAlgebra.top();
		case "boolean":
			return booleanAlgebra.top();
		case "number":
			return numberAlgebra.top();
		case "string":
			return stringAlgebra.top();
		case "array":
			return arrayAlgebra.top();
		case "object":
			return objectAlgebra.top();
	}
}

function isTopDescriptor(d: Descriptor): boolean {
	switch (d.kind) {
		case "null":
			return nullAlgebra.isTop(d);
		case "boolean":
			return booleanAlgebra.isTop(d);
		case "number":
			return numberAlgebra.isTop(d);
		case "string":
			return stringAlgebra.isTop(d);
		case "array":
			return arrayAlgebra.isTop(d);
		case "object":
			return objectAlgebra.isTop(d);
	}
}

function isSubtypeAtom(a: Descriptor, b: Descriptor, algebra: SchemaAlgebra): boolean {
	switch (a.kind) {
		case "null":
			return b.kind === "null" && nullAlgebra.isSubtype(a, b, algebra);
		case "boolean":
			return b.kind === "boolean" && booleanAlgebra.isSubtype(a, b, algebra);
		case "number":
			return b.kind === "number" && numberAlgebra.isSubtype(a, b, algebra);
		case "string":
			return b.kind === "string" && stringAlgebra.isSubtype(a, b, algebra);
		case "array":
			return b.kind === "array" && arrayAlgebra.isSubtype(a, b, algebra);
		case "object":
			return b.kind === "object" && objectAlgebra.isSubtype(a, b, algebra);
	}
}

function meetAtom(a: Descriptor, b: Descriptor, algebra: SchemaAlgebra): Descriptor | null {
	switch (a.kind) {
		case "null":
			return b.kind === "null" ? nullAlgebra.meet(a, b, algebra) : null;
		case "boolean":
			return b.kind === "boolean" ? booleanAlgebra.meet(a, b, algebra) : null;
		case "number":
			return b.kind === "number" ? numberAlgebra.meet(a, b, algebra) : null;
		case "string":
			return b.kind === "string" ? stringAlgebra.meet(a, b, algebra) : null;
		case "array":
			return b.kind === "array" ? arrayAlgebra.meet(a, b, algebra) : null;
		case "object":
			return b.kind === "object" ? objectAlgebra.meet(a, b, algebra) : null;
	}
}

function joinAtom(a: Descriptor, b: Descriptor, algebra: SchemaAlgebra): Descriptor {
	switch (a.kind) {
		case "null":
			return b.kind === "null" ? nullAlgebra.join(a, b, algebra) : a;
		case "boolean":
			return b.kind === "boolean" ? booleanAlgebra.join(a, b, algebra) : a;
		case "number":
			return b.kind === "number" ? numberAlgebra.join(a, b, algebra) : a;
		case "string":
			return b.kind === "string" ? stringAlgebra.join(a, b, algebra) : a;
		case "array":
			return b.kind === "array" ? arrayAlgebra.join(a, b, algebra) : a;
		case "object":
			return b.kind === "object" ? objectAlgebra.join(a, b, algebra) : a;
	}
}

function complementAtom(d: Descriptor): Descriptor | null | undefined {
	switch (d.kind) {
		case "null":
			return nullAlgebra.complement(d);
		case "boolean":
			return booleanAlgebra.complement(d);
		case "number":
			return numberAlgebra.complement(d);
		case "string":
			return stringAlgebra.complement(d);
		case "array":
			return arrayAlgebra.complement(d);
		case "object":
			return objectAlgebra.complement(d);
	}
}

// ─── Construction ────────────────────────────────────────────────────────────

export function atomsOf(schema: CanonicalSchema): readonly Descriptor[] {
	if (schema.type === "bottom") return [];
	if (schema.type === "top") return KINDS.map(topDescriptor);
	return schema.atoms;
}

/**
 * Forme normale d'un ensemble de descripteurs : regroupés par kind,
 * Bottom si vide, Top si les six kinds sont présents et non contraints.
 */
export function fromAtoms(
	atoms: readonly (Descriptor | null)[],
	stype?: string,
): CanonicalSchema {
	const present = KINDS.flatMap((kind) =>
		reduceKind(atoms.filter((atom): atom is Descriptor => atom?.kind === kind)),
	);
	if (present.length === 0) return BOTTOM;
	if (present.length === KINDS.length && present.every(isTopDescriptor)) {
		return withStype(TOP, stype);
	}
	return withStype({ type: "union", atoms: present }, stype);
}

/** `outer` couvre-t-il `inner` à lui seul ? */
function covers(outer: Descriptor, inner: Descriptor): boolean {
	return holdsIfDecidable(() => isSubtypeAtom(inner, outer, STRUCTURAL));
}

/** Fusion sans perte de deux descripteurs d'un même kind, quand elle existe. */
function mergeExactly(a: Descriptor, b: Descriptor): Descriptor | undefined {
	if (a.kind === "null" && b.kind === "null") return a;
	if (a.kind === "boolean" && b.kind === "boolean") return booleanAlgebra.join(a, b, STRUCTURAL);
	if (a.kind === "number" && b.kind === "number" && a.form === "values" && b.form === "values") {
		return makeNumberValues([...a.values, ...b.values]) ?? undefined;
	}
	return undefined;
}

/** Descripteurs d'un kind : fusions exactes, puis absorption des descripteurs couverts. */
function reduceKind(atoms: readonly Descriptor[]): Descriptor[] {
	let kept: Descriptor[] = [];
	for (const atom of atoms) {
		let current = atom;
		const next: Descriptor[] = [];
		for (const other of kept) {
			const merged = mergeExactly(other, current);
			if (merged) current = merged;
			else if (!covers(current, other)) next.push(other);
		}
		if (!next.some((other) => covers(other, current))) next.push(current);
		kept = next;
	}
	return kept;
}

/** Schema exact d'une valeur JSON. */
export function literalSchema(value: JSONSchema7Type): CanonicalSchema {
	if (value === null) return fromAtoms([NULL_TOP]);
	if (typeof value === "boolean") return fromAtoms([makeBoolean([value])]);
	if (typeof value === "number") return fromAtoms([makeNumberValues([value])]);
	if (typeof value === "string") {
		return fromAtoms([makeString({ patterns: [literalPattern([value])] })]);
	}
	if (Array.isArray(value)) {
		return fromAtoms([
			makeArray({
				prefix: value.map((item) => literalSchema(item)),
				rest: BOTTOM,
				length: countInterval(value.length, value.length),
			}),
		]);
	}
	const properties = new Map<string, CanonicalSchema>();
	for (const [key, item] of Object.entries(value)) {
		properties.set(key, literalSchema(item));
	}
	return fromAtoms([
		makeObject({ properties, required: [...properties.keys()], additional: BOTTOM }, STRUCTURAL),
	]);
}

// ─── Enumeration ─────────────────────────────────────────────────────────────

function enumerateSchema(schema: CanonicalSchema, limit: number): JSONSchema7Type[] | undefined {
	if (schema.type === "bottom") return [];
	if (schema.type === "top") return undefined;
	const values: JSONSchema7Type[] = [];
	for (const atom of schema.atoms) {
		const more = enumerateAtom(atom, limit);
		if (more === undefined) return undefined;
		values.push(...more);
		if (values.length > limit) return undefined;
	}
	return uniqWith(values, isEqual);
}

/** Valeurs d'un descripteur, `undefined` s'il en admet une infinité ou plus de `limit`. */
function enumerateAtom(d: Descriptor, limit: number): JSONSchema7Type[] | undefined {
	switch (d.kind) {
		case "null":
			return [null];
		case "boolean":
			return [...d.values];
		case "number": {
			const values = enumerateNumbers(d);
			return values && values.length <= limit ? values : undefined;
		}
		case "string":
			return enumerateStrings(d, limit);
		case "array":
			return enumerateArrays(d, limit);
		case "object":
			return enumerateObjects(d, limit);
	}
}

function isDistinct(items: readonly JSONSchema7Type[]): boolean {
	return items.every((item, i) => items.findIndex((other) => isEqual(other, item)) === i);
}

function enumerateArrays(d: ArrayDescriptor, limit: number): JSONSchema7Type[] | undefined {
	const max = upperValue(d.length);
	if (!Number.isFinite(max)) return undefined;
	const min = lowerValue(d.length);
	const results: JSONSchema7Type[] = [];
	let partial: JSONSchema7Type[][] = [[]];
	for (let size = 0; ; size++) {
		if (size >= min) results.push(...partial.filter((items) => !d.unique || isDistinct(items)));
		if (results.length > limit) return undefined;
		if (size >= max) return results;
		const options = enumerateSchema(itemAt(d, size), limit);
		if (options === undefined) return undefined;
		partial = partial.flatMap((items) => options.map((option) => [...items, option]));
		if (partial.length > limit) return undefined;
	}
}

function enumerateObjects(d: ObjectDescriptor, limit: number): JSONSchema7Type[] | undefined {
	if (d.additional.type !== "bottom" || d.patternProperties.length > 0) return undefined;
	if (d.required.some((name) => !d.properties.has(name))) return [];
	let partial: JSONSchema7Object[] = [{}];
	for (const [name, schema] of d.properties) {
		const options = enumerateSchema(schema, limit);
		if (options === undefined) return undefined;
		const optional = !d.required.includes(name);
		partial = partial.flatMap((object) => [
			...(optional ? [object] : []),
			...options.map((option) => ({ ...object, [name]: option })),
		]);
		if (partial.length > limit) return undefined;
	}
	return partial.filter((object) => includesValue(d.size, Object.keys(object).length));
}

// ─── Union coverage ──────────────────────────────────────────────────────────

const isNumberAtom = (d: Descriptor): d is NumberDescriptor => d.kind === "number";
const isStringAtom = (d: Descriptor): d is StringDescriptor => d.kind === "string";

/**
 * `x ⊆ ⋃ ys` (descripteurs du même kind que `x`).
 *
 * @throws UnsupportedUnionError quand aucune procédure exacte ne conclut
 */
function isCovered(x: Descriptor, ys: readonly Descriptor[], algebra: SchemaAlgebra): boolean {
	let undecided: UnsupportedUnionError | undefined;
	for (const y of ys) {
		try {
			if (isSubtypeAtom(x, y, algebra)) return true;
		} catch (error) {
			if (!(error instanceof UnsupportedUnionError)) throw error;
			undecided ??= error;
		}
	}
	// seules les branches qui rencontrent x comptent
	const overlapping = ys.filter((y) => meetAtom(x, y, STRUCTURAL) !== null);
	if (overlapping.length >= 2) return isCoveredByUnion(x, overlapping, algebra);
	if (undecided) throw undecided;
	return false;
}

function isCoveredByUnion(x: Descriptor, ys: readonly Descriptor[], algebra: SchemaAlgebra): boolean {
	let verdict: boolean | undefined;
	if (x.kind === "boolean") {
		verdict = x.values.every((value) =>
			ys.some((y) => y.kind === "boolean" && y.values.includes(value)),
		);
	} else if (x.kind === "number") {
		verdict = isNumberCovered(x, ys.filter(isNumberAtom));
	} else if (x.kind === "string") {
		verdict = isStringCovered(x, ys.filter(isStringAtom));
	}
	if (verdict !== undefined) return verdict;

	const values = enumerateAtom(x, MAX_ENUMERATED_VALUES);
	if (values === undefined) throw new UnsupportedUnionError(x.kind);
	if (values.length === 0) return true;
	// un singleton non couvert par une branche seule ne l'est pas par l'union
	if (values.length === 1) return false;
	return values.every((value) =>
		atomsOf(literalSchema(value)).every((literal) => isCovered(literal, ys, algebra)),
	);
}

// ─── Lattice ─────────────────────────────────────────────────────────────────

/**
 * Opérations du treillis, l'annotation `stype` des résultats étant
 * décidée par `policy`.
 */
export function createAlgebra(policy: AnnotationPolicy = DROP_ANNOTATIONS): SchemaAlgebra {
	const algebra: SchemaAlgebra = {
		isSubtype(a, b) {
			if (a.type === "bottom" || b.type === "top") return true;
			if (b.type === "bottom") return false;
			return atomsOf(a).every((atom) =>
				isCovered(
					atom,
					b.atoms.filter((other) => other.kind === atom.kind),
					algebra,
				),
			);
		},

		meet(a, b) {
			if (a.type === "bottom" || b.type === "bottom") return BOTTOM;
			const stype = policy.meet(stypeOf(a), stypeOf(b));
			if (a.type === "top") return withStype(b, stype);
			if (b.type === "top") return withStype(a, stype);
			const atoms = a.atoms.flatMap((atom) =>
				b.atoms
					.filter((other) => other.kind === atom.kind)
					.map((other) => meetAtom(atom, other, algebra)),
			);
			return fromAtoms(atoms, stype);
		},

		join(a, b) {
			if (a.type === "bottom") return b;
			if (b.type === "bottom") return a;
			const stype = policy.join(stypeOf(a), stypeOf(b));
			if (a.type === "top" || b.type === "top") return withStype(TOP, stype);
			const atoms = KINDS.map((kind) => {
				const [first, ...rest] = [...a.atoms, ...b.atoms].filter((atom) => atom.kind === kind);
				return first ? rest.reduce((acc, atom) => joinAtom(acc, atom, algebra), first) : null;
			});
			return fromAtoms(atoms, stype);
		},

		union(a, b) {
			if (a.type === "bottom") return b;
			if (b.type === "bottom") return a;
			const stype = policy.join(stypeOf(a), stypeOf(b));
			if (a.type === "top" || b.type === "top") return withStype(TOP, stype);
			return fromAtoms([...a.atoms, ...b.atoms], stype);
		},
	};
	return algebra;
}

/** Algèbre sans annotations, pour les décisions internes. */
const STRUCTURAL = createAlgebra();

/**
 * Complément dans l'univers JSON, `undefined` s'il n'est pas
 * représentable par la forme canonique. Par kind :
 * ¬(x₁ ∨ x₂) = ¬x₁ ∧ ¬x₂.
 */
export function complement(schema: CanonicalSchema): CanonicalSchema | undefined {
	if (schema.type === "top") return BOTTOM;
	if (schema.type === "bottom") return TOP;
	const atoms: (Descriptor | null)[] = [];
	for (const kind of KINDS) {
		let remaining: Descriptor | null = topDescriptor(kind);
		for (const atom of schema.atoms) {
			if (atom.kind !== kind) continue;
			const rest = complementAtom(atom);
			if (rest === undefined) return undefined;
			remaining = rest === null || remaining === null ? null : meetAtom(remaining, rest, STRUCTURAL);
		}
		atoms.push(remaining);
	}
	return fromAtoms(atoms);
}
