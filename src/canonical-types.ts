import type { Interval } from "./interval";

// ─── Canonical Type Model ────────────────────────────────────────────────────
//
// Forme normale d'un schema : Top, Bottom, ou une union de descripteurs
// (DNF au niveau des kinds). Un même kind peut porter plusieurs
// descripteurs quand leur union n'est pas exprimable par un seul.
// L'ensemble des instances acceptées est l'union des ensembles acceptés
// par chaque descripteur présent.

export const KINDS = [
	"null",
	"boolean",
	"number",
	"string",
	"array",
	"object",
] as const;

export type Kind = (typeof KINDS)[number];

export interface NullDescriptor {
	readonly kind: "null";
}

export interface BooleanDescriptor {
	readonly kind: "boolean";
	/** Non vide, trié (false avant true) */
	readonly values: readonly boolean[];
}

export type NumberDescriptor =
	| {
			readonly kind: "number";
			readonly form: "range";
			readonly integer: boolean;
			readonly range: Interval;
			readonly multipleOf?: number;
	  }
	| {
			readonly kind: "number";
			readonly form: "values";
			/** Non vide, trié, sans doublon */
			readonly values: readonly number[];
	  };

export interface StringDescriptor {
	readonly kind: "string";
	readonly length: Interval;
	/** Conjonction de patterns (sémantique de recherche) */
	readonly patterns: readonly string[];
	/** Patterns dont le langage est exclu */
	readonly excluded: readonly string[];
	/** Conjonction de formats */
	readonly formats: readonly string[];
}

/**
 * Liste homogène = `prefix` vide ; tuple = `prefix` positionnel suivi de
 * `rest` pour les positions restantes.
 */
export interface ArrayDescriptor {
	readonly kind: "array";
	readonly prefix: readonly CanonicalSchema[];
	readonly rest: CanonicalSchema;
	readonly length: Interval;
	readonly unique: boolean;
}

export interface PatternProperty {
	readonly pattern: string;
	readonly schema: CanonicalSchema;
}

export interface ObjectDescriptor {
	readonly kind: "object";
	readonly properties: ReadonlyMap<string, CanonicalSchema>;
	/** Trié, sans doublon ; pas forcément inclus dans `properties` */
	readonly required: readonly string[];
	readonly patternProperties: readonly PatternProperty[];
	readonly additional: CanonicalSchema;
	readonly size: Interval;
}

export type Descriptor =
	| NullDescriptor
	| BooleanDescriptor
	| NumberDescriptor
	| StringDescriptor
	| ArrayDescriptor
	| ObjectDescriptor;

export type CanonicalSchema =
	| { readonly type: "top"; readonly stype?: string }
	| { readonly type: "bottom" }
	| {
			readonly type: "union";
			/** Groupés par kind dans l'ordre de `KINDS`, sans descripteur absorbé par un autre */
			readonly atoms: readonly Descriptor[];
			readonly stype?: string;
	  };

// ─── Algebra contract ────────────────────────────────────────────────────────

/**
 * Opérations récursives fournies aux algèbres par kind (array et object
 * comparent leurs sous-schemas).
 */
export interface SchemaAlgebra {
	isSubtype(a: CanonicalSchema, b: CanonicalSchema): boolean;
	meet(a: CanonicalSchema, b: CanonicalSchema): CanonicalSchema;
	/** Borne supérieure avec au plus un descripteur par kind (élargissements documentés). */
	join(a: CanonicalSchema, b: CanonicalSchema): CanonicalSchema;
	/** Union exacte : les descripteurs d'un même kind restent disjoints. */
	union(a: CanonicalSchema, b: CanonicalSchema): CanonicalSchema;
}

/**
 * Combinaison des annotations `stype` lors d'un meet ou d'un join.
 * `undefined` = pas d'annotation sur le résultat.
 */
export interface AnnotationPolicy {
	meet(a: string | undefined, b: string | undefined): string | undefined;
	join(a: string | undefined, b: string | undefined): string | undefined;
}

/**
 * Opérations d'un kind. `meet` retourne `null` quand l'intersection est
 * vide pour ce kind ; `complement` retourne `undefined` quand le
 * complément n'est pas représentable.
 */
export interface KindAlgebra<D extends Descriptor> {
	top(): D;
	isTop(d: D): boolean;
	isSubtype(a: D, b: D, algebra: SchemaAlgebra): boolean;
	meet(a: D, b: D, algebra: SchemaAlgebra): D | null;
	join(a: D, b: D, algebra: SchemaAlgebra): D;
	complement(d: D): D | null | undefined;
}

/** Un sous-schema imbriqué (items, propriétés, ...) porte-t-il un `stype` ? */
export function hasNestedAnnotations(d: Descriptor): boolean {
	switch (d.kind) {
		case "array":
			return [...d.prefix, d.rest].some(isAnnotated);
		case "object":
			return (
				[...d.properties.values(), d.additional].some(isAnnotated) ||
				d.patternProperties.some(({ schema }) => isAnnotated(schema))
			);
		default:
			return false;
	}
}

function isAnnotated(schema: CanonicalSchema): boolean {
	if (schema.type === "bottom") return false;
	if (schema.stype !== undefined) return true;
	return schema.type === "union" && schema.atoms.some(hasNestedAnnotations);
}
