import type { JSONSchema7Type } from "json-schema";
import { makeArray } from "./array-algebra";
import {
	atomsOf,
	BOTTOM,
	complement,
	createAlgebra,
	fromAtoms,
	literalSchema,
	TOP,
	topDescriptor,
	withStype,
} from "./canonical-algebra";
import {
	type CanonicalSchema,
	type Descriptor,
	type Kind,
	KINDS,
	type PatternProperty,
	type SchemaAlgebra,
} from "./canonical-types";
import { getComparator } from "./comparator";
import {
	InvalidSchemaError,
	type OperandSide,
	UnsupportedKeywordError,
	UnsupportedNegationError,
	UnsupportedRecursiveRefError,
} from "./errors";
import { isKnownFormat } from "./format-validator";
import { closedAt, countInterval, FULL_INTERVAL, intersectIntervals, type Interval, openAt, UNBOUNDED } from "./interval";
import { type Logger, silentLogger } from "./logger";
import { makeNumberRange, makeNumberValues } from "./numeric-algebra";
import { makeObject } from "./object-algebra";
import { compilePattern, literalPattern } from "./pattern-subset";
import { makeBoolean, NULL_TOP } from "./scalar-algebra";
import { makeString } from "./string-algebra";
import { childPath, hasOwn, isJsonValue, isPlainObj } from "./utils";

// ─── Canonicalizer ───────────────────────────────────────────────────────────
//
// JSON Schema (draft-07) → CanonicalSchema.
//
//   type + mots-clés par kind  → union d'au plus un descripteur par kind
//   enum / const               → union exacte des littéraux
//   allOf                      → meet itéré
//   anyOf / oneOf              → union exacte (oneOf relâché en anyOf)
//   not                        → complément par kind, si représentable
//
// Le nœud est la conjonction de toutes ses parties.

/** Profondeur au-delà de laquelle un schema est traité comme récursif. */
const MAX_DEPTH = 512;

/** Mots-clés de validation hors du vocabulaire supporté. */
const UNSUPPORTED_KEYWORDS = [
	"$ref",
	"if",
	"then",
	"else",
	"dependencies",
	"contains",
	"propertyNames",
	"dependentRequired",
	"dependentSchemas",
	"unevaluatedProperties",
	"unevaluatedItems",
	"prefixItems",
	"$recursiveRef",
	"$dynamicRef",
] as const;

const NUMBER_KEYWORDS = ["minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum", "multipleOf"];
const STRING_KEYWORDS = ["minLength", "maxLength", "pattern", "format"];
const ARRAY_KEYWORDS = ["items", "additionalItems", "minItems", "maxItems", "uniqueItems"];
const OBJECT_KEYWORDS = [
	"properties",
	"patternProperties",
	"additionalProperties",
	"required",
	"minProperties",
	"maxProperties",
];

const CONSTRAINING_KEYWORDS = new Set([
	"type",
	...NUMBER_KEYWORDS,
	...STRING_KEYWORDS,
	...ARRAY_KEYWORDS,
	...OBJECT_KEYWORDS,
]);

export interface CanonicalizeOptions {
	/** Opérande en cours, reporté dans les erreurs */
	side?: OperandSide;
	/** Conserve les annotations `stype` (défaut true) */
	keepAnnotations?: boolean;
	/** Signale les sous-schemas non habités */
	warnUninhabited?: boolean;
	algebra?: SchemaAlgebra;
	logger?: Logger;
}

/**
 * Canonicalise un schema.
 *
 * @throws UnsupportedInputError (récursion, mot-clé, pattern ou négation
 *   non supportés, `stype` invalide)
 */
export function canonicalize(schema: unknown, options: CanonicalizeOptions = {}): CanonicalSchema {
	return new Canonicalizer(options).run(schema);
}

// ─── Keyword readers ─────────────────────────────────────────────────────────

function numberAt(schema: Record<string, unknown>, key: string): number | undefined {
	const value = schema[key];
	return typeof value === "number" ? value : undefined;
}

function schemaMap(value: unknown): [string, unknown][] {
	return isPlainObj(value) ? Object.entries(value) : [];
}

const COMBINING_KEYWORDS = new Set(["enum", "const", "allOf", "anyOf", "oneOf", "not"]);

/** Un `{ not: X }` sans autre contrainte. */
function isPureNegation(schema: unknown): schema is Record<string, unknown> & { not: unknown } {
	if (!isPlainObj(schema) || !hasOwn(schema, "not")) return false;
	return Object.keys(schema).every(
		(key) => key === "not" || !(CONSTRAINING_KEYWORDS.has(key) || COMBINING_KEYWORDS.has(key)),
	);
}

function isEmptyNegation(schema: unknown): boolean {
	return isPlainObj(schema) && isPlainObj(schema.not) && Object.keys(schema.not).length === 0;
}

// ─── Canonicalizer ───────────────────────────────────────────────────────────

class Canonicalizer {
	private readonly side: OperandSide | undefined;
	private readonly keepAnnotations: boolean;
	private readonly warnUninhabited: boolean;
	private readonly algebra: SchemaAlgebra;
	private readonly logger: Logger;
	private readonly ancestors = new Set<object>();

	constructor(options: CanonicalizeOptions) {
		this.side = options.side;
		this.keepAnnotations = options.keepAnnotations ?? true;
		this.warnUninhabited = options.warnUninhabited ?? false;
		this.algebra = options.algebra ?? createAlgebra();
		this.logger = options.logger ?? silentLogger;
	}

	run(schema: unknown): CanonicalSchema {
		return this.node(schema, "$");
	}

	private node(schema: unknown, path: string): CanonicalSchema {
		if (schema === true) return TOP;
		if (schema === false) return BOTTOM;
		if (!isPlainObj(schema)) {
			throw new InvalidSchemaError(this.side, schema, [`${path}: expected an object or a boolean`], path);
		}
		if (this.ancestors.has(schema) || this.ancestors.size >= MAX_DEPTH) {
			throw new UnsupportedRecursiveRefError(this.side, schema, path);
		}

		this.ancestors.add(schema);
		let result: CanonicalSchema;
		try {
			result = this.build(schema, path);
		} finally {
			this.ancestors.delete(schema);
		}

		if (this.warnUninhabited && result.type === "bottom" && !isEmptyNegation(schema)) {
			this.logger.warn("schema is uninhabited", { path, side: this.side });
		}
		return result;
	}

	private build(schema: Record<string, unknown>, path: string): CanonicalSchema {
		for (const keyword of UNSUPPORTED_KEYWORDS) {
			if (hasOwn(schema, keyword)) {
				throw new UnsupportedKeywordError(keyword, schema, childPath(path, keyword), this.side);
			}
		}
		const stype = schema.stype;
		if (stype !== undefined && typeof stype !== "string") {
			throw new InvalidSchemaError(this.side, schema, [`${path}.stype: must be a string`], path);
		}

		const parts: CanonicalSchema[] = [this.kinds(schema, path)];
		const literals = this.literals(schema, path);
		if (literals) parts.push(literals);

		const allOf = schema.allOf;
		if (Array.isArray(allOf)) {
			parts.push(
				...allOf.map((branch, i) => this.node(branch, childPath(path, "allOf", i))),
			);
		}
		for (const keyword of ["anyOf", "oneOf"] as const) {
			const branches = schema[keyword];
			if (Array.isArray(branches)) {
				parts.push(
					branches
						.map((branch, i) => this.node(branch, childPath(path, keyword, i)))
						.reduce((acc, branch) => this.algebra.union(acc, branch), BOTTOM),
				);
			}
		}
		if (hasOwn(schema, "not")) parts.push(this.negation(schema.not, childPath(path, "not")));

		const result = parts.reduce((acc, part) => this.algebra.meet(acc, part), TOP);
		if (this.keepAnnotations && typeof stype === "string") return withStype(result, stype);
		return result;
	}

	private negation(inner: unknown, path: string): CanonicalSchema {
		// not { not X } ≡ X
		if (isPureNegation(inner)) return this.node(inner.not, childPath(path, "not"));
		const negated = complement(this.node(inner, path));
		if (negated === undefined) throw new UnsupportedNegationError(inner, path, this.side);
		return negated;
	}

	// ─── type + kind keywords ─────────────────────────────────────────────

	private kinds(schema: Record<string, unknown>, path: string): CanonicalSchema {
		if (!Object.keys(schema).some((key) => CONSTRAINING_KEYWORDS.has(key))) return TOP;

		const declared = schema.type;
		const names = typeof declared === "string" ? [declared] : Array.isArray(declared) ? declared : undefined;
		const allowed = new Set<Kind>();
		let integer = false;
		if (names === undefined) {
			for (const kind of KINDS) allowed.add(kind);
		} else {
			for (const name of names) {
				const kind = name === "integer" ? "number" : KINDS.find((candidate) => candidate === name);
				if (kind) allowed.add(kind);
			}
			integer = names.includes("integer") && !names.includes("number");
		}

		const atoms: (Descriptor | null)[] = [];
		for (const kind of KINDS) {
			if (!allowed.has(kind)) continue;
			atoms.push(this.descriptor(kind, schema, path, integer));
		}
		return fromAtoms(atoms);
	}

	private descriptor(
		kind: Kind,
		schema: Record<string, unknown>,
		path: string,
		integer: boolean,
	): Descriptor | null {
		switch (kind) {
			case "null":
			case "boolean":
				return topDescriptor(kind);
			case "number":
				return this.numberDescriptor(schema, integer);
			case "string":
				return this.stringDescriptor(schema, path);
			case "array":
				return this.arrayDescriptor(schema, path);
			case "object":
				return this.objectDescriptor(schema, path);
		}
	}

	private numberDescriptor(schema: Record<string, unknown>, integer: boolean): Descriptor | null {
		let range: Interval = FULL_INTERVAL;
		const bounds: [string, (value: number) => Interval][] = [
			["minimum", (value) => ({ lower: closedAt(value), upper: UNBOUNDED })],
			["exclusiveMinimum", (value) => ({ lower: openAt(value), upper: UNBOUNDED })],
			["maximum", (value) => ({ lower: UNBOUNDED, upper: closedAt(value) })],
			["exclusiveMaximum", (value) => ({ lower: UNBOUNDED, upper: openAt(value) })],
		];
		for (const [keyword, toInterval] of bounds) {
			const value = numberAt(schema, keyword);
			if (value !== undefined) range = intersectIntervals(range, toInterval(value));
		}
		return makeNumberRange(integer, range, numberAt(schema, "multipleOf"));
	}

	private stringDescriptor(schema: Record<string, unknown>, path: string): Descriptor | null {
		const patterns: string[] = [];
		if (typeof schema.pattern === "string") {
			compilePattern(schema.pattern);
			patterns.push(schema.pattern);
		}
		const formats: string[] = [];
		if (typeof schema.format === "string") {
			if (isKnownFormat(schema.format)) formats.push(schema.format);
			else this.logger.debug("unknown format ignored", { path, format: schema.format });
		}
		return makeString({
			length: countInterval(numberAt(schema, "minLength"), numberAt(schema, "maxLength")),
			patterns,
			formats,
		});
	}

	private arrayDescriptor(schema: Record<string, unknown>, path: string): Descriptor | null {
		const items = schema.items;
		const length = countInterval(numberAt(schema, "minItems"), numberAt(schema, "maxItems"));
		const unique = schema.uniqueItems === true;
		if (Array.isArray(items)) {
			const prefix = items.map((item, i) => this.node(item, childPath(path, "items", i)));
			const rest = hasOwn(schema, "additionalItems")
				? this.node(schema.additionalItems, childPath(path, "additionalItems"))
				: TOP;
			return makeArray({ prefix, rest, length, unique });
		}
		const rest = items === undefined ? TOP : this.node(items, childPath(path, "items"));
		return makeArray({ rest, length, unique });
	}

	private objectDescriptor(schema: Record<string, unknown>, path: string): Descriptor | null {
		const properties = new Map<string, CanonicalSchema>();
		for (const [name, child] of schemaMap(schema.properties)) {
			properties.set(name, this.node(child, childPath(path, "properties", name)));
		}
		const patternProperties: PatternProperty[] = [];
		for (const [pattern, child] of schemaMap(schema.patternProperties)) {
			compilePattern(pattern);
			patternProperties.push({
				pattern,
				schema: this.node(child, childPath(path, "patternProperties", pattern)),
			});
		}
		const additional = hasOwn(schema, "additionalProperties")
			? this.node(schema.additionalProperties, childPath(path, "additionalProperties"))
			: TOP;
		const required = Array.isArray(schema.required)
			? schema.required.filter((name): name is string => typeof name === "string")
			: [];
		return makeObject(
			{
				properties,
				required,
				patternProperties,
				additional,
				size: countInterval(numberAt(schema, "minProperties"), numberAt(schema, "maxProperties")),
			},
			this.algebra,
		);
	}

	// ─── enum / const ─────────────────────────────────────────────────────

	private literals(schema: Record<string, unknown>, path: string): CanonicalSchema | undefined {
		const parts: CanonicalSchema[] = [];
		if (hasOwn(schema, "const")) {
			parts.push(this.literalUnion([this.jsonValue(schema.const, schema, childPath(path, "const"))]));
		}
		if (Array.isArray(schema.enum)) {
			const values = schema.enum.map((value, i) =>
				this.jsonValue(value, schema, childPath(path, "enum", i)),
			);
			parts.push(this.literalUnion(values));
		}
		if (parts.length === 0) return undefined;
		return parts.reduce((acc, part) => this.algebra.meet(acc, part), TOP);
	}

	private jsonValue(value: unknown, schema: Record<string, unknown>, path: string): JSONSchema7Type {
		if (!isJsonValue(value)) {
			throw new InvalidSchemaError(this.side, schema, [`${path}: not a JSON value`], path);
		}
		return value;
	}

	/** Union exacte des littéraux (chaînes regroupées en un pattern). */
	private literalUnion(values: readonly JSONSchema7Type[]): CanonicalSchema {
		const distinct = getComparator().dedupeValues(values);
		const strings = distinct.filter((value): value is string => typeof value === "string");
		const numbers = distinct.filter((value): value is number => typeof value === "number");
		const booleans = distinct.filter((value): value is boolean => typeof value === "boolean");
		const structured = distinct.filter((value) => value !== null && typeof value === "object");

		return fromAtoms([
			distinct.includes(null) ? NULL_TOP : null,
			makeBoolean(booleans),
			makeNumberValues(numbers),
			strings.length > 0 ? makeString({ patterns: [literalPattern(strings)] }) : null,
			...structured.flatMap((value) => atomsOf(literalSchema(value))),
		]);
	}
}
