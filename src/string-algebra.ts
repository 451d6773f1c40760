import type { KindAlgebra, StringDescriptor } from "./canonical-types";
import {
	areFormatsDisjoint,
	FORMAT_PATTERNS,
	isFormatSubset,
	validateFormat,
} from "./format-validator";
import {
	complementCount,
	containsInterval,
	countInterval,
	FULL_COUNT,
	hullIntervals,
	type Interval,
	intersectIntervals,
	isEmptyInterval,
	isFullCount,
	toIntegerInterval,
} from "./interval";
import { compilePattern, isPatternSubset, unionPattern } from "./pattern-subset";
import {
	acceptedLengths,
	type Dfa,
	enumerateLanguage,
	isEmptyLanguage,
	lengthDfa,
	productDfa,
} from "./regex-automaton";
import { isSubsetOf, sortedUnique } from "./utils";

// ─── String Algebra ──────────────────────────────────────────────────────────
//
// Le langage d'un descripteur string est :
//
//   L = longueurs ∩ ⋂ L(patterns) ∩ ⋂ ¬L(excluded) ∩ formats
//
// Les patterns et exclusions sont décidés exactement par automates ;
// les formats par la hiérarchie connue, ou par énumération quand le
// langage régulier est fini et petit.

/** Langage énuméré pour valider les formats de `b` mot à mot. */
const MAX_ENUMERATED_WORDS = 256;

export const STRING_TOP: StringDescriptor = {
	kind: "string",
	length: FULL_COUNT,
	patterns: [],
	excluded: [],
	formats: [],
};

// ─── Construction ────────────────────────────────────────────────────────────

interface StringParts {
	length?: Interval;
	patterns?: readonly string[];
	excluded?: readonly string[];
	formats?: readonly string[];
}

/**
 * Descripteur normalisé, `null` si aucune chaîne ne le satisfait
 * (longueurs vides, langage vide, formats disjoints).
 */
export function makeString(parts: StringParts): StringDescriptor | null {
	const length = toIntegerInterval(
		intersectIntervals(parts.length ?? FULL_COUNT, FULL_COUNT),
	);
	if (isEmptyInterval(length)) return null;

	const formats = sortedUnique(parts.formats ?? []);
	for (let i = 0; i < formats.length; i++) {
		for (let j = i + 1; j < formats.length; j++) {
			const [a, b] = [formats[i], formats[j]];
			if (a !== undefined && b !== undefined && areFormatsDisjoint(a, b)) return null;
		}
	}

	const implied = formats.flatMap((format) => FORMAT_PATTERNS[format] ?? []);
	const descriptor: StringDescriptor = {
		kind: "string",
		length,
		patterns: sortedUnique([...(parts.patterns ?? []), ...implied]),
		excluded: sortedUnique(parts.excluded ?? []),
		formats,
	};
	return isEmptyLanguage(languageOf(descriptor)) ? null : descriptor;
}

// ─── Languages ───────────────────────────────────────────────────────────────

/** Composants automates + prédicat d'acceptation d'un descripteur. */
function components(d: StringDescriptor, withLength: boolean): {
	dfas: Dfa[];
	accept: (flags: readonly boolean[]) => boolean;
} {
	const dfas = [...d.patterns.map(compilePattern)];
	const included = dfas.length;
	dfas.push(...d.excluded.map(compilePattern));
	const excludedEnd = dfas.length;
	if (withLength && !isFullCount(d.length)) {
		const lengths = lengthDfa(d.length);
		if (lengths) dfas.push(lengths);
	}
	const accept = (flags: readonly boolean[]): boolean => {
		for (let i = 0; i < flags.length; i++) {
			const inside = flags[i] === true;
			if (i < included || i >= excludedEnd ? !inside : inside) return false;
		}
		return true;
	};
	return { dfas, accept };
}

/** DFA du langage régulier du descripteur (formats hors automate). */
export function languageOf(d: StringDescriptor): Dfa {
	const { dfas, accept } = components(d, true);
	return productDfa(dfas, accept);
}

/** Longueurs effectivement atteintes, `undefined` si le langage est vide. */
export function lengthRangeOf(d: StringDescriptor): Interval | undefined {
	const bounds = acceptedLengths(languageOf(d));
	if (!bounds) return undefined;
	const reached = countInterval(
		bounds.min,
		bounds.max === Number.POSITIVE_INFINITY ? undefined : bounds.max,
	);
	return intersectIntervals(reached, d.length);
}

/** L(a) ⊆ L(b) pour la partie régulière (patterns, exclusions). */
function regularSubset(a: StringDescriptor, b: StringDescriptor): boolean {
	if (b.patterns.length === 0 && b.excluded.length === 0) return true;
	if (
		isSubsetOf(b.patterns, a.patterns) &&
		isSubsetOf(b.excluded, a.excluded)
	) {
		return true;
	}
	const left = components(a, true);
	const right = components(b, false);
	const split = left.dfas.length;
	return isEmptyLanguage(
		productDfa([...left.dfas, ...right.dfas], (flags) =>
			left.accept(flags.slice(0, split)) && !right.accept(flags.slice(split)),
		),
	);
}

/** Chaque format de `b` est garanti par `a`. */
function formatsImplied(a: StringDescriptor, b: StringDescriptor): boolean {
	const missing = b.formats.filter(
		(format) => !a.formats.some((own) => isFormatSubset(own, format)),
	);
	if (missing.length === 0) return true;
	const words = enumerateLanguage(languageOf(a), MAX_ENUMERATED_WORDS);
	if (!words) return false;
	return words.every((word) =>
		missing.every((format) => validateFormat(word, format) === true),
	);
}

function isStringSubtype(a: StringDescriptor, b: StringDescriptor): boolean {
	const lengths = lengthRangeOf(a);
	if (!lengths) return true;
	if (!containsInterval(b.length, lengths)) return false;
	return regularSubset(a, b) && formatsImplied(a, b);
}

// ─── Join helpers ────────────────────────────────────────────────────────────

/** Patterns d'un côté qui contiennent déjà tout l'autre côté. */
function patternsCovering(own: readonly string[], other: StringDescriptor): string[] {
	const otherLanguage = languageOf(other);
	return own.filter((pattern) =>
		isEmptyLanguage(
			productDfa([otherLanguage, compilePattern(pattern)], ([inOther, inPattern]) =>
				inOther === true && inPattern !== true,
			),
		),
	);
}

/** Exclusions d'un côté que l'autre côté respecte aussi. */
function exclusionsRespected(own: readonly string[], other: StringDescriptor): string[] {
	const otherLanguage = languageOf(other);
	return own.filter((pattern) =>
		isEmptyLanguage(
			productDfa([otherLanguage, compilePattern(pattern)], ([inOther, inPattern]) =>
				inOther === true && inPattern === true,
			),
		),
	);
}

/** Formats garantis des deux côtés (éventuellement via un sous-format). */
function sharedFormats(a: StringDescriptor, b: StringDescriptor): string[] {
	const candidates = sortedUnique([...a.formats, ...b.formats]);
	return candidates.filter(
		(format) =>
			a.formats.some((own) => isFormatSubset(own, format)) &&
			b.formats.some((own) => isFormatSubset(own, format)),
	);
}

// ─── Algebra ─────────────────────────────────────────────────────────────────

export const stringAlgebra: KindAlgebra<StringDescriptor> = {
	top: () => STRING_TOP,

	isTop: (d) =>
		isFullCount(d.length) &&
		d.patterns.length === 0 &&
		d.excluded.length === 0 &&
		d.formats.length === 0,

	isSubtype: isStringSubtype,

	meet: (a, b) =>
		makeString({
			length: intersectIntervals(a.length, b.length),
			patterns: [...a.patterns, ...b.patterns],
			excluded: [...a.excluded, ...b.excluded],
			formats: [...a.formats, ...b.formats],
		}),

	join(a, b) {
		if (isStringSubtype(a, b)) return b;
		if (isStringSubtype(b, a)) return a;

		// Distribue l'union sur les conjonctions : (p1 ∧ p2) ∨ (q1) ⊆ (p1 ∨ q1) ∧ (p2 ∨ q1)
		const patterns = new Set<string>([
			...patternsCovering(a.patterns, b),
			...patternsCovering(b.patterns, a),
		]);
		for (const p of a.patterns) {
			for (const q of b.patterns) {
				if (!patterns.has(p) && !patterns.has(q)) patterns.add(unionPattern(p, q));
			}
		}
		const excluded = [
			...exclusionsRespected(a.excluded, b),
			...exclusionsRespected(b.excluded, a),
		];
		const formats = sharedFormats(a, b);
		return (
			makeString({
				length: hullIntervals(a.length, b.length),
				patterns: minimalPatterns(Array.from(patterns)),
				excluded,
				formats,
			}) ?? STRING_TOP
		);
	},

	complement(d) {
		if (stringAlgebra.isTop(d)) return null;
		if (d.formats.length > 0) return undefined;
		const constraints =
			d.patterns.length + d.excluded.length + (isFullCount(d.length) ? 0 : 1);
		if (constraints !== 1) return undefined;

		const [pattern] = d.patterns;
		if (pattern !== undefined) return makeString({ excluded: [pattern] });
		const [excluded] = d.excluded;
		if (excluded !== undefined) return makeString({ patterns: [excluded] });

		const lengths = complementCount(d.length);
		return lengths ? makeString({ length: lengths }) : undefined;
	},
};

// ─── Union coverage ──────────────────────────────────────────────────────────

/** Format sans grammaire régulière : hors automate. */
function hasOpaqueFormat(d: StringDescriptor): boolean {
	return d.formats.some((format) => FORMAT_PATTERNS[format] === undefined);
}

/**
 * `x ⊆ ⋃ ys` par automate produit : aucun mot de `x` hors de toutes les
 * branches. `undefined` quand un format sans grammaire empêche de conclure.
 */
export function isStringCovered(
	x: StringDescriptor,
	ys: readonly StringDescriptor[],
): boolean | undefined {
	if (ys.some(hasOpaqueFormat)) return undefined;
	const outside = productDfa([languageOf(x), ...ys.map(languageOf)], ([inX, ...inYs]) =>
		inX === true && !inYs.some((flag) => flag === true),
	);
	if (isEmptyLanguage(outside)) return true;
	return hasOpaqueFormat(x) ? undefined : false;
}

/** Mots du langage (formats vérifiés), `undefined` s'il est infini ou trop grand. */
export function enumerateStrings(d: StringDescriptor, limit: number): string[] | undefined {
	const words = enumerateLanguage(languageOf(d), limit);
	return words?.filter((word) => d.formats.every((format) => validateFormat(word, format) !== false));
}

/** Retire les patterns impliqués par un autre pattern de la liste. */
function minimalPatterns(patterns: readonly string[]): string[] {
	return patterns.filter(
		(pattern, i) =>
			!patterns.some(
				(other, j) =>
					j !== i &&
					isPatternSubset(other, pattern) &&
					(!isPatternSubset(pattern, other) || j < i),
			),
	);
}
