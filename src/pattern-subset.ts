import escapeRegExp from "lodash/escapeRegExp";
import {
	acceptsString,
	compileSearchPattern,
	type Dfa,
	differenceDfa,
	fullMatchSource,
	intersectDfas,
	isEmptyLanguage,
	productDfa,
} from "./regex-automaton";
import { pairKey } from "./utils";

// ─── Pattern Subset Checker ──────────────────────────────────────────────────
//
// Vérifie les relations entre langages de patterns regex, de manière
// EXACTE, par automates :
//
//   L(A) ⊆ L(B)  ⟺  L(A) \ L(B) = ∅
//
// Chaque pattern est compilé une seule fois (cache par source) en DFA.
// Les patterns hors du sous-ensemble régulier lèvent
// UnsupportedPatternError à la compilation.

// ─── Caches ──────────────────────────────────────────────────────────────────

const dfaCache = new Map<string, Dfa>();

/** Cache des résultats de isPatternSubset, clé `${sub}\0${sup}`. */
const subsetCache = new Map<string, boolean>();

/**
 * DFA (sémantique de recherche) d'un pattern, mis en cache.
 *
 * @throws UnsupportedPatternError
 */
export function compilePattern(pattern: string): Dfa {
	let dfa = dfaCache.get(pattern);
	if (!dfa) {
		dfa = compileSearchPattern(pattern);
		dfaCache.set(pattern, dfa);
	}
	return dfa;
}

// ─── Relations ───────────────────────────────────────────────────────────────

/**
 * Vérifie si le langage de `subPattern` est inclus dans celui de `supPattern`.
 *
 * @example
 * ```ts
 * isPatternSubset("^[a-z]{3}$", "^[a-z]+$");  // true
 * isPatternSubset("^[a-z]+$", "^[a-z]{3}$");  // false
 * isPatternSubset("^abc", "b");               // true
 * ```
 */
export function isPatternSubset(subPattern: string, supPattern: string): boolean {
	if (subPattern === supPattern) return true;
	const key = pairKey(subPattern, supPattern);
	const cached = subsetCache.get(key);
	if (cached !== undefined) return cached;

	const result = isEmptyLanguage(
		differenceDfa(compilePattern(subPattern), compilePattern(supPattern)),
	);
	subsetCache.set(key, result);
	return result;
}

/**
 * Deux patterns sont équivalents s'ils acceptent exactement les mêmes chaînes.
 */
export function arePatternsEquivalent(a: string, b: string): boolean {
	return isPatternSubset(a, b) && isPatternSubset(b, a);
}

/**
 * Un pattern trivial accepte toutes les chaînes : "", ".*", "[\\s\\S]*".
 * "^.*$" ne l'est pas (`.` exclut les fins de ligne).
 */
export function isTrivialPattern(pattern: string): boolean {
	return isEmptyLanguage(
		productDfa([compilePattern(pattern)], ([matches]) => matches !== true),
	);
}

/** Existe-t-il une chaîne acceptée par les deux patterns ? */
export function patternsOverlap(a: string, b: string): boolean {
	return !isEmptyLanguage(intersectDfas([compilePattern(a), compilePattern(b)]));
}

/**
 * Vérifie si L(pattern) est couvert par l'union des `cover`.
 */
export function isPatternCovered(pattern: string, cover: readonly string[]): boolean {
	if (cover.includes(pattern)) return true;
	const components = [pattern, ...cover].map(compilePattern);
	return isEmptyLanguage(
		productDfa(
			components,
			([inPattern, ...rest]) => inPattern === true && !rest.some(Boolean),
		),
	);
}

export function patternMatches(pattern: string, value: string): boolean {
	return acceptsString(compilePattern(pattern), value);
}

// ─── Constructions ───────────────────────────────────────────────────────────

/**
 * Pattern dont le langage est L(a) ∪ L(b) :
 * `^(?:<plein-match de a>|<plein-match de b>)$`.
 */
export function unionPattern(a: string, b: string): string {
	if (isPatternSubset(a, b)) return b;
	if (isPatternSubset(b, a)) return a;
	return `^(?:${fullMatchSource(a)}|${fullMatchSource(b)})$`;
}

/**
 * Pattern ancré acceptant exactement les valeurs données.
 */
export function literalPattern(values: readonly string[]): string {
	return `^(?:${values.map(escapeRegExp).join("|")})$`;
}
