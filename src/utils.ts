import type { JSONSchema7Definition, JSONSchema7Type } from "json-schema";

// ─── Shared Utilities ────────────────────────────────────────────────────────
//
// Fonctions utilitaires partagées entre tous les modules.

/**
 * Vérifie si une valeur est un plain object (pas null, pas un array).
 */
export function isPlainObj(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Vérifie si un objet possède une propriété propre.
 */
export function hasOwn(obj: object, key: string): boolean {
	return Object.hasOwn(obj, key);
}

/** Trie et déduplique une liste de strings (forme normale des descripteurs). */
export function sortedUnique(values: Iterable<string>): string[] {
	return Array.from(new Set(values)).sort();
}

/** Vérifie que tous les éléments de `sub` sont dans `sup`. */
export function isSubsetOf(
	sub: readonly string[],
	sup: readonly string[],
): boolean {
	if (sub.length === 0) return true;
	const set = new Set(sup);
	return sub.every((item) => set.has(item));
}

/** Clé de cache composite pour une paire ordonnée. */
export function pairKey(a: string, b: string): string {
	return `${a}\0${b}`;
}

/** Chemin JSON-path-like d'un enfant : "$" → "$.properties.name". */
export function childPath(path: string, ...segments: (string | number)[]): string {
	let result = path;
	for (const segment of segments) {
		result +=
			typeof segment === "number" ? `[${segment}]` : `.${segment}`;
	}
	return result;
}

/** Valeur JSON (les valeurs d'`enum` / `const`). */
export function isJsonValue(value: unknown): value is JSONSchema7Type {
	if (value === null) return true;
	switch (typeof value) {
		case "string":
		case "boolean":
			return true;
		case "number":
			return Number.isFinite(value);
		case "object":
			return Array.isArray(value)
				? value.every(isJsonValue)
				: Object.values(value).every(isJsonValue);
		default:
			return false;
	}
}

/** Définition de schema : objet ou booléen. */
export function isSchemaDefinition(value: unknown): value is JSONSchema7Definition {
	return typeof value === "boolean" || isPlainObj(value);
}
