import get from "lodash/get";
import has from "lodash/has";
import { InvalidSchemaError } from "./errors";
import { childPath, isPlainObj } from "./utils";

// ─── Dereference ─────────────────────────────────────────────────────────────
//
// Inline des `$ref` locaux ("#", "#/definitions/…") et détection de cycles.
//
// Une référence récursive produit un graphe d'objets CYCLIQUE (même objet
// résolu réutilisé) : `findCycle` le détecte ensuite, avant tout parcours
// récursif. Les références externes sont laissées telles quelles.

/** Valeurs JSON littérales : un `$ref` y est une donnée. */
const DATA_KEYWORDS = new Set(["enum", "const", "default", "examples"]);

function decodePointer(ref: string): string[] | undefined {
	if (!ref.startsWith("#")) return undefined;
	const body = decodeURIComponent(ref.slice(1));
	if (body === "") return [];
	if (!body.startsWith("/")) return undefined;
	return body
		.slice(1)
		.split("/")
		.map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"));
}

function isLocalRef(node: Record<string, unknown>): node is Record<string, unknown> & { $ref: string } {
	const ref = node.$ref;
	return typeof ref === "string" && ref.startsWith("#");
}

/**
 * Copie de `schema` où chaque `$ref` local est remplacé par sa cible
 * (les mots-clés voisins d'un `$ref` sont ignorés, comme en draft-07).
 * Les sections `definitions` ne sont pas recopiées.
 *
 * @throws InvalidSchemaError si une référence locale ne pointe sur rien
 */
export function inlineLocalRefs(schema: unknown): unknown {
	const resolved = new Map<unknown, unknown>();

	const target = (ref: string, path: string): unknown => {
		const segments = decodePointer(ref);
		if (segments === undefined || (segments.length > 0 && !has(schema, segments))) {
			throw new InvalidSchemaError(undefined, schema, [`${path}: unresolvable $ref "${ref}"`], path);
		}
		return segments.length === 0 ? schema : get(schema, segments);
	};

	// `names` : nœud dont les clés sont des noms de propriétés, pas des mots-clés
	const visit = (node: unknown, path: string, via: Set<string>, names = false): unknown => {
		if (Array.isArray(node)) {
			return node.map((item, i) => visit(item, childPath(path, i), via));
		}
		if (!isPlainObj(node)) return node;

		if (!names && isLocalRef(node)) {
			// chaîne de $ref sans schema intermédiaire : "#/a" → "#/b" → "#/a"
			if (via.has(node.$ref)) {
				throw new InvalidSchemaError(undefined, schema, [`${path}: circular $ref chain "${node.$ref}"`], path);
			}
			return visit(target(node.$ref, path), path, new Set([...via, node.$ref]));
		}

		const known = resolved.get(node);
		if (known !== undefined) return known;

		const copy: Record<string, unknown> = {};
		resolved.set(node, copy);
		for (const [key, value] of Object.entries(node)) {
			// cibles déjà inlinées : une définition récursive inutilisée n'est pas un cycle
			if (!names && (key === "definitions" || key === "$defs")) continue;
			if (!names && DATA_KEYWORDS.has(key)) {
				copy[key] = value;
				continue;
			}
			const nameMap = !names && (key === "properties" || key === "patternProperties");
			copy[key] = visit(value, childPath(path, key), new Set(), nameMap);
		}
		return copy;
	};

	return visit(schema, "$", new Set());
}

/**
 * Chemin du premier nœud qui se contient lui-même, `undefined` si le
 * graphe d'objets est un arbre (ou un DAG).
 */
export function findCycle(schema: unknown): string | undefined {
	const ancestors = new Set<object>();
	const done = new Set<object>();

	const visit = (node: unknown, path: string): string | undefined => {
		if (typeof node !== "object" || node === null) return undefined;
		if (ancestors.has(node)) return path;
		if (done.has(node)) return undefined;
		ancestors.add(node);
		const entries: [string | number, unknown][] = Array.isArray(node)
			? node.map((item, i): [number, unknown] => [i, item])
			: Object.entries(node);
		for (const [key, value] of entries) {
			const found = visit(value, childPath(path, key));
			if (found !== undefined) return found;
		}
		ancestors.delete(node);
		done.add(node);
		return undefined;
	};

	return visit(schema, "$");
}
