import { childPath, isPlainObj } from "./utils";

// ─── Semantic Compatibility ──────────────────────────────────────────────────
//
// Compare les annotations `stype` de deux schemas, nœud à nœud :
//
//   aucun annoté      → ok
//   seul `a` annoté   → ok (a est plus spécifique)
//   seul `b` annoté   → incompatible (a est plus général)
//   les deux          → ok ssi stype(a) ⊑ stype(b)
//
// puis descend dans les sous-schemas appariés (properties communes, items,
// additionalProperties, patternProperties identiques, allOf / anyOf / oneOf).
// Les entrées sont acycliques.

export type SemanticIssueKind = "missing-annotation" | "not-narrower" | "no-compatible-branch";

export interface SemanticIssue {
	/** Chemin JSON-path-like du nœud fautif */
	path: string;
	kind: SemanticIssueKind;
	/** stype attendu (côté `b`) */
	expected?: string;
	/** stype trouvé (côté `a`) */
	actual?: string;
}

export interface SemanticTypeOracle {
	isSubtypeOf(narrower: string, broader: string): boolean;
}

function stypeAt(node: Record<string, unknown>): string | undefined {
	return typeof node.stype === "string" ? node.stype : undefined;
}

function nodeIssue(
	a: Record<string, unknown>,
	b: Record<string, unknown>,
	oracle: SemanticTypeOracle,
	path: string,
): SemanticIssue | undefined {
	const actual = stypeAt(a);
	const expected = stypeAt(b);
	if (expected === undefined) return undefined;
	if (actual === undefined) return { path, kind: "missing-annotation", expected };
	if (oracle.isSubtypeOf(actual, expected)) return undefined;
	return { path, kind: "not-narrower", expected, actual };
}

function branches(node: Record<string, unknown>, keyword: string): unknown[] {
	const value = node[keyword];
	return Array.isArray(value) ? value : [];
}

/**
 * Problèmes sémantiques de `a` vis-à-vis de `b` ; compatibles ssi la liste
 * est vide.
 */
export function findSemanticIssues(
	a: unknown,
	b: unknown,
	oracle: SemanticTypeOracle,
	path = "$",
): SemanticIssue[] {
	if (!isPlainObj(a) || !isPlainObj(b)) return [];

	const issues: SemanticIssue[] = [];
	const own = nodeIssue(a, b, oracle, path);
	if (own) issues.push(own);

	// properties communes
	if (isPlainObj(a.properties) && isPlainObj(b.properties)) {
		for (const [name, schema] of Object.entries(a.properties)) {
			if (Object.hasOwn(b.properties, name)) {
				issues.push(
					...findSemanticIssues(schema, b.properties[name], oracle, childPath(path, "properties", name)),
				);
			}
		}
	}

	issues.push(...itemIssues(a, b, oracle, path));

	if (isPlainObj(a.additionalProperties) && isPlainObj(b.additionalProperties)) {
		issues.push(
			...findSemanticIssues(
				a.additionalProperties,
				b.additionalProperties,
				oracle,
				childPath(path, "additionalProperties"),
			),
		);
	}

	if (isPlainObj(a.patternProperties) && isPlainObj(b.patternProperties)) {
		for (const [pattern, schema] of Object.entries(a.patternProperties)) {
			if (Object.hasOwn(b.patternProperties, pattern)) {
				issues.push(
					...findSemanticIssues(
						schema,
						b.patternProperties[pattern],
						oracle,
						childPath(path, "patternProperties", pattern),
					),
				);
			}
		}
	}

	issues.push(...connectiveIssues(a, b, oracle, path));
	return issues;
}

function itemIssues(
	a: Record<string, unknown>,
	b: Record<string, unknown>,
	oracle: SemanticTypeOracle,
	path: string,
): SemanticIssue[] {
	const itemsA = a.items;
	const itemsB = b.items;
	const at = (i?: number) => (i === undefined ? childPath(path, "items") : childPath(path, "items", i));

	if (Array.isArray(itemsA) && Array.isArray(itemsB)) {
		const count = Math.min(itemsA.length, itemsB.length);
		const issues: SemanticIssue[] = [];
		for (let i = 0; i < count; i++) {
			issues.push(...findSemanticIssues(itemsA[i], itemsB[i], oracle, at(i)));
		}
		return issues;
	}
	if (Array.isArray(itemsA) && isPlainObj(itemsB)) {
		// tuple ⊑ liste : chaque position (et la queue) contre le schema de liste
		const tail = isPlainObj(a.additionalItems)
			? findSemanticIssues(a.additionalItems, itemsB, oracle, childPath(path, "additionalItems"))
			: [];
		return [...itemsA.flatMap((item, i) => findSemanticIssues(item, itemsB, oracle, at(i))), ...tail];
	}
	if (isPlainObj(itemsA) && Array.isArray(itemsB)) {
		const tail = isPlainObj(b.additionalItems)
			? findSemanticIssues(itemsA, b.additionalItems, oracle, childPath(path, "additionalItems"))
			: [];
		return [...itemsB.flatMap((item, i) => findSemanticIssues(itemsA, item, oracle, at(i))), ...tail];
	}
	return findSemanticIssues(itemsA, itemsB, oracle, at());
}

function connectiveIssues(
	a: Record<string, unknown>,
	b: Record<string, unknown>,
	oracle: SemanticTypeOracle,
	path: string,
): SemanticIssue[] {
	const compatible = (x: unknown, y: unknown) => findSemanticIssues(x, y, oracle).length === 0;
	const issues: SemanticIssue[] = [];

	// allOf : chaque branche de `a` compatible avec au moins une de `b`
	const allA = branches(a, "allOf");
	const allB = branches(b, "allOf");
	if (allA.length > 0 && allB.length > 0) {
		allA.forEach((branch, i) => {
			if (!allB.some((other) => compatible(branch, other))) {
				issues.push({ path: childPath(path, "allOf", i), kind: "no-compatible-branch" });
			}
		});
	}

	// anyOf / oneOf : au moins une paire compatible
	for (const keyword of ["anyOf", "oneOf"]) {
		const anyA = branches(a, keyword);
		const anyB = branches(b, keyword);
		if (anyA.length === 0 || anyB.length === 0) continue;
		if (!anyA.some((branch) => anyB.some((other) => compatible(branch, other)))) {
			issues.push({ path: childPath(path, keyword), kind: "no-compatible-branch" });
		}
	}
	return issues;
}

export function isSemanticallyCompatible(a: unknown, b: unknown, oracle: SemanticTypeOracle): boolean {
	return findSemanticIssues(a, b, oracle).length === 0;
}

/** Toutes les valeurs `stype` d'un schema, dans l'ordre de parcours. */
export function collectSemanticTypes(schema: unknown): string[] {
	const found = new Set<string>();
	const seen = new Set<object>();
	const visit = (node: unknown): void => {
		if (typeof node !== "object" || node === null || seen.has(node)) return;
		seen.add(node);
		if (Array.isArray(node)) {
			for (const item of node) visit(item);
			return;
		}
		for (const [key, value] of Object.entries(node)) {
			if (key === "stype" && typeof value === "string") found.add(value);
			else if (key !== "enum" && key !== "const") visit(value);
		}
	};
	visit(schema);
	return Array.from(found);
}
