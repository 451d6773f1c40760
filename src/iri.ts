// ─── IRI helpers ─────────────────────────────────────────────────────────────
//
// Les identifiants `stype` sont des IRI complètes ou des formes compactes
// `prefix:local` développées contre une table fixe. Un préfixe inconnu
// laisse l'identifiant inchangé.

export const KNOWN_PREFIXES: Readonly<Record<string, string>> = {
	quantitykind: "http://qudt.org/vocab/quantitykind/",
	qudt: "http://qudt.org/schema/qudt/",
	skos: "http://www.w3.org/2004/02/skos/core#",
	foaf: "http://xmlns.com/foaf/0.1/",
	rdf: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
	rdfs: "http://www.w3.org/2000/01/rdf-schema#",
	owl: "http://www.w3.org/2002/07/owl#",
	xsd: "http://www.w3.org/2001/XMLSchema#",
	ex: "http://example.org/",
};

function isAbsoluteHttpIri(value: string): boolean {
	return value.startsWith("http://") || value.startsWith("https://");
}

/**
 * Forme normale d'un identifiant de concept.
 *
 * @example
 * ```ts
 * normalizeIri("foaf:Person");  // "http://xmlns.com/foaf/0.1/Person"
 * normalizeIri("acme:Widget");  // "acme:Widget"
 * ```
 */
export function normalizeIri(value: string): string {
	if (isAbsoluteHttpIri(value)) return value;
	const colon = value.indexOf(":");
	if (colon <= 0) return value;
	const namespace = KNOWN_PREFIXES[value.slice(0, colon)];
	return namespace === undefined ? value : `${namespace}${value.slice(colon + 1)}`;
}

/**
 * Espace de noms d'une IRI normalisée : tout jusqu'au dernier `#` ou `/`
 * inclus. `undefined` pour un identifiant qui n'est pas une IRI http(s).
 */
export function namespaceOf(iri: string): string | undefined {
	if (!isAbsoluteHttpIri(iri)) return undefined;
	const cut = Math.max(iri.lastIndexOf("#"), iri.lastIndexOf("/"));
	// "http://" seul : pas de chemin
	if (cut < iri.indexOf("//") + 2) return undefined;
	return iri.slice(0, cut + 1);
}

/** Forme compacte si une entrée de la table couvre l'IRI. */
export function compactIri(iri: string): string {
	for (const [prefix, namespace] of Object.entries(KNOWN_PREFIXES)) {
		if (iri.startsWith(namespace) && iri.length > namespace.length) {
			return `${prefix}:${iri.slice(namespace.length)}`;
		}
	}
	return iri;
}
