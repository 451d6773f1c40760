import { DataFactory, type Quad, Store } from "n3";

const { namedNode, quad } = DataFactory;

// ─── Concept Graph ───────────────────────────────────────────────────────────
//
// Graphe de concepts interrogé par le résolveur. Trois arcs portent la
// relation « plus étroit que » :
//
//   A skos:broader B      ⟹  A ⊑ B
//   A rdfs:subClassOf B   ⟹  A ⊑ B
//   B skos:narrower A     ⟹  A ⊑ B

export const SKOS_BROADER = "http://www.w3.org/2004/02/skos/core#broader";
export const SKOS_NARROWER = "http://www.w3.org/2004/02/skos/core#narrower";
export const RDFS_SUBCLASS_OF = "http://www.w3.org/2000/01/rdf-schema#subClassOf";

export type ConceptRelation = "broader" | "subClassOf";

const RELATION_PREDICATES: Record<ConceptRelation, string> = {
	broader: SKOS_BROADER,
	subClassOf: RDFS_SUBCLASS_OF,
};

export interface ConceptGraph {
	/** Nombre de triplets */
	readonly size: number;
	/** Concepts directement plus larges que `iri` */
	broaderOf(iri: string): string[];
	/** Ajoute un arc ; `false` s'il existait déjà */
	addRelation(narrower: string, broader: string, relation: ConceptRelation): boolean;
	/** Fusionne des quads ; retourne le nombre de quads nouveaux */
	addQuads(quads: readonly Quad[]): number;
	/**
	 * Requête transitive native (chemin `broader*`), pour les backends qui
	 * en offrent une. Peut lever une exception : le résolveur retombe
	 * alors sur un parcours en largeur.
	 */
	isReachable?(narrower: string, broader: string): boolean;
}

/** Graphe en mémoire adossé à un `Store` n3. */
export class N3ConceptGraph implements ConceptGraph {
	private readonly store: Store;

	constructor(quads: readonly Quad[] = []) {
		this.store = new Store();
		this.addQuads(quads);
	}

	get size(): number {
		return this.store.size;
	}

	broaderOf(iri: string): string[] {
		const node = namedNode(iri);
		const found = new Set<string>();
		for (const predicate of [SKOS_BROADER, RDFS_SUBCLASS_OF]) {
			for (const object of this.store.getObjects(node, namedNode(predicate), null)) {
				if (object.termType === "NamedNode") found.add(object.value);
			}
		}
		for (const subject of this.store.getSubjects(namedNode(SKOS_NARROWER), node, null)) {
			if (subject.termType === "NamedNode") found.add(subject.value);
		}
		return Array.from(found);
	}

	addRelation(narrower: string, broader: string, relation: ConceptRelation): boolean {
		const before = this.store.size;
		this.store.addQuad(
			quad(namedNode(narrower), namedNode(RELATION_PREDICATES[relation]), namedNode(broader)),
		);
		return this.store.size > before;
	}

	addQuads(quads: readonly Quad[]): number {
		const before = this.store.size;
		this.store.addQuads([...quads]);
		return this.store.size - before;
	}
}
