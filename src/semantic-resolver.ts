import type { Quad } from "n3";
import {
	type ConceptGraph,
	type ConceptRelation,
	N3ConceptGraph,
} from "./concept-graph";
import type { SubschemaConfig } from "./config";
import { namespaceOf, normalizeIri } from "./iri";
import { type Logger, silentLogger } from "./logger";
import {
	type DocumentFetcher,
	OntologyLoader,
	type WellKnownOntology,
} from "./ontology-loader";
import { pairKey } from "./utils";

// ─── Semantic Resolver ───────────────────────────────────────────────────────
//
// Répond à « le concept A est-il plus étroit que (ou égal à) B ? ».
//
//   uninitialized → pas de graphe : seule l'identité est vraie
//   ready         → graphe présent, capacité transitive non testée
//   tested        → capacité testée (requête native ou parcours BFS)
//
// Chaque paire résolue est mémorisée ; toute mutation du graphe vide le
// cache ET le drapeau de capacité.

export type ResolverState = "uninitialized" | "ready" | "tested";

export interface SemanticResolverOptions {
	graph?: ConceptGraph;
	/** Récupère à la demande l'espace de noms d'un concept inconnu */
	lazyLoad?: boolean;
	loader?: OntologyLoader;
	logger?: Logger;
}

export interface CreateResolverOptions extends SemanticResolverOptions {
	/** Ontologies connues à charger (`qudt`, `foaf`, `skos`) */
	ontologies?: readonly WellKnownOntology[];
	/** URLs ou chemins de fichiers RDF */
	sources?: readonly string[];
	/** Sources additionnelles et répertoire de cache */
	config?: SubschemaConfig;
	fetcher?: DocumentFetcher;
}

export class SemanticResolver {
	private graph: ConceptGraph | undefined;
	private readonly lazyLoad: boolean;
	private readonly loader: OntologyLoader;
	private readonly logger: Logger;

	private readonly cache = new Map<string, boolean>();
	private transitiveSupport: boolean | undefined;
	private readonly fetchedNamespaces = new Set<string>();
	private readonly pendingFetches = new Map<string, Promise<void>>();

	constructor(options: SemanticResolverOptions = {}) {
		this.graph = options.graph;
		this.lazyLoad = options.lazyLoad ?? false;
		this.logger = options.logger ?? silentLogger;
		this.loader = options.loader ?? new OntologyLoader({ logger: this.logger });
	}

	/**
	 * Résolveur peuplé depuis un graphe existant, des ontologies connues,
	 * des sources personnalisées et les sources de la configuration.
	 * Les échecs de chargement sont journalisés, jamais levés.
	 */
	static async create(options: CreateResolverOptions = {}): Promise<SemanticResolver> {
		const logger = options.logger ?? silentLogger;
		const loader =
			options.loader ??
			new OntologyLoader({
				fetcher: options.fetcher,
				cacheDir: options.config?.getSemanticCacheDir() ?? null,
				logger,
			});
		const resolver = new SemanticResolver({ ...options, loader, logger });

		const sources = new Set<string>([
			...(options.ontologies ?? []),
			...(options.sources ?? []),
			...(options.config?.getSemanticGraphSources() ?? []),
		]);
		for (const result of await loader.loadAll([...sources])) {
			resolver.mergeQuads(result.quads);
		}
		return resolver;
	}

	get state(): ResolverState {
		if (!this.graph) return "uninitialized";
		return this.transitiveSupport === undefined ? "ready" : "tested";
	}

	/** Nombre de triplets du graphe (0 sans graphe). */
	get size(): number {
		return this.graph?.size ?? 0;
	}

	// ─── Queries ──────────────────────────────────────────────────────────

	/**
	 * `narrower` est-il identique ou plus étroit que `broader` ?
	 * Synchrone : ne déclenche jamais de chargement.
	 */
	isSubtypeOf(narrower: string, broader: string): boolean {
		const a = normalizeIri(narrower);
		const b = normalizeIri(broader);
		if (a === b) return true;

		const key = pairKey(a, b);
		const cached = this.cache.get(key);
		if (cached !== undefined) return cached;

		if (this.lazyLoad) this.noteUnfetched(a, b);
		const graph = this.graph;
		let result = false;
		if (graph) {
			result = this.supportsTransitiveQueries(graph)
				? this.queryTransitive(graph, a, b)
				: this.traverse(graph, a, b);
		}
		this.cache.set(key, result);
		this.logger.debug("concept subtype resolved", { narrower: a, broader: b, result });
		return result;
	}

	areEquivalent(a: string, b: string): boolean {
		return this.isSubtypeOf(a, b) && this.isSubtypeOf(b, a);
	}

	private supportsTransitiveQueries(graph: ConceptGraph): boolean {
		if (this.transitiveSupport !== undefined) return this.transitiveSupport;
		if (!graph.isReachable) {
			this.transitiveSupport = false;
		} else {
			try {
				graph.isReachable("urn:semantic-subschema:self", "urn:semantic-subschema:self");
				this.transitiveSupport = true;
			} catch (error) {
				this.logger.debug("transitive queries unavailable, using traversal", {
					reason: error instanceof Error ? error.message : String(error),
				});
				this.transitiveSupport = false;
			}
		}
		return this.transitiveSupport;
	}

	private queryTransitive(graph: ConceptGraph, a: string, b: string): boolean {
		try {
			return graph.isReachable ? graph.isReachable(a, b) : this.traverse(graph, a, b);
		} catch (error) {
			this.logger.debug("transitive query failed, using traversal", {
				reason: error instanceof Error ? error.message : String(error),
			});
			return this.traverse(graph, a, b);
		}
	}

	/** Parcours en largeur ; l'ensemble `visited` garantit la terminaison. */
	private traverse(graph: ConceptGraph, a: string, b: string): boolean {
		const visited = new Set<string>([a]);
		const queue = [a];
		for (let head = 0; head < queue.length; head++) {
			const current = queue[head];
			if (current === undefined) break;
			for (const next of graph.broaderOf(current)) {
				if (next === b) return true;
				if (!visited.has(next)) {
					visited.add(next);
					queue.push(next);
				}
			}
		}
		return false;
	}

	// ─── Mutations ────────────────────────────────────────────────────────

	/** Déclare `narrower` plus étroit que `broader` (identifiants normalisés). */
	addRelationship(narrower: string, broader: string, relation: ConceptRelation = "broader"): void {
		const graph = this.ensureGraph();
		graph.addRelation(normalizeIri(narrower), normalizeIri(broader), relation);
		this.invalidate();
	}

	/** Fusionne des quads ; retourne le nombre de quads ajoutés. */
	mergeQuads(quads: readonly Quad[]): number {
		if (quads.length === 0) return 0;
		const added = this.ensureGraph().addQuads(quads);
		this.invalidate();
		return added;
	}

	clearCache(): void {
		this.cache.clear();
	}

	private ensureGraph(): ConceptGraph {
		this.graph ??= new N3ConceptGraph();
		return this.graph;
	}

	private invalidate(): void {
		this.cache.clear();
		this.transitiveSupport = undefined;
	}

	// ─── Lazy loading ─────────────────────────────────────────────────────

	/** Requête synchrone sur un espace jamais récupéré : `prepare()` manquant. */
	private noteUnfetched(...iris: string[]): void {
		for (const iri of iris) {
			const namespace = namespaceOf(iri);
			if (namespace === undefined || this.fetchedNamespaces.has(namespace)) continue;
			this.logger.debug("namespace not fetched yet, answer uses the current graph", { namespace });
		}
	}

	isNamespaceFetched(namespace: string): boolean {
		return this.fetchedNamespaces.has(namespace);
	}

	/**
	 * Récupère une seule fois l'espace de noms de chaque concept (sans effet
	 * hors mode `lazyLoad`). Un échec marque quand même l'espace comme
	 * récupéré.
	 */
	async ensureNamespaces(iris: Iterable<string>): Promise<void> {
		if (!this.lazyLoad) return;
		const jobs: Promise<void>[] = [];
		for (const iri of iris) {
			const namespace = namespaceOf(normalizeIri(iri));
			if (namespace === undefined || this.fetchedNamespaces.has(namespace)) continue;
			let job = this.pendingFetches.get(namespace);
			if (!job) {
				job = this.fetchNamespace(namespace);
				this.pendingFetches.set(namespace, job);
			}
			jobs.push(job);
		}
		await Promise.all(jobs);
	}

	private async fetchNamespace(namespace: string): Promise<void> {
		try {
			const result = await this.loader.load(namespace);
			this.mergeQuads(result.quads);
		} finally {
			this.fetchedNamespaces.add(namespace);
			this.pendingFetches.delete(namespace);
		}
	}
}
