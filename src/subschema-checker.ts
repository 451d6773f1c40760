import type { JSONSchema7 } from "json-schema";
import { createAlgebra, DROP_ANNOTATIONS, stypeOf } from "./canonical-algebra";
import type { AnnotationPolicy, CanonicalSchema, SchemaAlgebra } from "./canonical-types";
import { canonicalize } from "./canonicalizer";
import { getComparator } from "./comparator";
import type { ConceptGraph } from "./concept-graph";
import { getDefaultConfig, type SubschemaConfig } from "./config";
import { findCycle, inlineLocalRefs } from "./dereference";
import { type OperandSide, UnsupportedInputError, UnsupportedRecursiveRefError } from "./errors";
import { formatResult } from "./formatter";
import { createLogger, type Logger } from "./logger";
import type { DocumentFetcher, WellKnownOntology } from "./ontology-loader";
import { assertValidSchema } from "./schema-validator";
import { collectSemanticTypes, findSemanticIssues } from "./semantic-compatibility";
import { SemanticResolver } from "./semantic-resolver";
import { toJsonSchema } from "./serializer";
import type { SchemaInput, SubschemaResult } from "./types";
import { isSchemaDefinition } from "./utils";

// ─── Subschema Checker ───────────────────────────────────────────────────────
//
// Façade publique. Chaque opération :
//
//   1. prépare ses opérandes (cycle → méta-schema → $ref locaux → cycle)
//   2. court-circuite les opérandes identiques
//   3. vérifie la couche sémantique (`stype`) si elle est active
//   4. délègue à l'algèbre canonique
//
// Les erreurs d'entrée portent le côté fautif (LHS / RHS).

export interface SubschemaCheckerOptions {
	config?: SubschemaConfig;
	resolver?: SemanticResolver;
	logger?: Logger;
}

export interface CreateCheckerOptions extends SubschemaCheckerOptions {
	ontologies?: readonly WellKnownOntology[];
	sources?: readonly string[];
	graph?: ConceptGraph;
	lazyLoad?: boolean;
	fetcher?: DocumentFetcher;
}

export class SubschemaChecker {
	readonly config: SubschemaConfig;
	readonly resolver: SemanticResolver;
	private readonly logger: Logger;
	private readonly comparator = getComparator();

	/** Politique d'annotation : le concept le plus étroit (meet), le plus large (join). */
	private readonly annotations: AnnotationPolicy = {
		meet: (a, b) => {
			if (a === undefined) return b;
			if (b === undefined) return a;
			if (this.resolver.isSubtypeOf(a, b)) return a;
			if (this.resolver.isSubtypeOf(b, a)) return b;
			this.logger.warn("incomparable stypes in meet, annotation dropped", { left: a, right: b });
			return undefined;
		},
		join: (a, b) => {
			if (a === undefined || b === undefined) return undefined;
			if (this.resolver.isSubtypeOf(a, b)) return b;
			if (this.resolver.isSubtypeOf(b, a)) return a;
			this.logger.warn("incomparable stypes in join, annotation dropped", { left: a, right: b });
			return undefined;
		},
	};

	constructor(options: SubschemaCheckerOptions = {}) {
		this.config = options.config ?? getDefaultConfig();
		this.logger = options.logger ?? createLogger(this.config);
		this.resolver = options.resolver ?? new SemanticResolver({ logger: this.logger });
	}

	/**
	 * Checker dont le résolveur est peuplé depuis les ontologies demandées,
	 * les sources personnalisées et celles de la configuration.
	 */
	static async create(options: CreateCheckerOptions = {}): Promise<SubschemaChecker> {
		const config = options.config ?? getDefaultConfig();
		const logger = options.logger ?? createLogger(config);
		const resolver =
			options.resolver ??
			(await SemanticResolver.create({
				ontologies: options.ontologies,
				sources: options.sources,
				graph: options.graph,
				lazyLoad: options.lazyLoad,
				fetcher: options.fetcher,
				config,
				logger,
			}));
		return new SubschemaChecker({ config, resolver, logger });
	}

	// ─── Public API ───────────────────────────────────────────────────────

	/** `sub` ⊆ `sup` : toute valeur valide pour `sub` l'est pour `sup`. */
	isSubschema(sub: SchemaInput, sup: SchemaInput): boolean {
		return this.check(sub, sup).isSubschema;
	}

	/** Comme `isSubschema`, avec l'étape décisive et les problèmes sémantiques. */
	check(sub: SchemaInput, sup: SchemaInput): SubschemaResult {
		const a = this.prepareOperand(sub, "LHS");
		const b = this.prepareOperand(sup, "RHS");

		if (isSchemaDefinition(a) && isSchemaDefinition(b) && this.comparator.isEqual(a, b)) {
			return { isSubschema: true, stage: "identity", issues: [] };
		}

		if (this.semanticsEnabled()) {
			const issues = findSemanticIssues(a, b, this.resolver);
			if (issues.length > 0) {
				this.logger.debug("semantic check failed", { issues: issues.length });
				return { isSubschema: false, stage: "semantic", issues };
			}
		}

		const result = this.includes(this.toCanonical(a, "LHS"), this.toCanonical(b, "RHS"), "RHS");
		return { isSubschema: result, stage: "structural", issues: [] };
	}

	/**
	 * Plus grande borne inférieure. Si `a` n'est pas sémantiquement
	 * compatible avec `b`, le résultat est Bottom (`{ not: {} }`).
	 */
	meet(a: SchemaInput, b: SchemaInput): JSONSchema7 {
		const left = this.prepareOperand(a, "LHS");
		const right = this.prepareOperand(b, "RHS");
		if (
			this.semanticsEnabled() &&
			findSemanticIssues(left, right, this.resolver).length > 0
		) {
			this.logger.debug("meet of semantically incompatible schemas is empty");
			return { not: {} };
		}
		return toJsonSchema(this.algebra().meet(this.toCanonical(left, "LHS"), this.toCanonical(right, "RHS")));
	}

	/** Plus petite borne supérieure représentable. */
	join(a: SchemaInput, b: SchemaInput): JSONSchema7 {
		const left = this.toCanonical(this.prepareOperand(a, "LHS"), "LHS");
		const right = this.toCanonical(this.prepareOperand(b, "RHS"), "RHS");
		return toJsonSchema(this.algebra().join(left, right));
	}

	/** Inclusion dans les deux sens, concepts racines équivalents compris. */
	isEquivalent(a: SchemaInput, b: SchemaInput): boolean {
		const left = this.prepareOperand(a, "LHS");
		const right = this.prepareOperand(b, "RHS");
		if (isSchemaDefinition(left) && isSchemaDefinition(right) && this.comparator.isEqual(left, right)) {
			return true;
		}

		const ca = this.toCanonical(left, "LHS");
		const cb = this.toCanonical(right, "RHS");
		if (this.semanticsEnabled()) {
			if (
				findSemanticIssues(left, right, this.resolver).length > 0 ||
				findSemanticIssues(right, left, this.resolver).length > 0
			) {
				return false;
			}
			const sa = stypeOf(ca);
			const sb = stypeOf(cb);
			if (sa !== sb && (sa === undefined || sb === undefined || !this.resolver.areEquivalent(sa, sb))) {
				return false;
			}
		}
		return this.includes(ca, cb, "RHS") && this.includes(cb, ca, "LHS");
	}

	/** Seule la couche `stype` ; toujours vrai quand elle est désactivée. */
	isSemanticallyCompatible(a: SchemaInput, b: SchemaInput): boolean {
		const left = this.prepareOperand(a, "LHS");
		const right = this.prepareOperand(b, "RHS");
		if (!this.semanticsEnabled()) return true;
		return findSemanticIssues(left, right, this.resolver).length === 0;
	}

	canonicalize(schema: SchemaInput): CanonicalSchema {
		return this.toCanonical(this.prepareOperand(schema, "LHS"), "LHS");
	}

	/** Forme canonique resérialisée en JSON Schema. */
	normalize(schema: SchemaInput): JSONSchema7 {
		return toJsonSchema(this.canonicalize(schema));
	}

	/**
	 * Récupère les espaces de noms des concepts cités par les schemas
	 * (mode `lazyLoad` uniquement). À appeler avant les opérations
	 * synchrones.
	 */
	async prepare(...schemas: SchemaInput[]): Promise<void> {
		if (!this.semanticsEnabled()) return;
		await this.resolver.ensureNamespaces(schemas.flatMap(collectSemanticTypes));
	}

	formatResult(label: string, result: SubschemaResult): string {
		return formatResult(label, result);
	}

	// ─── Internals ────────────────────────────────────────────────────────

	private semanticsEnabled(): boolean {
		return this.config.isSemanticReasoningEnabled();
	}

	private algebra(): SchemaAlgebra {
		return createAlgebra(this.semanticsEnabled() ? this.annotations : DROP_ANNOTATIONS);
	}

	/**
	 * Inclusion `sub` ⊆ `sup`. Une union indécidable est imputée au côté
	 * de `sup`.
	 */
	private includes(sub: CanonicalSchema, sup: CanonicalSchema, supSide: OperandSide): boolean {
		try {
			return this.algebra().isSubtype(sub, sup);
		} catch (error) {
			if (error instanceof UnsupportedInputError) throw error.assignSide(supSide);
			throw error;
		}
	}

	/**
	 * @throws UnsupportedInputError avec le côté renseigné
	 */
	private prepareOperand(schema: SchemaInput, side: OperandSide): unknown {
		try {
			const cycle = findCycle(schema);
			if (cycle !== undefined) throw new UnsupportedRecursiveRefError(side, schema, cycle);
			assertValidSchema(schema, side);

			const inlined = inlineLocalRefs(schema);
			const recursion = findCycle(inlined);
			if (recursion !== undefined) throw new UnsupportedRecursiveRefError(side, schema, recursion);
			return inlined;
		} catch (error) {
			if (error instanceof UnsupportedInputError) throw error.assignSide(side);
			throw error;
		}
	}

	private toCanonical(schema: unknown, side: OperandSide): CanonicalSchema {
		try {
			return canonicalize(schema, {
				side,
				keepAnnotations: this.semanticsEnabled(),
				warnUninhabited: this.config.isWarnUninhabitedEnabled(),
				algebra: this.algebra(),
				logger: this.logger,
			});
		} catch (error) {
			if (error instanceof UnsupportedInputError) throw error.assignSide(side);
			throw error;
		}
	}
}
