export { SubschemaChecker } from "./subschema-checker";
export type { CreateCheckerOptions, SubschemaCheckerOptions } from "./subschema-checker";
export { SemanticResolver } from "./semantic-resolver";
export type { CreateResolverOptions, ResolverState, SemanticResolverOptions } from "./semantic-resolver";
export { N3ConceptGraph, RDFS_SUBCLASS_OF, SKOS_BROADER, SKOS_NARROWER } from "./concept-graph";
export type { ConceptGraph, ConceptRelation } from "./concept-graph";
export { OntologyLoader, WELL_KNOWN_ONTOLOGIES, fetchDocument } from "./ontology-loader";
export type {
	DocumentFetcher,
	FetchedDocument,
	GraphLoadFailure,
	LoadResult,
	WellKnownOntology,
} from "./ontology-loader";
export { compactIri, normalizeIri, KNOWN_PREFIXES } from "./iri";
export { SubschemaConfig, getDefaultConfig } from "./config";
export type { SubschemaConfigOptions, SubschemaConfigSnapshot } from "./config";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LogLevel, LogSink } from "./logger";
export {
	InvalidSchemaError,
	SubschemaError,
	UnsupportedInputError,
	UnsupportedKeywordError,
	UnsupportedNegationError,
	UnsupportedPatternError,
	UnsupportedRecursiveRefError,
	UnsupportedUnionError,
} from "./errors";
export type { OperandSide, SubschemaErrorCode } from "./errors";
export { formatResult } from "./formatter";
export {
	arePatternsEquivalent,
	isPatternSubset,
	isTrivialPattern,
} from "./pattern-subset";
export type { SemanticIssue, SemanticIssueKind } from "./semantic-compatibility";
export type { CanonicalSchema, Descriptor } from "./canonical-types";
export type { CheckStage, SchemaInput, SubschemaResult } from "./types";
