import type { JSONSchema7Definition } from "json-schema";
import type { SemanticIssue } from "./semantic-compatibility";

// ─── Public types ────────────────────────────────────────────────────────────

declare module "json-schema" {
	interface JSONSchema7 {
		/** Concept sémantique : IRI complète ou forme compacte `prefix:local` */
		stype?: string;
	}
}

/** Opérande accepté par les opérations publiques. */
export type SchemaInput = JSONSchema7Definition;

/**
 * Étape qui a décidé d'un check :
 *   - "identity"   : opérandes structurellement identiques
 *   - "semantic"   : annotations `stype` incompatibles
 *   - "structural" : algèbre canonique
 */
export type CheckStage = "identity" | "semantic" | "structural";

export interface SubschemaResult {
	/** true si sub ⊆ sup (toute valeur valide pour sub est valide pour sup) */
	isSubschema: boolean;
	stage: CheckStage;
	/** Problèmes sémantiques, vide sauf si `stage` vaut "semantic" */
	issues: SemanticIssue[];
}
