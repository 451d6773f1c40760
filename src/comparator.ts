import { createComparator } from "@x0k/json-schema-merge";
import { createDeduplicator } from "@x0k/json-schema-merge/lib/array";
import type { JSONSchema7Definition, JSONSchema7Type } from "json-schema";

// ─── Schema Comparator ───────────────────────────────────────────────────────
//
// Encapsule le comparateur structurel de `@x0k/json-schema-merge` :
//
//   A ≡ B (syntaxiquement)  ⟺  compare(A, B) === 0
//
// Sert au court-circuit des opérandes identiques et à la déduplication
// des littéraux `enum`.

export class SchemaComparator {
	private readonly compareDefinitions: (
		a: JSONSchema7Definition,
		b: JSONSchema7Definition,
	) => number;

	private readonly dedupeFn: (values: JSONSchema7Type[]) => JSONSchema7Type[];

	constructor() {
		const { compareSchemaDefinitions, compareSchemaValues } = createComparator();

		// compareSchemaValues(null, null) retourne -1 : la déduplication
		// repose sur compare(x, x) === 0.
		const safeCompareSchemaValues = (a: JSONSchema7Type, b: JSONSchema7Type): number => {
			if (a === null && b === null) return 0;
			return compareSchemaValues(a, b);
		};

		this.compareDefinitions = compareSchemaDefinitions;
		this.dedupeFn = createDeduplicator(safeCompareSchemaValues);
	}

	/** 0 si les deux définitions sont structurellement identiques. */
	compare(a: JSONSchema7Definition, b: JSONSchema7Definition): number {
		return this.compareDefinitions(a, b);
	}

	isEqual(a: JSONSchema7Definition, b: JSONSchema7Definition): boolean {
		return this.compareDefinitions(a, b) === 0;
	}

	/** Valeurs JSON distinctes, l'ordre n'étant pas garanti. */
	dedupeValues(values: readonly JSONSchema7Type[]): JSONSchema7Type[] {
		return this.dedupeFn([...values]);
	}
}

let sharedComparator: SchemaComparator | undefined;

export function getComparator(): SchemaComparator {
	sharedComparator ??= new SchemaComparator();
	return sharedComparator;
}
