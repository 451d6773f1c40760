import Ajv from "ajv";
import type { OperandSide } from "./errors";
import { InvalidSchemaError } from "./errors";

// ─── Schema Validator ────────────────────────────────────────────────────────
//
// Conformité draft-07 d'un opérande, vérifiée contre le méta-schema
// embarqué par ajv. L'entrée doit être acyclique (vérifié avant).

const DRAFT_07 = "http://json-schema.org/draft-07/schema";

const ajv = new Ajv({ strict: false, validateFormats: false, logger: false });

/** Messages d'erreur du méta-schema, vide si le schema est conforme. */
export function schemaErrors(schema: unknown): string[] {
	if (ajv.validate(DRAFT_07, schema) === true) return [];
	return (ajv.errors ?? []).map(
		(error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
	);
}

/**
 * @throws InvalidSchemaError si le schema n'est pas un draft-07 valide
 */
export function assertValidSchema(schema: unknown, side?: OperandSide): void {
	const errors = schemaErrors(schema);
	if (errors.length > 0) throw new InvalidSchemaError(side, schema, errors);
}
