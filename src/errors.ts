// ─── Errors ──────────────────────────────────────────────────────────────────
//
// Hiérarchie d'erreurs typées levées à la frontière des opérations publiques.
// Une incompatibilité sémantique n'est PAS une erreur : c'est un résultat
// normal (`false` ou Bottom).

/** Côté de l'opération auquel appartient le schema fautif. */
export type OperandSide = "LHS" | "RHS";

export type SubschemaErrorCode =
	| "UNSUPPORTED_RECURSIVE_REF"
	| "INVALID_SCHEMA"
	| "UNSUPPORTED_KEYWORD"
	| "UNSUPPORTED_PATTERN"
	| "UNSUPPORTED_NEGATION"
	| "UNSUPPORTED_UNION";

/**
 * Classe de base de toutes les erreurs du package.
 * `code` est stable et peut être utilisé pour le dispatch côté appelant.
 */
export abstract class SubschemaError extends Error {
	abstract readonly code: SubschemaErrorCode;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}
}

/**
 * Entrée hors du sous-ensemble supporté.
 *
 * `side` est inconnu quand l'erreur naît loin de la frontière (compilation
 * d'un pattern par exemple) : le checker le complète avec `assignSide`
 * avant de la propager.
 */
export abstract class UnsupportedInputError extends SubschemaError {
	side: OperandSide | undefined;
	readonly schema: unknown;
	/** Chemin JSON-path-like du nœud fautif ("$" = racine) */
	readonly path: string;

	constructor(
		message: string,
		options: { side?: OperandSide; schema?: unknown; path?: string } = {},
	) {
		super(options.side ? `${options.side}: ${message}` : message);
		this.side = options.side;
		this.schema = options.schema;
		this.path = options.path ?? "$";
	}

	assignSide(side: OperandSide): this {
		if (this.side === undefined) {
			this.side = side;
			this.message = `${side}: ${this.message}`;
		}
		return this;
	}
}

export class UnsupportedRecursiveRefError extends UnsupportedInputError {
	readonly code = "UNSUPPORTED_RECURSIVE_REF" as const;

	constructor(side: OperandSide | undefined, schema: unknown, path: string) {
		super(`recursive schema at ${path} is not supported`, {
			side,
			schema,
			path,
		});
	}
}

export class InvalidSchemaError extends UnsupportedInputError {
	readonly code = "INVALID_SCHEMA" as const;
	readonly errors: string[];

	constructor(
		side: OperandSide | undefined,
		schema: unknown,
		errors: string[],
		path = "$",
	) {
		super(`invalid draft-07 schema: ${errors.join("; ")}`, {
			side,
			schema,
			path,
		});
		this.errors = errors;
	}
}

export class UnsupportedKeywordError extends UnsupportedInputError {
	readonly code = "UNSUPPORTED_KEYWORD" as const;
	readonly keyword: string;

	constructor(
		keyword: string,
		schema: unknown,
		path: string,
		side?: OperandSide,
	) {
		super(`keyword "${keyword}" at ${path} is not supported`, {
			side,
			schema,
			path,
		});
		this.keyword = keyword;
	}
}

export class UnsupportedPatternError extends UnsupportedInputError {
	readonly code = "UNSUPPORTED_PATTERN" as const;
	readonly pattern: string;
	readonly reason: string;

	constructor(pattern: string, reason: string) {
		super(`pattern /${pattern}/ is not supported: ${reason}`, {
			schema: pattern,
		});
		this.pattern = pattern;
		this.reason = reason;
	}
}

export class UnsupportedNegationError extends UnsupportedInputError {
	readonly code = "UNSUPPORTED_NEGATION" as const;

	constructor(schema: unknown, path: string, side?: OperandSide) {
		super(`negation at ${path} cannot be represented`, {
			side,
			schema,
			path,
		});
	}
}

/**
 * Inclusion dans une union de plusieurs schemas du même kind qu'aucune
 * branche ne couvre seule et que ni le balayage d'intervalles, ni les
 * automates, ni l'énumération ne savent trancher.
 */
export class UnsupportedUnionError extends UnsupportedInputError {
	readonly code = "UNSUPPORTED_UNION" as const;
	readonly kind: string;

	constructor(kind: string, path = "$") {
		super(`inclusion in a union of ${kind} schemas at ${path} cannot be decided exactly`, { path });
		this.kind = kind;
	}
}

/** Vrai seulement quand `decide` conclut ; une union indécidable compte comme faux. */
export function holdsIfDecidable(decide: () => boolean): boolean {
	try {
		return decide();
	} catch (error) {
		if (error instanceof UnsupportedUnionError) return false;
		throw error;
	}
}
