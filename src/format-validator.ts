import {
	isEmail,
	isFQDN,
	isIP,
	isISO8601,
	isURL,
	isUUID,
} from "class-validator";
import includes from "lodash/includes";

// ─── Format Validator ─────────────────────────────────────────────────────────
//
// Connaissances sur les formats JSON Schema Draft-07 utilisées par
// l'algèbre des chaînes :
//
//   1. `FORMAT_SUPERSETS`  → hiérarchie d'inclusion entre formats
//   2. `FORMAT_PATTERNS`   → grammaire régulière NÉCESSAIRE d'un format
//                            (ajoutée au langage du descripteur)
//   3. `validateFormat`    → validation d'une valeur concrète (class-validator),
//                            utilisée quand un langage fini est énuméré
//   4. `areFormatsDisjoint`→ formats dont aucune valeur n'est commune

// ─── Regex patterns ──────────────────────────────────────────────────────────

const TIME_PATTERN = "^\\d{2}:\\d{2}:\\d{2}(?:\\.\\d+)?(?:Z|[+-]\\d{2}:\\d{2})?$";
const DATE_PATTERN = "^\\d{4}-\\d{2}-\\d{2}$";
const UUID_PATTERN =
	"^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$";
const JSON_POINTER_PATTERN = "^(?:/(?:[^~/]|~[01])*)*$";
const RELATIVE_JSON_POINTER_PATTERN = "^\\d+(?:#|(?:/(?:[^~/]|~[01])*)*)$";

/**
 * Pattern satisfait par toute valeur valide du format. Le canonicalizer
 * l'ajoute aux patterns du descripteur string.
 */
export const FORMAT_PATTERNS: Readonly<Record<string, string>> = {
	date: DATE_PATTERN,
	time: TIME_PATTERN,
	uuid: UUID_PATTERN,
	"json-pointer": JSON_POINTER_PATTERN,
	"relative-json-pointer": RELATIVE_JSON_POINTER_PATTERN,
};

const TIME_REGEX = new RegExp(TIME_PATTERN);
const DATE_REGEX = new RegExp(DATE_PATTERN);
const JSON_POINTER_REGEX = new RegExp(JSON_POINTER_PATTERN);
const RELATIVE_JSON_POINTER_REGEX = new RegExp(RELATIVE_JSON_POINTER_PATTERN);

// ─── Known formats ──────────────────────────────────────────────────────────

/** Formats reconnus par le validateur */
export const KNOWN_FORMATS: ReadonlySet<string> = new Set([
	"date-time",
	"date",
	"time",
	"email",
	"idn-email",
	"hostname",
	"idn-hostname",
	"ipv4",
	"ipv6",
	"uri",
	"uri-reference",
	"iri",
	"iri-reference",
	"uri-template",
	"uuid",
	"json-pointer",
	"relative-json-pointer",
	"regex",
]);

// ─── Format hierarchy ────────────────────────────────────────────────────────

/**
 * `FORMAT_SUPERSETS[format]` = formats dont le langage contient celui de
 * `format`. La plupart des formats sont incomparables.
 */
export const FORMAT_SUPERSETS: Readonly<Record<string, readonly string[]>> = {
	email: ["idn-email"],
	hostname: ["idn-hostname"],
	uri: ["iri", "uri-reference", "iri-reference"],
	iri: ["iri-reference"],
	"uri-reference": ["iri-reference"],
};

/**
 * Formats deux à deux disjoints : une date n'est jamais une adresse IP,
 * une adresse email contient toujours "@", etc.
 */
const MUTUALLY_DISJOINT_FORMATS: ReadonlySet<string> = new Set([
	"date-time",
	"date",
	"time",
	"email",
	"ipv4",
	"ipv6",
	"uuid",
]);

// ─── Format validators (internal) ───────────────────────────────────────────

const FORMAT_VALIDATORS: Record<string, (value: string) => boolean> = {
	"date-time": (value) => isISO8601(value, { strict: true }) && value.includes("T"),

	date: (value) => {
		if (!DATE_REGEX.test(value)) return false;
		// 2023-02-30 n'existe pas
		const d = new Date(`${value}T00:00:00Z`);
		return !Number.isNaN(d.getTime()) && value === d.toISOString().slice(0, 10);
	},

	time: (value) => TIME_REGEX.test(value),

	email: (value) => isEmail(value),

	"idn-email": (value) => isEmail(value, { allow_utf8_local_part: true }),

	hostname: (value) => isFQDN(value, { require_tld: false }),

	"idn-hostname": (value) =>
		isFQDN(value, { require_tld: false, allow_underscores: true }),

	ipv4: (value) => isIP(value, 4),

	ipv6: (value) => isIP(value, 6),

	uri: (value) => isURL(value, { require_protocol: true }),

	"uri-reference": (value) => isURL(value, { require_protocol: false }),

	iri: (value) => isURL(value, { require_protocol: true }),

	"iri-reference": (value) => isURL(value, { require_protocol: false }),

	"uri-template": (value) => {
		let inBrace = false;
		for (const ch of value) {
			if (ch === "{") {
				if (inBrace) return false;
				inBrace = true;
			} else if (ch === "}") {
				if (!inBrace) return false;
				inBrace = false;
			}
		}
		return !inBrace;
	},

	uuid: (value) => isUUID(value),

	"json-pointer": (value) => JSON_POINTER_REGEX.test(value),

	"relative-json-pointer": (value) => RELATIVE_JSON_POINTER_REGEX.test(value),

	regex: (value) => {
		try {
			new RegExp(value);
			return true;
		} catch {
			return false;
		}
	},
};

// ─── Public API ──────────────────────────────────────────────────────────────

export function isKnownFormat(format: string): boolean {
	return KNOWN_FORMATS.has(format);
}

/**
 * Valide une chaîne contre un format Draft-07.
 *
 * @returns `true` si valide, `false` si invalide, `null` si format inconnu
 *
 * @example
 * ```ts
 * validateFormat("test@example.com", "email");  // true
 * validateFormat("not-an-email", "email");       // false
 * validateFormat("foo", "unknown-format");       // null
 * ```
 */
export function validateFormat(value: string, format: string): boolean | null {
	const validator = FORMAT_VALIDATORS[format];
	if (!validator) return null;
	return validator(value);
}

/**
 * `sub ⊆ sup` : toute valeur valide pour `sub` l'est aussi pour `sup`.
 * Seules l'identité et la hiérarchie `FORMAT_SUPERSETS` sont garanties ;
 * deux formats sans relation connue donnent `false`.
 *
 * @example
 * ```ts
 * isFormatSubset("email", "idn-email");   // true
 * isFormatSubset("idn-email", "email");   // false
 * ```
 */
export function isFormatSubset(subFormat: string, supFormat: string): boolean {
	if (subFormat === supFormat) return true;
	const supersets = FORMAT_SUPERSETS[subFormat];
	return supersets !== undefined && includes(supersets, supFormat);
}

/** Aucune valeur ne satisfait les deux formats. */
export function areFormatsDisjoint(a: string, b: string): boolean {
	if (isFormatSubset(a, b) || isFormatSubset(b, a)) return false;
	return MUTUALLY_DISJOINT_FORMATS.has(a) && MUTUALLY_DISJOINT_FORMATS.has(b);
}
