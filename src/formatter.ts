import isEmpty from "lodash/isEmpty";
import map from "lodash/map";
import type { SemanticIssue } from "./semantic-compatibility";
import type { SubschemaResult } from "./types";

// ─── Result Formatter ────────────────────────────────────────────────────────
//
// Formate un `SubschemaResult` en chaîne lisible pour logs / debug.

function formatIssueLine(issue: SemanticIssue): string {
	switch (issue.kind) {
		case "missing-annotation":
			return `  - ${issue.path}: missing stype, expected ${issue.expected}`;
		case "not-narrower":
			return `  ~ ${issue.path}: ${issue.actual} is not narrower than ${issue.expected}`;
		case "no-compatible-branch":
			return `  ! ${issue.path}: no semantically compatible branch`;
	}
}

/**
 * @example
 * ```
 * ✅ employee ⊆ person: true
 * ```
 *
 * @example
 * ```
 * ❌ person ⊆ employee: false (semantic)
 *    Issues:
 *        ~ $: foaf:Person is not narrower than ex:Employee
 * ```
 */
export function formatResult(label: string, result: SubschemaResult): string {
	const icon = result.isSubschema ? "✅" : "❌";
	const stage = result.isSubschema ? "" : ` (${result.stage})`;
	const lines: string[] = [`${icon} ${label}: ${result.isSubschema}${stage}`];

	if (!isEmpty(result.issues)) {
		lines.push("   Issues:");
		lines.push(...map(result.issues, (issue) => `     ${formatIssueLine(issue)}`));
	}

	return lines.join("\n");
}
