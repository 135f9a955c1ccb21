// CHANGE: Diagnostic model produced by the rule engine
// WHY: Every rule violation IS the output; there is no separate error channel for rules
// PURITY: CORE
// INVARIANT: Diagnostics are immutable once created
// COMPLEXITY: O(1)

import type { SourcePosition } from "./tree.js";

/**
 * Stable identifiers of the rules, used by sinks for grouping and SARIF ruleId.
 */
export const RULE_IDS = [
	"package-name",
	"package-comment",
	"package-file",
	"function-comment",
	"literal-conditional",
	"constant-block-comment",
	"constant-grouped",
	"constant-comment",
	"type-block-comment",
	"type-comment",
] as const;

export type RuleId = (typeof RULE_IDS)[number];

/**
 * One documentation-convention violation.
 *
 * @remarks
 * - @invariant position === null ⇔ violation is file- or compilation-unit-scoped
 */
export interface Diagnostic {
	readonly rule: RuleId;
	readonly position: SourcePosition | null;
	readonly message: string;
}

/**
 * Short human-readable description of each rule.
 */
export const RULE_DESCRIPTIONS: Readonly<Record<RuleId, string>> = {
	"package-name": "Package names are lowercase without - or _",
	"package-comment": "The file named after the package carries its package comment",
	"package-file": "Every package has a file named after it",
	"function-comment": "Functions have a comment starting with their name",
	"literal-conditional": "Conditionals do not compare against literal constants",
	"constant-block-comment": "Constant blocks have a comment",
	"constant-grouped": "Constants are declared one per line",
	"constant-comment": "Constants have a comment starting with their name",
	"type-block-comment": "Type blocks have a comment",
	"type-comment": "Types have a comment starting with their name",
};

/**
 * Build a diagnostic value.
 *
 * @pure true
 * @complexity O(1)
 */
export const makeDiagnostic = (
	rule: RuleId,
	position: SourcePosition | null,
	message: string,
): Diagnostic => ({ rule, position, message });
