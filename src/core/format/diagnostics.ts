// CHANGE: Pure sorting, grouping and text rendering of diagnostics
// WHY: FCIS — the printer only writes lines; deciding their order and shape stays in CORE
// FORMAT THEOREM: ∀ds: formatTextReport(ds) is deterministic in ds
// PURITY: CORE
// INVARIANT: No side effects; input arrays are never mutated
// COMPLEXITY: O(n log n) where n = |diagnostics|

import { pipe } from "effect";

import { type Diagnostic, RULE_IDS, type RuleId } from "../types/index.js";

/**
 * Order diagnostics: unit-scoped first (emission order kept), then by file, line, column.
 *
 * @pure true
 * @invariant stable: equal keys keep their relative order
 */
export function sortDiagnostics(
	diagnostics: ReadonlyArray<Diagnostic>,
): ReadonlyArray<Diagnostic> {
	return [...diagnostics].sort((a, b) => {
		if (a.position === null || b.position === null) {
			return (a.position === null ? 0 : 1) - (b.position === null ? 0 : 1);
		}
		if (a.position.file !== b.position.file) {
			return a.position.file < b.position.file ? -1 : 1;
		}
		return a.position.line - b.position.line || a.position.column - b.position.column;
	});
}

/**
 * Group diagnostics by rule, sections following the declaration order of RULE_IDS.
 *
 * @pure true
 * @postcondition every returned section is non-empty
 */
export function groupByRule(
	diagnostics: ReadonlyArray<Diagnostic>,
): ReadonlyMap<RuleId, ReadonlyArray<Diagnostic>> {
	const sections = new Map<RuleId, ReadonlyArray<Diagnostic>>();
	for (const rule of RULE_IDS) {
		const members = diagnostics.filter((d) => d.rule === rule);
		if (members.length > 0) sections.set(rule, members);
	}
	return sections;
}

/**
 * `file:line:column: message`, or `-: message` for unit-scoped diagnostics.
 *
 * @pure true
 */
export const formatDiagnosticLine = (diagnostic: Diagnostic): string =>
	diagnostic.position === null
		? `-: ${diagnostic.message}`
		: `${diagnostic.position.file}:${diagnostic.position.line}:${diagnostic.position.column}: ${diagnostic.message}`;

/**
 * Render the text report: one section per rule and a closing summary.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatTextReport([{ rule: "literal-conditional", position: { file: "a.go", line: 3, column: 10 }, message: "literal found in conditional" }]);
 * // [
 * //   "=== literal-conditional (1 issues) ===",
 * //   "a.go:3:10: literal found in conditional",
 * //   "📊 Total: 1 issues",
 * // ]
 * ```
 */
export function formatTextReport(
	diagnostics: ReadonlyArray<Diagnostic>,
): ReadonlyArray<string> {
	if (diagnostics.length === 0) return ["✅ No documentation issues found!"];

	const sections = pipe(diagnostics, sortDiagnostics, groupByRule);
	const lines: string[] = [];
	for (const [rule, members] of sections) {
		lines.push(`=== ${rule} (${members.length} issues) ===`);
		lines.push(...members.map(formatDiagnosticLine));
	}
	lines.push(`📊 Total: ${diagnostics.length} issues`);
	return lines;
}
