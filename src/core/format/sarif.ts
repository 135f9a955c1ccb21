// CHANGE: Build a SARIF 2.1.0 log from diagnostics
// WHY: Lets code-scanning front ends ingest doculint results
// SOURCE: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
// PURITY: CORE
// INVARIANT: results.length = |diagnostics|; rules = distinct ruleIds used, RULE_IDS order
// COMPLEXITY: O(n log n)

import {
	type Diagnostic,
	RULE_DESCRIPTIONS,
	RULE_IDS,
	type SarifLog,
	type SarifResult,
} from "../types/index.js";
import { sortDiagnostics } from "./diagnostics.js";

const SARIF_SCHEMA = "https://json.schemastore.org/sarif-2.1.0.json";

const toSarifResult = (diagnostic: Diagnostic): SarifResult => ({
	ruleId: diagnostic.rule,
	level: "warning",
	message: { text: diagnostic.message },
	locations:
		diagnostic.position === null
			? []
			: [
					{
						physicalLocation: {
							artifactLocation: { uri: diagnostic.position.file },
							region: {
								startLine: diagnostic.position.line,
								startColumn: diagnostic.position.column,
							},
						},
					},
				],
});

/**
 * @pure true
 */
export function toSarifLog(
	toolName: string,
	diagnostics: ReadonlyArray<Diagnostic>,
): SarifLog {
	const used = new Set(diagnostics.map((d) => d.rule));
	return {
		$schema: SARIF_SCHEMA,
		version: "2.1.0",
		runs: [
			{
				tool: {
					driver: {
						name: toolName,
						rules: RULE_IDS.filter((id) => used.has(id)).map((id) => ({
							id,
							shortDescription: { text: RULE_DESCRIPTIONS[id] },
						})),
					},
				},
				results: sortDiagnostics(diagnostics).map(toSarifResult),
			},
		],
	};
}
