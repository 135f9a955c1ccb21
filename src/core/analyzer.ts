// CHANGE: Register the rule engine as a named analyzer
// WHY: Drivers invoke analyzers by name, once per compilation unit
// FORMAT THEOREM: run(u) = naming(u.packageName) ++ ⋃ auditFile(f) ++ finalize()
// PURITY: CORE
// INVARIANT: A fresh auditor per run; no state crosses compilation units
// COMPLEXITY: O(n) where n = total nodes in the unit

import { Option } from "effect";

import { createTreeAuditor } from "./audit/auditor.js";
import { validatePackageName } from "./naming/package-name.js";
import {
	type CompilationUnit,
	type Conventions,
	DEFAULT_CONVENTIONS,
	type Diagnostic,
} from "./types/index.js";

export interface Analyzer {
	readonly name: string;
	readonly doc: string;
	readonly run: (
		unit: CompilationUnit,
		conventions?: Conventions,
	) => ReadonlyArray<Diagnostic>;
}

/**
 * Audit one compilation unit and return its diagnostics in emission order.
 *
 * @pure true (all mutation is local to the call)
 * @throws InvariantViolation when the tree breaks the supplier contract
 */
export function analyzeUnit(
	unit: CompilationUnit,
	conventions: Conventions = DEFAULT_CONVENTIONS,
): ReadonlyArray<Diagnostic> {
	const diagnostics: Diagnostic[] = [];
	const emit = (diagnostic: Diagnostic): void => {
		diagnostics.push(diagnostic);
	};

	Option.match(validatePackageName(unit.packageName), {
		onNone: () => undefined,
		onSome: emit,
	});

	const auditor = createTreeAuditor(
		{ packageName: unit.packageName, isEntry: unit.isEntry },
		emit,
		conventions,
	);
	for (const file of unit.files) auditor.auditFile(file);
	auditor.finalize();

	return diagnostics;
}

export const Analyzer: Analyzer = {
	name: "doculint",
	doc: "checks for proper function, type, package, constant, and string and numeric literal documentation",
	run: analyzeUnit,
};
