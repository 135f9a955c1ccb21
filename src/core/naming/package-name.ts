// CHANGE: Package identifier naming rules
// WHY: Package names are part of every import path; separators and capitals are rejected
// FORMAT THEOREM: ∀id: hasSeparator(id) → validate(id) = separatorViolation
// PURITY: CORE
// INVARIANT: At most one violation per call; separator rule precedes casing rule
// COMPLEXITY: O(|id|)

import { Option } from "effect";

import { type Diagnostic, makeDiagnostic } from "../types/index.js";

const SEPARATORS = /[-_]/u;

/**
 * Validate a package identifier.
 *
 * @param identifier - Package name as written in the package clause
 * @returns Option.none() when the name follows the conventions
 *
 * @pure true
 * @invariant total: every string yields some or none, never throws
 *
 * @example
 * ```ts
 * validatePackageName("my_pkg");
 * // Option.some({ rule: "package-name", message: 'package "my_pkg" should not contain - or _ in name', ... })
 * ```
 */
export function validatePackageName(identifier: string): Option.Option<Diagnostic> {
	if (SEPARATORS.test(identifier)) {
		return Option.some(
			makeDiagnostic(
				"package-name",
				null,
				`package "${identifier}" should not contain - or _ in name`,
			),
		);
	}

	if (identifier !== identifier.toLowerCase()) {
		return Option.some(
			makeDiagnostic(
				"package-name",
				null,
				`package "${identifier}" should be all lowercase`,
			),
		);
	}

	return Option.none();
}
