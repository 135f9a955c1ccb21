// CHANGE: Stateful tree auditor scoped to one compilation unit
// WHY: Package documentation may live in any one file; it is only known after every file is seen
// FORMAT THEOREM: finalize() reports pkg ⇔ no audited file had stem(file) = pkg
// PURITY: CORE (mutation confined to the auditor's own PackageDocState)
// INVARIANT: auditFile* → finalize, exactly once; unit-scoped diagnostics at most once per package
// COMPLEXITY: O(n) per file where n = |nodes|

import { InvariantViolation } from "../errors.js";
import {
	type Conventions,
	DEFAULT_CONVENTIONS,
	type Diagnostic,
	makeDiagnostic,
	type SourceFile,
} from "../types/index.js";
import { docStartsWith, fileStem } from "./doc.js";
import { type AuditContext, rulesFor } from "./rules.js";
import { walk } from "./walk.js";

/**
 * Receives diagnostics as soon as they are produced.
 */
export type DiagnosticSink = (diagnostic: Diagnostic) => void;

/**
 * package identifier → "has a file named after the package carrying its comment"
 */
export type PackageDocState = Map<string, boolean>;

export interface AuditTarget {
	readonly packageName: string;
	readonly isEntry: boolean;
}

export interface TreeAuditor {
	/** Per-file pass; any order, before finalize. */
	readonly auditFile: (file: SourceFile) => void;
	/** Emit package-level diagnostics; call once after every file. */
	readonly finalize: () => void;
}

function checkPackageComment(
	file: SourceFile,
	ctx: AuditContext,
	state: PackageDocState,
	emit: DiagnosticSink,
): void {
	const pkg = ctx.packageName;
	if (!state.has(pkg)) state.set(pkg, false);
	// first file named after the package wins
	if (fileStem(file.name) !== pkg || state.get(pkg) === true) return;

	state.set(pkg, true);

	if (file.doc === null) {
		emit(
			makeDiagnostic(
				"package-comment",
				null,
				`package "${pkg}" has no comment associated with it in "${file.name}"`,
			),
		);
		return;
	}

	const expectedPrefix = `${ctx.conventions.packageCommentPrefix} ${pkg}`;
	if (!docStartsWith(file.doc.text, expectedPrefix)) {
		emit(
			makeDiagnostic(
				"package-comment",
				null,
				`comment for package "${pkg}" should begin with "${expectedPrefix}"`,
			),
		);
	}
}

/**
 * Create an auditor for one compilation unit.
 *
 * @param target - Package identifier and entry flag of the unit
 * @param emit - Sink receiving every diagnostic
 * @param conventions - Entry/initializer names and package comment prefix
 *
 * @pure false (owns PackageDocState, calls emit)
 * @throws InvariantViolation on auditFile after finalize, or a second finalize
 *
 * @example
 * ```ts
 * const found: Diagnostic[] = [];
 * const auditor = createTreeAuditor({ packageName: "mypkg", isEntry: false }, (d) => found.push(d));
 * files.forEach(auditor.auditFile);
 * auditor.finalize();
 * ```
 */
export function createTreeAuditor(
	target: AuditTarget,
	emit: DiagnosticSink,
	conventions: Conventions = DEFAULT_CONVENTIONS,
): TreeAuditor {
	const ctx: AuditContext = { ...target, conventions };
	const state: PackageDocState = new Map();
	let finalized = false;

	const assertOpen = (where: string): void => {
		if (finalized) {
			throw new InvariantViolation({
				where,
				detail: `auditor for package "${target.packageName}" was already finalized`,
			});
		}
	};

	return {
		auditFile: (file) => {
			assertOpen("auditFile");
			// The entry package conventionally has no library-style documentation.
			if (!ctx.isEntry) checkPackageComment(file, ctx, state, emit);
			walk(file.decls, (node) => {
				for (const diagnostic of rulesFor(node, ctx)) emit(diagnostic);
			});
		},
		finalize: () => {
			assertOpen("finalize");
			finalized = true;
			for (const [pkg, hasNamedDocFile] of state) {
				if (!hasNamedDocFile) {
					emit(
						makeDiagnostic(
							"package-file",
							null,
							`package "${pkg}" has no file with the same name containing package comment`,
						),
					);
				}
			}
			state.clear();
		},
	};
}
