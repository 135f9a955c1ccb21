// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE analyzer and types; hide SHELL internals
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect-returning APP functions
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run doculint for already-parsed options.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runDoculint } from "doculint";
 *
 * const exitCode = await Effect.runPromise(
 *   runDoculint({ treePaths: ["trees/mypkg.json"], help: false }),
 * );
 * ```
 */
export { auditUnits, runDoculint } from "./app/runDoculint.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (rule engine)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Analyzer registration and the per-unit audit.
 *
 * @example
 * ```typescript
 * import { Analyzer } from "doculint";
 *
 * const diagnostics = Analyzer.run({ packageName: "mypkg", isEntry: false, files });
 * ```
 */
export { Analyzer, analyzeUnit } from "./core/analyzer.js";
export {
	type AuditTarget,
	createTreeAuditor,
	type DiagnosticSink,
	type PackageDocState,
	type TreeAuditor,
} from "./core/audit/auditor.js";
export { type DeclShape, declShape, resolveDocComment } from "./core/audit/doc.js";
export { childrenOf, walk } from "./core/audit/walk.js";
export { computeExitCode } from "./core/decision.js";
export {
	type AppError,
	FSError,
	InvariantViolation,
	ParseError,
	UsageError,
} from "./core/errors.js";
export {
	formatDiagnosticLine,
	formatTextReport,
	groupByRule,
	sortDiagnostics,
} from "./core/format/diagnostics.js";
export { renderReport } from "./core/format/report.js";
export { toSarifLog } from "./core/format/sarif.js";
export type { ExitCode } from "./core/models.js";
export { validatePackageName } from "./core/naming/package-name.js";
export * from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// TREE SUPPLIER
// ═══════════════════════════════════════════════════════════════════════════════

export { decodeCompilationUnits, loadCompilationUnits } from "./shell/supplier/json.js";
