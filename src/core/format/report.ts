// CHANGE: Select the rendering for the configured output format
// WHY: Printer stays a thin writer; rendering is pure and testable
// PURITY: CORE
// INVARIANT: Output is deterministic for a given (format, diagnostics)
// COMPLEXITY: O(n log n)

import { match } from "ts-pattern";

import type { Diagnostic, OutputFormat } from "../types/index.js";
import { formatTextReport, sortDiagnostics } from "./diagnostics.js";
import { toSarifLog } from "./sarif.js";

/**
 * Render diagnostics as one printable string.
 *
 * @pure true
 */
export const renderReport = (
	format: OutputFormat,
	toolName: string,
	diagnostics: ReadonlyArray<Diagnostic>,
): string =>
	match(format)
		.with("text", () => formatTextReport(diagnostics).join("\n"))
		.with("json", () => JSON.stringify(sortDiagnostics(diagnostics), null, 2))
		.with("sarif", () => JSON.stringify(toSarifLog(toolName, diagnostics), null, 2))
		.exhaustive();
