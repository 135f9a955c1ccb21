// CHANGE: Console sink for diagnostics and failures
// WHY: All console output is confined to the shell; CORE only renders strings
// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: Reports go to stdout, failures to stderr
// COMPLEXITY: O(n) where n = output size

import { Effect } from "effect";

import { type AppError, describeAppError } from "../../core/errors.js";
import { renderReport } from "../../core/format/report.js";
import type { Diagnostic, OutputFormat } from "../../core/types/index.js";

/**
 * Print the report for a finished run.
 *
 * @pure false (console output)
 */
export function printReport(
	format: OutputFormat,
	toolName: string,
	diagnostics: ReadonlyArray<Diagnostic>,
): Effect.Effect<void> {
	return Effect.sync(() => {
		console.log(renderReport(format, toolName, diagnostics));
	});
}

/**
 * Report an input or usage failure.
 *
 * @pure false (console output)
 */
export function printFailure(error: AppError): Effect.Effect<void> {
	return Effect.sync(() => {
		console.error(`❌ ${describeAppError(error)}`);
	});
}

/**
 * @pure false (console output)
 */
export function printUsage(
	toolName: string,
	doc: string,
	usage: string,
): Effect.Effect<void> {
	return Effect.sync(() => {
		console.log(`${toolName}: ${doc}`);
		console.log(usage);
	});
}
