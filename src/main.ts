// CHANGE: Make main.ts a thin APP delegator
// WHY: Programmatic entry that runs the CLI flow without terminating the process
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects on the process
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { main as mainEffect } from "./app/runDoculint.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args Command-line arguments, defaulting to process.argv
 * @returns ExitCode (0 | 1)
 */
export function main(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(mainEffect(args));
}
