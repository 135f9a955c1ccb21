#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: Enforce Functional Core, Imperative Shell. APP returns ExitCode; BIN exits the process.
// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../app/runDoculint.js";

/**
 * CLI entry point for doculint.
 *
 * @remarks
 * - @pure false (contains side effects: process termination and console I/O)
 * - @invariant exit code is 0 when no diagnostics and every input loaded, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(main());
		process.exit(code);
	} catch (error) {
		// Shell boundary: defects (invalid trees) end up here
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
