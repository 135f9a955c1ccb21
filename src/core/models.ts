// CHANGE: Functional Core domain models (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the linter process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing exit code from a run.
 *
 * @remarks
 * - @pure true
 * - @precondition flags are computed from diagnostics deterministically
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly hasDiagnostics: boolean;
	readonly hasLoadErrors: boolean;
}
