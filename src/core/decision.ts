// CHANGE: Pure decision function computing the exit code of a run
// WHY: Centralize termination logic in Functional Core with Effect composition support
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s ∈ State: (s.hasDiagnostics ∨ s.hasLoadErrors) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from run state (pure function).
 *
 * @param state - Immutable flags computed from the run
 * @returns 1 if any diagnostic was emitted or any input failed to load; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition (state.hasDiagnostics ∨ state.hasLoadErrors) → result = 1
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({ hasDiagnostics: true, hasLoadErrors: false });
 * // exitCode === 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.hasDiagnostics || s.hasLoadErrors,
		(failed): ExitCode => (failed ? 1 : 0),
	);

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @pure false - wraps in Effect for composition
 * @effect Effect<ExitCode, never, never>
 */
export const computeExitCodeEffect = (
	state: DecisionState,
): Effect.Effect<ExitCode> => pipe(state, computeExitCode, Effect.succeed);
