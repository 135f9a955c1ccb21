// CHANGE: Typed domain error ADT built on Effect.Data
// WHY: Shell failures travel in the Effect error channel; core contract violations are defects
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Invariant violation - the caller handed the core an invalid tree or broke call order.
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Invalid JSON or schema mismatch in a tree or config file.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ParseError extends Data.TaggedError("ParseError")<{
	readonly entity: "tree" | "config";
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Bad command line.
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError = ParseError | FSError | UsageError;

/**
 * Render an application error as a single line for stderr.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeAppError(error: AppError): string {
	const where = "path" in error && error.path !== undefined ? ` (${error.path})` : "";
	return `${error._tag}: ${error.detail}${where}`;
}
