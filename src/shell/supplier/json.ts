// CHANGE: JSON tree supplier
// WHY: The core consumes already-parsed trees; this module reads and validates them
// PURITY: SHELL (filesystem I/O)
// EFFECT: Effect<CompilationUnit[], FSError | ParseError>
// INVARIANT: Every returned unit satisfies the core tree contract
// COMPLEXITY: O(n) where n = |nodes| in the file

import { Effect, Schema } from "effect";

import { type FSError, ParseError } from "../../core/errors.js";
import type { CompilationUnit, Conventions } from "../../core/types/index.js";
import { readTextFile } from "../utils/files.js";
import { type CompilationUnitInput, TreeFileSchema } from "./schema.js";

type TreeFile = typeof TreeFileSchema.Type;

const isUnitList = (
	decoded: TreeFile,
): decoded is ReadonlyArray<CompilationUnitInput> => Array.isArray(decoded);

/**
 * Fill in isEntry from the conventions when the tree file leaves it out.
 *
 * @pure true
 */
export const toCompilationUnit = (
	input: CompilationUnitInput,
	conventions: Conventions,
): CompilationUnit => ({
	packageName: input.packageName,
	isEntry: input.isEntry ?? input.packageName === conventions.entryPackage,
	files: input.files,
});

/**
 * Decode the text of a tree file.
 *
 * @pure false (wraps decoding in Effect)
 * @effect Effect<CompilationUnit[], ParseError>
 */
export function decodeCompilationUnits(
	text: string,
	conventions: Conventions,
	source?: string,
): Effect.Effect<ReadonlyArray<CompilationUnit>, ParseError> {
	return Schema.decodeUnknown(TreeFileSchema)(text).pipe(
		Effect.map((decoded) => {
			const inputs: ReadonlyArray<CompilationUnitInput> = isUnitList(decoded)
				? decoded
				: [decoded];
			return inputs.map((input) => toCompilationUnit(input, conventions));
		}),
		Effect.mapError(
			(error) =>
				new ParseError({
					entity: "tree",
					detail: error.message,
					...(source === undefined ? {} : { path: source }),
				}),
		),
	);
}

/**
 * Read and decode one tree file.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<CompilationUnit[], FSError | ParseError>
 */
export function loadCompilationUnits(
	filePath: string,
	conventions: Conventions,
): Effect.Effect<ReadonlyArray<CompilationUnit>, FSError | ParseError> {
	return readTextFile(filePath).pipe(
		Effect.flatMap((text) => decodeCompilationUnits(text, conventions, filePath)),
	);
}
