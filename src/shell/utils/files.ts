// CHANGE: Effect wrapper around reading a UTF-8 file
// WHY: Tree and config loaders share the same read + FSError mapping
// PURITY: SHELL (filesystem I/O)
// EFFECT: Effect<string, FSError>
// INVARIANT: ∀ path: readTextFile(path) → contents ∨ FSError carrying path
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import { fs } from "./node-mods.js";

/**
 * Read a whole file as UTF-8.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<string, FSError>
 */
export function readTextFile(filePath: string): Effect.Effect<string, FSError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(filePath, "utf8"),
		catch: (error) =>
			new FSError({
				detail: error instanceof Error ? error.message : String(error),
				path: filePath,
			}),
	});
}

/**
 * @pure false (checks the filesystem)
 */
export const fileExists = (filePath: string): Effect.Effect<boolean> =>
	Effect.sync(() => fs.existsSync(filePath));
