// CHANGE: Doc comment lookup and prefix helpers shared by every rule
// WHY: Block vs singleton placement of a doc comment is decided in exactly one place
// PURITY: CORE
// INVARIANT: Rules never inspect GenDecl.parenthesized themselves
// COMPLEXITY: O(|text|)

import { Option } from "effect";

import type { DocComment, GenDecl, TypeSpec, ValueSpec } from "../types/index.js";

/**
 * Where a group's doc comments live.
 *
 * - SingletonDecl: `const x = 1`, the comment belongs to the GenDecl
 * - ParenthesizedBlock: `const ( ... )`, the GenDecl comment documents the block
 *   and each spec carries its own
 */
export type DeclShape = "SingletonDecl" | "ParenthesizedBlock";

export const declShape = (group: GenDecl): DeclShape =>
	group.parenthesized ? "ParenthesizedBlock" : "SingletonDecl";

const docText = (doc: DocComment | null): Option.Option<string> =>
	doc === null ? Option.none() : Option.some(doc.text);

/**
 * Locate the doc comment that documents one specification of a group.
 *
 * @pure true
 * @postcondition declShape(group) = "SingletonDecl" → result = group.doc
 */
export function resolveDocComment(
	spec: ValueSpec | TypeSpec,
	group: GenDecl,
): Option.Option<string> {
	return declShape(group) === "ParenthesizedBlock"
		? docText(spec.doc)
		: docText(group.doc);
}

/**
 * True when the comment text, trimmed, starts with the expected prefix.
 *
 * @pure true
 */
export const docStartsWith = (text: string, prefix: string): boolean =>
	text.trim().startsWith(prefix);

/**
 * File name without its last extension ("mypkg.go" → "mypkg").
 *
 * @pure true
 * @invariant names without a dot, and dot-files, are returned unchanged
 */
export function fileStem(fileName: string): string {
	const dot = fileName.lastIndexOf(".");
	return dot > 0 ? fileName.slice(0, dot) : fileName;
}
