// CHANGE: Pre-order traversal over the closed syntax-tree union
// WHY: Rules dispatch per node; traversal itself must never skip children
// FORMAT THEOREM: ∀n reachable from roots: visit(n) is called exactly once
// PURITY: CORE
// INVARIANT: Visitation order = source order of children
// COMPLEXITY: O(n) where n = |nodes|

import { match, P } from "ts-pattern";

import type { SyntaxNode } from "../types/index.js";

const present = (node: SyntaxNode | null): node is SyntaxNode => node !== null;

/**
 * Direct children of a node in source order.
 *
 * @pure true
 */
export const childrenOf = (node: SyntaxNode): ReadonlyArray<SyntaxNode> =>
	match(node)
		.with({ kind: "FuncDecl" }, (n) => n.body)
		.with({ kind: "IfStmt" }, (n) =>
			[n.init, n.cond, ...n.body, n.else].filter(present),
		)
		.with({ kind: "GenDecl" }, (n) => n.specs)
		.with({ kind: "ValueSpec" }, (n) => [...n.names, ...n.values])
		.with({ kind: "TypeSpec" }, (n) => [n.name, n.type].filter(present))
		.with({ kind: "BinaryExpr" }, (n) => [n.left, n.right])
		.with({ kind: P.union("BasicLit", "Ident") }, () => [])
		.with({ kind: "Node" }, (n) => n.children)
		.exhaustive();

/**
 * Visit every node of the given forest, parents before children.
 *
 * @pure false (calls visit)
 */
export function walk(
	roots: ReadonlyArray<SyntaxNode>,
	visit: (node: SyntaxNode) => void,
): void {
	const stack: SyntaxNode[] = [...roots].reverse();
	let node = stack.pop();
	while (node !== undefined) {
		visit(node);
		const children = childrenOf(node);
		for (let index = children.length - 1; index >= 0; index -= 1) {
			const child = children[index];
			if (child !== undefined) stack.push(child);
		}
		node = stack.pop();
	}
}
