// CHANGE: Per-node-kind documentation rules
// WHY: Each rule is a pure function Node → Diagnostic[]; the auditor only dispatches
// FORMAT THEOREM: ∀node: rulesFor(node) depends only on node and context
// PURITY: CORE
// INVARIANT: Nodes without a rule yield []; a rule never inspects siblings
// COMPLEXITY: O(k) per node where k = number of specs in a group

import { Option } from "effect";
import { match } from "ts-pattern";

import { InvariantViolation } from "../errors.js";
import {
	type Conventions,
	type Diagnostic,
	type FuncDecl,
	type GenDecl,
	type IfStmt,
	makeDiagnostic,
	type SyntaxNode,
	type TypeSpec,
	type ValueSpec,
} from "../types/index.js";
import { declShape, docStartsWith, resolveDocComment } from "./doc.js";

/**
 * What the rules need to know about the compilation unit being audited.
 */
export interface AuditContext {
	readonly packageName: string;
	readonly isEntry: boolean;
	readonly conventions: Conventions;
}

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set([
	"==",
	"!=",
	"<",
	"<=",
	">",
	">=",
]);

/**
 * Entry-point and initializer functions need no doc comment.
 *
 * @pure true
 */
export const isExemptFunction = (name: string, ctx: AuditContext): boolean =>
	(ctx.isEntry && name === ctx.conventions.entryFunction) ||
	name === ctx.conventions.initializerFunction;

/**
 * Function declarations: comment present and starting with the function name.
 *
 * @pure true
 * @invariant result.length ≤ 1
 */
export function checkFunction(
	decl: FuncDecl,
	ctx: AuditContext,
): ReadonlyArray<Diagnostic> {
	if (isExemptFunction(decl.name, ctx)) return [];

	if (decl.doc === null) {
		return [
			makeDiagnostic(
				"function-comment",
				decl.position,
				`function "${decl.name}" has no comment associated with it`,
			),
		];
	}

	if (!docStartsWith(decl.doc.text, decl.name)) {
		return [
			makeDiagnostic(
				"function-comment",
				decl.position,
				`comment for function "${decl.name}" should begin with "${decl.name}"`,
			),
		];
	}

	return [];
}

/**
 * Conditionals: a bare literal directly compared at the top level of the condition.
 *
 * @pure true
 * @invariant result.length ≤ 2; nested expressions are not inspected
 */
export function checkConditional(stmt: IfStmt): ReadonlyArray<Diagnostic> {
	const cond = stmt.cond;
	if (cond.kind !== "BinaryExpr" || !COMPARISON_OPERATORS.has(cond.operator)) {
		return [];
	}

	return [cond.left, cond.right]
		.filter((operand) => operand.kind === "BasicLit")
		.map((literal) =>
			makeDiagnostic(
				"literal-conditional",
				literal.position,
				"literal found in conditional",
			),
		);
}

function namedComment(
	doc: Option.Option<string>,
	name: string,
	spec: ValueSpec | TypeSpec,
	noun: "constant" | "type",
): ReadonlyArray<Diagnostic> {
	const rule = noun === "constant" ? "constant-comment" : "type-comment";
	return Option.match(doc, {
		onNone: () => [
			makeDiagnostic(
				rule,
				spec.position,
				`${noun} "${name}" has no comment associated with it`,
			),
		],
		onSome: (text) =>
			docStartsWith(text, name)
				? []
				: [
						makeDiagnostic(
							rule,
							spec.position,
							`comment for ${noun} "${name}" should begin with "${name}"`,
						),
					],
	});
}

function checkConstantSpec(
	spec: ValueSpec,
	group: GenDecl,
): ReadonlyArray<Diagnostic> {
	const [first, ...rest] = spec.names;
	if (first === undefined) {
		throw new InvariantViolation({
			where: "checkConstantSpec",
			detail: `constant specification at ${spec.position.file}:${spec.position.line} declares no names`,
		});
	}

	if (rest.length > 0) {
		const names = spec.names.map((ident) => ident.name).join(", ");
		return [
			makeDiagnostic(
				"constant-grouped",
				spec.position,
				`constants "${names}" should be separated and each have a comment associated with them`,
			),
		];
	}

	return namedComment(resolveDocComment(spec, group), first.name, spec, "constant");
}

function checkTypeSpec(spec: TypeSpec, group: GenDecl): ReadonlyArray<Diagnostic> {
	return namedComment(resolveDocComment(spec, group), spec.name.name, spec, "type");
}

function blockComment(group: GenDecl, noun: "constant" | "type"): ReadonlyArray<Diagnostic> {
	if (declShape(group) !== "ParenthesizedBlock" || group.doc !== null) return [];
	return [
		makeDiagnostic(
			noun === "constant" ? "constant-block-comment" : "type-block-comment",
			group.position,
			`${noun} block has no comment associated with it`,
		),
	];
}

/**
 * Constant groups: block comment, one name per spec, per-name comment.
 *
 * @pure true
 * @throws InvariantViolation when a spec declares zero names (invalid tree)
 */
export function checkConstantGroup(group: GenDecl): ReadonlyArray<Diagnostic> {
	const specs = group.specs.flatMap((spec) =>
		spec.kind === "ValueSpec" ? checkConstantSpec(spec, group) : [],
	);
	return [...blockComment(group, "constant"), ...specs];
}

/**
 * Type groups: block comment, then per-name comment.
 *
 * @pure true
 */
export function checkTypeGroup(group: GenDecl): ReadonlyArray<Diagnostic> {
	const specs = group.specs.flatMap((spec) =>
		spec.kind === "TypeSpec" ? checkTypeSpec(spec, group) : [],
	);
	return [...blockComment(group, "type"), ...specs];
}

/**
 * Dispatch a node to its rule; inert kinds yield [].
 *
 * @pure true
 */
export const rulesFor = (
	node: SyntaxNode,
	ctx: AuditContext,
): ReadonlyArray<Diagnostic> =>
	match(node)
		.with({ kind: "FuncDecl" }, (decl) => checkFunction(decl, ctx))
		.with({ kind: "IfStmt" }, (stmt) => checkConditional(stmt))
		.with({ kind: "GenDecl", token: "const" }, (group) => checkConstantGroup(group))
		.with({ kind: "GenDecl", token: "type" }, (group) => checkTypeGroup(group))
		.otherwise(() => []);
