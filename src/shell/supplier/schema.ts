// CHANGE: Effect Schema describing the JSON form of compilation units
// WHY: Trees arrive from an external front end; they are validated once at the shell boundary
// SOURCE: https://effect.website/docs/schema/advanced-usage/#recursive-schemas
// PURITY: SHELL (pure values, but only the supplier uses them)
// INVARIANT: decode(json) succeeds ⇒ result satisfies the core tree types, names.length ≥ 1
// COMPLEXITY: O(n) decoding where n = |nodes|

import { Schema } from "effect";

import type { SyntaxNode } from "../../core/types/index.js";

const PositionSchema = Schema.Struct({
	file: Schema.String,
	line: Schema.Int,
	column: Schema.Int,
});

const DocCommentSchema = Schema.Struct({
	text: Schema.String,
	position: PositionSchema,
});

const DocField = Schema.NullOr(DocCommentSchema);

const NodeRef = Schema.suspend((): Schema.Schema<SyntaxNode> => SyntaxNodeSchema);

const IdentSchema = Schema.Struct({
	kind: Schema.Literal("Ident"),
	position: PositionSchema,
	name: Schema.String,
});

const BasicLitSchema = Schema.Struct({
	kind: Schema.Literal("BasicLit"),
	position: PositionSchema,
	literal: Schema.Literal("INT", "FLOAT", "IMAG", "CHAR", "STRING"),
	value: Schema.String,
});

const BinaryExprSchema = Schema.Struct({
	kind: Schema.Literal("BinaryExpr"),
	position: PositionSchema,
	operator: Schema.String,
	left: NodeRef,
	right: NodeRef,
});

const FuncDeclSchema = Schema.Struct({
	kind: Schema.Literal("FuncDecl"),
	position: PositionSchema,
	name: Schema.String,
	doc: DocField,
	body: Schema.Array(NodeRef),
});

const IfStmtSchema = Schema.Struct({
	kind: Schema.Literal("IfStmt"),
	position: PositionSchema,
	init: Schema.NullOr(NodeRef),
	cond: NodeRef,
	body: Schema.Array(NodeRef),
	else: Schema.NullOr(NodeRef),
});

const GenDeclSchema = Schema.Struct({
	kind: Schema.Literal("GenDecl"),
	position: PositionSchema,
	token: Schema.Literal("const", "type", "var", "import"),
	doc: DocField,
	parenthesized: Schema.Boolean,
	specs: Schema.Array(NodeRef),
});

const ValueSpecSchema = Schema.Struct({
	kind: Schema.Literal("ValueSpec"),
	position: PositionSchema,
	doc: DocField,
	names: Schema.Array(IdentSchema).pipe(Schema.minItems(1)),
	values: Schema.Array(NodeRef),
});

const TypeSpecSchema = Schema.Struct({
	kind: Schema.Literal("TypeSpec"),
	position: PositionSchema,
	doc: DocField,
	name: IdentSchema,
	type: Schema.NullOr(NodeRef),
});

const OpaqueNodeSchema = Schema.Struct({
	kind: Schema.Literal("Node"),
	position: PositionSchema,
	type: Schema.String,
	children: Schema.Array(NodeRef),
});

export const SyntaxNodeSchema: Schema.Schema<SyntaxNode> = Schema.Union(
	FuncDeclSchema,
	IfStmtSchema,
	GenDeclSchema,
	ValueSpecSchema,
	TypeSpecSchema,
	BinaryExprSchema,
	BasicLitSchema,
	IdentSchema,
	OpaqueNodeSchema,
);

export const SourceFileSchema = Schema.Struct({
	name: Schema.String.pipe(Schema.minLength(1)),
	doc: DocField,
	decls: Schema.Array(SyntaxNodeSchema),
});

/**
 * A compilation unit as written in a tree file; isEntry may be left to the conventions.
 */
export const CompilationUnitInputSchema = Schema.Struct({
	packageName: Schema.String.pipe(Schema.minLength(1)),
	isEntry: Schema.optional(Schema.Boolean),
	files: Schema.Array(SourceFileSchema),
});

export type CompilationUnitInput = typeof CompilationUnitInputSchema.Type;

/**
 * A tree file holds one unit or an array of units.
 */
export const TreeFileSchema = Schema.parseJson(
	Schema.Union(CompilationUnitInputSchema, Schema.Array(CompilationUnitInputSchema)),
);
