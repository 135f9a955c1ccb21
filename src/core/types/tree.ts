// CHANGE: Closed syntax-tree model consumed by the auditor
// WHY: Per-node-kind dispatch needs a finite union discriminated by `kind`
// PURITY: CORE
// INVARIANT: Trees are read-only; the core never mutates a node
// COMPLEXITY: O(1)

/**
 * Location of a node in its source file (1-based line and column).
 */
export interface SourcePosition {
	readonly file: string;
	readonly line: number;
	readonly column: number;
}

/**
 * Comment block immediately preceding a declaration.
 *
 * @remarks
 * - @invariant text has comment markers already stripped by the supplier
 */
export interface DocComment {
	readonly text: string;
	readonly position: SourcePosition;
}

export interface Ident {
	readonly kind: "Ident";
	readonly position: SourcePosition;
	readonly name: string;
}

export type LiteralKind = "INT" | "FLOAT" | "IMAG" | "CHAR" | "STRING";

/**
 * Literal constant written directly in source (`5`, `"x"`, `'c'`).
 */
export interface BasicLit {
	readonly kind: "BasicLit";
	readonly position: SourcePosition;
	readonly literal: LiteralKind;
	readonly value: string;
}

export interface BinaryExpr {
	readonly kind: "BinaryExpr";
	readonly position: SourcePosition;
	readonly operator: string;
	readonly left: SyntaxNode;
	readonly right: SyntaxNode;
}

export interface FuncDecl {
	readonly kind: "FuncDecl";
	readonly position: SourcePosition;
	readonly name: string;
	readonly doc: DocComment | null;
	readonly body: ReadonlyArray<SyntaxNode>;
}

export interface IfStmt {
	readonly kind: "IfStmt";
	readonly position: SourcePosition;
	readonly init: SyntaxNode | null;
	readonly cond: SyntaxNode;
	readonly body: ReadonlyArray<SyntaxNode>;
	readonly else: SyntaxNode | null;
}

export type DeclToken = "const" | "type" | "var" | "import";

/**
 * Declaration group: `const x = 1` or `const ( ... )`.
 *
 * @remarks
 * - @invariant parenthesized ⇔ specs are enclosed in a shared block
 * - doc is the comment attached to the whole group
 */
export interface GenDecl {
	readonly kind: "GenDecl";
	readonly position: SourcePosition;
	readonly token: DeclToken;
	readonly doc: DocComment | null;
	readonly parenthesized: boolean;
	readonly specs: ReadonlyArray<SyntaxNode>;
}

/**
 * One constant/variable specification inside a GenDecl.
 *
 * @remarks
 * - @invariant names.length ≥ 1 for a well-formed tree
 */
export interface ValueSpec {
	readonly kind: "ValueSpec";
	readonly position: SourcePosition;
	readonly doc: DocComment | null;
	readonly names: ReadonlyArray<Ident>;
	readonly values: ReadonlyArray<SyntaxNode>;
}

export interface TypeSpec {
	readonly kind: "TypeSpec";
	readonly position: SourcePosition;
	readonly doc: DocComment | null;
	readonly name: Ident;
	readonly type: SyntaxNode | null;
}

/**
 * Any construct without a rule of its own (blocks, calls, assignments,
 * parenthesized expressions, function literals, ...).
 */
export interface OpaqueNode {
	readonly kind: "Node";
	readonly position: SourcePosition;
	readonly type: string;
	readonly children: ReadonlyArray<SyntaxNode>;
}

export type SyntaxNode =
	| FuncDecl
	| IfStmt
	| GenDecl
	| ValueSpec
	| TypeSpec
	| BinaryExpr
	| BasicLit
	| Ident
	| OpaqueNode;

/**
 * One source file of a compilation unit.
 *
 * @property name Simple file name with extension (e.g. "mypkg.go")
 * @property doc Package-level doc comment of the file
 */
export interface SourceFile {
	readonly name: string;
	readonly doc: DocComment | null;
	readonly decls: ReadonlyArray<SyntaxNode>;
}

/**
 * One package's complete set of source files, analyzed together.
 */
export interface CompilationUnit {
	readonly packageName: string;
	readonly isEntry: boolean;
	readonly files: ReadonlyArray<SourceFile>;
}
