// CHANGE: Central export file for all core type definitions
// WHY: Provides a single import point for types used across modules

export type {
	CLIOptions,
	Conventions,
	DoculintConfig,
	OutputFormat,
} from "./config.js";
export {
	DEFAULT_CONFIG,
	DEFAULT_CONVENTIONS,
	OUTPUT_FORMATS,
} from "./config.js";
export type { Diagnostic, RuleId } from "./diagnostic.js";
export { makeDiagnostic, RULE_DESCRIPTIONS, RULE_IDS } from "./diagnostic.js";
export type { SarifLog, SarifResult, SarifRule } from "./sarif.js";
export type {
	BasicLit,
	BinaryExpr,
	CompilationUnit,
	DeclToken,
	DocComment,
	FuncDecl,
	GenDecl,
	Ident,
	IfStmt,
	LiteralKind,
	OpaqueNode,
	SourceFile,
	SourcePosition,
	SyntaxNode,
	TypeSpec,
	ValueSpec,
} from "./tree.js";
