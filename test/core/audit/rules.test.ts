// CHANGE: Unit tests for per-node-kind documentation rules
// INVARIANT: function outcomes (none / wrong prefix / ok) are mutually exclusive

import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
	type AuditContext,
	checkConditional,
	checkConstantGroup,
	checkFunction,
	checkTypeGroup,
	isExemptFunction,
	rulesFor,
} from "../../../src/core/audit/rules.js";
import { InvariantViolation } from "../../../src/core/errors.js";
import { DEFAULT_CONVENTIONS } from "../../../src/core/types/index.js";
import {
	binary,
	doc,
	funcDecl,
	genDecl,
	ident,
	ifStmt,
	lit,
	opaque,
	pos,
	typeSpec,
	valueSpec,
} from "../../utils/builders.js";

const library: AuditContext = {
	packageName: "mypkg",
	isEntry: false,
	conventions: DEFAULT_CONVENTIONS,
};

const entry: AuditContext = { ...library, packageName: "main", isEntry: true };

describe("checkFunction", () => {
	it("accepts a comment that is exactly the function name", () => {
		expect(checkFunction(funcDecl("Parse", { doc: doc("Parse") }), library)).toEqual([]);
	});

	it("accepts a comment starting with the name after trimming", () => {
		const decl = funcDecl("Parse", { doc: doc("  Parse reads a tree.\n") });
		expect(checkFunction(decl, library)).toEqual([]);
	});

	it("reports a missing comment at the declaration", () => {
		const decl = funcDecl("Parse", { position: pos(12, 1) });
		expect(checkFunction(decl, library)).toEqual([
			{
				rule: "function-comment",
				position: pos(12, 1),
				message: 'function "Parse" has no comment associated with it',
			},
		]);
	});

	it("reports a comment that starts with another word", () => {
		const decl = funcDecl("Parse", { doc: doc("Reads a tree."), position: pos(4, 1) });
		expect(checkFunction(decl, library)).toEqual([
			{
				rule: "function-comment",
				position: pos(4, 1),
				message: 'comment for function "Parse" should begin with "Parse"',
			},
		]);
	});

	it("exempts main only in the entry package", () => {
		expect(checkFunction(funcDecl("main"), entry)).toEqual([]);
		expect(checkFunction(funcDecl("main"), library)).toHaveLength(1);
	});

	it("exempts init in every package", () => {
		expect(isExemptFunction("init", library)).toBe(true);
		expect(isExemptFunction("init", entry)).toBe(true);
		expect(checkFunction(funcDecl("init"), library)).toEqual([]);
	});

	it("uses the configured exemption names", () => {
		const ctx: AuditContext = {
			...entry,
			conventions: { ...DEFAULT_CONVENTIONS, entryFunction: "start", initializerFunction: "setup" },
		};
		expect(isExemptFunction("start", ctx)).toBe(true);
		expect(isExemptFunction("setup", ctx)).toBe(true);
		expect(isExemptFunction("main", ctx)).toBe(false);
	});
});

describe("checkConditional", () => {
	it("reports the literal operand of x == 5", () => {
		const five = lit("5", pos(7, 10));
		expect(checkConditional(ifStmt(binary("==", ident("x", pos(7, 5)), five)))).toEqual([
			{
				rule: "literal-conditional",
				position: pos(7, 10),
				message: "literal found in conditional",
			},
		]);
	});

	it("reports nothing for x == y", () => {
		expect(checkConditional(ifStmt(binary("==", ident("x"), ident("y"))))).toEqual([]);
	});

	it("reports each literal operand separately", () => {
		const cond = binary("<", lit('"a"', pos(3, 5), "STRING"), lit('"b"', pos(3, 11), "STRING"));
		expect(checkConditional(ifStmt(cond)).map((d) => d.position)).toEqual([
			pos(3, 5),
			pos(3, 11),
		]);
	});

	it("does not look inside nested comparisons", () => {
		const cond = binary("&&", binary("==", ident("x"), lit("5")), ident("y"));
		expect(checkConditional(ifStmt(cond))).toEqual([]);
	});

	it("ignores parenthesized and call operands", () => {
		const cond = binary("!=", opaque("ParenExpr", [lit("5")]), opaque("CallExpr"));
		expect(checkConditional(ifStmt(cond))).toEqual([]);
	});

	it("reports exactly the literal side of any top-level comparison", () => {
		fc.assert(
			fc.property(
				fc.constantFrom("==", "!=", "<", "<=", ">", ">="),
				fc.boolean(),
				fc.integer({ min: 1, max: 500 }),
				(operator, literalFirst, column) => {
					const literal = lit("42", pos(2, column));
					const name = ident("count", pos(2, column + 10));
					const cond = literalFirst
						? binary(operator, literal, name)
						: binary(operator, name, literal);
					const positions = checkConditional(ifStmt(cond)).map((d) => d.position);
					expect(positions).toEqual([pos(2, column)]);
				},
			),
		);
	});

	it("ignores conditions that are not comparisons", () => {
		expect(checkConditional(ifStmt(ident("ready")))).toEqual([]);
		expect(checkConditional(ifStmt(binary("+", ident("n"), lit("1"))))).toEqual([]);
	});
});

describe("checkConstantGroup", () => {
	it("accepts a documented singleton constant", () => {
		const group = genDecl("const", [valueSpec(["Max"])], { doc: doc("Max is the cap.") });
		expect(checkConstantGroup(group)).toEqual([]);
	});

	it("reports an undocumented singleton constant at the spec", () => {
		const group = genDecl("const", [valueSpec(["Max"], { position: pos(3, 7) })]);
		expect(checkConstantGroup(group)).toEqual([
			{
				rule: "constant-comment",
				position: pos(3, 7),
				message: 'constant "Max" has no comment associated with it',
			},
		]);
	});

	it("reports a singleton comment with the wrong prefix", () => {
		const group = genDecl("const", [valueSpec(["Max"], { position: pos(3, 7) })], {
			doc: doc("The cap."),
		});
		expect(checkConstantGroup(group)).toEqual([
			{
				rule: "constant-comment",
				position: pos(3, 7),
				message: 'comment for constant "Max" should begin with "Max"',
			},
		]);
	});

	it("reports an undocumented block before its specs", () => {
		const group = genDecl(
			"const",
			[
				valueSpec(["Min"], { doc: doc("Min is the floor."), position: pos(6, 2) }),
				valueSpec(["Max"], { position: pos(7, 2) }),
			],
			{ parenthesized: true, position: pos(5, 1) },
		);
		expect(checkConstantGroup(group)).toEqual([
			{
				rule: "constant-block-comment",
				position: pos(5, 1),
				message: "constant block has no comment associated with it",
			},
			{
				rule: "constant-comment",
				position: pos(7, 2),
				message: 'constant "Max" has no comment associated with it',
			},
		]);
	});

	it("reports jointly declared names once and skips their comment check", () => {
		const group = genDecl("const", [valueSpec(["a", "b"], { position: pos(9, 2) })], {
			parenthesized: true,
			doc: doc("Pairs."),
		});
		expect(checkConstantGroup(group)).toEqual([
			{
				rule: "constant-grouped",
				position: pos(9, 2),
				message:
					'constants "a, b" should be separated and each have a comment associated with them',
			},
		]);
	});

	it("throws InvariantViolation for a spec without names", () => {
		const group = genDecl("const", [valueSpec([])]);
		expect(() => checkConstantGroup(group)).toThrow(InvariantViolation);
	});
});

describe("checkTypeGroup", () => {
	it("accepts documented types in a documented block", () => {
		const group = genDecl("type", [typeSpec("Reader", { doc: doc("Reader reads.") })], {
			parenthesized: true,
			doc: doc("Interfaces."),
		});
		expect(checkTypeGroup(group)).toEqual([]);
	});

	it("reports the block and the type separately", () => {
		const group = genDecl("type", [typeSpec("Reader", { position: pos(4, 2) })], {
			parenthesized: true,
			position: pos(3, 1),
		});
		expect(checkTypeGroup(group).map((d) => d.message)).toEqual([
			"type block has no comment associated with it",
			'type "Reader" has no comment associated with it',
		]);
	});

	it("reports a singleton type comment with the wrong prefix", () => {
		const group = genDecl("type", [typeSpec("Reader")], { doc: doc("A reader.") });
		expect(checkTypeGroup(group)).toEqual([
			{
				rule: "type-comment",
				position: pos(1),
				message: 'comment for type "Reader" should begin with "Reader"',
			},
		]);
	});
});

describe("rulesFor", () => {
	it("leaves var and import groups alone", () => {
		expect(rulesFor(genDecl("var", [valueSpec(["x"])]), library)).toEqual([]);
		expect(rulesFor(genDecl("import", [opaque("ImportSpec")]), library)).toEqual([]);
	});

	it("treats opaque nodes, identifiers and literals as inert", () => {
		expect(rulesFor(opaque("BlockStmt"), library)).toEqual([]);
		expect(rulesFor(ident("x"), library)).toEqual([]);
		expect(rulesFor(lit("1"), library)).toEqual([]);
	});

	it("dispatches function declarations", () => {
		expect(rulesFor(funcDecl("Run"), library).map((d) => d.rule)).toEqual([
			"function-comment",
		]);
	});
});
