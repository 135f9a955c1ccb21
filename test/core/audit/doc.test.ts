import { Option } from "effect";
import { describe, expect, it } from "vitest";
import {
	declShape,
	docStartsWith,
	fileStem,
	resolveDocComment,
} from "../../../src/core/audit/doc.js";
import { doc, genDecl, typeSpec, valueSpec } from "../../utils/builders.js";

describe("resolveDocComment", () => {
	it("uses the group comment for a singleton declaration", () => {
		const spec = valueSpec(["Limit"], { doc: doc("spec level") });
		const group = genDecl("const", [spec], { doc: doc("Limit caps retries.") });
		expect(declShape(group)).toBe("SingletonDecl");
		expect(resolveDocComment(spec, group)).toEqual(Option.some("Limit caps retries."));
	});

	it("uses the spec comment inside a parenthesized block", () => {
		const spec = typeSpec("Reader", { doc: doc("Reader reads.") });
		const group = genDecl("type", [spec], {
			doc: doc("Readers."),
			parenthesized: true,
		});
		expect(declShape(group)).toBe("ParenthesizedBlock");
		expect(resolveDocComment(spec, group)).toEqual(Option.some("Reader reads."));
	});

	it("ignores the block comment for an undocumented spec", () => {
		const spec = valueSpec(["Limit"]);
		const group = genDecl("const", [spec], {
			doc: doc("Limits."),
			parenthesized: true,
		});
		expect(Option.isNone(resolveDocComment(spec, group))).toBe(true);
	});
});

describe("docStartsWith", () => {
	it("trims surrounding whitespace before comparing", () => {
		expect(docStartsWith("\n  Parse reads input.\n", "Parse")).toBe(true);
	});

	it("is case sensitive", () => {
		expect(docStartsWith("parse reads input.", "Parse")).toBe(false);
	});
});

describe("fileStem", () => {
	it("drops the last extension only", () => {
		expect(fileStem("mypkg.go")).toBe("mypkg");
		expect(fileStem("mypkg_test.go")).toBe("mypkg_test");
		expect(fileStem("archive.tar.gz")).toBe("archive.tar");
	});

	it("keeps names without an extension and dot-files", () => {
		expect(fileStem("mypkg")).toBe("mypkg");
		expect(fileStem(".mypkg")).toBe(".mypkg");
	});
});
