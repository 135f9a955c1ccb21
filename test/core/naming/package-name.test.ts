// CHANGE: Unit and property tests for package naming rules
// INVARIANT: separator rule precedes casing rule; at most one violation per call

import { Option } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { validatePackageName } from "../../../src/core/naming/package-name.js";

const messageOf = (identifier: string): string | null =>
	Option.match(validatePackageName(identifier), {
		onNone: () => null,
		onSome: (diagnostic) => diagnostic.message,
	});

describe("validatePackageName", () => {
	it("accepts all-lowercase names without separators", () => {
		expect(Option.isNone(validatePackageName("mypkg"))).toBe(true);
		expect(Option.isNone(validatePackageName("http2"))).toBe(true);
	});

	it("rejects hyphens and underscores", () => {
		expect(messageOf("my-pkg")).toBe('package "my-pkg" should not contain - or _ in name');
		expect(messageOf("my_pkg")).toBe('package "my_pkg" should not contain - or _ in name');
	});

	it("reports the separator rule before the casing rule", () => {
		expect(messageOf("My_Pkg")).toBe('package "My_Pkg" should not contain - or _ in name');
	});

	it("rejects names that are not all lowercase", () => {
		expect(messageOf("MyPkg")).toBe('package "MyPkg" should be all lowercase');
	});

	it("tags the violation as package-name without a position", () => {
		const result = validatePackageName("Bad");
		expect(Option.getOrNull(result)).toEqual({
			rule: "package-name",
			position: null,
			message: 'package "Bad" should be all lowercase',
		});
	});
});

describe("validatePackageName properties", () => {
	it("always returns the separator violation when - or _ is present", () => {
		fc.assert(
			fc.property(
				fc.string(),
				fc.constantFrom("-", "_"),
				fc.string(),
				(head, separator, tail) => {
					const identifier = `${head}${separator}${tail}`;
					expect(messageOf(identifier)).toBe(
						`package "${identifier}" should not contain - or _ in name`,
					);
				},
			),
		);
	});

	it("never reports lowercase alphanumeric names", () => {
		fc.assert(
			fc.property(fc.stringMatching(/^[a-z0-9]*$/), (identifier) => {
				expect(Option.isNone(validatePackageName(identifier))).toBe(true);
			}),
		);
	});
});
