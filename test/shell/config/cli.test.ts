// CHANGE: Unit tests for CLI argument parsing
// WHY: Ensure flags and positional arguments are parsed deterministically with strict typing

import { Either } from "effect";
import { describe, expect, it } from "vitest";
import type { UsageError } from "../../../src/core/errors.js";
import type { CLIOptions } from "../../../src/core/types/index.js";
import { parseCLIArgs } from "../../../src/shell/config/index.js";

const parsed = (args: ReadonlyArray<string>): CLIOptions =>
	Either.getOrThrow(parseCLIArgs(args));

const failure = (args: ReadonlyArray<string>): string => {
	const result = parseCLIArgs(args);
	return Either.match(result, {
		onLeft: (error: UsageError) => error.detail,
		onRight: () => "no error",
	});
};

describe("parseCLIArgs: positional", () => {
	it("collects tree files in argument order", () => {
		expect(parsed(["a.json", "b.json"])).toEqual({
			treePaths: ["a.json", "b.json"],
			help: false,
		});
	});

	it("ignores empty string arguments", () => {
		expect(parsed(["", "a.json"]).treePaths).toEqual(["a.json"]);
	});

	it("requires at least one tree file", () => {
		expect(failure([])).toBe("no tree files given");
	});
});

describe("parseCLIArgs: flags", () => {
	it("--format selects the output format", () => {
		expect(parsed(["--format", "sarif", "a.json"])).toEqual({
			treePaths: ["a.json"],
			help: false,
			format: "sarif",
		});
	});

	it("--config sets an explicit config path", () => {
		expect(parsed(["a.json", "--config", "cfg/doculint.json"]).configPath).toBe(
			"cfg/doculint.json",
		);
	});

	it("--help and -h need no tree files", () => {
		expect(parsed(["--help"])).toEqual({ treePaths: [], help: true });
		expect(parsed(["-h"]).help).toBe(true);
	});

	it("rejects an unknown format", () => {
		expect(failure(["--format", "xml", "a.json"])).toBe(
			'unknown format "xml", expected one of text, json, sarif',
		);
	});

	it("rejects a flag without its value", () => {
		expect(failure(["a.json", "--config"])).toBe("--config requires a value");
	});

	it("rejects unknown options", () => {
		expect(failure(["--fix", "a.json"])).toBe("unknown option --fix");
	});
});
