// CHANGE: Command-line parsing for the doculint entry point
// WHY: Flags select config and output; positional arguments are tree files
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Right(options) ⇒ options.help ∨ options.treePaths.length > 0
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import {
	type CLIOptions,
	OUTPUT_FORMATS,
	type OutputFormat,
} from "../../core/types/index.js";

interface ArgState {
	readonly treePaths: ReadonlyArray<string>;
	readonly configPath: string | undefined;
	readonly format: OutputFormat | undefined;
	readonly help: boolean;
}

type ValueFlagHandler = (
	value: string,
	current: ArgState,
) => Either.Either<ArgState, UsageError>;

const isOutputFormat = (value: string): value is OutputFormat =>
	OUTPUT_FORMATS.some((format) => format === value);

// CHANGE: Lookup table for flags that take a value
// WHY: Keeps processArgument free of per-flag branching
const valueHandlers: Readonly<Record<string, ValueFlagHandler>> = {
	"--config": (value, current) => Either.right({ ...current, configPath: value }),
	"--format": (value, current) =>
		isOutputFormat(value)
			? Either.right({ ...current, format: value })
			: Either.left(
					new UsageError({
						detail: `unknown format "${value}", expected one of ${OUTPUT_FORMATS.join(", ")}`,
					}),
				),
};

export const USAGE = `usage: doculint [--config <path>] [--format ${OUTPUT_FORMATS.join("|")}] [--help] <tree.json ...>`;

function processArgument(
	args: ReadonlyArray<string>,
	index: number,
	current: ArgState,
): Either.Either<{ readonly state: ArgState; readonly consumed: number }, UsageError> {
	const arg = args[index] ?? "";

	if (arg === "--help" || arg === "-h") {
		return Either.right({ state: { ...current, help: true }, consumed: 1 });
	}

	const handler = valueHandlers[arg];
	if (handler !== undefined) {
		const value = args[index + 1];
		if (value === undefined) {
			return Either.left(new UsageError({ detail: `${arg} requires a value` }));
		}
		return Either.map(handler(value, current), (state) => ({ state, consumed: 2 }));
	}

	if (arg.startsWith("-")) {
		return Either.left(new UsageError({ detail: `unknown option ${arg}` }));
	}

	return Either.right({
		state: { ...current, treePaths: [...current.treePaths, arg] },
		consumed: 1,
	});
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Arguments after the node and script entries
 * @returns Right(CLIOptions) or Left(UsageError)
 *
 * @example
 * ```ts
 * parseCLIArgs(["--format", "json", "units.json"]);
 * // Either.right({ treePaths: ["units.json"], format: "json", help: false })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<CLIOptions, UsageError> {
	let state: ArgState = {
		treePaths: [],
		configPath: undefined,
		format: undefined,
		help: false,
	};

	let index = 0;
	while (index < args.length) {
		// CHANGE: Skip empty arguments explicitly
		// WHY: strict-boolean-expressions — handle empty string explicitly
		if ((args[index] ?? "").length === 0) {
			index += 1;
			continue;
		}
		const step = processArgument(args, index, state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		index += step.right.consumed;
	}

	if (!state.help && state.treePaths.length === 0) {
		return Either.left(new UsageError({ detail: "no tree files given" }));
	}

	// exactOptionalPropertyTypes: absent flags are absent fields, not undefined
	return Either.right({
		treePaths: state.treePaths,
		help: state.help,
		...(state.configPath === undefined ? {} : { configPath: state.configPath }),
		...(state.format === undefined ? {} : { format: state.format }),
	});
}
