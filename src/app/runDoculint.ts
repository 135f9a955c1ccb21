// CHANGE: Application layer orchestrating config, tree supplier, analyzer and sink
// WHY: Enforce FCIS — APP composes pure CORE logic with SHELL integrations
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; core contract violations surface as defects
// COMPLEXITY: O(f + n) where f = tree files, n = nodes audited

import { Effect, Either } from "effect";

import { Analyzer } from "../core/analyzer.js";
import { computeExitCodeEffect } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import type {
	CLIOptions,
	CompilationUnit,
	Conventions,
	Diagnostic,
} from "../core/types/index.js";
import { loadConfig, parseCLIArgs, USAGE } from "../shell/config/index.js";
import { printFailure, printReport, printUsage } from "../shell/output/index.js";
import { loadCompilationUnits } from "../shell/supplier/json.js";
import { path } from "../shell/utils/node-mods.js";

const SUCCESS: ExitCode = 0;
const FAILURE: ExitCode = 1;

interface LoadedUnits {
	readonly units: ReadonlyArray<CompilationUnit>;
	readonly failures: ReadonlyArray<AppError>;
}

/**
 * Load every tree file; a failing file does not stop the others.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<LoadedUnits, never>
 */
function loadAllUnits(
	treePaths: ReadonlyArray<string>,
	conventions: Conventions,
	cwd: string,
): Effect.Effect<LoadedUnits> {
	return Effect.forEach(
		treePaths,
		(treePath) =>
			Effect.either(loadCompilationUnits(path.resolve(cwd, treePath), conventions)),
		{ concurrency: "unbounded" },
	).pipe(
		Effect.map((results) => ({
			units: results.flatMap(
				(result): ReadonlyArray<CompilationUnit> =>
					Either.isRight(result) ? result.right : [],
			),
			failures: results.flatMap(
				(result): ReadonlyArray<AppError> =>
					Either.isLeft(result) ? [result.left] : [],
			),
		})),
	);
}

/**
 * Audit units independently; each gets its own auditor and PackageDocState.
 *
 * CHANGE: Effect.forEach with unbounded concurrency over units
 * WHY: Units share no mutable state, results are merged afterwards
 *
 * @effect Effect<Diagnostic[], never> (InvariantViolation is a defect)
 */
export function auditUnits(
	units: ReadonlyArray<CompilationUnit>,
	conventions: Conventions,
): Effect.Effect<ReadonlyArray<Diagnostic>> {
	return Effect.forEach(
		units,
		(unit) => Effect.sync(() => Analyzer.run(unit, conventions)),
		{ concurrency: "unbounded" },
	).pipe(Effect.map((perUnit) => perUnit.flat()));
}

/**
 * Run doculint for parsed options and return the exit code as a value.
 *
 * @param options - Parsed CLI options
 * @param cwd - Directory that relative paths are resolved against
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 * @postcondition (diagnostics ≠ ∅ ∨ load failures ≠ ∅) → 1 else 0
 */
export function runDoculint(
	options: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		if (options.help) {
			yield* printUsage(Analyzer.name, Analyzer.doc, USAGE);
			return SUCCESS;
		}

		const config = yield* Effect.either(loadConfig(options.configPath, cwd));
		if (Either.isLeft(config)) {
			yield* printFailure(config.left);
			return FAILURE;
		}

		const { conventions } = config.right;
		const format = options.format ?? config.right.format;

		const loaded = yield* loadAllUnits(options.treePaths, conventions, cwd);
		yield* Effect.forEach(loaded.failures, printFailure);

		const diagnostics = yield* auditUnits(loaded.units, conventions);
		yield* printReport(format, Analyzer.name, diagnostics);

		return yield* computeExitCodeEffect({
			hasDiagnostics: diagnostics.length > 0,
			hasLoadErrors: loaded.failures.length > 0,
		});
	});
}

/**
 * Parse process arguments and delegate to runDoculint.
 *
 * @pure false (coordinates effects)
 */
export function main(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Effect.Effect<ExitCode> {
	return Either.match(parseCLIArgs(args), {
		onLeft: (error) =>
			printFailure(error).pipe(
				Effect.zipRight(Effect.sync(() => console.error(USAGE))),
				Effect.as(FAILURE),
			),
		onRight: (options) => runDoculint(options),
	});
}
