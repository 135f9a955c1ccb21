// CHANGE: Load doculint.config.json with an Effect Schema
// WHY: Conventions (entry/initializer names, package comment prefix) and output format are per-project
// PURITY: SHELL (filesystem I/O)
// EFFECT: Effect<DoculintConfig, FSError | ParseError>
// INVARIANT: Missing default config ⇒ DEFAULT_CONFIG; explicit config must exist and decode
// COMPLEXITY: O(n) where n = config size

import { Effect, Schema } from "effect";

import { type FSError, ParseError } from "../../core/errors.js";
import {
	DEFAULT_CONFIG,
	type DoculintConfig,
	OUTPUT_FORMATS,
} from "../../core/types/index.js";
import { fileExists, readTextFile } from "../utils/files.js";
import { path } from "../utils/node-mods.js";

export const CONFIG_FILE_NAME = "doculint.config.json";

const Identifier = Schema.String.pipe(Schema.minLength(1));

const ConfigFileSchema = Schema.parseJson(
	Schema.Struct({
		entryPackage: Schema.optional(Identifier),
		entryFunction: Schema.optional(Identifier),
		initializerFunction: Schema.optional(Identifier),
		packageCommentPrefix: Schema.optional(Identifier),
		format: Schema.optional(Schema.Literal(...OUTPUT_FORMATS)),
	}),
);

type ConfigFile = typeof ConfigFileSchema.Type;

/**
 * Merge a decoded config file over the defaults.
 *
 * @pure true
 */
export const applyDefaults = (file: ConfigFile): DoculintConfig => {
	const defaults = DEFAULT_CONFIG.conventions;
	return {
		conventions: {
			entryPackage: file.entryPackage ?? defaults.entryPackage,
			entryFunction: file.entryFunction ?? defaults.entryFunction,
			initializerFunction: file.initializerFunction ?? defaults.initializerFunction,
			packageCommentPrefix: file.packageCommentPrefix ?? defaults.packageCommentPrefix,
		},
		format: file.format ?? DEFAULT_CONFIG.format,
	};
};

/**
 * Decode config file text.
 *
 * @effect Effect<DoculintConfig, ParseError>
 */
export function decodeConfig(
	text: string,
	source: string,
): Effect.Effect<DoculintConfig, ParseError> {
	return Schema.decodeUnknown(ConfigFileSchema)(text).pipe(
		Effect.map(applyDefaults),
		Effect.mapError(
			(error) =>
				new ParseError({ entity: "config", detail: error.message, path: source }),
		),
	);
}

/**
 * Загружает конфигурацию из doculint.config.json.
 *
 * @param configPath Explicit path (--config); undefined means `<cwd>/doculint.config.json`
 *
 * @pure false (reads the filesystem)
 * @effect Effect<DoculintConfig, FSError | ParseError>
 */
export function loadConfig(
	configPath?: string,
	cwd: string = process.cwd(),
): Effect.Effect<DoculintConfig, FSError | ParseError> {
	if (configPath !== undefined) {
		const explicit = path.resolve(cwd, configPath);
		return readTextFile(explicit).pipe(
			Effect.flatMap((text) => decodeConfig(text, explicit)),
		);
	}

	const fallback = path.resolve(cwd, CONFIG_FILE_NAME);
	return fileExists(fallback).pipe(
		Effect.flatMap(
			(exists): Effect.Effect<DoculintConfig, FSError | ParseError> =>
				exists
					? readTextFile(fallback).pipe(
							Effect.flatMap((text) => decodeConfig(text, fallback)),
						)
					: Effect.succeed(DEFAULT_CONFIG),
		),
	);
}
