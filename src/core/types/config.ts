// CHANGE: Configuration types for conventions, output and CLI
// WHY: Name-based exemptions and the package comment prefix are conventions, not constants
// PURITY: CORE
// INVARIANT: All configuration is immutable after loading

/**
 * Naming conventions the auditor relies on.
 *
 * @property entryPackage Package name treated as the program entry when a unit does not say
 * @property entryFunction Function exempt from the doc rule inside the entry package
 * @property initializerFunction Automatic package initializer, exempt everywhere
 * @property packageCommentPrefix First word of every package comment
 */
export interface Conventions {
	readonly entryPackage: string;
	readonly entryFunction: string;
	readonly initializerFunction: string;
	readonly packageCommentPrefix: string;
}

export const DEFAULT_CONVENTIONS: Conventions = {
	entryPackage: "main",
	entryFunction: "main",
	initializerFunction: "init",
	packageCommentPrefix: "Package",
};

export const OUTPUT_FORMATS = ["text", "json", "sarif"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Contents of doculint.config.json after defaults are applied.
 */
export interface DoculintConfig {
	readonly conventions: Conventions;
	readonly format: OutputFormat;
}

export const DEFAULT_CONFIG: DoculintConfig = {
	conventions: DEFAULT_CONVENTIONS,
	format: "text",
};

/**
 * Опции командной строки.
 *
 * @property treePaths JSON tree files to audit, in argument order
 * @property configPath Explicit config file; undefined means the default location
 * @property format Output format overriding the config file
 * @property help Print usage and exit
 */
export interface CLIOptions {
	readonly treePaths: ReadonlyArray<string>;
	readonly configPath?: string;
	readonly format?: OutputFormat;
	readonly help: boolean;
}
