// CHANGE: Central export file for config module
// WHY: Provides a single import point for CLI parsing and config loading

export { parseCLIArgs, USAGE } from "./cli.js";
export {
	applyDefaults,
	CONFIG_FILE_NAME,
	decodeConfig,
	loadConfig,
} from "./loader.js";
