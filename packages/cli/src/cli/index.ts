/**
 * CLI - Public API
 */

export { VERSION, EXIT_CODES } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs, type ParsedArgs } from "./parser.js";
export { runCli } from "./dispatcher.js";
