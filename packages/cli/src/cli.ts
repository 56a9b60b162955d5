/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  VERSION,
  EXIT_CODES,
  showHelp,
  parseArgs,
  runCli,
} from "./cli/index.js";
export { emitCommand } from "./commands/emit.js";
export { treeCommand } from "./commands/tree.js";
