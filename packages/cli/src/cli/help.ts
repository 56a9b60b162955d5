/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

export const helpText = (): string => `
luacxx - Lua syntax tree to C++ translator v${VERSION}

USAGE:
  luacxx <command> [options]

COMMANDS:
  emit <tree.json>          Translate a syntax tree to C++ sources
  tree <tree.json>          Print a syntax tree, one node per line
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: luacxx.json)

EMIT OPTIONS:
  -o, --out <dir>           Output directory (default: generated)
  -m, --module <name>       Emit a module loaded by require(name)
  -e, --entry <tree.json>   Tree file, when not given as an argument

EXIT CODES:
  0 success, 1 configuration error, 2 unknown command,
  4 tree could not be loaded, 5 translation failed,
  6 output could not be written

EXAMPLES:
  luacxx emit main.json
  luacxx emit util.json --module util -o cpp
  luacxx tree main.json
`;

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(helpText());
};
