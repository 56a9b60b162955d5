#!/usr/bin/env node
/**
 * luacxx CLI - command-line driver for the Lua to C++ translator
 */

import { runCli } from "./cli.js";

try {
  // Skip node and script name
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error("Fatal error:", error);
  process.exitCode = 1;
}

// Export for testing
export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
