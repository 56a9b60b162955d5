/**
 * Type definitions for CLI
 */

import type { EmitterOptions } from "@luacxx/emitter";

export type { Result } from "@luacxx/frontend";

/**
 * Configuration file (luacxx.json)
 */
export type LuacxxConfig = {
  readonly $schema?: string;
  readonly outputDirectory?: string;
  readonly indent?: number;
  readonly maxDepth?: number;
  readonly includeTimestamp?: boolean;
  readonly runtimeHeader?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  module?: string;
  entry?: string;
};

/**
 * Resolved configuration (after merging config file + CLI args)
 */
export type ResolvedConfig = {
  /** Syntax tree JSON to translate */
  readonly treeFile?: string;
  readonly outputDirectory: string;
  readonly emitterOptions: EmitterOptions;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
