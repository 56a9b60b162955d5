/**
 * Shared constants for the emitter
 */

/**
 * Standard library headers every generated translation unit includes
 */
export const STANDARD_INCLUDES: readonly string[] = [
  "cmath",
  "iostream",
  "memory",
  "stdexcept",
  "string",
  "variant",
  "vector",
];

/**
 * Runtime header that declares `init_G`
 */
export const INIT_HEADER = "init.hpp";

/**
 * Generate standard file header for emitted C++ files
 *
 * @param filePath - Source script path
 * @param options - Header generation options
 * @returns Header comment lines
 */
export const generateFileHeader = (
  filePath: string,
  options: {
    readonly includeTimestamp?: boolean;
    readonly timestamp?: string;
  } = {}
): string[] => {
  const lines: string[] = [];

  lines.push(`// Generated from: ${filePath}`);

  if (options.includeTimestamp ?? true) {
    const timestamp = options.timestamp ?? new Date().toISOString();
    lines.push(`// Generated at: ${timestamp}`);
  }

  lines.push("// WARNING: Do not modify this file manually");
  lines.push("");

  return lines;
};
