/**
 * CLI constants
 */

import { existsSync } from "node:fs";
import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";

const require = createRequire(import.meta.url);

// Sources run from packages/cli/src/cli, the build from dist/cli/src/cli
const MANIFEST_CANDIDATES = [
  "../../package.json",
  "../../../../packages/cli/package.json",
];

const hasVersion = (value: unknown): value is { readonly version: string } =>
  typeof value === "object" &&
  value !== null &&
  "version" in value &&
  typeof value.version === "string";

const readVersion = (): string => {
  const manifest = MANIFEST_CANDIDATES.map((candidate) =>
    fileURLToPath(new URL(candidate, import.meta.url))
  ).find((path) => existsSync(path));
  if (manifest === undefined) {
    return "0.0.0";
  }
  const packageJson: unknown = require(manifest);
  return hasVersion(packageJson) ? packageJson.version : "0.0.0";
};

export const VERSION = readVersion();

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  ok: 0,
  config: 1,
  unknownCommand: 2,
  load: 4,
  emit: 5,
  write: 6,
} as const;
