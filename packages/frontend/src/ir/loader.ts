/**
 * Syntax tree JSON loader
 *
 * Reads a tree serialized by the external parser and checks that every value
 * has the node shape. Node kinds are not checked here: an unknown kind is
 * reported by the backend as an unsupported construct.
 */

import * as fs from "node:fs";
import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { SyntaxNode } from "./types.js";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const shapeError = (filePath: string, path: string, message: string) =>
  createDiagnostic(
    "LCX9004",
    "error",
    `${filePath}: ${path}: ${message}`
  );

const validateNode = (
  data: unknown,
  filePath: string,
  path: string,
  diagnostics: Diagnostic[]
): SyntaxNode | undefined => {
  if (!isRecord(data)) {
    diagnostics.push(shapeError(filePath, path, "expected a node object"));
    return undefined;
  }

  const { kind, literal, name, line, children } = data;
  let valid = true;

  if (typeof kind !== "string" || kind.length === 0) {
    diagnostics.push(
      shapeError(filePath, path, "missing or invalid 'kind' field")
    );
    valid = false;
  }

  if (
    literal !== undefined &&
    typeof literal !== "string" &&
    typeof literal !== "number" &&
    typeof literal !== "boolean"
  ) {
    diagnostics.push(
      shapeError(filePath, path, "'literal' must be a string, number or boolean")
    );
    valid = false;
  }

  if (name !== undefined && typeof name !== "string") {
    diagnostics.push(shapeError(filePath, path, "'name' must be a string"));
    valid = false;
  }

  if (line !== undefined && (typeof line !== "number" || line < 0)) {
    diagnostics.push(
      shapeError(filePath, path, "'line' must be a non-negative number")
    );
    valid = false;
  }

  if (children !== undefined && !Array.isArray(children)) {
    diagnostics.push(shapeError(filePath, path, "'children' must be an array"));
    return undefined;
  }

  const childNodes: SyntaxNode[] = [];
  const items: readonly unknown[] = Array.isArray(children) ? children : [];
  items.forEach((child, i) => {
    const childNode = validateNode(
      child,
      filePath,
      `${path}.children[${i}]`,
      diagnostics
    );
    if (childNode) {
      childNodes.push(childNode);
    }
  });

  if (!valid || typeof kind !== "string") {
    return undefined;
  }

  return {
    kind,
    ...(typeof literal === "string" ||
    typeof literal === "number" ||
    typeof literal === "boolean"
      ? { literal }
      : {}),
    ...(typeof name === "string" ? { name } : {}),
    ...(typeof line === "number" ? { line } : {}),
    children: childNodes,
  };
};

/**
 * Validate an already-parsed JSON value as a syntax tree.
 *
 * @param data - Parsed JSON
 * @param filePath - File name used in messages
 */
export const parseSyntaxTree = (
  data: unknown,
  filePath = "<memory>"
): Result<SyntaxNode, Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];
  const tree = validateNode(data, filePath, "$", diagnostics);

  if (diagnostics.length > 0 || !tree) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: tree };
};

/**
 * Load and validate a syntax tree JSON file.
 */
export const loadSyntaxTree = (
  filePath: string
): Result<SyntaxNode, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "LCX9001",
          "error",
          `Tree file not found: ${filePath}`
        ),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "LCX9002",
          "error",
          `Failed to read tree file: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "LCX9003",
          "error",
          `Invalid JSON in tree file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  return parseSyntaxTree(parsed, filePath);
};
