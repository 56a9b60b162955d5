/**
 * Fatal translation errors and warning reporting
 */

import {
  createDiagnostic,
  type Diagnostic,
  type DiagnosticCode,
  type SourceLocation,
  type SyntaxNode,
} from "@luacxx/frontend";
import type { EmitterContext } from "../types.js";

/**
 * Thrown to abort the translation of a unit. `emitUnit` turns it back into
 * a diagnostic.
 */
export class EmitterError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "EmitterError";
    this.diagnostic = diagnostic;
  }
}

export const nodeLocation = (
  node: SyntaxNode | undefined,
  context: EmitterContext
): SourceLocation | undefined =>
  node?.line === undefined
    ? undefined
    : { file: context.options.sourcePath ?? "<unit>", line: node.line };

export const fatal = (
  code: DiagnosticCode,
  message: string,
  node: SyntaxNode | undefined,
  context: EmitterContext
): EmitterError =>
  new EmitterError(
    createDiagnostic(code, "error", message, nodeLocation(node, context))
  );

export const malformed = (
  node: SyntaxNode,
  problem: string,
  context: EmitterContext
): EmitterError =>
  fatal("LCX6001", `Malformed tree: '${node.kind}' ${problem}`, node, context);

export const internalError = (
  message: string,
  context: EmitterContext
): EmitterError => fatal("LCX6003", `ICE: ${message}`, undefined, context);

/**
 * Fetch a child the grammar guarantees, or abort the unit.
 */
export const requireChild = (
  node: SyntaxNode,
  index: number,
  role: string,
  context: EmitterContext
): SyntaxNode => {
  const child = node.children[index];
  if (!child) {
    throw malformed(node, `is missing its ${role}`, context);
  }
  return child;
};

export const requireName = (
  node: SyntaxNode,
  context: EmitterContext
): string => {
  if (node.name === undefined || node.name.length === 0) {
    throw malformed(node, "has no name", context);
  }
  return node.name;
};

/**
 * Record a non-fatal diagnostic for the unit.
 */
export const reportWarning = (
  context: EmitterContext,
  code: DiagnosticCode,
  message: string,
  node?: SyntaxNode,
  hint?: string
): void => {
  context.unit.diagnostics.push(
    createDiagnostic(code, "warning", message, nodeLocation(node, context), hint)
  );
};
