/**
 * Whole-unit scans done before emission
 */

import type { SyntaxNode } from "@luacxx/frontend";

export type UnitAnalysis = {
  /** Global names and `namespace.member` pairs assigned anywhere */
  readonly reassigned: ReadonlySet<string>;
};

const FUNCTION_KINDS: ReadonlySet<string> = new Set([
  "functionExpression",
  "functionDeclaration",
  "localFunction",
  "methodDeclaration",
]);

/**
 * Assignment targets of a statement, if it assigns
 */
const assignedTargets = (node: SyntaxNode): readonly SyntaxNode[] => {
  if (node.kind === "assignment") {
    return node.children[0]?.children ?? [];
  }
  if (node.kind === "functionDeclaration") {
    const target = node.children[0];
    return target ? [target] : [];
  }
  return [];
};

const collectReassigned = (node: SyntaxNode, found: Set<string>): void => {
  for (const target of assignedTargets(node)) {
    if (target.kind === "identifier" && target.name !== undefined) {
      found.add(target.name);
    }
    const base = target.children[0];
    if (
      target.kind === "member" &&
      target.name !== undefined &&
      base?.kind === "identifier" &&
      base.name !== undefined
    ) {
      found.add(`${base.name}.${target.name}`);
    }
  }
  node.children.forEach((child) => collectReassigned(child, found));
};

export const analyzeUnit = (root: SyntaxNode): UnitAnalysis => {
  const reassigned = new Set<string>();
  collectReassigned(root, reassigned);
  return { reassigned };
};

export const referencesName = (node: SyntaxNode, name: string): boolean =>
  (node.kind === "identifier" && node.name === name) ||
  node.children.some((child) => referencesName(child, name));

const isAssignedIn = (node: SyntaxNode, name: string): boolean =>
  assignedTargets(node).some(
    (target) => target.kind === "identifier" && target.name === name
  ) || node.children.some((child) => isAssignedIn(child, name));

const isCapturedIn = (node: SyntaxNode, name: string): boolean =>
  FUNCTION_KINDS.has(node.kind)
    ? referencesName(node, name)
    : node.children.some((child) => isCapturedIn(child, name));

/**
 * A local needs a shared cell when a closure reads it and some code assigns
 * it after its declaration. Shadowing is ignored, which can only add cells.
 */
export const needsCell = (
  name: string,
  scopeAfterDeclaration: readonly SyntaxNode[]
): boolean =>
  scopeAfterDeclaration.some((node) => isCapturedIn(node, name)) &&
  scopeAfterDeclaration.some((node) => isAssignedIn(node, name));
