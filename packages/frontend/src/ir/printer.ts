/**
 * Indented text dump of a syntax tree, one node per line.
 *
 *   chunk
 *     localDeclaration
 *       variableList
 *         identifier name=x
 */

import type { SyntaxNode } from "./types.js";

const describeNode = (node: SyntaxNode): string => {
  const parts = [node.kind];
  if (node.name !== undefined) {
    parts.push(`name=${node.name}`);
  }
  if (node.literal !== undefined) {
    parts.push(`literal=${JSON.stringify(node.literal)}`);
  }
  if (node.line !== undefined) {
    parts.push(`@${node.line}`);
  }
  return parts.join(" ");
};

export const printTree = (root: SyntaxNode, indentWidth = 2): string => {
  const lines: string[] = [];
  const visit = (node: SyntaxNode, depth: number): void => {
    lines.push(" ".repeat(depth * indentWidth) + describeNode(node));
    for (const child of node.children) {
      visit(child, depth + 1);
    }
  };
  visit(root, 0);
  return lines.join("\n");
};

/**
 * Number of nodes in the tree, root included.
 */
export const countNodes = (root: SyntaxNode): number =>
  root.children.reduce((total, child) => total + countNodes(child), 1);
