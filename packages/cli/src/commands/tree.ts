/**
 * luacxx tree command - dump a syntax tree
 */

import {
  countNodes,
  loadSyntaxTree,
  printTree,
  type Diagnostic,
} from "@luacxx/frontend";
import type { Result } from "../types.js";

export const treeCommand = (
  treeFile: string,
  options: { readonly verbose?: boolean } = {}
): Result<string, readonly Diagnostic[]> => {
  const treeResult = loadSyntaxTree(treeFile);
  if (!treeResult.ok) {
    return treeResult;
  }

  const text = printTree(treeResult.value);
  console.log(text);
  if (options.verbose) {
    console.log(`\n${countNodes(treeResult.value)} nodes`);
  }
  return { ok: true, value: text };
};
