/**
 * luacxx frontend - syntax tree model, tree loading and diagnostics
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  summarizeDiagnostics,
  hasErrors,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./ir/index.js";
