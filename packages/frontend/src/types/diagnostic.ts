/**
 * Diagnostic types shared by the luacxx packages
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Translation warnings (LCX2001-LCX2099)
  | "LCX2001" // Unsupported construct, placeholder emitted
  | "LCX2002" // require() with a non-literal module name
  | "LCX2003" // Numeric for with a literal zero step
  // Fatal translation errors (LCX6001-LCX6099)
  | "LCX6001" // Malformed tree: required child missing
  | "LCX6002" // Recursion depth exceeded
  | "LCX6003" // Internal emitter error
  // Tree loading errors (LCX9001-LCX9099)
  | "LCX9001" // Tree file not found
  | "LCX9002" // Failed to read tree file
  | "LCX9003" // Invalid JSON in tree file
  | "LCX9004" // JSON value is not a syntax node
  | "LCX9005"; // Failed to write output file

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column?: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some(isError);

/**
 * Render a diagnostic on one line: `file:line:col severity CODE: message Hint: ...`
 */
export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    const { file, line, column } = diagnostic.location;
    parts.push(
      column === undefined ? `${file}:${line}` : `${file}:${line}:${column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

/**
 * Count diagnostics per severity, for summaries such as "2 warnings".
 */
export const summarizeDiagnostics = (
  diagnostics: readonly Diagnostic[]
): Readonly<Record<DiagnosticSeverity, number>> => {
  const counts: Record<DiagnosticSeverity, number> = {
    error: 0,
    warning: 0,
    info: 0,
  };
  for (const diagnostic of diagnostics) {
    counts[diagnostic.severity] += 1;
  }
  return counts;
};
