/**
 * Context creation and manipulation functions
 */

import type {
  EmitterOptions,
  EmitterContext,
  FunctionFrame,
  LocalBinding,
  UnitState,
} from "./core.js";

/**
 * Create the mutable state of a fresh unit
 */
export const createUnitState = (
  reassigned: ReadonlySet<string> = new Set()
): UnitState => ({
  strings: new Map(),
  globals: new Map(),
  integers: new Map(),
  libraries: new Map(),
  requiredModules: new Set(),
  reassigned,
  diagnostics: [],
  hoist: [[]],
  counter: 0,
});

/**
 * Create a new emitter context with default values
 */
export const createContext = (
  options: EmitterOptions,
  unit: UnitState = createUnitState(),
  frame?: FunctionFrame
): EmitterContext => {
  return {
    indentLevel: 0,
    options,
    unit,
    scope: new Map<string, LocalBinding>(),
    declared: new Set(),
    frame: frame ?? {
      kind: options.moduleName === undefined ? "entry" : "module",
      fixedParams: 0,
      variadic: false,
      buffer: "lx_buf_0",
    },
    depth: 0,
    following: [],
  };
};

/**
 * Increase indentation level
 */
export const indent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: context.indentLevel + 1,
});

/**
 * Decrease indentation level
 */
export const dedent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: Math.max(0, context.indentLevel - 1),
});

/**
 * Draw a unique generated identifier, e.g. `lx_ret_12`
 */
export const nextId = (context: EmitterContext, prefix: string): string => {
  context.unit.counter += 1;
  return `lx_${prefix}_${context.unit.counter}`;
};

/**
 * Scoped fields restored after a block, so names declared inside never leak
 * out and names shadowed inside come back.
 */
type ScopedFields = Pick<
  EmitterContext,
  "scope" | "declared" | "indentLevel" | "following" | "frame"
>;

/**
 * Execute an emission function with scoped context fields.
 *
 * @example
 * ```typescript
 * const [lines, after] = withScoped(
 *   context,
 *   { indentLevel: context.indentLevel + 1 },
 *   (inner) => emitBlockBody(block, inner)
 * );
 * ```
 */
export const withScoped = <T>(
  context: EmitterContext,
  scopedPatch: Partial<ScopedFields>,
  emit: (ctx: EmitterContext) => [T, EmitterContext]
): [T, EmitterContext] => {
  const saved: ScopedFields = {
    scope: context.scope,
    declared: context.declared,
    indentLevel: context.indentLevel,
    following: context.following,
    frame: context.frame,
  };

  const childContext: EmitterContext = { ...context, ...scopedPatch };
  const [result, innerContext] = emit(childContext);

  return [result, { ...innerContext, ...saved }];
};
