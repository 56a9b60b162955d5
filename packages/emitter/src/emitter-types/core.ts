/**
 * Core emitter types
 */

import type { Diagnostic, SyntaxNode } from "@luacxx/frontend";

/**
 * Options for C++ code generation
 */
export type EmitterOptions = {
  /**
   * Module name for a library unit. Units without one are program entry
   * points and get a `main` function.
   */
  readonly moduleName?: string;
  /** Path of the script the tree came from (header comment, diagnostics) */
  readonly sourcePath?: string;
  /** Indentation style (spaces) */
  readonly indent?: number;
  /** Include timestamp in generated files */
  readonly includeTimestamp?: boolean;
  /** Fixed timestamp, for reproducible headers */
  readonly timestamp?: string;
  /** Recursion limit of the node dispatcher */
  readonly maxDepth?: number;
  /** Header declaring the runtime value types */
  readonly runtimeHeader?: string;
};

/**
 * A piece of generated C++ in expression position.
 */
export type CppFragment = {
  readonly text: string;
  /** Text is a C++ `bool`, not a `LuaValue` */
  readonly nativeBool?: boolean;
  /** Text can be read again after later statements without changing value */
  readonly stable?: boolean;
  /** Text names a result buffer holding every value of a call or `...` */
  readonly multi?: boolean;
};

export const EMPTY_FRAGMENT: CppFragment = { text: "", stable: true };

/**
 * Per-node options passed down by the dispatcher
 */
export type EmitNodeOptions = {
  /** Call-shaped nodes may leave all results in the function's buffer */
  readonly multiret?: boolean;
  /** Results are never read (expression statements) */
  readonly discard?: boolean;
  /** Blocks emit their statements without surrounding braces */
  readonly noBraces?: boolean;
  /** Block is a function body: close with an empty result when it falls through */
  readonly lambda?: boolean;
};

/**
 * How a name in scope is reached from C++.
 * Boxed locals live in a shared cell so closures observe later assignments.
 * Globals are never bound: they live in the global table only.
 */
export type LocalBinding =
  | { readonly kind: "plain"; readonly cppName: string }
  | {
      readonly kind: "boxed";
      readonly cppName: string;
      readonly cellName: string;
    };

/**
 * The function (or unit body) currently being emitted
 */
export type FunctionFrame = {
  readonly kind: "entry" | "module" | "function";
  /** Number of named parameters, where `...` starts */
  readonly fixedParams: number;
  readonly variadic: boolean;
  /** Reusable call result buffer of this function */
  readonly buffer: string;
};

/**
 * Mutable state owned by the translation of one unit.
 * Never shared between units.
 */
export type UnitState = {
  /** String literal value -> cache identifier */
  readonly strings: Map<string, string>;
  /** Global name -> key handle identifier */
  readonly globals: Map<string, string>;
  /** Small integer constant -> cache identifier */
  readonly integers: Map<number, string>;
  /** Library namespace, `namespace.member` or builtin name -> accessor */
  readonly libraries: Map<string, string>;
  /** Modules loaded with a literal require() */
  readonly requiredModules: Set<string>;
  /** Global names and `namespace.member` pairs assigned somewhere in the unit */
  readonly reassigned: ReadonlySet<string>;
  readonly diagnostics: Diagnostic[];
  /** Hoisting stack; the last frame receives new statements */
  readonly hoist: string[][];
  /** Source of every generated identifier suffix */
  counter: number;
};

/**
 * Context passed through emission process
 */
export type EmitterContext = {
  /** Current indentation level */
  readonly indentLevel: number;
  /** Options for emission */
  readonly options: EmitterOptions;
  /** Unit-wide caches and hoisting stack */
  readonly unit: UnitState;
  /** Locals visible at this point */
  readonly scope: ReadonlyMap<string, LocalBinding>;
  /** C++ names declared by enclosing blocks, visible or shadowed */
  readonly declared: ReadonlySet<string>;
  readonly frame: FunctionFrame;
  /** Dispatcher recursion depth */
  readonly depth: number;
  /** Statements after the one being emitted in the current block */
  readonly following: readonly SyntaxNode[];
};

/**
 * Handler signature shared by every node kind
 */
export type NodeHandler = (
  node: SyntaxNode,
  context: EmitterContext,
  options: EmitNodeOptions
) => [CppFragment, EmitterContext];

/**
 * Generated files for one unit
 */
export type EmitOutput = {
  readonly source: string;
  /** Declarations for other units; module units only */
  readonly header?: string;
  readonly requiredModules: readonly string[];
  /** Non-fatal diagnostics */
  readonly diagnostics: readonly Diagnostic[];
};
