/**
 * C++ Emitter Types
 * Main dispatcher - re-exports from emitter-types/ subdirectory
 */

export type {
  EmitterOptions,
  EmitterContext,
  EmitNodeOptions,
  EmitOutput,
  CppFragment,
  LocalBinding,
  FunctionFrame,
  UnitState,
  NodeHandler,
} from "./emitter-types/index.js";
export {
  EMPTY_FRAGMENT,
  createUnitState,
  createContext,
  indent,
  dedent,
  nextId,
  withScoped,
  getIndent,
  toCppStringLiteral,
  sanitizeIdentifier,
  isCppKeyword,
  moduleNamespace,
  GENERATED_PREFIX,
} from "./emitter-types/index.js";
