/**
 * Emitter types - Public API
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
} from "./core.js";
export { EMPTY_FRAGMENT } from "./core.js";
export {
  createUnitState,
  createContext,
  indent,
  dedent,
  nextId,
  withScoped,
} from "./context.js";
export { getIndent, toCppStringLiteral } from "./formatting.js";
export {
  sanitizeIdentifier,
  isCppKeyword,
  moduleNamespace,
  GENERATED_PREFIX,
} from "./identifiers.js";
