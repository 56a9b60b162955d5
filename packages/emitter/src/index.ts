/**
 * luacxx Emitter - C++ code generator
 */

export * from "./types.js";
export { emitNode } from "./node-emitter.js";
export {
  emitUnit,
  emitEntryUnit,
  emitModuleUnit,
} from "./core/module-emitter/orchestrator.js";
export { emitModuleHeader } from "./core/module-emitter/header.js";
export { defaultOptions } from "./core/options.js";
export { EmitterError } from "./core/errors.js";
export { emitUnitFiles, unitFileNames, type UnitFileNames } from "./emitter.js";
