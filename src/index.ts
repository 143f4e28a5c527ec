// src/index.ts
// tagdispatch - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { TagDispatchRuntime, type RuntimeOptions } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// GENERIC FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type TypeTag,
  type Implementation,
  type MethodEntry,
  type GenericDef,
  type GenericEvent,
  type GenericRegistryHandle,
  type DispatchResult,
  type RegistryOptions,
  type RegistryStats,
  type RegistryState,
  type TaggedValue,
  type GenericFunction,
  type Builtins,
  type BuiltinOptions,
  type DefaultSummary,
  createRegistry,
  getRegistry,
  requireRegistry,
  resetRegistryStore,
  declareGeneric,
  hasGeneric,
  listGenerics,
  registerMethod,
  registerDefault,
  getMethod,
  getDefaultMethod,
  listMethods,
  getRegistryStats,
  getRegistrySummary,
  getRecentEvents,
  clearEventLog,
  countEvents,
  resolveDispatch,
  dispatch,
  dispatchTagged,
  makeGeneric,
  installBuiltins,
  attachTag,
  isTagged,
  getTypeTag,
  getContents,
  setTypeTag,
  unclass,
  inherits,
} from "./core/generic";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  GenericError,
  UnknownRegistryError,
  UnknownGenericError,
  NoApplicableMethodError,
} from "./core/generic/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & PORTS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { type DisplayPort, type BufferDisplay, consoleDisplay, bufferDisplay } from "./ports/display";
