// src/core/generic/dispatch.ts
// Generic dispatch: exact tag match, then default, then failure

import { NoApplicableMethodError, UnknownGenericError } from "./errors";
import { declareGeneric, logGenericEvent, registerDefault, registerMethod, requireRegistry } from "./registry";
import { getTypeTag } from "./tagged";
import type { DispatchResult, Implementation, TypeTag } from "./types";

// ─────────────────────────────────────────────────────────────────
// Core Dispatch
// ─────────────────────────────────────────────────────────────────

/**
 * Resolve which method a call would use, without invoking it.
 * Pure lookup: stats and the event log are left untouched.
 *
 * Resolution order:
 * 1. Method registered for exactly `typeTag`
 * 2. The generic's default method
 * 3. Miss
 *
 * There is no inheritance chain and no multi-tag resolution.
 */
export function resolveDispatch(registryId: string, generic: string, typeTag: TypeTag): DispatchResult {
  const registry = requireRegistry(registryId);
  const def = registry.generics.get(generic);
  if (!def) throw new UnknownGenericError(generic);

  const method = def.methods.get(typeTag);
  if (method) {
    return { tag: "found", method };
  }

  if (def.defaultMethod) {
    return { tag: "default", method: def.defaultMethod };
  }

  return { tag: "miss", generic, typeTag };
}

function recordDispatch(registryId: string, generic: string, typeTag: TypeTag, result: DispatchResult): void {
  const registry = requireRegistry(registryId);
  switch (result.tag) {
    case "found":
      registry.stats.methodHits++;
      logGenericEvent(registry, { tag: "dispatch", generic, typeTag, result: "hit", timestamp: Date.now() });
      return;
    case "default":
      registry.stats.defaultHits++;
      logGenericEvent(registry, { tag: "dispatch", generic, typeTag, result: "default", timestamp: Date.now() });
      return;
    case "miss":
      registry.stats.misses++;
      logGenericEvent(registry, { tag: "dispatch", generic, typeTag, result: "miss", timestamp: Date.now() });
      return;
  }
}

/**
 * Dispatch `generic` on `object` using the caller-supplied `typeTag`.
 * Errors raised by the selected implementation propagate unchanged.
 */
export function dispatch(
  registryId: string,
  generic: string,
  object: unknown,
  typeTag: TypeTag,
  ...args: unknown[]
): unknown {
  const result = resolveDispatch(registryId, generic, typeTag);
  recordDispatch(registryId, generic, typeTag, result);
  if (result.tag === "miss") {
    throw new NoApplicableMethodError(generic, typeTag);
  }
  return result.method.impl(object, ...args);
}

/**
 * Dispatch on the tag the value itself carries (its class attribute, or its
 * implicit class when untagged). The implementation receives the value as is.
 */
export function dispatchTagged(registryId: string, generic: string, value: unknown, ...args: unknown[]): unknown {
  return dispatch(registryId, generic, value, getTypeTag(value), ...args);
}

// ─────────────────────────────────────────────────────────────────
// Generic Functions
// ─────────────────────────────────────────────────────────────────

/**
 * GenericFunction: a callable bound to one generic in one registry.
 */
export type GenericFunction = {
  (value: unknown, ...args: unknown[]): unknown;
  readonly genericName: string;
  readonly registryId: string;
  /** Register a method for `typeTag`; chainable */
  method(typeTag: TypeTag, impl: Implementation): GenericFunction;
  /** Register the fallback method; chainable */
  default(impl: Implementation): GenericFunction;
};

/**
 * Declare `name` (if needed) and return a function that dispatches on the
 * class of its first argument.
 */
export function makeGeneric(registryId: string, name: string): GenericFunction {
  declareGeneric(registryId, name);

  const call = (value: unknown, ...args: unknown[]): unknown => dispatchTagged(registryId, name, value, ...args);

  const generic: GenericFunction = Object.assign(call, {
    genericName: name,
    registryId,
    method(typeTag: TypeTag, impl: Implementation): GenericFunction {
      registerMethod(registryId, name, typeTag, impl);
      return generic;
    },
    default(impl: Implementation): GenericFunction {
      registerDefault(registryId, name, impl);
      return generic;
    },
  });

  return generic;
}
