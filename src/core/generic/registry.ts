// src/core/generic/registry.ts
// Generic registry: method tables, defaults, stats and the event ledger

import { DEFAULT_REGISTRY_CONFIG } from "../config/config";
import { UnknownGenericError, UnknownRegistryError } from "./errors";
import {
  type TypeTag,
  type Implementation,
  type MethodEntry,
  type GenericDef,
  type GenericEvent,
  type GenericRegistryHandle,
  type RegistryOptions,
  type RegistryState,
  type RegistryStats,
  DEFAULT_KEY,
  makeRegistryHandle,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Registry Store
// ─────────────────────────────────────────────────────────────────

const registryStore = new Map<string, RegistryState>();
let nextRegistryId = 0;

function genRegistryId(): string {
  return `registry-${nextRegistryId++}`;
}

/**
 * Reset the registry store (for testing).
 */
export function resetRegistryStore(): void {
  registryStore.clear();
  nextRegistryId = 0;
}

// ─────────────────────────────────────────────────────────────────
// Registry Creation and Access
// ─────────────────────────────────────────────────────────────────

/**
 * Create a new generic function registry.
 */
export function createRegistry(name?: string, options: Partial<RegistryOptions> = {}): GenericRegistryHandle {
  const id = genRegistryId();
  const state: RegistryState = {
    id,
    name,
    generics: new Map(),
    stats: {
      methodHits: 0,
      defaultHits: 0,
      misses: 0,
    },
    events: [],
    options: {
      recordEvents: options.recordEvents ?? DEFAULT_REGISTRY_CONFIG.recordEvents,
      eventLogLimit: options.eventLogLimit ?? DEFAULT_REGISTRY_CONFIG.eventLogLimit,
    },
    createdAt: Date.now(),
  };
  registryStore.set(id, state);
  return makeRegistryHandle(id, name);
}

export function getRegistry(id: string): RegistryState | undefined {
  return registryStore.get(id);
}

export function requireRegistry(id: string): RegistryState {
  const registry = registryStore.get(id);
  if (!registry) throw new UnknownRegistryError(id);
  return registry;
}

function requireGeneric(registry: RegistryState, name: string): GenericDef {
  const def = registry.generics.get(name);
  if (!def) throw new UnknownGenericError(name);
  return def;
}

// ─────────────────────────────────────────────────────────────────
// Generic Declaration
// ─────────────────────────────────────────────────────────────────

/**
 * Declare a generic function. Redeclaring keeps the existing method table.
 * Returns true if the generic was created by this call.
 */
export function declareGeneric(registryId: string, name: string): boolean {
  const registry = requireRegistry(registryId);
  if (registry.generics.has(name)) return false;

  registry.generics.set(name, {
    name,
    methods: new Map(),
    createdAt: Date.now(),
  });
  logGenericEvent(registry, { tag: "declare", generic: name, timestamp: Date.now() });
  return true;
}

export function hasGeneric(registryId: string, name: string): boolean {
  return requireRegistry(registryId).generics.has(name);
}

export function listGenerics(registryId: string): string[] {
  return Array.from(requireRegistry(registryId).generics.keys());
}

// ─────────────────────────────────────────────────────────────────
// Method Table Operations
// ─────────────────────────────────────────────────────────────────

/**
 * Register the method for `typeTag` under `generic`, silently replacing any
 * earlier one. Returns true if a method was replaced.
 */
export function registerMethod<R>(
  registryId: string,
  generic: string,
  typeTag: TypeTag,
  impl: Implementation<R>
): boolean {
  const registry = requireRegistry(registryId);
  const def = requireGeneric(registry, generic);

  const replaced = def.methods.has(typeTag);
  def.methods.set(typeTag, { generic, typeTag, impl, registeredAt: Date.now() });

  logGenericEvent(registry, { tag: "register", generic, typeTag, replaced, timestamp: Date.now() });
  return replaced;
}

/**
 * Set the fallback method for `generic`. Returns true if a default was replaced.
 */
export function registerDefault<R>(registryId: string, generic: string, impl: Implementation<R>): boolean {
  const registry = requireRegistry(registryId);
  const def = requireGeneric(registry, generic);

  const replaced = def.defaultMethod !== undefined;
  def.defaultMethod = { generic, typeTag: DEFAULT_KEY, impl, registeredAt: Date.now() };

  logGenericEvent(registry, { tag: "register", generic, typeTag: DEFAULT_KEY, replaced, timestamp: Date.now() });
  return replaced;
}

/**
 * Look up the method registered for exactly `typeTag`. The default is not consulted.
 */
export function getMethod(registryId: string, generic: string, typeTag: TypeTag): MethodEntry | undefined {
  const registry = requireRegistry(registryId);
  return requireGeneric(registry, generic).methods.get(typeTag);
}

export function getDefaultMethod(registryId: string, generic: string): MethodEntry | undefined {
  const registry = requireRegistry(registryId);
  return requireGeneric(registry, generic).defaultMethod;
}

/**
 * List a generic's methods as "generic.tag" labels, default last.
 */
export function listMethods(registryId: string, generic: string): string[] {
  const def = requireGeneric(requireRegistry(registryId), generic);
  const labels = Array.from(def.methods.keys()).map(tag => `${generic}.${tag}`);
  if (def.defaultMethod) labels.push(`${generic}.${DEFAULT_KEY}`);
  return labels;
}

// ─────────────────────────────────────────────────────────────────
// Registry Statistics
// ─────────────────────────────────────────────────────────────────

export function getRegistryStats(registryId: string): RegistryStats {
  return { ...requireRegistry(registryId).stats };
}

export function getRegistrySummary(registryId: string): {
  id: string;
  name?: string;
  genericCount: number;
  methodCount: number;
  defaultCount: number;
  stats: RegistryStats;
} {
  const registry = requireRegistry(registryId);

  let methodCount = 0;
  let defaultCount = 0;
  for (const def of registry.generics.values()) {
    methodCount += def.methods.size;
    if (def.defaultMethod) defaultCount++;
  }

  return {
    id: registry.id,
    name: registry.name,
    genericCount: registry.generics.size,
    methodCount,
    defaultCount,
    stats: { ...registry.stats },
  };
}

// ─────────────────────────────────────────────────────────────────
// Event Logging
// ─────────────────────────────────────────────────────────────────

export function logGenericEvent(registry: RegistryState, event: GenericEvent): void {
  if (!registry.options.recordEvents) return;
  registry.events.push(event);
  const overflow = registry.events.length - registry.options.eventLogLimit;
  if (overflow > 0) {
    registry.events.splice(0, overflow);
  }
}

export function getRecentEvents(registryId: string, limit: number = 100): GenericEvent[] {
  const events = requireRegistry(registryId).events;
  return limit > 0 ? events.slice(-limit) : [];
}

export function clearEventLog(registryId: string): void {
  requireRegistry(registryId).events.length = 0;
}

export function countEvents(registryId: string, tag: GenericEvent["tag"]): number {
  return requireRegistry(registryId).events.filter(e => e.tag === tag).length;
}
