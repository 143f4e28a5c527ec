// src/core/generic/types.ts
// Generic function types (single dispatch on a mutable type tag)

// ─────────────────────────────────────────────────────────────────
// Type Tags
// ─────────────────────────────────────────────────────────────────

/**
 * TypeTag: the class label a value is dispatched on (e.g. "integer", "MyDNASeq").
 * Nothing ties a tag to the shape of the value carrying it.
 */
export type TypeTag = string;

/**
 * Key under which the fallback method is reported in listings.
 */
export const DEFAULT_KEY = "default";

// ─────────────────────────────────────────────────────────────────
// Methods and Generics
// ─────────────────────────────────────────────────────────────────

/**
 * Implementation: receives the dispatched object plus any extra arguments.
 */
export type Implementation<R = unknown> = (object: unknown, ...args: unknown[]) => R;

/**
 * MethodEntry: a registered method for a generic function.
 */
export type MethodEntry = {
  /** The generic this method belongs to */
  generic: string;
  /** Tag this method handles, or "default" for the fallback */
  typeTag: TypeTag;
  /** The implementation */
  impl: Implementation;
  /** Registration time */
  registeredAt: number;
};

/**
 * GenericDef: a declared generic and its method table.
 */
export type GenericDef = {
  name: string;
  /** Tag → method; at most one entry per tag */
  methods: Map<TypeTag, MethodEntry>;
  defaultMethod?: MethodEntry;
  createdAt: number;
};

// ─────────────────────────────────────────────────────────────────
// Registry State
// ─────────────────────────────────────────────────────────────────

export type RegistryStats = {
  /** Dispatches answered by a tag-specific method */
  methodHits: number;
  /** Dispatches answered by the default method */
  defaultHits: number;
  /** Dispatches that found nothing */
  misses: number;
};

export type RegistryOptions = {
  /** Whether dispatch and registration events are recorded */
  recordEvents: boolean;
  /** Maximum number of events kept; older events are dropped */
  eventLogLimit: number;
};

export type RegistryState = {
  id: string;
  name?: string;
  generics: Map<string, GenericDef>;
  stats: RegistryStats;
  events: GenericEvent[];
  options: RegistryOptions;
  createdAt: number;
};

/**
 * GenericRegistryHandle: what callers hold on to; the state lives in the store.
 */
export type GenericRegistryHandle = {
  tag: "GenericRegistry";
  id: string;
  name?: string;
};

export function makeRegistryHandle(id: string, name?: string): GenericRegistryHandle {
  return { tag: "GenericRegistry", id, name };
}

// ─────────────────────────────────────────────────────────────────
// Dispatch Results
// ─────────────────────────────────────────────────────────────────

export type DispatchResult =
  | { tag: "found"; method: MethodEntry }
  | { tag: "default"; method: MethodEntry }
  | { tag: "miss"; generic: string; typeTag: TypeTag };

// ─────────────────────────────────────────────────────────────────
// Event Types (for ledger)
// ─────────────────────────────────────────────────────────────────

export type GenericEvent =
  | { tag: "declare"; generic: string; timestamp: number }
  | { tag: "register"; generic: string; typeTag: TypeTag; replaced: boolean; timestamp: number }
  | { tag: "dispatch"; generic: string; typeTag: TypeTag; result: "hit" | "default" | "miss"; timestamp: number };

// ─────────────────────────────────────────────────────────────────
// Tagged Values
// ─────────────────────────────────────────────────────────────────

/**
 * TaggedValue: a payload annotated with a class tag.
 * `typeTag` is deliberately writable: any value may be reclassed at any time.
 */
export type TaggedValue<T = unknown> = {
  tag: "Tagged";
  typeTag: TypeTag;
  payload: T;
};
