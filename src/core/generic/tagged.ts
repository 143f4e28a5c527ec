// src/core/generic/tagged.ts
// Tagged value helpers: attaching, reading and reassigning class tags

import type { TaggedValue, TypeTag } from "./types";

/**
 * Create a tagged value.
 */
export function attachTag<T>(typeTag: TypeTag, payload: T): TaggedValue<T> {
  return { tag: "Tagged", typeTag, payload };
}

/**
 * Check if a value is tagged.
 */
export function isTagged(v: unknown): v is TaggedValue {
  if (typeof v !== "object" || v === null) return false;
  return "tag" in v && v.tag === "Tagged" && "typeTag" in v && typeof v.typeTag === "string" && "payload" in v;
}

/**
 * Implicit class of an untagged value, named after R's basic modes.
 */
export function implicitTypeTag(v: unknown): TypeTag {
  if (v === null || v === undefined) return "NULL";
  if (Array.isArray(v)) return "list";
  switch (typeof v) {
    case "number":
    case "bigint":
      return "numeric";
    case "string":
      return "character";
    case "boolean":
      return "logical";
    case "function":
      return "function";
    default:
      return "object";
  }
}

/**
 * Get the type tag of a value.
 * Returns the typeTag if tagged, or the implicit class otherwise.
 */
export function getTypeTag(v: unknown): TypeTag {
  return isTagged(v) ? v.typeTag : implicitTypeTag(v);
}

/**
 * Get the contents (payload) of a value.
 */
export function getContents(v: unknown): unknown {
  return isTagged(v) ? v.payload : v;
}

/**
 * Reassign the class of a tagged value in place. No check is made that the
 * payload resembles what methods for the new tag expect.
 */
export function setTypeTag<T>(v: TaggedValue<T>, typeTag: TypeTag): TaggedValue<T> {
  v.typeTag = typeTag;
  return v;
}

/**
 * Strip the class tag, returning the bare payload.
 */
export function unclass(v: unknown): unknown {
  return getContents(v);
}

export function inherits(v: unknown, typeTag: TypeTag): boolean {
  return getTypeTag(v) === typeTag;
}
