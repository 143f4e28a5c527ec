// src/core/generic/builtins.ts
// Built-in generics (print, format, length, summary) installed through the
// same registry as user generics, so user methods override them uniformly.

import type { DisplayPort } from "../../ports/display";
import { DEFAULT_CONFIG } from "../config/config";
import { type GenericFunction, makeGeneric } from "./dispatch";
import { getContents, getTypeTag, implicitTypeTag, isTagged } from "./tagged";
import type { TypeTag } from "./types";

export type Builtins = {
  print: GenericFunction;
  format: GenericFunction;
  length: GenericFunction;
  summary: GenericFunction;
};

export type BuiltinOptions = {
  /** Spaces prefixed to the lines of nested list elements */
  indent: number;
};

/**
 * summary.default result for values without a dedicated method.
 */
export type DefaultSummary = {
  length: number;
  class: TypeTag;
  mode: string;
};

// ─────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────

function formatScalar(v: unknown): string {
  switch (typeof v) {
    case "string":
      return JSON.stringify(v);
    case "boolean":
      return v ? "TRUE" : "FALSE";
    case "number":
    case "bigint":
      return String(v);
    case "function":
      return "function";
    default:
      return "NULL";
  }
}

function isScalar(v: unknown): boolean {
  return v === null || v === undefined || (typeof v !== "object" && typeof v !== "function");
}

function indentLines(text: string, indent: number): string {
  const pad = " ".repeat(indent);
  return text.split("\n").map(line => (line.length > 0 ? pad + line : line)).join("\n");
}

function asText(v: unknown): string {
  return typeof v === "string" ? v : String(v);
}

/** Placeholder for a value already being formatted further up. */
export const CYCLE_MARKER = "<cycle>";

/**
 * `inProgress` holds the objects on the current formatting path; nested
 * values reached again through it render as CYCLE_MARKER.
 */
function formatDefault(value: unknown, format: GenericFunction, indent: number, inProgress: Set<object>): string {
  if (typeof value !== "object" || value === null) return formatContents(value, format, indent);
  if (inProgress.has(value)) return CYCLE_MARKER;

  inProgress.add(value);
  try {
    return formatContents(value, format, indent);
  } finally {
    inProgress.delete(value);
  }
}

function formatContents(value: unknown, format: GenericFunction, indent: number): string {
  if (isTagged(value)) {
    return `${asText(format(value.payload))}\nattr(,"class")\n[1] ${JSON.stringify(value.typeTag)}`;
  }
  if (value === null || value === undefined) return "NULL";

  if (Array.isArray(value)) {
    if (value.length === 0) return "list()";
    if (value.every(isScalar)) return `[1] ${value.map(formatScalar).join(" ")}`;
    return value
      .map((item, i) => `[[${i + 1}]]\n${indentLines(asText(format(item)), indent)}`)
      .join("\n\n");
  }

  if (typeof value === "object") {
    const entries = Object.entries(value);
    if (entries.length === 0) return "list()";
    return entries
      .map(([key, item]) => `$${key}\n${indentLines(asText(format(item)), indent)}`)
      .join("\n\n");
  }

  return `[1] ${formatScalar(value)}`;
}

// ─────────────────────────────────────────────────────────────────
// Length and Summary
// ─────────────────────────────────────────────────────────────────

function lengthDefault(value: unknown): number {
  const contents = getContents(value);
  if (contents === null || contents === undefined) return 0;
  if (Array.isArray(contents)) return contents.length;
  if (typeof contents === "object") return Object.keys(contents).length;
  return 1;
}

function modeOf(contents: unknown): string {
  const tag = implicitTypeTag(contents);
  return tag === "object" ? "list" : tag;
}

// ─────────────────────────────────────────────────────────────────
// Installation
// ─────────────────────────────────────────────────────────────────

/**
 * Declare the built-in generics in a registry and give each its default.
 * Existing tag-specific methods are kept; defaults are replaced.
 */
export function installBuiltins(
  registryId: string,
  display: DisplayPort,
  options: Partial<BuiltinOptions> = {}
): Builtins {
  const indent = options.indent ?? DEFAULT_CONFIG.display.indent;

  const format = makeGeneric(registryId, "format");
  const print = makeGeneric(registryId, "print");
  const length = makeGeneric(registryId, "length");
  const summary = makeGeneric(registryId, "summary");

  const inProgress = new Set<object>();
  format.default(value => formatDefault(value, format, indent, inProgress));

  print.default(value => {
    display.write(asText(format(value)));
    return value;
  });

  length.default(lengthDefault);

  summary.default((value): DefaultSummary => {
    const n = length(value);
    return {
      length: typeof n === "number" ? n : lengthDefault(value),
      class: getTypeTag(value),
      mode: modeOf(getContents(value)),
    };
  });

  return { print, format, length, summary };
}
