// src/core/generic/index.ts
// Generic functions (single dispatch on class tags)

export * from "./types";
export * from "./errors";
export * from "./tagged";
export * from "./registry";
export * from "./dispatch";
export * from "./builtins";
