// src/core/generic/errors.ts
// Error taxonomy for generic dispatch

import type { TypeTag } from "./types";

export class GenericError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "GenericError";
  }
}

export class UnknownRegistryError extends GenericError {
  constructor(public readonly registryId: string) {
    super(`unknown generic registry '${registryId}'`, "UNKNOWN_REGISTRY");
    this.name = "UnknownRegistryError";
  }
}

export class UnknownGenericError extends GenericError {
  constructor(public readonly generic: string) {
    super(`could not find generic function '${generic}'`, "UNKNOWN_GENERIC");
    this.name = "UnknownGenericError";
  }
}

/**
 * Raised when a generic has neither a method for the tag nor a default.
 * The message follows the wording of R's own dispatch failure.
 */
export class NoApplicableMethodError extends GenericError {
  constructor(
    public readonly generic: string,
    public readonly typeTag: TypeTag
  ) {
    super(
      `no applicable method for '${generic}' applied to an object of class "${typeTag}"`,
      "NO_APPLICABLE_METHOD"
    );
    this.name = "NoApplicableMethodError";
  }
}
