// src/runtime.ts
// TagDispatchRuntime - one registry with the built-in generics installed
//
// Usage:
//   import { TagDispatchRuntime, attachTag } from "tagdispatch";
//
//   const rt = new TagDispatchRuntime();
//   rt.generic("length").method("MyDNASeq", seq => ...);
//   rt.builtins.print(attachTag("MyDNASeq", { sequence: "ACGT" }));

import type { DisplayPort } from "./ports/display";
import { consoleDisplay } from "./ports/display";
import { type TagDispatchConfig, loadConfig, validateConfig } from "./core/config/config";
import {
  type Builtins,
  type GenericFunction,
  type GenericRegistryHandle,
  type Implementation,
  type TypeTag,
  createRegistry,
  declareGeneric,
  dispatch,
  dispatchTagged,
  installBuiltins,
  makeGeneric,
  registerDefault,
  registerMethod,
} from "./core/generic";

/**
 * Configuration for TagDispatchRuntime
 */
export type RuntimeOptions = {
  /** Registry name, shown in summaries */
  name?: string;
  /** Full configuration; loaded from env and config files when omitted */
  config?: TagDispatchConfig;
  /** Where print writes (default: console) */
  display?: DisplayPort;
};

export class TagDispatchRuntime {
  readonly config: TagDispatchConfig;
  readonly registry: GenericRegistryHandle;
  readonly builtins: Builtins;
  readonly display: DisplayPort;

  /**
   * @throws Error when the configuration fails `validateConfig`
   */
  constructor(options: RuntimeOptions = {}) {
    this.config = options.config ?? loadConfig();
    const validation = validateConfig(this.config);
    if (!validation.valid) {
      throw new Error(`Invalid configuration: ${validation.errors.join("; ")}`);
    }
    this.display = options.display ?? consoleDisplay();
    this.registry = createRegistry(options.name, this.config.registry);
    this.builtins = installBuiltins(this.registry.id, this.display, this.config.display);
  }

  declareGeneric(name: string): boolean {
    return declareGeneric(this.registry.id, name);
  }

  registerMethod(generic: string, typeTag: TypeTag, impl: Implementation): boolean {
    return registerMethod(this.registry.id, generic, typeTag, impl);
  }

  registerDefault(generic: string, impl: Implementation): boolean {
    return registerDefault(this.registry.id, generic, impl);
  }

  /**
   * Dispatch with an explicit tag.
   */
  dispatch(generic: string, object: unknown, typeTag: TypeTag, ...args: unknown[]): unknown {
    return dispatch(this.registry.id, generic, object, typeTag, ...args);
  }

  /**
   * Dispatch on the value's own class.
   */
  call(generic: string, value: unknown, ...args: unknown[]): unknown {
    return dispatchTagged(this.registry.id, generic, value, ...args);
  }

  generic(name: string): GenericFunction {
    return makeGeneric(this.registry.id, name);
  }
}
