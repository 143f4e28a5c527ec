// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  partialConfigFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.TAGDISPATCH_RECORD_EVENTS;
    delete process.env.TAGDISPATCH_EVENT_LOG_LIMIT;
    delete process.env.TAGDISPATCH_DISPLAY_INDENT;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    expect(configFromEnv()).toEqual(DEFAULT_CONFIG);
  });

  it("reads registry settings", () => {
    process.env.TAGDISPATCH_RECORD_EVENTS = "false";
    process.env.TAGDISPATCH_EVENT_LOG_LIMIT = "50";
    const config = configFromEnv();
    expect(config.registry.recordEvents).toBe(false);
    expect(config.registry.eventLogLimit).toBe(50);
  });

  it("ignores unparseable values", () => {
    process.env.TAGDISPATCH_RECORD_EVENTS = "maybe";
    process.env.TAGDISPATCH_DISPLAY_INDENT = "wide";
    const config = configFromEnv();
    expect(config.registry.recordEvents).toBe(true);
    expect(config.display.indent).toBe(0);
  });

  it("honors a custom prefix", () => {
    process.env.MYAPP_DISPLAY_INDENT = "4";
    expect(configFromEnv("MYAPP").display.indent).toBe(4);
  });
});

describe("configFromObject", () => {
  it("parses camelCase keys", () => {
    const config = configFromObject({
      registry: { recordEvents: false, eventLogLimit: 10 },
      display: { indent: 2 },
    });
    expect(config).toEqual({
      registry: { recordEvents: false, eventLogLimit: 10 },
      display: { indent: 2 },
    });
  });

  it("handles snake_case keys", () => {
    const config = configFromObject({
      registry: { record_events: false, event_log_limit: 25 },
    });
    expect(config.registry).toEqual({ recordEvents: false, eventLogLimit: 25 });
  });

  it("uses defaults for missing or mistyped fields", () => {
    const config = configFromObject({ registry: { eventLogLimit: "lots" } });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it("partial form keeps only present settings", () => {
    expect(partialConfigFromObject({ display: { indent: 3 } })).toEqual({
      registry: {},
      display: { indent: 3 },
    });
  });
});

describe("mergeConfigs", () => {
  it("later configs override earlier ones", () => {
    const merged = mergeConfigs(
      { registry: { eventLogLimit: 10 } },
      { registry: { eventLogLimit: 20 }, display: { indent: 1 } },
      { display: { indent: 2 } }
    );
    expect(merged).toEqual({
      registry: { recordEvents: true, eventLogLimit: 20 },
      display: { indent: 2 },
    });
  });

  it("keys set to undefined keep the earlier value", () => {
    const merged = mergeConfigs(
      { registry: { eventLogLimit: 10 } },
      { registry: { eventLogLimit: undefined, recordEvents: undefined }, display: { indent: undefined } }
    );
    expect(merged).toEqual({
      registry: { recordEvents: true, eventLogLimit: 10 },
      display: { indent: 0 },
    });
  });

  it("does not mutate the defaults", () => {
    mergeConfigs({ registry: { eventLogLimit: 1 } });
    expect(DEFAULT_CONFIG.registry.eventLogLimit).toBe(1000);
  });
});

describe("config files", () => {
  let dir: string;
  const originalEnv = process.env;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tagdispatch-config-"));
    process.env = { ...originalEnv };
    delete process.env.TAGDISPATCH_RECORD_EVENTS;
    delete process.env.TAGDISPATCH_EVENT_LOG_LIMIT;
    delete process.env.TAGDISPATCH_DISPLAY_INDENT;
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads JSON", () => {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify({ registry: { eventLogLimit: 5 } }));
    expect(configFromFile(file).registry.eventLogLimit).toBe(5);
  });

  it("reads simple YAML", () => {
    const file = path.join(dir, "config.yaml");
    fs.writeFileSync(
      file,
      ["# registry settings", "registry:", "  record_events: false", "  event_log_limit: 7", "display:", "  indent: 2", ""].join("\n")
    );
    expect(configFromFile(file)).toEqual({
      registry: { recordEvents: false, eventLogLimit: 7 },
      display: { indent: 2 },
    });
  });

  it("rejects missing files and unknown formats", () => {
    expect(() => configFromFile(path.join(dir, "absent.json"))).toThrow("Config file not found");
    const file = path.join(dir, "config.toml");
    fs.writeFileSync(file, "");
    expect(() => configFromFile(file)).toThrow("Unsupported config file format: .toml");
  });

  it("loadConfig layers env, file and overrides", () => {
    process.env.TAGDISPATCH_EVENT_LOG_LIMIT = "50";
    process.env.TAGDISPATCH_DISPLAY_INDENT = "4";
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify({ display: { indent: 1 } }));

    const config = loadConfig({ configFile: file, overrides: { registry: { recordEvents: false } } });
    expect(config).toEqual({
      registry: { recordEvents: false, eventLogLimit: 50 },
      display: { indent: 1 },
    });
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("errors on negative limits", () => {
    const result = validateConfig({
      registry: { recordEvents: true, eventLogLimit: -1 },
      display: { indent: -2 },
    });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "eventLogLimit must be a non-negative integer",
      "display.indent must be a non-negative integer",
    ]);
  });

  it("warns when recording into an empty log", () => {
    const result = validateConfig({
      registry: { recordEvents: true, eventLogLimit: 0 },
      display: { indent: 0 },
    });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["recordEvents is on but eventLogLimit is 0, so no events are kept"]);
  });
});
