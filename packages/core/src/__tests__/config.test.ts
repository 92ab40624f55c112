/**
 * Tests for config loading and precedence
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { config, defineConfig, ConfigError } from "../index.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sexpr-config-"));
    config.reset({ searchFrom: dir });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    config.reset();
    rmSync(dir, { recursive: true, force: true });
  });

  describe("defaults", () => {
    it("starts with debug off and a depth limit of 256", () => {
      expect(config.getAll()).toEqual({ debug: false, maxDepth: 256 });
      expect(config.has("debug")).toBe(false);
    });

    it("reports no config file when none exists", () => {
      expect(config.getConfigFilePath()).toBeUndefined();
    });
  });

  describe("environment variables", () => {
    it("reads SEXPR_DEBUG", () => {
      vi.stubEnv("SEXPR_DEBUG", "1");
      expect(config.get("debug")).toBe(true);
    });

    it("reads SEXPR_DEBUG=false as false", () => {
      vi.stubEnv("SEXPR_DEBUG", "false");
      expect(config.get("debug")).toBe(false);
    });

    it("accepts the depth key with or without an underscore", () => {
      vi.stubEnv("SEXPR_MAX_DEPTH", "64");
      expect(config.get("maxDepth")).toBe(64);

      vi.unstubAllEnvs();
      vi.stubEnv("SEXPR_MAXDEPTH", "32");
      config.reset({ searchFrom: dir });
      expect(config.get("maxDepth")).toBe(32);
    });

    it("ignores unknown SEXPR_ variables", () => {
      vi.stubEnv("SEXPR_COLOR", "always");
      expect(config.getAll()).toEqual({ debug: false, maxDepth: 256 });
    });

    it("skips a malformed value with a warning", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      vi.stubEnv("SEXPR_MAX_DEPTH", "deep");
      expect(config.get("maxDepth")).toBe(256);
      expect(spy).toHaveBeenCalledWith(
        '[sexpr:config] warning: Invalid value for "maxDepth" from env: expected a non-negative integer, got "deep"; ignoring it'
      );
    });

    it("keeps the other values when one is malformed", () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      vi.stubEnv("SEXPR_DEBUG", "yes");
      vi.stubEnv("SEXPR_MAX_DEPTH", "9");
      expect(config.getAll()).toEqual({ debug: false, maxDepth: 9 });
    });

    it("warns only once per load", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      vi.stubEnv("SEXPR_DEBUG", "yes");
      config.get("debug");
      config.get("debug");
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe("config files", () => {
    it("loads .sexprrc.json", () => {
      writeFileSync(join(dir, ".sexprrc.json"), JSON.stringify({ maxDepth: 12 }));
      expect(config.get("maxDepth")).toBe(12);
      expect(config.getConfigFilePath()).toBe(join(dir, ".sexprrc.json"));
    });

    it("loads the sexpr key of package.json", () => {
      writeFileSync(
        join(dir, "package.json"),
        JSON.stringify({ name: "fixture", sexpr: { debug: true } })
      );
      expect(config.get("debug")).toBe(true);
    });

    it("lets the environment override the file", () => {
      writeFileSync(join(dir, ".sexprrc.json"), JSON.stringify({ maxDepth: 12 }));
      vi.stubEnv("SEXPR_MAX_DEPTH", "7");
      expect(config.get("maxDepth")).toBe(7);
    });

    it("ignores a file that does not hold an object", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      const file = join(dir, ".sexprrc.json");
      writeFileSync(file, JSON.stringify([1, 2]));
      expect(config.getAll()).toEqual({ debug: false, maxDepth: 256 });
      expect(config.getConfigFilePath()).toBeUndefined();
      expect(spy).toHaveBeenCalledWith(
        `[sexpr:config] warning: ignoring ${file}: config file must contain an object`
      );
    });

    it("skips a wrongly typed value and keeps the rest of the file", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      const file = join(dir, ".sexprrc.json");
      writeFileSync(file, JSON.stringify({ debug: true, maxDepth: -3 }));
      expect(config.getAll()).toEqual({ debug: true, maxDepth: 256 });
      expect(spy).toHaveBeenCalledWith(
        `[sexpr:config] warning: Invalid value for "maxDepth" from ${file}: expected a non-negative integer, got -3; ignoring it`
      );
    });

    it("falls back to defaults when a file cannot be read", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      writeFileSync(join(dir, ".sexprrc.json"), "{ not json");
      expect(config.get("maxDepth")).toBe(256);
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy.mock.calls[0][0]).toMatch(/^\[sexpr:config\] warning: could not load config file: /);
    });
  });

  describe("set", () => {
    it("overrides every other source", () => {
      vi.stubEnv("SEXPR_MAX_DEPTH", "7");
      config.set({ maxDepth: 3 });
      expect(config.get("maxDepth")).toBe(3);
    });

    it("is cleared by reset", () => {
      config.set({ debug: true });
      config.reset({ searchFrom: dir });
      expect(config.get("debug")).toBe(false);
    });

    it("validates programmatic values", () => {
      expect(() => config.set({ maxDepth: 1.5 })).toThrow(ConfigError);
      expect(() => config.set({ maxDepth: 1.5 })).toThrow(
        'Invalid value for "maxDepth" from set: expected a non-negative integer, got 1.5'
      );
    });

    it("accepts values written with defineConfig", () => {
      const values = defineConfig({ debug: true, maxDepth: 5 });
      expect(values).toEqual({ debug: true, maxDepth: 5 });
      config.set(values);
      expect(config.getAll()).toEqual({ debug: true, maxDepth: 5 });
    });
  });
});
