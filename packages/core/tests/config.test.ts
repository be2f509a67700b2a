/**
 * Tests for the configuration layer
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { config } from "@tessera/core";

const ENV_KEYS = ["TESSERA_DIAGNOSTICS_VERBOSE", "TESSERA_DIAGNOSTICS_ENABLED", "TESSERA_PRECISION"];

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) delete process.env[key];
    config.reset();
  });

  it("should start from the diagnostics defaults", () => {
    expect(config.get("diagnostics")).toEqual({ enabled: true, verbose: false, colors: false });
  });

  it("should return undefined for unknown paths", () => {
    expect(config.get("nothing.here")).toBeUndefined();
    expect(config.get("diagnostics.enabled.deeper")).toBeUndefined();
  });

  it("should merge patches over the defaults", () => {
    config.set({ diagnostics: { verbose: true } });
    expect(config.get("diagnostics")).toEqual({ enabled: true, verbose: true, colors: false });
  });

  it("should read TESSERA_ environment variables", () => {
    process.env.TESSERA_DIAGNOSTICS_VERBOSE = "1";
    process.env.TESSERA_DIAGNOSTICS_ENABLED = "false";
    process.env.TESSERA_PRECISION = "12";
    config.reset();

    expect(config.get("diagnostics.verbose")).toBe(true);
    expect(config.get("diagnostics.enabled")).toBe(false);
    expect(config.get("precision")).toBe(12);
  });

  it("should forget patches after reset", () => {
    config.set({ diagnostics: { colors: true } });
    config.reset();
    expect(config.get("diagnostics.colors")).toBe(false);
  });

  describe("flag", () => {
    it("should return stored booleans", () => {
      config.set({ diagnostics: { enabled: false } });
      expect(config.flag("diagnostics.enabled", true)).toBe(false);
    });

    it("should fall back for missing or non-boolean values", () => {
      config.set({ mode: "fast" });
      expect(config.flag("mode", true)).toBe(true);
      expect(config.flag("missing", false)).toBe(false);
    });
  });
});
