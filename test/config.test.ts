import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { applyEnv, loadConfig, loadEnv, DEFAULT_CONFIG_FILE } from "../src/config/load.js";
import { ConfigSchema } from "../src/config/schema.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dashboard-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("loadConfig", () => {
    it("falls back to defaults when the default file is absent", () => {
      expect(loadConfig(undefined, dir)).toEqual({
        quoteAsset: "USDT",
        freshWindowSeconds: 300,
        visualDegradations: 12,
        reconcileFields: ["total_frozen_value", "cash_frozen_value", "assets_frozen_value"],
      });
    });

    it("reads the default file from the working directory", () => {
      fs.writeFileSync(path.join(dir, DEFAULT_CONFIG_FILE), JSON.stringify({ quoteAsset: "EUR", visualDegradations: 4 }));
      const cfg = loadConfig(undefined, dir);
      expect(cfg.quoteAsset).toBe("EUR");
      expect(cfg.visualDegradations).toBe(4);
      expect(cfg.freshWindowSeconds).toBe(300);
    });

    it("throws when an explicit file is missing", () => {
      expect(() => loadConfig(path.join(dir, "missing.json"))).toThrow("Config file not found");
    });

    it("rejects fewer than two visual degradations", () => {
      const file = path.join(dir, "bad.json");
      fs.writeFileSync(file, JSON.stringify({ visualDegradations: 1 }));
      expect(() => loadConfig(file)).toThrow();
    });
  });

  describe("loadEnv", () => {
    it("reads .env without overriding variables already set", () => {
      fs.writeFileSync(
        path.join(dir, ".env"),
        "# dashboard\nQUOTE_ASSET=BTC\nFRESH_WINDOW_S=60\nN_VISUAL_DEGRADATIONS=\n"
      );
      const env: NodeJS.ProcessEnv = { QUOTE_ASSET: "ETH" };
      expect(loadEnv(dir, env)).toEqual({
        QUOTE_ASSET: "ETH",
        FRESH_WINDOW_S: 60,
        N_VISUAL_DEGRADATIONS: undefined,
      });
    });

    it("rejects non-numeric windows", () => {
      expect(() => loadEnv(dir, { FRESH_WINDOW_S: "soon" })).toThrow();
    });
  });

  describe("applyEnv", () => {
    const defaults = ConfigSchema.parse({});

    it("lets the environment override the file", () => {
      const cfg = applyEnv(defaults, { QUOTE_ASSET: "EUR", FRESH_WINDOW_S: 60 });
      expect(cfg.quoteAsset).toBe("EUR");
      expect(cfg.freshWindowSeconds).toBe(60);
      expect(cfg.visualDegradations).toBe(12);
    });

    it("validates the overridden values", () => {
      expect(() => applyEnv(defaults, { N_VISUAL_DEGRADATIONS: 1 })).toThrow();
    });
  });
});
