import * as fs from "fs";
import * as path from "path";
import pino from "pino";
import { ConfigSchema, EnvSchema, type Config, type Env } from "./schema.js";

const logger = pino({ name: "Config" });

export const DEFAULT_CONFIG_FILE = "dashboard.config.json";

function unset(v: string | undefined): string | undefined {
  return v === undefined || v.trim() === "" ? undefined : v;
}

/**
 * Read `.env` from `cwd` into `env` (existing variables win), then
 * validate the variables the dashboard understands.
 */
export function loadEnv(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Env {
  const envPath = path.join(cwd, ".env");
  if (fs.existsSync(envPath)) {
    const contents = fs.readFileSync(envPath, "utf-8");
    for (const line of contents.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const eqIdx = trimmed.indexOf("=");
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      const value = trimmed.slice(eqIdx + 1).trim();
      if (key && !env[key]) {
        env[key] = value;
      }
    }
  }

  return EnvSchema.parse({
    QUOTE_ASSET: unset(env.QUOTE_ASSET),
    FRESH_WINDOW_S: unset(env.FRESH_WINDOW_S),
    N_VISUAL_DEGRADATIONS: unset(env.N_VISUAL_DEGRADATIONS),
  });
}

/**
 * Load the JSON config. A path given explicitly must exist; the default
 * file in the working directory may be absent, in which case every field
 * takes its default.
 */
export function loadConfig(configPath?: string, cwd: string = process.cwd()): Config {
  const resolved = configPath ?? path.join(cwd, DEFAULT_CONFIG_FILE);
  if (!fs.existsSync(resolved)) {
    if (configPath !== undefined) throw new Error(`Config file not found: ${resolved}`);
    logger.debug({ path: resolved }, "No config file, using defaults");
    return ConfigSchema.parse({});
  }
  const cfg = ConfigSchema.parse(JSON.parse(fs.readFileSync(resolved, "utf-8")));
  logger.info({ path: resolved }, "Config loaded");
  return cfg;
}

/** Environment variables override the file; the result is validated again. */
export function applyEnv(cfg: Config, env: Env): Config {
  return ConfigSchema.parse({
    ...cfg,
    quoteAsset: env.QUOTE_ASSET ?? cfg.quoteAsset,
    freshWindowSeconds: env.FRESH_WINDOW_S ?? cfg.freshWindowSeconds,
    visualDegradations: env.N_VISUAL_DEGRADATIONS ?? cfg.visualDegradations,
  });
}

export function loadSettings(configPath?: string, cwd: string = process.cwd()): Config {
  const cfg = applyEnv(loadConfig(configPath, cwd), loadEnv(cwd));
  logger.debug({ cfg }, "Effective config");
  return cfg;
}
