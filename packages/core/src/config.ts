import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import type { CoordinatorConfig } from "@collab/types";
import { configError } from "./errors.js";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const CoordinatorConfigSchema = z.object({
  database: z
    .object({
      path: z.string().min(1).default("collab_sessions.db"),
      busyTimeoutMs: z.number().int().nonnegative().default(5000),
    })
    .default({}),
  history: z
    .object({
      defaultLimit: z.number().int().positive().default(50),
      recentLimit: z.number().int().nonnegative().default(5),
    })
    .default({}),
  log: z
    .object({
      level: LogLevelSchema.default("info"),
    })
    .default({}),
});

export type ConfigEnv = Record<string, string | undefined>;

/**
 * Validate a raw (already parsed) config document and apply
 * `COLLAB_DB_PATH` / `COLLAB_LOG_LEVEL` overrides.
 */
export function parseCoordinatorConfig(raw: unknown, env: ConfigEnv = {}): CoordinatorConfig {
  const parsed = CoordinatorConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw configError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  const config = parsed.data;

  const dbPath = env.COLLAB_DB_PATH;
  let level = config.log.level;
  if (env.COLLAB_LOG_LEVEL !== undefined) {
    const envLevel = LogLevelSchema.safeParse(env.COLLAB_LOG_LEVEL);
    if (!envLevel.success) {
      throw configError(`Invalid COLLAB_LOG_LEVEL: ${env.COLLAB_LOG_LEVEL}`, {
        value: env.COLLAB_LOG_LEVEL,
      });
    }
    level = envLevel.data;
  }

  return {
    database: { ...config.database, path: dbPath ? dbPath : config.database.path },
    history: config.history,
    log: { level },
  };
}

/**
 * Load config from a YAML file. A missing file yields the defaults.
 */
export async function loadCoordinatorConfig(
  path: string,
  env: ConfigEnv = process.env
): Promise<CoordinatorConfig> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return parseCoordinatorConfig({}, env);
    }
    throw configError(`Cannot read config file ${path}`, { path, cause: String(err) });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw configError(`Malformed YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`, { path });
  }
  return parseCoordinatorConfig(raw, env);
}
