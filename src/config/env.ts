import dotenv from "dotenv";
import path from "path";
import { envSchema } from "./env.schema.js";
import type { EnvConfig } from "./env.schema.js";
import { ConfigError } from "../errors.js";

dotenv.config();

/**
 * Parse and resolve configuration from an environment map.
 * Relative paths are resolved against the working directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse({
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL,
    ERDB_ROOT: env.ERDB_ROOT,
    ERDB_GAMEDATA_DIR: env.ERDB_GAMEDATA_DIR,
    ERDB_SCHEMA_DIR: env.ERDB_SCHEMA_DIR,
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => ({
      field: issue.path.join("."),
      constraint: issue.message,
    }));
    throw new ConfigError("Environment validation failed", details);
  }

  const root = path.resolve(parsed.data.ERDB_ROOT ?? process.cwd());

  return {
    NODE_ENV: parsed.data.NODE_ENV,
    LOG_LEVEL: parsed.data.LOG_LEVEL,
    ERDB_ROOT: root,
    ERDB_GAMEDATA_DIR: path.resolve(root, parsed.data.ERDB_GAMEDATA_DIR ?? "gamedata"),
    ERDB_SCHEMA_DIR: path.resolve(root, parsed.data.ERDB_SCHEMA_DIR ?? "schema"),
  };
}

let config: EnvConfig;

try {
  config = loadConfig();
} catch (error) {
  console.error("Environment validation failed:", error);
  process.exit(1);
}

export default config;
export type { EnvConfig };
