import { z } from "zod";

/**
 * Environment variable validation schema.
 * Paths left unset are derived from ERDB_ROOT in env.ts.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

  // Repository root: schema/, gamedata/ and the per-version output directories live here
  ERDB_ROOT: z.string().min(1).optional(),
  ERDB_GAMEDATA_DIR: z.string().min(1).optional(),
  ERDB_SCHEMA_DIR: z.string().min(1).optional(),
});

export type EnvInput = z.infer<typeof envSchema>;

export interface EnvConfig {
  NODE_ENV: EnvInput["NODE_ENV"];
  LOG_LEVEL: EnvInput["LOG_LEVEL"];
  ERDB_ROOT: string;
  ERDB_GAMEDATA_DIR: string;
  ERDB_SCHEMA_DIR: string;
}
