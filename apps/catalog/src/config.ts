/**
 * Runtime configuration, read from the environment.
 *
 * The beats folder default is only a deployment convenience; point
 * BEATS_FOLDER at the real audio directory.
 */

import { z } from "zod";

const BooleanFlagSchema = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  BEATS_FOLDER: z.string().min(1).default("./beats"),
  DATABASE_PATH: z.string().min(1).default("./beats.db"),
  SYNC_ON_LIST: BooleanFlagSchema.default("true"),
  SYNC_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
});

export interface CatalogConfig {
  port: number;
  beatsFolder: string;
  databasePath: string;
  /** Sync the folder before every GET /api/beats */
  syncOnList: boolean;
  /** Background refresh interval; 0 disables it */
  syncIntervalMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Parse configuration from an environment map. Empty strings count as
 * unset so that `PORT=` in a .env file falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return {
    port: result.data.PORT,
    beatsFolder: result.data.BEATS_FOLDER,
    databasePath: result.data.DATABASE_PATH,
    syncOnList: result.data.SYNC_ON_LIST,
    syncIntervalMs: result.data.SYNC_INTERVAL_MS,
  };
}
