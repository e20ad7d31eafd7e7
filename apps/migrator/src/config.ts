import path from "node:path";
import { isConfigParseError, parseMigratorEnv, type LogLevel } from "@ledger-migrate/shared";
import { defaultBusyTimeoutMs } from "./db/database.js";
import { defaultMigrationsDirectory } from "./db/fileStore.js";
import { UsageError } from "./errors.js";

export interface MigratorConfig {
  dbFilePath: string;
  migrationsDirectory: string;
  logLevel: LogLevel;
  busyTimeoutMs: number;
  port: number;
  host: string;
}

export type ConfigOverrides = Partial<Pick<MigratorConfig, "dbFilePath" | "migrationsDirectory" | "logLevel">>;

/**
 * Environment first, then command line flags on top.
 */
export function resolveConfig(
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd()
): MigratorConfig {
  const parsedEnv = parseMigratorEnv(env);

  if (isConfigParseError(parsedEnv)) {
    throw new UsageError(parsedEnv.message, parsedEnv.issues);
  }

  const dbFilePath =
    overrides.dbFilePath ?? parsedEnv.MIGRATOR_DB_PATH ?? path.join("data", "migrator.sqlite");
  const migrationsDirectory =
    overrides.migrationsDirectory ?? parsedEnv.MIGRATOR_MIGRATIONS_DIR ?? defaultMigrationsDirectory;

  return {
    dbFilePath: path.resolve(cwd, dbFilePath),
    migrationsDirectory: path.resolve(cwd, migrationsDirectory),
    logLevel: overrides.logLevel ?? parsedEnv.MIGRATOR_LOG_LEVEL ?? "info",
    busyTimeoutMs: parsedEnv.MIGRATOR_BUSY_TIMEOUT_MS ?? defaultBusyTimeoutMs,
    port: parsedEnv.PORT ?? 3000,
    host: parsedEnv.HOST ?? "0.0.0.0"
  };
}
