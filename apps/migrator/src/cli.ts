import { mkdir } from "node:fs/promises";
import path from "node:path";
import { logLevelSchema, migrationIdSchema, type LogLevel, type MigrationId } from "@ledger-migrate/shared";
import { resolveConfig, type ConfigOverrides, type MigratorConfig } from "./config.js";
import { getMigrationStatus, runMigrations } from "./db/runner.js";
import { MigrationError, UsageError, describeCause } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { startServer } from "./server.js";

type CommandName = "up" | "status" | "serve" | "help";

interface ParsedArgs {
  command: CommandName;
  overrides: ConfigOverrides;
  target: MigrationId | undefined;
  dryRun: boolean;
}

export interface CliIo {
  env: Record<string, string | undefined>;
  stdout: { write: (text: string) => unknown };
  stderr: { write: (text: string) => unknown };
  cwd?: string;
  /** Defaults to a pino logger at the configured level, on stderr. */
  logger?: Logger;
}

export const usage = `Usage: ledger-migrate [command] [options]

Commands:
  up        Apply pending migrations (default)
  status    List applied and pending migrations
  serve     Start the read-only ledger status server
  help      Show this message

Options:
  --db <path>          SQLite database file (env MIGRATOR_DB_PATH)
  --dir <path>         Migrations directory (env MIGRATOR_MIGRATIONS_DIR)
  --to <id>            Stop after this migration (up only)
  --dry-run            List what up would apply without applying it
  --log-level <level>  fatal, error, warn, info, debug, trace or silent
`;

const commands: readonly CommandName[] = ["up", "status", "serve", "help"];

function isCommandName(value: string): value is CommandName {
  return commands.some((command) => command === value);
}

function parseLogLevel(value: string): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`Unknown log level '${value}'.`);
  }
  return parsed.data;
}

function parseTarget(value: string): MigrationId {
  if (!migrationIdSchema.safeParse(value).success) {
    throw new UsageError(`'${value}' is not a migration id; expected a name like 0003_add_notes.`);
  }
  return value;
}

/**
 * Parse command line arguments (without the node and script entries).
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    command: "up",
    overrides: {},
    target: undefined,
    dryRun: false
  };
  let commandSeen = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];

    if (!arg.startsWith("-")) {
      if (commandSeen || !isCommandName(arg)) {
        throw new UsageError(`Unexpected argument '${arg}'.`);
      }
      parsed.command = arg;
      commandSeen = true;
      continue;
    }

    const equalsIndex = arg.indexOf("=");
    const flag = equalsIndex === -1 ? arg : arg.slice(0, equalsIndex);
    const readValue = (): string => {
      if (equalsIndex !== -1) {
        return arg.slice(equalsIndex + 1);
      }
      const value = argv[index + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`Option ${flag} needs a value.`);
      }
      index += 1;
      return value;
    };

    switch (flag) {
      case "--db":
        parsed.overrides.dbFilePath = readValue();
        break;
      case "--dir":
        parsed.overrides.migrationsDirectory = readValue();
        break;
      case "--to":
        parsed.target = parseTarget(readValue());
        break;
      case "--log-level":
        parsed.overrides.logLevel = parseLogLevel(readValue());
        break;
      case "--dry-run":
        parsed.dryRun = true;
        break;
      case "--help":
      case "-h":
        parsed.command = "help";
        break;
      default:
        throw new UsageError(`Unknown option '${flag}'.`);
    }
  }

  if (parsed.command !== "up" && (parsed.target !== undefined || parsed.dryRun)) {
    throw new UsageError("--to and --dry-run only apply to the up command.");
  }

  return parsed;
}

async function runUp(args: ParsedArgs, config: MigratorConfig, io: CliIo, logger: Logger): Promise<void> {
  await mkdir(path.dirname(config.dbFilePath), { recursive: true });

  const result = await runMigrations({
    dbFilePath: config.dbFilePath,
    migrationsDirectory: config.migrationsDirectory,
    busyTimeoutMs: config.busyTimeoutMs,
    logger,
    dryRun: args.dryRun,
    target: args.target
  });

  if (args.dryRun) {
    io.stdout.write(
      result.pendingVersions.length === 0
        ? "No pending migrations.\n"
        : `Pending migrations: ${result.pendingVersions.join(", ")}\n`
    );
    return;
  }

  if (result.appliedVersions.length === 0) {
    io.stdout.write("No pending migrations.\n");
    return;
  }

  io.stdout.write(`Applied migrations: ${result.appliedVersions.join(", ")}\n`);

  for (const lostIndex of result.lostIndexes) {
    io.stderr.write(`Warning: index ${lostIndex.index} on ${lostIndex.table} was not recreated.\n`);
  }
}

async function runStatus(config: MigratorConfig, io: CliIo): Promise<void> {
  const status = await getMigrationStatus({
    dbFilePath: config.dbFilePath,
    migrationsDirectory: config.migrationsDirectory,
    busyTimeoutMs: config.busyTimeoutMs
  });

  if (status.applied.length === 0 && status.pending.length === 0) {
    io.stdout.write("No migrations found.\n");
    return;
  }

  for (const entry of status.applied) {
    io.stdout.write(`applied  ${entry.migrationId}  ${entry.appliedAt}\n`);
  }
  for (const migrationId of status.pending) {
    io.stdout.write(`pending  ${migrationId}\n`);
  }
}

/**
 * Runs one CLI invocation and resolves to its exit code: 0 on success, 1 when
 * a migration or the ledger fails, 2 for bad usage.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let args: ParsedArgs;
  let config: MigratorConfig;

  try {
    args = parseArgs(argv);
    config = resolveConfig(io.env, args.overrides, io.cwd);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\n`);
      for (const issue of error.issues) {
        io.stderr.write(`  ${issue}\n`);
      }
      io.stderr.write(`\n${usage}`);
      return 2;
    }
    throw error;
  }

  if (args.command === "help") {
    io.stdout.write(usage);
    return 0;
  }

  const logger = io.logger ?? createLogger(config.logLevel);

  try {
    if (args.command === "status") {
      await runStatus(config, io);
    } else if (args.command === "serve") {
      await startServer({
        dbFilePath: config.dbFilePath,
        migrationsDirectory: config.migrationsDirectory,
        busyTimeoutMs: config.busyTimeoutMs,
        logger,
        port: config.port,
        host: config.host
      });
    } else {
      await runUp(args, config, io, logger);
    }
  } catch (error) {
    if (error instanceof MigrationError) {
      io.stderr.write(`${error.message}\n`);
      return 1;
    }
    io.stderr.write(`Unexpected failure: ${describeCause(error)}\n`);
    return 1;
  }

  return 0;
}
