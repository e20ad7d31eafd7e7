import type Database from "better-sqlite3";
import type { MigrationId, MigrationState, MigrationStatusPayload } from "@ledger-migrate/shared";
import { DiscoveryError, LedgerWriteError, MigrationRunError, describeCause, statementIndexOf } from "../errors.js";
import { createSilentLogger, type Logger } from "../logger.js";
import { openDatabase } from "./database.js";
import { StatementExecutor } from "./executor.js";
import { MigrationFileStore } from "./fileStore.js";
import { MigrationLedger } from "./ledger.js";
import type {
  LostIndex,
  MigrationRunResult,
  MigrationSource,
  MigrationStatusOptions,
  RunMigrationsOptions
} from "./types.js";

export interface MigrationRunnerDependencies {
  source: MigrationSource;
  ledger: MigrationLedger;
  executor: StatementExecutor;
  logger: Logger;
  now?: () => Date;
}

export interface RunOptions {
  dryRun?: boolean;
  /** Stop after this migration has been applied. */
  target?: MigrationId;
}

/**
 * Applies pending migrations strictly in id order. The first failure stops
 * the run; everything applied before it stays applied.
 */
export class MigrationRunner {
  private readonly source: MigrationSource;

  private readonly ledger: MigrationLedger;

  private readonly executor: StatementExecutor;

  private readonly logger: Logger;

  private readonly now: () => Date;

  constructor(dependencies: MigrationRunnerDependencies) {
    this.source = dependencies.source;
    this.ledger = dependencies.ledger;
    this.executor = dependencies.executor;
    this.logger = dependencies.logger;
    this.now = dependencies.now ?? (() => new Date());
  }

  async run(options: RunOptions = {}): Promise<MigrationRunResult> {
    const migrations = await this.source.list();

    let lastIndex = migrations.length - 1;
    if (options.target !== undefined) {
      lastIndex = migrations.findIndex((migration) => migration.id === options.target);
      if (lastIndex === -1) {
        throw new DiscoveryError(`Target migration ${options.target} was not found.`);
      }
    }

    const states = new Map<MigrationId, MigrationState>(
      migrations.map((migration) => [migration.id, "pending"])
    );
    const appliedVersions: MigrationId[] = [];
    const skippedVersions: MigrationId[] = [];
    const pendingVersions: MigrationId[] = [];
    const lostIndexes: LostIndex[] = [];

    for (const [index, migration] of migrations.entries()) {
      if (this.ledger.isApplied(migration.id)) {
        states.set(migration.id, "applied");
        skippedVersions.push(migration.id);
        this.logger.debug({ migrationId: migration.id }, "migration.skipped");
        continue;
      }

      if (index > lastIndex || options.dryRun === true) {
        pendingVersions.push(migration.id);
        continue;
      }

      states.set(migration.id, "applying");
      this.logger.info(
        { migrationId: migration.id, statementCount: migration.statements.length },
        "migration.applying"
      );

      try {
        const report = this.executor.apply(migration, {
          beforeCommit: () => {
            const recorded = this.ledger.recordApplied(migration.id, this.now(), {
              description: migration.description,
              rollbackStrategy: migration.rollbackStrategy
            });
            if (!recorded) {
              this.logger.warn({ migrationId: migration.id }, "ledger.duplicate");
            }
          }
        });
        lostIndexes.push(...report.lostIndexes);
      } catch (error) {
        states.set(migration.id, "failed");
        const statementIndex = statementIndexOf(error);
        this.logger.error(
          { migrationId: migration.id, statementIndex, err: error },
          "migration.failed"
        );
        throw new MigrationRunError(migration.id, statementIndex, appliedVersions, error);
      }

      states.set(migration.id, "applied");
      appliedVersions.push(migration.id);
      this.logger.info({ migrationId: migration.id }, "migration.applied");
    }

    return {
      appliedVersions,
      skippedVersions,
      pendingVersions,
      states: Array.from(states, ([migrationId, state]) => ({ migrationId, state })),
      lostIndexes
    };
  }

  async status(): Promise<MigrationStatusPayload> {
    const migrations = await this.source.list();
    const applied = this.ledger.list();
    const appliedIds = new Set(applied.map((entry) => entry.migrationId));

    return {
      applied,
      pending: migrations
        .map((migration) => migration.id)
        .filter((migrationId) => !appliedIds.has(migrationId))
    };
  }
}

function createRunner(
  database: Database.Database,
  options: Pick<RunMigrationsOptions, "migrationsDirectory" | "logger" | "now" | "transactionalDdl">,
  readOnly = false
): MigrationRunner {
  const logger = options.logger ?? createSilentLogger();

  return new MigrationRunner({
    source: new MigrationFileStore(options.migrationsDirectory),
    ledger: new MigrationLedger(database, { readOnly }),
    executor: new StatementExecutor({
      database,
      logger,
      transactionalDdl: options.transactionalDdl
    }),
    logger,
    now: options.now
  });
}

/**
 * Reads the ledger without writing: the database file must already exist and
 * is opened read-only.
 */
export async function getMigrationStatus(options: MigrationStatusOptions): Promise<MigrationStatusPayload> {
  let database: Database.Database;

  try {
    database = openDatabase(options.dbFilePath, { busyTimeoutMs: options.busyTimeoutMs, readonly: true });
  } catch (error) {
    throw new LedgerWriteError(
      `Cannot open ${options.dbFilePath} to read the ledger: ${describeCause(error)}`,
      { cause: error }
    );
  }

  try {
    return await createRunner(database, options, true).status();
  } finally {
    database.close();
  }
}

export async function runMigrations(options: RunMigrationsOptions): Promise<MigrationRunResult> {
  const database = openDatabase(options.dbFilePath, { busyTimeoutMs: options.busyTimeoutMs });

  try {
    return await createRunner(database, options).run({
      dryRun: options.dryRun,
      target: options.target
    });
  } finally {
    database.close();
  }
}
