import type Database from "better-sqlite3";
import { classifyStatement, type ClassifiedStatement, type CopyRowsStatement } from "@ledger-migrate/sql";
import { ConsistencyError, SchemaMismatchError, StatementError } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  listExplicitIndexes,
  listTableColumns,
  readForeignKeysEnabled,
  tableExists
} from "./database.js";
import type { ApplyOptions, ApplyReport, LostIndex, MigrationDefinition } from "./types.js";

export interface StatementExecutorDependencies {
  database: Database.Database;
  logger: Logger;
  /**
   * Whether the engine can roll back schema changes. SQLite can, so this is
   * only turned off to run statements one by one with no transaction.
   */
  transactionalDdl?: boolean;
}

interface ForeignKeyViolation {
  table: string;
  rowid: number | null;
  parent: string;
  fkid: number;
}

interface DroppedTable {
  table: string;
  indexes: string[];
}

function sameName(left: string, right: string): boolean {
  return left.toLowerCase() === right.toLowerCase();
}

function missingColumns(wanted: readonly string[], available: readonly string[]): string[] {
  return wanted.filter((column) => !available.some((candidate) => sameName(candidate, column)));
}

/**
 * Applies the statements of one migration in file order.
 *
 * `PRAGMA foreign_keys` statements are lifted out of the transaction, since
 * SQLite ignores them inside one: enforcement is switched off before BEGIN
 * and the data is checked with `PRAGMA foreign_key_check` before COMMIT.
 * Whatever happens, the connection's enforcement setting is put back and
 * probed before the migration counts as applied.
 */
export class StatementExecutor {
  private readonly database: Database.Database;

  private readonly logger: Logger;

  private readonly transactionalDdl: boolean;

  constructor(dependencies: StatementExecutorDependencies) {
    this.database = dependencies.database;
    this.logger = dependencies.logger;
    this.transactionalDdl = dependencies.transactionalDdl ?? true;
  }

  apply(migration: MigrationDefinition, options: ApplyOptions = {}): ApplyReport {
    const classified = migration.statements.map((statement) => classifyStatement(statement));
    const foreignKeysSuspended = classified.some(
      (statement) => statement.kind === "foreignKeys" && !statement.enabled
    );
    const foreignKeysWereEnabled = readForeignKeysEnabled(this.database);

    let lostIndexes: LostIndex[];

    try {
      if (this.transactionalDdl) {
        if (foreignKeysSuspended) {
          this.database.pragma("foreign_keys = OFF");
        }

        const transaction = this.database.transaction(() =>
          this.runStatements(migration, classified, foreignKeysSuspended, options)
        );
        lostIndexes = transaction.immediate();
      } else {
        lostIndexes = this.runStatements(migration, classified, foreignKeysSuspended, options);
      }
    } finally {
      if (readForeignKeysEnabled(this.database) !== foreignKeysWereEnabled) {
        this.database.pragma(`foreign_keys = ${foreignKeysWereEnabled ? "ON" : "OFF"}`);
      }
    }

    if (foreignKeysWereEnabled && !readForeignKeysEnabled(this.database)) {
      throw new ConsistencyError(migration.id, "foreign key enforcement is still off after the migration");
    }

    return {
      migrationId: migration.id,
      statementCount: migration.statements.length,
      foreignKeysSuspended,
      lostIndexes
    };
  }

  private runStatements(
    migration: MigrationDefinition,
    classified: readonly ClassifiedStatement[],
    foreignKeysSuspended: boolean,
    options: ApplyOptions
  ): LostIndex[] {
    // Keyed by lowercased name: SQLite table names are case-insensitive.
    const droppedTableIndexes = new Map<string, DroppedTable>();

    for (const [statementIndex, statement] of migration.statements.entries()) {
      const parsed = classified[statementIndex];

      if (parsed.kind === "foreignKeys" && this.transactionalDdl) {
        continue;
      }

      if (parsed.kind === "transactionControl") {
        throw new StatementError(
          migration.id,
          statementIndex,
          new Error(`${parsed.keyword} is not allowed inside a migration; the runner manages transactions.`)
        );
      }

      if (parsed.kind === "copyRows") {
        this.checkCopyColumns(migration.id, statementIndex, parsed);
      }

      if (
        parsed.kind === "dropTable" &&
        !droppedTableIndexes.has(parsed.table.toLowerCase()) &&
        tableExists(this.database, parsed.table)
      ) {
        droppedTableIndexes.set(parsed.table.toLowerCase(), {
          table: parsed.table,
          indexes: listExplicitIndexes(this.database, parsed.table)
        });
      }

      this.logger.debug({ migrationId: migration.id, statementIndex }, "executor.statement");

      try {
        this.database.exec(statement);
      } catch (error) {
        throw new StatementError(migration.id, statementIndex, error);
      }
    }

    if (foreignKeysSuspended) {
      this.checkForeignKeys(migration.id);
    }

    const lostIndexes = this.findLostIndexes(droppedTableIndexes);
    if (lostIndexes.length > 0) {
      this.logger.warn({ migrationId: migration.id, lostIndexes }, "executor.lostIndexes");
    }

    options.beforeCommit?.();

    return lostIndexes;
  }

  private checkCopyColumns(migrationId: string, statementIndex: number, copy: CopyRowsStatement): void {
    const mismatch = (detail: string) => new SchemaMismatchError(migrationId, statementIndex, detail);
    const sourceColumns = listTableColumns(this.database, copy.sourceTable);
    const targetColumns = listTableColumns(this.database, copy.targetTable);

    if (sourceColumns.length === 0) {
      throw mismatch(`source table ${copy.sourceTable} does not exist`);
    }
    if (targetColumns.length === 0) {
      throw mismatch(`target table ${copy.targetTable} does not exist`);
    }

    const insertColumns = copy.targetColumns ?? targetColumns;
    const unknownTargetColumns = missingColumns(insertColumns, targetColumns);
    if (unknownTargetColumns.length > 0) {
      throw mismatch(`${copy.targetTable} has no column(s) ${unknownTargetColumns.join(", ")}`);
    }

    if (copy.selectedColumns !== "*") {
      if (copy.selectedColumns.length !== insertColumns.length) {
        throw mismatch(
          `${insertColumns.length} target column(s) but ${copy.selectedColumns.length} selected value(s)`
        );
      }

      const namedColumns = copy.selectedColumns.filter((column): column is string => column !== null);
      const unknownSourceColumns = missingColumns(namedColumns, sourceColumns);
      if (unknownSourceColumns.length > 0) {
        throw mismatch(`${copy.sourceTable} has no column(s) ${unknownSourceColumns.join(", ")}`);
      }
      return;
    }

    if (insertColumns.length !== sourceColumns.length) {
      throw mismatch(
        `${copy.targetTable} takes ${insertColumns.length} column(s) but ${copy.sourceTable} has ${sourceColumns.length}`
      );
    }

    if (copy.targetColumns !== null) {
      return;
    }

    for (const [position, targetColumn] of targetColumns.entries()) {
      const sourceColumn = sourceColumns[position];
      if (!sameName(targetColumn, sourceColumn)) {
        throw mismatch(
          `column ${position} is ${targetColumn} in ${copy.targetTable} but ${sourceColumn} in ${copy.sourceTable}`
        );
      }
    }
  }

  private checkForeignKeys(migrationId: string): void {
    const violations = this.database.prepare("PRAGMA foreign_key_check").all() as ForeignKeyViolation[];
    const firstViolation = violations[0];

    if (firstViolation !== undefined) {
      throw new ConsistencyError(
        migrationId,
        `${violations.length} foreign key violation(s), first in ${firstViolation.table} referencing ${firstViolation.parent}`
      );
    }
  }

  private findLostIndexes(droppedTableIndexes: ReadonlyMap<string, DroppedTable>): LostIndex[] {
    const lostIndexes: LostIndex[] = [];

    for (const { table, indexes } of droppedTableIndexes.values()) {
      if (!tableExists(this.database, table)) {
        continue;
      }

      const currentIndexes = listExplicitIndexes(this.database, table);
      for (const index of indexes) {
        if (!currentIndexes.some((current) => sameName(current, index))) {
          lostIndexes.push({ table, index });
        }
      }
    }

    return lostIndexes;
  }
}
