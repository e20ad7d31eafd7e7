import type Database from "better-sqlite3";
import {
  LEDGER_TABLE_NAME,
  ledgerRowSchema,
  toLedgerEntry,
  type LedgerEntry,
  type MigrationId
} from "@ledger-migrate/shared";
import { LedgerWriteError, describeCause } from "../errors.js";
import { listTableColumns } from "./database.js";

const requiredColumns = ["migration_id", "applied_at"];

const detailColumns = ["description", "rollback_strategy"];

export interface LedgerRecordDetails {
  description?: string;
  rollbackStrategy?: string;
}

export interface MigrationLedgerOptions {
  /** Never creates or alters the table; a missing table reads as empty. */
  readOnly?: boolean;
}

/**
 * Record of applied migrations, kept in the target database itself. The
 * table is created on first use. A pre-existing table that only has
 * `migration_id` and `applied_at` gains the detail columns.
 */
export class MigrationLedger {
  private columns: string[] | null = null;

  private readonly readOnly: boolean;

  constructor(
    private readonly database: Database.Database,
    options: MigrationLedgerOptions = {}
  ) {
    this.readOnly = options.readOnly ?? false;
  }

  isApplied(migrationId: MigrationId): boolean {
    const row = this.withLedger("read", (columns) =>
      columns.length === 0
        ? undefined
        : this.database
            .prepare(`SELECT migration_id FROM ${LEDGER_TABLE_NAME} WHERE migration_id = ?`)
            .get(migrationId)
    );

    return row !== undefined;
  }

  /**
   * Returns false when the id was already recorded; the existing entry is kept.
   */
  recordApplied(migrationId: MigrationId, appliedAt: Date, details: LedgerRecordDetails = {}): boolean {
    if (this.readOnly) {
      throw new LedgerWriteError(`Ledger ${LEDGER_TABLE_NAME} is open read-only; cannot record ${migrationId}.`);
    }

    const result = this.withLedger("write", () =>
      this.database
        .prepare(
          `
INSERT INTO ${LEDGER_TABLE_NAME} (migration_id, applied_at, description, rollback_strategy)
VALUES (?, ?, ?, ?)
ON CONFLICT (migration_id) DO NOTHING
`
        )
        .run(migrationId, appliedAt.toISOString(), details.description ?? "", details.rollbackStrategy ?? "")
    );

    return result.changes === 1;
  }

  list(): LedgerEntry[] {
    const rows = this.withLedger<unknown[]>("read", (columns) => {
      if (columns.length === 0) {
        return [];
      }

      // Read-only connections cannot add the detail columns, so absent ones read as blank.
      const selected = [
        ...requiredColumns,
        ...detailColumns.map((column) => (columns.includes(column) ? column : `'' AS ${column}`))
      ];
      return this.database
        .prepare(`SELECT ${selected.join(", ")} FROM ${LEDGER_TABLE_NAME} ORDER BY migration_id`)
        .all();
    });

    return rows.map((row) => {
      const parsed = ledgerRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new LedgerWriteError(
          `Ledger table ${LEDGER_TABLE_NAME} holds an unreadable row: ${parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ")}`
        );
      }
      return toLedgerEntry(parsed.data);
    });
  }

  private ensureTable(): string[] {
    if (this.columns !== null) {
      return this.columns;
    }

    if (!this.readOnly) {
      this.database.exec(`
CREATE TABLE IF NOT EXISTS ${LEDGER_TABLE_NAME} (
  migration_id TEXT PRIMARY KEY,
  applied_at TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  rollback_strategy TEXT NOT NULL DEFAULT ''
);
`);
    }

    const columns = listTableColumns(this.database, LEDGER_TABLE_NAME).map((column) => column.toLowerCase());
    if (columns.length === 0) {
      this.columns = columns;
      return columns;
    }

    const missingColumns = requiredColumns.filter((column) => !columns.includes(column));
    if (missingColumns.length > 0) {
      throw new LedgerWriteError(
        `Ledger table ${LEDGER_TABLE_NAME} is missing column(s): ${missingColumns.join(", ")}`
      );
    }

    if (!this.readOnly) {
      for (const column of detailColumns.filter((candidate) => !columns.includes(candidate))) {
        this.database.exec(`ALTER TABLE ${LEDGER_TABLE_NAME} ADD COLUMN ${column} TEXT NOT NULL DEFAULT ''`);
        columns.push(column);
      }
    }

    this.columns = columns;
    return columns;
  }

  private withLedger<T>(operation: "read" | "write", work: (columns: readonly string[]) => T): T {
    try {
      return work(this.ensureTable());
    } catch (error) {
      if (error instanceof LedgerWriteError) {
        throw error;
      }
      throw new LedgerWriteError(`Ledger ${operation} failed: ${describeCause(error)}`, { cause: error });
    }
  }
}
