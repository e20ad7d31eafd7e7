import { existsSync } from "node:fs";
import Database from "better-sqlite3";
import { afterEach, describe, expect, test } from "vitest";
import { DiscoveryError, LedgerWriteError, MigrationRunError } from "../src/errors.js";
import { getMigrationStatus, runMigrations } from "../src/db/runner.js";
import { createMigrationsDirectory, createTempDbPath, removeTempDirectories } from "./tempFiles.js";

const shippedIds = ["0001_initial_schema", "0002_daily_performance", "0003_trade_status_pending_fill"];

afterEach(async () => {
  await removeTempDirectories();
});

function withDatabase<T>(dbFilePath: string, work: (database: Database.Database) => T): T {
  const database = new Database(dbFilePath);
  database.pragma("foreign_keys = ON");
  try {
    return work(database);
  } finally {
    database.close();
  }
}

function getUserTableNames(database: Database.Database): string[] {
  const rows = database.prepare(`
SELECT name
FROM sqlite_master
WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
ORDER BY name;
`).all() as Array<{ name: string }>;

  return rows.map((row) => row.name);
}

function countRows(database: Database.Database, table: string): number {
  const row = database.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as { count: number };
  return row.count;
}

function seedTrades(database: Database.Database): void {
  const insertTrade = database.prepare(`
INSERT INTO trades (id, status, underlying, spread_type, short_strike, long_strike, expiration, entry_credit)
VALUES (?, ?, ?, 'bull_put', ?, ?, '2026-03-20', ?)
`);
  insertTrade.run("trade-1", "open", "SPY", 500, 495, 1.25);
  insertTrade.run("trade-2", "closed", "QQQ", 420, 415, 0.9);
  insertTrade.run("trade-3", "open", "IWM", 200, 195, 0.6);

  const insertPosition = database.prepare(`
INSERT INTO positions (id, trade_id, underlying, short_strike, long_strike, expiration, contracts)
VALUES (?, ?, ?, ?, ?, '2026-03-20', 1)
`);
  insertPosition.run("position-1", "trade-1", "SPY", 500, 495);
  insertPosition.run("position-2", "trade-3", "IWM", 200, 195);
}

describe("runMigrations", () => {
  test("applies the shipped migrations on a fresh database", async () => {
    const dbFilePath = await createTempDbPath();

    const result = await runMigrations({
      dbFilePath,
      now: () => new Date("2026-02-15T00:00:00.000Z")
    });

    expect(result.appliedVersions).toEqual(shippedIds);
    expect(result.skippedVersions).toEqual([]);
    expect(result.pendingVersions).toEqual([]);
    expect(result.states).toEqual(shippedIds.map((migrationId) => ({ migrationId, state: "applied" })));
    expect(result.lostIndexes).toEqual([]);

    withDatabase(dbFilePath, (database) => {
      expect(getUserTableNames(database)).toEqual([
        "daily_performance",
        "positions",
        "recommendations",
        "schema_migrations",
        "trades"
      ]);
    });
  });

  test("re-running migrations is a no-op", async () => {
    const dbFilePath = await createTempDbPath();

    await runMigrations({ dbFilePath, now: () => new Date("2026-02-15T00:00:00.000Z") });
    const secondRun = await runMigrations({ dbFilePath, now: () => new Date("2026-02-15T00:01:00.000Z") });

    expect(secondRun.appliedVersions).toEqual([]);
    expect(secondRun.skippedVersions).toEqual(shippedIds);

    const status = await getMigrationStatus({ dbFilePath });
    expect(status.pending).toEqual([]);
    expect(status.applied).toHaveLength(3);
    expect(status.applied[1]).toEqual({
      migrationId: "0002_daily_performance",
      appliedAt: "2026-02-15T00:00:00.000Z",
      description: "Daily performance snapshots",
      rollbackStrategy: "Irreversible in-place. Restore a backup taken before 0002_daily_performance."
    });
  });

  test("stops at the target migration", async () => {
    const dbFilePath = await createTempDbPath();

    const result = await runMigrations({ dbFilePath, target: "0001_initial_schema" });

    expect(result.appliedVersions).toEqual(["0001_initial_schema"]);
    expect(result.pendingVersions).toEqual(["0002_daily_performance", "0003_trade_status_pending_fill"]);
    expect(result.states.map((entry) => entry.state)).toEqual(["applied", "pending", "pending"]);
  });

  test("rejects an unknown target", async () => {
    const dbFilePath = await createTempDbPath();

    const run = runMigrations({ dbFilePath, target: "0009_missing" });

    await expect(run).rejects.toBeInstanceOf(DiscoveryError);
    await expect(run).rejects.toThrow("Target migration 0009_missing was not found.");
  });

  test("a dry run applies nothing", async () => {
    const dbFilePath = await createTempDbPath();

    const result = await runMigrations({ dbFilePath, dryRun: true });

    expect(result.appliedVersions).toEqual([]);
    expect(result.pendingVersions).toEqual(shippedIds);
    withDatabase(dbFilePath, (database) => {
      expect(getUserTableNames(database)).toEqual(["schema_migrations"]);
    });
  });

  test("halts at the first failing migration and keeps earlier ones", async () => {
    const dbFilePath = await createTempDbPath();
    const migrationsDirectory = await createMigrationsDirectory({
      "0001_first.sql": "CREATE TABLE first_table (id TEXT PRIMARY KEY);",
      "0002_broken.sql": "CREATE TABLE second_table (id TEXT);\nINSERT INTO missing_table VALUES (1);",
      "0003_third.sql": "CREATE TABLE third_table (id TEXT);"
    });

    const error = await runMigrations({ dbFilePath, migrationsDirectory }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MigrationRunError);
    expect(error).toMatchObject({
      migrationId: "0002_broken",
      statementIndex: 1,
      appliedVersions: ["0001_first"]
    });
    expect((error as MigrationRunError).message).toBe(
      "Migration 0002_broken failed at statement 1: StatementError: no such table: missing_table"
    );

    withDatabase(dbFilePath, (database) => {
      expect(getUserTableNames(database)).toEqual(["first_table", "schema_migrations"]);
    });

    const status = await getMigrationStatus({ dbFilePath, migrationsDirectory });
    expect(status.applied.map((entry) => entry.migrationId)).toEqual(["0001_first"]);
    expect(status.pending).toEqual(["0002_broken", "0003_third"]);
  });

  test("continues a ledger table that only has id and timestamp columns", async () => {
    const dbFilePath = await createTempDbPath();
    const migrationsDirectory = await createMigrationsDirectory({
      "0001_first.sql": "CREATE TABLE first_table (id TEXT PRIMARY KEY);",
      "0002_second.sql": "-- Migration: Second table\nCREATE TABLE second_table (id TEXT PRIMARY KEY);"
    });
    withDatabase(dbFilePath, (database) => {
      database.exec(`
CREATE TABLE first_table (id TEXT PRIMARY KEY);
CREATE TABLE schema_migrations (migration_id TEXT PRIMARY KEY, applied_at TEXT);
INSERT INTO schema_migrations VALUES ('0001_first', '2026-01-10T00:00:00.000Z');
`);
    });

    const result = await runMigrations({
      dbFilePath,
      migrationsDirectory,
      now: () => new Date("2026-02-15T00:00:00.000Z")
    });

    expect(result.appliedVersions).toEqual(["0002_second"]);
    expect(result.skippedVersions).toEqual(["0001_first"]);
    expect((await getMigrationStatus({ dbFilePath, migrationsDirectory })).applied).toEqual([
      { migrationId: "0001_first", appliedAt: "2026-01-10T00:00:00.000Z", description: "", rollbackStrategy: "" },
      {
        migrationId: "0002_second",
        appliedAt: "2026-02-15T00:00:00.000Z",
        description: "Second table",
        rollbackStrategy: "Irreversible in-place. Restore a backup taken before 0002_second."
      }
    ]);
  });

  test("rebuilds trades with a wider status check and keeps its rows, indexes and references", async () => {
    const dbFilePath = await createTempDbPath();
    await runMigrations({ dbFilePath, target: "0002_daily_performance" });
    withDatabase(dbFilePath, seedTrades);

    const result = await runMigrations({ dbFilePath });

    expect(result.appliedVersions).toEqual(["0003_trade_status_pending_fill"]);
    expect(result.lostIndexes).toEqual([]);

    withDatabase(dbFilePath, (database) => {
      expect(countRows(database, "trades")).toBe(3);
      expect(countRows(database, "positions")).toBe(2);
      expect(
        database.prepare("SELECT status FROM trades WHERE id = ?").get("trade-2")
      ).toEqual({ status: "closed" });

      database
        .prepare(
          "INSERT INTO trades (id, status, underlying, spread_type, short_strike, long_strike, expiration, entry_credit) VALUES (?, ?, 'DIA', 'bear_call', 390, 395, '2026-04-17', 0.8)"
        )
        .run("trade-4", "expired");
      expect(() =>
        database
          .prepare(
            "INSERT INTO trades (id, status, underlying, spread_type, short_strike, long_strike, expiration, entry_credit) VALUES (?, ?, 'DIA', 'bear_call', 390, 395, '2026-04-17', 0.8)"
          )
          .run("trade-5", "bogus")
      ).toThrow("CHECK constraint failed");

      const indexes = database
        .prepare(
          "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'trades' AND sql IS NOT NULL ORDER BY name"
        )
        .all() as Array<{ name: string }>;
      expect(indexes.map((index) => index.name)).toEqual(["idx_trades_status", "idx_trades_underlying"]);
      expect(
        database.prepare("SELECT id FROM trades INDEXED BY idx_trades_status WHERE status = 'open' ORDER BY id").all()
      ).toEqual([{ id: "trade-1" }, { id: "trade-3" }]);

      expect(database.prepare("PRAGMA foreign_key_check").all()).toEqual([]);
      expect(() =>
        database
          .prepare(
            "INSERT INTO positions (id, trade_id, underlying, short_strike, long_strike, expiration, contracts) VALUES ('position-9', 'trade-missing', 'SPY', 1, 2, '2026-03-20', 1)"
          )
          .run()
      ).toThrow("FOREIGN KEY constraint failed");
    });

    const secondRun = await runMigrations({ dbFilePath });
    expect(secondRun.appliedVersions).toEqual([]);
    withDatabase(dbFilePath, (database) => {
      expect(countRows(database, "schema_migrations")).toBe(3);
    });
  });
});

describe("getMigrationStatus", () => {
  test("does not create a missing database file", async () => {
    const dbFilePath = await createTempDbPath();

    const status = getMigrationStatus({ dbFilePath });

    await expect(status).rejects.toBeInstanceOf(LedgerWriteError);
    await expect(status).rejects.toThrow(`Cannot open ${dbFilePath} to read the ledger: `);
    expect(existsSync(dbFilePath)).toBe(false);
  });

  test("reports everything pending without creating the ledger table", async () => {
    const dbFilePath = await createTempDbPath();
    withDatabase(dbFilePath, (database) => {
      database.exec("CREATE TABLE unrelated (id TEXT);");
    });

    const status = await getMigrationStatus({ dbFilePath });

    expect(status).toEqual({ applied: [], pending: shippedIds });
    withDatabase(dbFilePath, (database) => {
      expect(getUserTableNames(database)).toEqual(["unrelated"]);
    });
  });
});
