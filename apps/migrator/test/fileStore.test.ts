import { afterEach, describe, expect, test } from "vitest";
import { DiscoveryError } from "../src/errors.js";
import { MigrationFileStore, defaultMigrationsDirectory, parseMigrationFile } from "../src/db/fileStore.js";
import { createMigrationsDirectory, removeTempDirectories } from "./tempFiles.js";

afterEach(async () => {
  await removeTempDirectories();
});

describe("parseMigrationFile", () => {
  test("reads description and rollback strategy from the header", () => {
    const migration = parseMigrationFile(
      "0002_add_notes.sql",
      `-- Migration: Add trade notes
-- Rollback: Drop the notes column by table rebuild.
-- Run once per environment.

ALTER TABLE trades ADD COLUMN notes TEXT;
`
    );

    expect(migration).toEqual({
      id: "0002_add_notes",
      fileName: "0002_add_notes.sql",
      description: "Add trade notes",
      rollbackStrategy: "Drop the notes column by table rebuild.",
      statements: ["ALTER TABLE trades ADD COLUMN notes TEXT"]
    });
  });

  test("falls back to the first header line and a backup rollback note", () => {
    const migration = parseMigrationFile("0004_indexes.sql", "-- Extra indexes\nCREATE INDEX i ON t(a);");

    expect(migration.description).toBe("Extra indexes");
    expect(migration.rollbackStrategy).toBe("Irreversible in-place. Restore a backup taken before 0004_indexes.");
  });

  test("uses the id as description when there is no header", () => {
    expect(parseMigrationFile("0005_bare.sql", "SELECT 1;").description).toBe("0005_bare");
  });

  test("rejects unterminated literals", () => {
    expect(() => parseMigrationFile("0006_broken.sql", "INSERT INTO t VALUES ('oops);")).toThrow(DiscoveryError);
  });

  test("rejects files with no statements", () => {
    expect(() => parseMigrationFile("0007_empty.sql", "-- nothing yet\n")).toThrow(
      "Migration file 0007_empty.sql contains no statements."
    );
  });

  test("rejects explicit transaction control", () => {
    expect(() => parseMigrationFile("0008_tx.sql", "BEGIN;\nCREATE TABLE a (id TEXT);\nCOMMIT;")).toThrow(
      "Migration file 0008_tx.sql uses BEGIN at statement 0; transactions are managed by the runner."
    );
  });
});

describe("MigrationFileStore", () => {
  test("lists migrations in id order and ignores other files", async () => {
    const directory = await createMigrationsDirectory({
      "0002_second.sql": "CREATE TABLE b (id TEXT);",
      "README.md": "not a migration",
      "0001_first.sql": "CREATE TABLE a (id TEXT);",
      "0003_third.sql.bak": "CREATE TABLE c (id TEXT);"
    });

    const migrations = await new MigrationFileStore(directory).list();

    expect(migrations.map((migration) => migration.id)).toEqual(["0001_first", "0002_second"]);
  });

  test("fails when two files share a sequence number", async () => {
    const directory = await createMigrationsDirectory({
      "0001_first.sql": "CREATE TABLE a (id TEXT);",
      "0002_second.sql": "CREATE TABLE b (id TEXT);",
      "2_other.sql": "CREATE TABLE c (id TEXT);"
    });

    await expect(new MigrationFileStore(directory).list()).rejects.toThrow(
      "Duplicate migration ID found: 0002_second.sql and 2_other.sql share sequence number 2."
    );
  });

  test("keeps sequence numbers beyond double precision apart", async () => {
    const directory = await createMigrationsDirectory({
      "99999999999999999998_a.sql": "CREATE TABLE a (id TEXT);",
      "99999999999999999999_b.sql": "CREATE TABLE b (id TEXT);"
    });

    const migrations = await new MigrationFileStore(directory).list();

    expect(migrations.map((migration) => migration.id)).toEqual([
      "99999999999999999998_a",
      "99999999999999999999_b"
    ]);
  });

  test("names the malformed file", async () => {
    const directory = await createMigrationsDirectory({
      "0001_first.sql": "CREATE TABLE a (id TEXT);",
      "0002_broken.sql": "/* unfinished"
    });

    await expect(new MigrationFileStore(directory).list()).rejects.toMatchObject({
      code: "DISCOVERY_FAILED",
      fileName: "0002_broken.sql"
    });
  });

  test("fails with DiscoveryError for a missing directory", async () => {
    const directory = await createMigrationsDirectory({});

    await expect(new MigrationFileStore(`${directory}/missing`).list()).rejects.toBeInstanceOf(DiscoveryError);
  });

  test("ships the trade migrations", async () => {
    const migrations = await new MigrationFileStore(defaultMigrationsDirectory).list();

    expect(migrations.map((migration) => migration.id)).toEqual([
      "0001_initial_schema",
      "0002_daily_performance",
      "0003_trade_status_pending_fill"
    ]);

    const rebuild = migrations[2];
    expect(rebuild.description).toBe("Allow pending_fill and expired as trade statuses");
    expect(rebuild.statements[0]).toBe("PRAGMA foreign_keys = OFF");
    expect(rebuild.statements[rebuild.statements.length - 1]).toBe("PRAGMA foreign_keys = ON");
    expect(rebuild.statements).toHaveLength(8);
  });
});
