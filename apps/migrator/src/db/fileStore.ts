import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { classifyStatement, readHeaderComments, splitStatements } from "@ledger-migrate/sql";
import { DiscoveryError, describeCause } from "../errors.js";
import type { MigrationDefinition, MigrationSource } from "./types.js";

const migrationFilePattern = /^(\d+)_[A-Za-z0-9_-]+\.sql$/;

/**
 * Migrations shipped with the runner.
 */
export const defaultMigrationsDirectory = fileURLToPath(new URL("./migrations/", import.meta.url));

function parseHeader(migrationId: string, header: string[]): Pick<MigrationDefinition, "description" | "rollbackStrategy"> {
  let description: string | null = null;
  let rollbackStrategy: string | null = null;
  const notes: string[] = [];

  for (const line of header) {
    const migrationMatch = /^Migration:\s*(.+)$/i.exec(line);
    if (migrationMatch !== null && description === null) {
      description = migrationMatch[1].trim();
      continue;
    }

    const rollbackMatch = /^Rollback:\s*(.+)$/i.exec(line);
    if (rollbackMatch !== null && rollbackStrategy === null) {
      rollbackStrategy = rollbackMatch[1].trim();
      continue;
    }

    notes.push(line);
  }

  return {
    description: description ?? notes[0] ?? migrationId,
    rollbackStrategy:
      rollbackStrategy ?? `Irreversible in-place. Restore a backup taken before ${migrationId}.`
  };
}

/**
 * Parses one migration file. Throws DiscoveryError when the script cannot be
 * split into statements or tries to manage its own transaction.
 */
export function parseMigrationFile(fileName: string, script: string): MigrationDefinition {
  const id = fileName.replace(/\.sql$/, "");
  const splitResult = splitStatements(script);

  if (!splitResult.ok) {
    throw new DiscoveryError(
      `Migration file ${fileName} is malformed at line ${splitResult.error.line}: ${splitResult.error.message}`,
      fileName
    );
  }

  if (splitResult.value.length === 0) {
    throw new DiscoveryError(`Migration file ${fileName} contains no statements.`, fileName);
  }

  for (const [statementIndex, statement] of splitResult.value.entries()) {
    const classified = classifyStatement(statement);
    if (classified.kind === "transactionControl") {
      throw new DiscoveryError(
        `Migration file ${fileName} uses ${classified.keyword} at statement ${statementIndex}; transactions are managed by the runner.`,
        fileName
      );
    }
  }

  return {
    id,
    fileName,
    statements: splitResult.value,
    ...parseHeader(id, readHeaderComments(script))
  };
}

/**
 * Reads `NNNN_slug.sql` files from one directory. Other files are ignored.
 */
export class MigrationFileStore implements MigrationSource {
  constructor(private readonly directory: string = defaultMigrationsDirectory) {}

  async list(): Promise<MigrationDefinition[]> {
    let files: string[];

    try {
      files = await readdir(this.directory);
    } catch (error) {
      throw new DiscoveryError(
        `Cannot read migrations directory ${this.directory}: ${describeCause(error)}`,
        null,
        { cause: error }
      );
    }

    const orderedFiles = files
      .filter((fileName) => migrationFilePattern.test(fileName))
      .sort((left, right) => left.localeCompare(right));

    // Ids are unique once sequence numbers are: "0003_a" and "3_b" collide too.
    const filesBySequence = new Map<string, string>();
    for (const fileName of orderedFiles) {
      const sequence = fileName.slice(0, fileName.indexOf("_")).replace(/^0+(?=\d)/, "");
      const existing = filesBySequence.get(sequence);
      if (existing !== undefined) {
        throw new DiscoveryError(
          `Duplicate migration ID found: ${existing} and ${fileName} share sequence number ${sequence}.`,
          fileName
        );
      }
      filesBySequence.set(sequence, fileName);
    }

    const migrations: MigrationDefinition[] = [];

    for (const fileName of orderedFiles) {
      const script = await readFile(path.join(this.directory, fileName), "utf8");
      migrations.push(parseMigrationFile(fileName, script));
    }

    return migrations;
  }
}
