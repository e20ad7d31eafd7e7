import type { MigrationErrorCode, MigrationId } from "@ledger-migrate/shared";

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/**
 * The innermost message of a runner failure, prefixed with its error class.
 */
export function describeFailure(cause: unknown): string {
  if (cause instanceof StatementError) {
    return `${cause.name}: ${describeCause(cause.underlyingCause)}`;
  }
  if (cause instanceof SchemaMismatchError || cause instanceof ConsistencyError) {
    return `${cause.name}: ${cause.detail}`;
  }
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  return String(cause);
}

/**
 * Base class for every failure the runner surfaces. Nothing that extends it
 * is retried.
 */
export abstract class MigrationError extends Error {
  abstract readonly code: MigrationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The migration set on disk cannot be used: duplicate ids, unparsable files.
 */
export class DiscoveryError extends MigrationError {
  readonly code = "DISCOVERY_FAILED";

  constructor(
    message: string,
    readonly fileName: string | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class StatementError extends MigrationError {
  readonly code = "STATEMENT_FAILED";

  constructor(
    readonly migrationId: MigrationId,
    readonly statementIndex: number,
    readonly underlyingCause: unknown
  ) {
    super(
      `Statement ${statementIndex} of migration ${migrationId} failed: ${describeCause(underlyingCause)}`,
      { cause: underlyingCause }
    );
  }
}

/**
 * A row copy would not line up column for column. Raised before the copy runs.
 */
export class SchemaMismatchError extends MigrationError {
  readonly code = "SCHEMA_MISMATCH";

  constructor(
    readonly migrationId: MigrationId,
    readonly statementIndex: number,
    readonly detail: string
  ) {
    super(`Statement ${statementIndex} of migration ${migrationId} would copy mismatched columns: ${detail}`);
  }
}

export class LedgerWriteError extends MigrationError {
  readonly code = "LEDGER_WRITE_FAILED";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Foreign key enforcement was not restored, or the data violates it.
 */
export class ConsistencyError extends MigrationError {
  readonly code = "CONSISTENCY_VIOLATION";

  constructor(
    readonly migrationId: MigrationId,
    readonly detail: string
  ) {
    super(`Migration ${migrationId} left the database inconsistent: ${detail}`);
  }
}

/**
 * Wraps the failure of one migration with where it happened. The run stops here.
 */
export class MigrationRunError extends MigrationError {
  readonly code = "MIGRATION_FAILED";

  constructor(
    readonly migrationId: MigrationId,
    readonly statementIndex: number | null,
    readonly appliedVersions: MigrationId[],
    cause: unknown
  ) {
    super(
      statementIndex === null
        ? `Migration ${migrationId} failed: ${describeFailure(cause)}`
        : `Migration ${migrationId} failed at statement ${statementIndex}: ${describeFailure(cause)}`,
      { cause }
    );
  }
}

/**
 * Bad command line or environment. Reported with usage and exit code 2.
 */
export class UsageError extends Error {
  readonly code = "INVALID_USAGE";

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "UsageError";
  }
}

export function statementIndexOf(error: unknown): number | null {
  if (error instanceof StatementError || error instanceof SchemaMismatchError) {
    return error.statementIndex;
  }
  return null;
}
