import type { MigrationId, MigrationState } from "@ledger-migrate/shared";
import type { Logger } from "../logger.js";

export interface MigrationDefinition {
  id: MigrationId;
  fileName: string;
  description: string;
  statements: string[];
  rollbackStrategy: string;
}

/**
 * Anything that can list migrations in apply order.
 */
export interface MigrationSource {
  list(): Promise<MigrationDefinition[]>;
}

export interface LostIndex {
  table: string;
  index: string;
}

export interface ApplyReport {
  migrationId: MigrationId;
  statementCount: number;
  foreignKeysSuspended: boolean;
  lostIndexes: LostIndex[];
}

export interface ApplyOptions {
  /**
   * Runs after the last statement and before the commit, so work done here
   * commits or rolls back together with the migration.
   */
  beforeCommit?: () => void;
}

export interface RunMigrationsOptions {
  dbFilePath: string;
  migrationsDirectory?: string;
  now?: () => Date;
  logger?: Logger;
  busyTimeoutMs?: number;
  transactionalDdl?: boolean;
  dryRun?: boolean;
  target?: MigrationId;
}

export interface MigrationRunResult {
  appliedVersions: MigrationId[];
  skippedVersions: MigrationId[];
  pendingVersions: MigrationId[];
  states: Array<{ migrationId: MigrationId; state: MigrationState }>;
  lostIndexes: LostIndex[];
}

export interface MigrationStatusOptions {
  dbFilePath: string;
  migrationsDirectory?: string;
  busyTimeoutMs?: number;
}
