import { z } from "zod";

/**
 * Name of the table that records applied migrations.
 */
export const LEDGER_TABLE_NAME = "schema_migrations";

/**
 * Migration ids are the migration file name without `.sql`: a zero-padded
 * sequence number, an underscore, and a slug.
 */
export type MigrationId = string;

export type MigrationState = "pending" | "applying" | "applied" | "failed";

export interface LedgerEntry {
	migrationId: MigrationId;
	appliedAt: string;
	description: string;
	rollbackStrategy: string;
}

export interface MigrationStatusPayload {
	applied: LedgerEntry[];
	pending: MigrationId[];
}

export const migrationErrorCodes = [
	"DISCOVERY_FAILED",
	"SCHEMA_MISMATCH",
	"STATEMENT_FAILED",
	"LEDGER_WRITE_FAILED",
	"CONSISTENCY_VIOLATION",
	"MIGRATION_FAILED"
] as const;

export type MigrationErrorCode = (typeof migrationErrorCodes)[number];

export const migrationIdSchema = z.string().regex(/^\d+_[A-Za-z0-9_-]+$/);
const isoDateTimeSchema = z.string().datetime({ offset: true });

/**
 * Shape of one `schema_migrations` row as it comes back from SQLite.
 */
export const ledgerRowSchema = z.object({
	migration_id: z.string().min(1),
	applied_at: isoDateTimeSchema,
	description: z.string(),
	rollback_strategy: z.string()
});

export type LedgerRow = z.infer<typeof ledgerRowSchema>;

export const migrationStatusPayloadSchema = z.object({
	applied: z.array(
		z.object({
			migrationId: z.string().min(1),
			appliedAt: isoDateTimeSchema,
			description: z.string(),
			rollbackStrategy: z.string()
		})
	),
	pending: z.array(migrationIdSchema)
});

export const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof logLevels)[number];

export const logLevelSchema = z.enum(logLevels);

function blankAsUndefined(value: unknown): unknown {
	return typeof value === "string" && value.trim().length === 0 ? undefined : value;
}

export const migratorEnvSchema = z.object({
	MIGRATOR_DB_PATH: z.preprocess(blankAsUndefined, z.string().trim().optional()),
	MIGRATOR_MIGRATIONS_DIR: z.preprocess(blankAsUndefined, z.string().trim().optional()),
	MIGRATOR_LOG_LEVEL: z.preprocess(blankAsUndefined, logLevelSchema.optional()),
	MIGRATOR_BUSY_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).optional()),
	PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(65535).optional()),
	HOST: z.preprocess(blankAsUndefined, z.string().trim().optional())
});

export type MigratorEnv = z.infer<typeof migratorEnvSchema>;

export interface ConfigParseError {
	code: "INVALID_CONFIG";
	message: string;
	issues: string[];
}

export function toLedgerEntry(row: LedgerRow): LedgerEntry {
	return {
		migrationId: row.migration_id,
		appliedAt: row.applied_at,
		description: row.description,
		rollbackStrategy: row.rollback_strategy
	};
}

export function parseMigratorEnv(env: Record<string, string | undefined>): MigratorEnv | ConfigParseError {
	const result = migratorEnvSchema.safeParse(env);

	if (!result.success) {
		return {
			code: "INVALID_CONFIG",
			message: "Invalid migrator environment.",
			issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
		};
	}

	return result.data;
}

export function isConfigParseError(value: MigratorEnv | ConfigParseError): value is ConfigParseError {
	return "code" in value;
}
