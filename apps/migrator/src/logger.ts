import pino, { type Logger } from "pino";
import type { LogLevel } from "@ledger-migrate/shared";

export type { Logger };

/**
 * Structured logger for runner events. Writes to stderr so stdout only
 * carries command output.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino(
    {
      name: "ledger-migrate",
      level
    },
    pino.destination(2)
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
