import Fastify, { type FastifyInstance } from "fastify";
import type { MigrationStatusPayload } from "@ledger-migrate/shared";
import { getMigrationStatus } from "./db/runner.js";
import { MigrationError, describeCause } from "./errors.js";
import type { Logger } from "./logger.js";

interface ApiErrorPayload {
  error: string;
  message: string;
}

export interface StatusServerOptions {
  dbFilePath: string;
  migrationsDirectory: string;
  busyTimeoutMs: number;
  logger: Logger;
}

/**
 * Read-only view of the ledger for tooling that audits applied migrations.
 */
export function buildServer(options: StatusServerOptions): FastifyInstance {
  const server = Fastify({
    logger: false
  });

  server.get("/health", async () => ({ status: "ok" }));

  server.get("/migrations", async (_request, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");

    try {
      const status: MigrationStatusPayload = await getMigrationStatus({
        dbFilePath: options.dbFilePath,
        migrationsDirectory: options.migrationsDirectory,
        busyTimeoutMs: options.busyTimeoutMs
      });

      return reply.status(200).send(status);
    } catch (error) {
      options.logger.error({ err: error }, "status.failed");

      const payload: ApiErrorPayload = {
        error: error instanceof MigrationError ? error.code : "STATUS_UNAVAILABLE",
        message: describeCause(error)
      };
      return reply.status(500).send(payload);
    }
  });

  return server;
}

/**
 * Starts the status server on the provided host and port.
 */
export async function startServer(
  options: StatusServerOptions & { port: number; host: string }
): Promise<FastifyInstance> {
  const server = buildServer(options);

  await server.listen({ port: options.port, host: options.host });
  options.logger.info({ port: options.port, host: options.host }, "status.listening");

  return server;
}
