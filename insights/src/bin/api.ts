#!/usr/bin/env node

/**
 * Insights HTTP Server
 *
 * Wires the configured domain accessor, the heuristic tables and the
 * analyzers behind the express app, then listens until signalled.
 */

import { createLogger, type Logger, validateRequiredEnv } from "@rentdash/shared-utils";
import { Pool } from "pg";
import { HttpDomainAccessor } from "../adapters/accessor.http";
import { MemoryDomainAccessor } from "../adapters/accessor.memory";
import { SqlDomainAccessor } from "../adapters/accessor.sql";
import { MemoryDiscountStore } from "../adapters/discounts.memory";
import { loadHeuristicTables } from "../adapters/tables.file";
import { cfg } from "../config/env";
import { type DiscountStore, type DomainAccessor, systemClock } from "../core/ports";
import { getServiceInfo } from "../core/versioning";
import { createApp } from "../http/app";

function createAccessor(
  discounts: DiscountStore,
  logger: Logger
): { accessor: DomainAccessor; close: () => Promise<void> } {
  switch (cfg.accessor) {
    case "sql": {
      const pool = new Pool({
        host: cfg.db.host,
        port: cfg.db.port,
        user: cfg.db.user,
        password: cfg.db.password,
        database: cfg.db.name,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: cfg.upstream.timeoutMs,
      });
      pool.on("error", (error) => logger.error("Idle database client error:", error));
      return { accessor: new SqlDomainAccessor(pool, discounts), close: () => pool.end() };
    }
    case "http":
      validateRequiredEnv(["UPSTREAM_URL"]);
      return {
        accessor: new HttpDomainAccessor(discounts, {
          baseUrl: cfg.upstream.baseUrl,
          timeoutMs: cfg.upstream.timeoutMs,
        }),
        close: async () => {},
      };
    case "memory":
      logger.warn("Using the in-memory accessor; data is empty until seeded");
      return { accessor: new MemoryDomainAccessor(discounts), close: async () => {} };
  }
}

async function startServer(): Promise<void> {
  const logger = createLogger("insights", cfg.logLevel);
  const tables = loadHeuristicTables(cfg.tablesPath);

  logger.info("Starting Insights HTTP Server...", getServiceInfo(tables.version));

  // One side-table per process, shared by whichever accessor is configured
  const discounts = new MemoryDiscountStore();
  const { accessor, close } = createAccessor(discounts, logger.child("accessor"));

  const app = createApp({
    deps: { accessor, tables, clock: systemClock, logger },
    corsOrigins: cfg.corsOrigins,
    exposeErrors: cfg.mode === "development",
  });

  const server = app.listen(cfg.port, () => {
    logger.info(`Listening on port ${cfg.port} (accessor: ${cfg.accessor})`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);

    server.close(() => {
      close()
        .then(() => {
          logger.info("Server shut down");
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error("Error during shutdown:", error);
          process.exit(1);
        });
    });

    // Force shutdown after timeout
    setTimeout(() => {
      logger.error("Forced shutdown after timeout");
      process.exit(1);
    }, 10000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

startServer().catch((error: unknown) => {
  console.error("Insights HTTP Server crashed:", error);
  process.exit(1);
});
