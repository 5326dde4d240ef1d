import * as dotenv from "dotenv";
import {
  createDatabaseConfig,
  createServiceConfig,
  parseEnvArray,
  parseEnvChoice,
  parseEnvNumber,
  toLogLevel,
} from "@rentdash/shared-utils";

// Load environment variables
dotenv.config();

export const ACCESSOR_KINDS = ["memory", "sql", "http"] as const;
export type AccessorKind = (typeof ACCESSOR_KINDS)[number];

const service = createServiceConfig(8090);

export const cfg = {
  mode: service.mode,
  port: service.port ?? 8090,
  logLevel: toLogLevel(service.logLevel),
  accessor: parseEnvChoice("ACCESSOR", ACCESSOR_KINDS, "memory"),
  upstream: {
    baseUrl: process.env.UPSTREAM_URL ?? "", // required when ACCESSOR=http
    timeoutMs: parseEnvNumber("UPSTREAM_TIMEOUT_MS", 5000),
  },
  db: createDatabaseConfig("insights"),
  tablesPath: process.env.INSIGHTS_TABLES_PATH || undefined,
  corsOrigins: parseEnvArray("CORS_ORIGINS", ["http://localhost:3000"]),
};

export type InsightsConfig = typeof cfg;
