/**
 * Shared configuration utilities for services
 */

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
}

export interface ServiceConfig {
  mode: string;
  logLevel: string;
  port?: number;
}

/**
 * Create database configuration from environment variables
 */
export function createDatabaseConfig(serviceName: string): DatabaseConfig {
  const defaultPort = getDefaultDbPort(serviceName);

  return {
    host: process.env.DB_HOST ?? "localhost",
    port: parseEnvNumber("DB_PORT", defaultPort),
    user: process.env.DB_USER ?? serviceName,
    password: process.env.DB_PASSWORD ?? serviceName,
    name: process.env.DB_NAME ?? `${serviceName}_dev`,
  };
}

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(defaultPort?: number): ServiceConfig {
  return {
    mode: process.env.MODE ?? process.env.NODE_ENV ?? "development",
    logLevel: process.env.LOG_LEVEL ?? "info",
    port:
      defaultPort !== undefined
        ? parseEnvNumber("PORT", defaultPort)
        : undefined,
  };
}

function getDefaultDbPort(serviceName: string): number {
  const portMap: Record<string, number> = {
    insights: 5440,
  };

  return portMap[serviceName] ?? 5432;
}

/**
 * Validate required environment variables
 */
export function validateRequiredEnv(requiredVars: string[]): void {
  const missing = requiredVars.filter((varName) => !process.env[varName]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(", ")}`
    );
  }
}

/**
 * Parse a numeric environment variable, falling back when unset
 */
export function parseEnvNumber(envVar: string, defaultValue: number): number {
  const value = process.env[envVar];
  if (value === undefined || value.trim() === "") return defaultValue;

  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Invalid number in ${envVar}: ${value}`);
  }
  return num;
}

/**
 * Parse comma-separated environment variable into array
 */
export function parseEnvArray(
  envVar: string,
  defaultValue: string[] = []
): string[] {
  const value = process.env[envVar];
  if (!value) return defaultValue;

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Parse an environment variable restricted to a fixed set of values
 */
export function parseEnvChoice<T extends string>(
  envVar: string,
  choices: readonly T[],
  defaultValue: T
): T {
  const value = process.env[envVar];
  if (!value) return defaultValue;

  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new Error(
      `Invalid value in ${envVar}: ${value} (expected one of ${choices.join(", ")})`
    );
  }
  return match;
}
