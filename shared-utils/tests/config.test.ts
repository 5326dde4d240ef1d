import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createDatabaseConfig,
  createServiceConfig,
  parseEnvArray,
  parseEnvChoice,
  parseEnvNumber,
  validateRequiredEnv,
} from "../src/config";

describe("config helpers", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should build database config with the service's default port", () => {
    vi.stubEnv("DB_HOST", "");
    vi.stubEnv("DB_PORT", "");
    vi.stubEnv("DB_USER", "");
    vi.stubEnv("DB_PASSWORD", "");
    vi.stubEnv("DB_NAME", "");
    delete process.env.DB_HOST;
    delete process.env.DB_PORT;
    delete process.env.DB_USER;
    delete process.env.DB_PASSWORD;
    delete process.env.DB_NAME;

    expect(createDatabaseConfig("insights")).toEqual({
      host: "localhost",
      port: 5440,
      user: "insights",
      password: "insights",
      name: "insights_dev",
    });
    expect(createDatabaseConfig("other").port).toBe(5432);
  });

  it("should prefer DB_* variables when set", () => {
    vi.stubEnv("DB_HOST", "db.internal");
    vi.stubEnv("DB_PORT", "6543");
    vi.stubEnv("DB_PASSWORD", "test-secret");

    const db = createDatabaseConfig("insights");

    expect(db.host).toBe("db.internal");
    expect(db.port).toBe(6543);
    expect(db.password).toBe("test-secret");
  });

  it("should only resolve a port when a default is given", () => {
    vi.stubEnv("MODE", "test");
    vi.stubEnv("LOG_LEVEL", "warn");
    vi.stubEnv("PORT", "9100");

    expect(createServiceConfig(8090)).toEqual({ mode: "test", logLevel: "warn", port: 9100 });
    expect(createServiceConfig().port).toBeUndefined();
  });

  it("should parse numbers and reject garbage", () => {
    vi.stubEnv("SOME_TIMEOUT", "250");
    expect(parseEnvNumber("SOME_TIMEOUT", 5000)).toBe(250);

    vi.stubEnv("SOME_TIMEOUT", "  ");
    expect(parseEnvNumber("SOME_TIMEOUT", 5000)).toBe(5000);

    vi.stubEnv("SOME_TIMEOUT", "soon");
    expect(() => parseEnvNumber("SOME_TIMEOUT", 5000)).toThrow(
      "Invalid number in SOME_TIMEOUT: soon"
    );
  });

  it("should split comma-separated values", () => {
    vi.stubEnv("ORIGINS", " http://a.test , ,http://b.test");
    expect(parseEnvArray("ORIGINS")).toEqual(["http://a.test", "http://b.test"]);

    vi.stubEnv("ORIGINS", "");
    expect(parseEnvArray("ORIGINS", ["fallback"])).toEqual(["fallback"]);
  });

  it("should restrict a value to the allowed choices", () => {
    const kinds = ["memory", "sql", "http"] as const;

    vi.stubEnv("ACCESSOR_KIND", "sql");
    expect(parseEnvChoice("ACCESSOR_KIND", kinds, "memory")).toBe("sql");

    vi.stubEnv("ACCESSOR_KIND", "");
    expect(parseEnvChoice("ACCESSOR_KIND", kinds, "memory")).toBe("memory");

    vi.stubEnv("ACCESSOR_KIND", "redis");
    expect(() => parseEnvChoice("ACCESSOR_KIND", kinds, "memory")).toThrow(
      "Invalid value in ACCESSOR_KIND: redis (expected one of memory, sql, http)"
    );
  });

  it("should list every missing required variable", () => {
    vi.stubEnv("PRESENT_VAR", "yes");
    vi.stubEnv("ABSENT_ONE", "");
    vi.stubEnv("ABSENT_TWO", "");

    expect(() => validateRequiredEnv(["PRESENT_VAR", "ABSENT_ONE", "ABSENT_TWO"])).toThrow(
      "Missing required environment variables: ABSENT_ONE, ABSENT_TWO"
    );
    expect(() => validateRequiredEnv(["PRESENT_VAR"])).not.toThrow();
  });
});
