// Re-export all shared utilities
export * from "./config";
export * from "./logger";
export * from "./versioning";

