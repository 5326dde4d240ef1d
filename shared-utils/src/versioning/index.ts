/**
 * Shared versioning utilities for services
 */

export interface ServiceVersionInfo {
  service: string;
  version: string;
  timestamp: string;
}

/**
 * Create service version info
 */
export function createServiceVersionInfo(
  serviceName: string,
  version: string = "1.0.0",
  now: Date = new Date()
): ServiceVersionInfo {
  return {
    service: serviceName,
    version,
    timestamp: now.toISOString(),
  };
}

/**
 * Check if version is compatible (same major version)
 */
export function isVersionCompatible(v1: string, v2: string): boolean {
  const major1 = parseInt(v1.split(".")[0], 10);
  const major2 = parseInt(v2.split(".")[0], 10);

  return major1 === major2;
}
