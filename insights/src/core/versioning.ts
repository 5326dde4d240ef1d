import { createServiceVersionInfo, type ServiceVersionInfo } from "@rentdash/shared-utils";

export const VERSION = "1.0.0";

export function getServiceInfo(
  tablesVersion?: string
): ServiceVersionInfo & { tablesVersion?: string } {
  return {
    ...createServiceVersionInfo("insights", VERSION),
    ...(tablesVersion ? { tablesVersion } : {}),
  };
}
