export type InsightsErrorCode =
  | "NOT_FOUND"
  | "MISSING_PARAMETER"
  | "INVALID_PARAMETER"
  | "UNKNOWN_ACTION"
  | "UPSTREAM_UNAVAILABLE"
  | "UNEXPECTED";

export class InsightsError extends Error {
  constructor(
    readonly code: InsightsErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends InsightsError {
  constructor(
    readonly entity: "listing" | "owner",
    readonly id: string
  ) {
    super("NOT_FOUND", `${entity === "listing" ? "Listing" : "Owner"} '${id}' not found.`);
  }
}

export class MissingParameterError extends InsightsError {
  constructor(
    readonly actionCode: string,
    readonly missing: string[]
  ) {
    super(
      "MISSING_PARAMETER",
      `Missing required parameter(s) for ${actionCode}: ${missing.join(", ")}`
    );
  }
}

export class InvalidParameterError extends InsightsError {
  constructor(
    readonly actionCode: string,
    readonly details: string[]
  ) {
    super(
      "INVALID_PARAMETER",
      `Invalid parameter(s) for ${actionCode}: ${details.join("; ")}`
    );
  }
}

export class UnknownActionError extends InsightsError {
  constructor(readonly actionCode: string) {
    super("UNKNOWN_ACTION", `Unknown action code: ${actionCode}`);
  }
}

export class UpstreamUnavailableError extends InsightsError {
  constructor(operation: string, cause?: unknown) {
    super(
      "UPSTREAM_UNAVAILABLE",
      `Upstream data source unavailable during ${operation}${
        cause instanceof Error ? `: ${cause.message}` : ""
      }`,
      { cause }
    );
  }
}

export function isInsightsError(error: unknown): error is InsightsError {
  return error instanceof InsightsError;
}

/**
 * Run an accessor read whose failure the caller treats as "no data".
 * Only upstream failures are absorbed; anything else propagates.
 */
export async function readOrEmpty<T>(
  read: () => Promise<T[]>,
  onUpstreamFailure: (error: UpstreamUnavailableError) => void
): Promise<T[]> {
  try {
    return await read();
  } catch (error) {
    if (error instanceof UpstreamUnavailableError) {
      onUpstreamFailure(error);
      return [];
    }
    throw error;
  }
}
