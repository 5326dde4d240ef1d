/**
 * Express middleware for the insights API: body validation, request
 * logging and the fallback error handlers.
 */

import type { Logger } from "@rentdash/shared-utils";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { numberLike } from "../core/actions";
import type { ApiResponse } from "../core/dto";

export class InsightsMiddleware {
  constructor(
    private logger: Logger,
    private exposeErrors: boolean = false
  ) {}

  // ===== Request Validation Middleware =====

  validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return (req: Request, res: Response, next: NextFunction) => {
      const result = schema.safeParse(req.body);
      if (!result.success) {
        return badRequest(res, "Validation error", {
          errors: result.error.errors.map((e) => ({
            path: e.path.join("."),
            message: e.message,
          })),
        });
      }
      req.body = result.data;
      next();
    };
  }

  // ===== Logging Middleware =====

  requestLogger() {
    return (req: Request, res: Response, next: NextFunction) => {
      const startTime = Date.now();

      res.on("finish", () => {
        const logData = {
          method: req.method,
          url: req.originalUrl,
          statusCode: res.statusCode,
          duration: Date.now() - startTime,
        };

        if (res.statusCode >= 400) {
          this.logger.warn("HTTP request failed", logData);
        } else {
          this.logger.debug("HTTP request", logData);
        }
      });

      next();
    };
  }

  // ===== Error Handling Middleware =====

  errorHandler() {
    // express recognizes error handlers by their four parameters
    return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error("Unhandled error:", {
        error: err.message,
        stack: err.stack,
        method: req.method,
        url: req.originalUrl,
      });

      // Body parser rejects malformed JSON with a 400-class status
      if (isHttpError(error) && error.status < 500) {
        return sendError(res, "Malformed request body", error.status);
      }

      sendError(res, this.exposeErrors ? err.message : "Internal server error", 500);
    };
  }

  notFoundHandler() {
    return (req: Request, res: Response) => {
      sendError(res, `Route ${req.method} ${req.originalUrl} not found`, 404);
    };
  }
}

function isHttpError(error: unknown): error is { status: number } {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

// ===== Response Helpers =====

export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(response);
}

export function sendError(res: Response, message: string, statusCode: number = 400): void {
  const response: ApiResponse<never> = {
    success: false,
    error: message,
    timestamp: new Date().toISOString(),
  };
  res.status(statusCode).json(response);
}

function badRequest(res: Response, message: string, details: unknown): void {
  const response: ApiResponse<never> = {
    success: false,
    error: message,
    details,
    timestamp: new Date().toISOString(),
  };
  res.status(400).json(response);
}

// ===== Validation Schemas =====

const identifier = z.union([z.string().trim().min(1), z.number().int()]).transform(String);

export const schemas = {
  // Action params are validated by the dispatcher, which answers with an envelope
  actionParams: z.record(z.unknown()),

  action: z
    .object({
      action_code: z.string().min(1),
    })
    .passthrough(),

  bookingAnalyze: z.object({
    listing_id: identifier,
  }),

  bookingDiscount: z.object({
    listing_id: identifier,
    discount_percent: numberLike.pipe(
      z.number().gt(0, "must be greater than 0").lt(100, "must be less than 100")
    ),
  }),
};
