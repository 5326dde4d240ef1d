/**
 * Insights HTTP Routes
 *
 * One endpoint per action plus a generic action endpoint. Action endpoints
 * always answer 200 with the dispatcher's envelope; only a body that is not
 * a JSON object is rejected with 400.
 */

import type { Logger } from "@rentdash/shared-utils";
import { type NextFunction, type Request, type Response, Router } from "express";
import type { z } from "zod";
import { type ActionCode, listActionCodes } from "../core/actions";
import { analyzeBookings, applyDiscount } from "../core/bookings";
import type { ActionDispatcher } from "../core/dispatch";
import { NotFoundError, UpstreamUnavailableError } from "../core/errors";
import type { AnalyzerDeps } from "../core/ports";
import { getServiceInfo } from "../core/versioning";
import { InsightsMiddleware, schemas, sendError, sendSuccess } from "./middleware";

type ActionBody = z.infer<typeof schemas.action>;
type BookingAnalyzeBody = z.infer<typeof schemas.bookingAnalyze>;
type BookingDiscountBody = z.infer<typeof schemas.bookingDiscount>;

export class InsightsRoutes {
  private router: Router;

  constructor(
    private dispatcher: ActionDispatcher,
    private deps: AnalyzerDeps,
    private middleware: InsightsMiddleware,
    private logger: Logger
  ) {
    this.router = Router();
    this.setupRoutes();
  }

  getRouter(): Router {
    return this.router;
  }

  private setupRoutes(): void {
    this.router.get("/health", this.handleHealthCheck.bind(this));
    this.router.get("/action-codes", this.handleActionCodes.bind(this));

    // ===== Action Routes =====

    this.router.post(
      "/actions",
      this.middleware.validateBody(schemas.action),
      this.handleAction.bind(this)
    );

    this.actionRoute("/pricing/analyze", "PRICING_ANALYZE");
    this.actionRoute("/pricing/apply", "PRICING_APPLY");
    this.actionRoute("/market/analyze", "MARKET_ANALYZE");
    this.actionRoute("/review/analyze", "REVIEW_ANALYZE");

    // ===== Booking Routes =====

    this.router.post(
      "/bookings/analyze",
      this.middleware.validateBody(schemas.bookingAnalyze),
      this.handleBookingAnalyze.bind(this)
    );

    this.router.post(
      "/bookings/discount",
      this.middleware.validateBody(schemas.bookingDiscount),
      this.handleBookingDiscount.bind(this)
    );
  }

  private actionRoute(path: string, actionCode: ActionCode): void {
    this.router.post(
      path,
      this.middleware.validateBody(schemas.actionParams),
      async (req: Request, res: Response, next: NextFunction) => {
        try {
          const params: Record<string, unknown> = req.body;
          res.json(await this.dispatcher.dispatch(actionCode, params));
        } catch (error) {
          next(error);
        }
      }
    );
  }

  // ===== Route Handlers =====

  private handleHealthCheck(req: Request, res: Response): void {
    res.json({
      status: "healthy",
      ...getServiceInfo(this.deps.tables.version),
    });
  }

  private handleActionCodes(req: Request, res: Response): void {
    sendSuccess(res, listActionCodes());
  }

  private async handleAction(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { action_code, ...params }: ActionBody = req.body;
      res.json(await this.dispatcher.dispatch(action_code, params));
    } catch (error) {
      next(error);
    }
  }

  private async handleBookingAnalyze(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const body: BookingAnalyzeBody = req.body;
      sendSuccess(res, await analyzeBookings(body.listing_id, this.deps));
    } catch (error) {
      this.handleError(res, next, error);
    }
  }

  private async handleBookingDiscount(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const body: BookingDiscountBody = req.body;
      const result = await applyDiscount(body.listing_id, body.discount_percent, this.deps);
      if (result.success) {
        sendSuccess(res, result);
      } else {
        sendError(res, result.message, 404);
      }
    } catch (error) {
      this.handleError(res, next, error);
    }
  }

  // ===== Helper Methods =====

  private handleError(res: Response, next: NextFunction, error: unknown): void {
    if (error instanceof NotFoundError) {
      return sendError(res, error.message, 404);
    }
    if (error instanceof UpstreamUnavailableError) {
      this.logger.warn("Upstream failure:", error.message);
      return sendError(res, error.message, 502);
    }
    next(error);
  }
}
