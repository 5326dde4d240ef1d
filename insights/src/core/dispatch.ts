import { ACTION_CONFIG, type ActionRequest, parseAction, toActionCode } from "./actions";
import type { PriceChangeResult, PricingReport, ReviewReport, TrendReport } from "./dto";
import {
  InvalidParameterError,
  isInsightsError,
  MissingParameterError,
  NotFoundError,
  UnknownActionError,
  UpstreamUnavailableError,
} from "./errors";
import { analyzeMarketTrends } from "./market";
import type { AnalyzerDeps } from "./ports";
import { analyzePricing, applyPriceChange } from "./pricing";
import { analyzeReviews } from "./reviews";

export type ActionData =
  | PricingReport
  | PriceChangeResult
  | TrendReport
  | ReviewReport
  | Record<string, never>;

export type ActionResponse = {
  success: boolean;
  actionCode: string;
  agentName: string;
  data: ActionData;
  showActionButton: boolean;
  error: string | null;
};

export const GENERIC_ERROR = "An unexpected error occurred while processing the action.";

export interface ActionDispatcher {
  dispatch(actionCode: string, params: Record<string, unknown>): Promise<ActionResponse>;
}

type Outcome = Pick<ActionResponse, "success" | "data" | "showActionButton" | "error">;

async function invoke(request: ActionRequest, deps: AnalyzerDeps): Promise<Outcome> {
  switch (request.code) {
    case "PRICING_ANALYZE": {
      const report = await analyzePricing(request.params.listingId, deps);
      return { success: true, data: report, showActionButton: report.canTakeAction, error: null };
    }
    case "PRICING_APPLY": {
      const { listingId, newPrice } = request.params;
      const result = await applyPriceChange(listingId, newPrice, deps);
      return {
        success: result.success,
        data: result,
        showActionButton: false,
        error: result.success ? null : result.message,
      };
    }
    case "MARKET_ANALYZE": {
      const report = await analyzeMarketTrends(request.params.ownerId, deps);
      return { success: true, data: report, showActionButton: false, error: null };
    }
    case "REVIEW_ANALYZE": {
      const report = await analyzeReviews(request.params.listingId, deps);
      return { success: true, data: report, showActionButton: false, error: null };
    }
  }
}

function failure(actionCode: string, agentName: string, error: string): ActionResponse {
  return {
    success: false,
    actionCode,
    agentName,
    data: {},
    showActionButton: false,
    error,
  };
}

export function createDispatcher(deps: AnalyzerDeps): ActionDispatcher {
  const logger = deps.logger;

  return {
    async dispatch(actionCode, params) {
      const code = toActionCode(actionCode);
      const agentName = code ? ACTION_CONFIG[code].agentName : "";

      try {
        const request = parseAction(actionCode, params);
        logger.debug(`Dispatching ${request.code} to ${agentName}`);
        const outcome = await invoke(request, deps);
        return { actionCode, agentName, ...outcome };
      } catch (error) {
        if (
          error instanceof UnknownActionError ||
          error instanceof MissingParameterError ||
          error instanceof InvalidParameterError
        ) {
          logger.info(`Rejected ${actionCode}: ${error.message}`);
          return failure(actionCode, agentName, error.message);
        }
        if (error instanceof NotFoundError) {
          return failure(actionCode, agentName, error.message);
        }
        if (error instanceof UpstreamUnavailableError) {
          logger.warn(`${actionCode} failed upstream:`, error.message);
          return failure(actionCode, agentName, error.message);
        }

        logger.error(
          `Unexpected failure in ${actionCode}:`,
          isInsightsError(error) ? error.code : "UNEXPECTED",
          error
        );
        return failure(actionCode, agentName, GENERIC_ERROR);
      }
    },
  };
}
