/**
 * Action catalogue
 *
 * Each UI insight card carries one action code. The catalogue maps a code
 * to the agent that answers it and to the wire parameters it needs, and
 * `parseAction` turns an untyped request into a typed variant.
 */

import { z } from "zod";
import {
  InvalidParameterError,
  MissingParameterError,
  UnknownActionError,
} from "./errors";

export const ACTION_CODES = [
  "PRICING_ANALYZE",
  "PRICING_APPLY",
  "MARKET_ANALYZE",
  "REVIEW_ANALYZE",
] as const;

export type ActionCode = (typeof ACTION_CODES)[number];

export type AgentName = "PricingAgent" | "DemandTrendAgent" | "ReviewAnalysisAgent";

export type ActionConfig = {
  agentName: AgentName;
  description: string;
  requiredParams: string[]; // wire names
  cardType: "pricing" | "market" | "review";
  hasActionButton: boolean;
  mutating: boolean;
};

export const ACTION_CONFIG = {
  PRICING_ANALYZE: {
    agentName: "PricingAgent",
    description: "Analyze demand and suggest a price for a listing",
    requiredParams: ["listing_id"],
    cardType: "pricing",
    hasActionButton: true,
    mutating: false,
  },
  PRICING_APPLY: {
    agentName: "PricingAgent",
    description: "Apply a new price to a listing",
    requiredParams: ["listing_id", "new_price"],
    cardType: "pricing",
    hasActionButton: false,
    mutating: true,
  },
  MARKET_ANALYZE: {
    agentName: "DemandTrendAgent",
    description: "Rank trending categories against an owner's portfolio",
    requiredParams: ["owner_id"],
    cardType: "market",
    hasActionButton: false,
    mutating: false,
  },
  REVIEW_ANALYZE: {
    agentName: "ReviewAnalysisAgent",
    description: "Summarize review sentiment, themes and issues for a listing",
    requiredParams: ["listing_id"],
    cardType: "review",
    hasActionButton: false,
    mutating: false,
  },
} satisfies Record<ActionCode, ActionConfig>;

export type ActionRequest =
  | { code: "PRICING_ANALYZE"; params: { listingId: string } }
  | { code: "PRICING_APPLY"; params: { listingId: string; newPrice: number } }
  | { code: "MARKET_ANALYZE"; params: { ownerId: string } }
  | { code: "REVIEW_ANALYZE"; params: { listingId: string } };

// Ids arrive as strings from the UI, owner ids sometimes as integers
const identifier = z
  .union([z.string().trim().min(1, "must not be empty"), z.number().int()])
  .transform(String);

// A number, or a non-empty string holding one; booleans and arrays are rejected
export const numberLike = z.union(
  [z.number(), z.string().trim().min(1, "must be a number").pipe(z.coerce.number())],
  { errorMap: () => ({ message: "must be a number" }) }
);

const price = numberLike.pipe(z.number().finite().positive("must be greater than 0"));

export const paramSchemas = {
  PRICING_ANALYZE: z.object({ listing_id: identifier }),
  PRICING_APPLY: z.object({ listing_id: identifier, new_price: price }),
  MARKET_ANALYZE: z.object({ owner_id: identifier }),
  REVIEW_ANALYZE: z.object({ listing_id: identifier }),
};

export function toActionCode(code: string): ActionCode | undefined {
  return ACTION_CODES.find((c) => c === code);
}

export function getActionConfig(code: ActionCode): ActionConfig {
  return ACTION_CONFIG[code];
}

function parseWith<T>(
  code: ActionCode,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: Record<string, unknown>
): T {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new InvalidParameterError(
      code,
      result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`)
    );
  }
  return result.data;
}

/**
 * Resolve an action code and validate its parameters.
 * Throws UnknownActionError, MissingParameterError or InvalidParameterError.
 */
export function parseAction(
  actionCode: string,
  params: Record<string, unknown>
): ActionRequest {
  const code = toActionCode(actionCode);
  if (!code) {
    throw new UnknownActionError(actionCode);
  }

  const missing = ACTION_CONFIG[code].requiredParams.filter(
    (name) => params[name] === undefined || params[name] === null
  );
  if (missing.length > 0) {
    throw new MissingParameterError(code, missing);
  }

  switch (code) {
    case "PRICING_ANALYZE": {
      const p = parseWith(code, paramSchemas.PRICING_ANALYZE, params);
      return { code, params: { listingId: p.listing_id } };
    }
    case "PRICING_APPLY": {
      const p = parseWith(code, paramSchemas.PRICING_APPLY, params);
      return { code, params: { listingId: p.listing_id, newPrice: p.new_price } };
    }
    case "MARKET_ANALYZE": {
      const p = parseWith(code, paramSchemas.MARKET_ANALYZE, params);
      return { code, params: { ownerId: p.owner_id } };
    }
    case "REVIEW_ANALYZE": {
      const p = parseWith(code, paramSchemas.REVIEW_ANALYZE, params);
      return { code, params: { listingId: p.listing_id } };
    }
  }
}

export type ActionCatalogueEntry = ActionConfig & { actionCode: ActionCode };

export function listActionCodes(): ActionCatalogueEntry[] {
  return ACTION_CODES.map((actionCode) => ({ actionCode, ...ACTION_CONFIG[actionCode] }));
}
