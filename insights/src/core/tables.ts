/**
 * Heuristic tables: keyword sets, thresholds, the holiday calendar and the
 * fixed wording templates the analyzers fill in. Loaded from JSON so the
 * wording and tuning can change without touching control flow.
 */

import { isVersionCompatible } from "@rentdash/shared-utils";
import { z } from "zod";

export const SUPPORTED_TABLES_VERSION = "1.0.0";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const holidaySchema = z
  .object({
    name: z.string().min(1),
    start: isoDate,
    end: isoDate,
  })
  .refine((h) => h.end >= h.start, {
    message: "holiday end must not precede start",
  });

const advisorySchema = z.object({
  message: z.string(),
  advice: z.string(),
});

const keywordList = z.array(z.string().min(1));
const keywordMap = z.record(z.string().min(1));

export const heuristicTablesSchema = z.object({
  version: z.string(),
  revenueStatuses: z.array(z.string().min(1)).min(1),
  pricing: z.object({
    windowDays: z.number().int().positive(),
    occupancy: z.object({ high: z.number(), moderate: z.number() }),
    recentBookings: z.object({
      strong: z.number().int().positive(),
      some: z.number().int().positive(),
    }),
    weights: z.object({
      highOccupancy: z.number(),
      moderateOccupancy: z.number(),
      weekendDominant: z.number(),
      holiday: z.number(),
      strongRecent: z.number(),
      someRecent: z.number(),
    }),
    levels: z
      .array(
        z.object({
          minScore: z.number(),
          level: z.enum(["High", "Medium", "Low"]),
          adjustmentPercent: z.number(),
        })
      )
      .min(1),
    fallbackLevel: z.object({
      level: z.literal("Very Low"),
      adjustmentPercent: z.number(),
    }),
    holidays: z.array(holidaySchema),
  }),
  market: z.object({
    topN: z.number().int().positive(),
    strongTrendScore: z.number(),
    opportunityTrendScore: z.number(),
    fallbackCategory: z.string().min(1),
    advisories: z.object({
      onTrackStrong: advisorySchema,
      onTrackSteady: advisorySchema,
      needsImprovement: advisorySchema,
      lowDemand: advisorySchema,
      opportunity: advisorySchema,
    }),
    emptyMarketMessage: z.string(),
  }),
  reviews: z.object({
    maxRating: z.number().positive(),
    satisfaction: z.object({ satisfied: z.number(), neutral: z.number() }),
    sentiment: z.object({
      veryPositive: z.number(),
      mostlyPositive: z.number(),
      mixed: z.number(),
    }),
    positiveKeywords: keywordList,
    negativeKeywords: keywordList,
    themes: z.record(keywordList),
    topThemes: z.number().int().positive(),
    positiveThemeMinRating: z.number(),
    negativeThemeMaxRating: z.number(),
    issueMaxRating: z.number(),
    praiseMinRating: z.number(),
    issueKeywords: keywordMap,
    praiseKeywords: keywordMap,
    issueRecommendations: z.record(z.string()),
    seededIssueCount: z.number().int().nonnegative(),
    maxExamples: z.number().int().nonnegative(),
    exampleLength: z.number().int().positive(),
    canned: z.object({
      noReviews: z.object({
        insights: z.array(z.string()),
        recommendations: z.array(z.string()),
        summary: z.string(),
      }),
      satisfied: z.object({
        insight: z.string(),
        recommendations: z.array(z.string()),
      }),
      fallback: z.object({
        Neutral: z.array(z.string()),
        Dissatisfied: z.array(z.string()),
      }),
    }),
  }),
  booking: z.object({
    windowDays: z.number().int().positive(),
    minAverageStayDays: z.number().nonnegative(),
    minOccupancy: z.number().nonnegative(),
    suggestedDiscountPercent: z.number().positive().lt(100),
  }),
});

export type HeuristicTables = z.infer<typeof heuristicTablesSchema>;
export type PricingTables = HeuristicTables["pricing"];
export type MarketTables = HeuristicTables["market"];
export type ReviewTables = HeuristicTables["reviews"];
export type BookingTables = HeuristicTables["booking"];
export type Holiday = PricingTables["holidays"][number];

/**
 * Validate raw table data. Levels are re-sorted by descending minScore so a
 * first-match scan picks the highest band.
 */
export function parseHeuristicTables(raw: unknown): HeuristicTables {
  const tables = heuristicTablesSchema.parse(raw);

  if (!isVersionCompatible(tables.version, SUPPORTED_TABLES_VERSION)) {
    throw new Error(
      `Unsupported heuristic tables version ${tables.version} (expected ${SUPPORTED_TABLES_VERSION})`
    );
  }

  return {
    ...tables,
    pricing: {
      ...tables.pricing,
      levels: [...tables.pricing.levels].sort((a, b) => b.minScore - a.minScore),
    },
  };
}

/**
 * Fill `{name}` placeholders; unknown placeholders are left as-is
 */
export function fillTemplate(
  template: string,
  values: Record<string, string | number>
): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match
  );
}

export function isRevenueStatus(tables: HeuristicTables, status: string): boolean {
  const normalized = status.toLowerCase();
  return tables.revenueStatuses.some((s) => s.toLowerCase() === normalized);
}
