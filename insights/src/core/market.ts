import { round } from "./dates";
import type {
  Booking,
  CategoryTrend,
  Listing,
  PortfolioSummary,
  TrendRecommendation,
  TrendReport,
} from "./dto";
import { readOrEmpty } from "./errors";
import type { AnalyzerDeps } from "./ports";
import { fillTemplate, type HeuristicTables, isRevenueStatus } from "./tables";

const TITLE = "Market Trend Analysis";

type CategoryStats = {
  listingCount: number;
  totalBookings: number;
  totalRevenue: number;
};

function categoryOf(listing: Listing, tables: HeuristicTables): string {
  return listing.category.trim() || tables.market.fallbackCategory;
}

function groupByListing(bookings: Booking[]): Map<string, Booking[]> {
  const grouped = new Map<string, Booking[]>();
  for (const booking of bookings) {
    const list = grouped.get(booking.listingId);
    if (list) {
      list.push(booking);
    } else {
      grouped.set(booking.listingId, [booking]);
    }
  }
  return grouped;
}

/**
 * Per-category demand ranking, highest trend score first. Ties keep the
 * order in which categories were first seen.
 */
export function rankCategories(
  listings: Listing[],
  bookingsByListing: Map<string, Booking[]>,
  tables: HeuristicTables
): CategoryTrend[] {
  const stats = new Map<string, CategoryStats>();

  for (const listing of listings) {
    const category = categoryOf(listing, tables);
    const entry = stats.get(category) ?? {
      listingCount: 0,
      totalBookings: 0,
      totalRevenue: 0,
    };
    const bookings = bookingsByListing.get(listing.id) ?? [];

    entry.listingCount++;
    entry.totalBookings += bookings.length;
    for (const booking of bookings) {
      if (isRevenueStatus(tables, booking.status)) {
        entry.totalRevenue += booking.totalPrice;
      }
    }
    stats.set(category, entry);
  }

  const trends: CategoryTrend[] = [];
  for (const [category, s] of stats) {
    const avgBookings = s.totalBookings / s.listingCount;
    const avgRevenue = s.totalRevenue / s.listingCount;
    trends.push({
      category,
      listingCount: s.listingCount,
      totalBookings: s.totalBookings,
      totalRevenue: round(s.totalRevenue, 2),
      trendScore: round(avgBookings * 2 + avgRevenue / 100, 2),
    });
  }

  // Array.prototype.sort is stable
  return trends.sort((a, b) => b.trendScore - a.trendScore);
}

type OwnerHoldings = {
  summary: PortfolioSummary;
  listingsByCategory: Map<string, number>;
  bookingsByCategory: Map<string, number>;
};

function summarizeHoldings(
  ownerListings: Listing[],
  bookingsByListing: Map<string, Booking[]>,
  tables: HeuristicTables
): OwnerHoldings {
  const listingsByCategory = new Map<string, number>();
  const bookingsByCategory = new Map<string, number>();
  let totalBookings = 0;
  let totalRevenue = 0;

  for (const listing of ownerListings) {
    const category = categoryOf(listing, tables);
    const revenueBookings = (bookingsByListing.get(listing.id) ?? []).filter((b) =>
      isRevenueStatus(tables, b.status)
    );

    listingsByCategory.set(category, (listingsByCategory.get(category) ?? 0) + 1);
    bookingsByCategory.set(
      category,
      (bookingsByCategory.get(category) ?? 0) + revenueBookings.length
    );

    totalBookings += revenueBookings.length;
    for (const booking of revenueBookings) {
      totalRevenue += booking.totalPrice;
    }
  }

  return {
    summary: {
      totalListings: ownerListings.length,
      categories: [...listingsByCategory.keys()],
      totalBookings,
      totalRevenue: round(totalRevenue, 2),
    },
    listingsByCategory,
    bookingsByCategory,
  };
}

export function recommendFor(
  trend: CategoryTrend,
  holdings: OwnerHoldings,
  tables: HeuristicTables
): TrendRecommendation | null {
  const { advisories, strongTrendScore, opportunityTrendScore } = tables.market;
  const count = holdings.listingsByCategory.get(trend.category);
  const values = {
    count: count ?? 0,
    category: trend.category,
    listingCount: trend.listingCount,
    trendScore: trend.trendScore,
  };

  const make = (
    status: TrendRecommendation["status"],
    advisory: { message: string; advice: string }
  ): TrendRecommendation => ({
    category: trend.category,
    status,
    message: fillTemplate(advisory.message, values),
    advice: fillTemplate(advisory.advice, values),
  });

  if (count === undefined) {
    return trend.trendScore > opportunityTrendScore
      ? make("opportunity", advisories.opportunity)
      : null;
  }

  const ownerBookings = holdings.bookingsByCategory.get(trend.category) ?? 0;

  if (trend.trendScore > strongTrendScore && ownerBookings > 0) {
    return make("on_track", advisories.onTrackStrong);
  }
  if (trend.trendScore > 0 && ownerBookings === 0) {
    return make("needs_improvement", advisories.needsImprovement);
  }
  if (ownerBookings > 0) {
    return make("on_track", advisories.onTrackSteady);
  }
  return make("low_demand", advisories.lowDemand);
}

/**
 * Rank listing categories market-wide and compare them with what the owner
 * already rents out. Collections that fail to load are treated as empty.
 */
export async function analyzeMarketTrends(
  ownerId: string,
  deps: AnalyzerDeps
): Promise<TrendReport> {
  const { accessor, tables, logger } = deps;
  const onFailure = (what: string) => (error: Error) =>
    logger.warn(`${what} unavailable, treating as empty:`, error.message);

  const [allListings, ownerListings, allBookings] = await Promise.all([
    readOrEmpty(() => accessor.getAllListings(), onFailure("Market listings")),
    readOrEmpty(() => accessor.getListingsByOwner(ownerId), onFailure("Owner listings")),
    readOrEmpty(() => accessor.getAllBookings(), onFailure("Market bookings")),
  ]);

  const bookingsByListing = groupByListing(allBookings);
  const holdings = summarizeHoldings(ownerListings, bookingsByListing, tables);

  if (allListings.length === 0) {
    return {
      title: TITLE,
      ownerId,
      portfolio: holdings.summary,
      trendingCategories: [],
      recommendations: [],
      message: tables.market.emptyMarketMessage,
    };
  }

  const top = rankCategories(allListings, bookingsByListing, tables).slice(
    0,
    tables.market.topN
  );

  const recommendations: TrendRecommendation[] = [];
  for (const trend of top) {
    const recommendation = recommendFor(trend, holdings, tables);
    if (recommendation) recommendations.push(recommendation);
  }

  logger.debug(
    `Market trends for owner ${ownerId}: ${top.length} categories, ${recommendations.length} recommendations`
  );

  return {
    title: TITLE,
    ownerId,
    portfolio: holdings.summary,
    trendingCategories: top,
    recommendations,
    message: "Market trend analysis complete.",
  };
}
