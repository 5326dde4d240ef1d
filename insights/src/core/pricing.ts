import {
  addDays,
  calendarRange,
  isWeekend,
  overlapDays,
  rangesIntersect,
  round,
} from "./dates";
import type {
  AdjustmentDirection,
  Booking,
  DemandLevel,
  PriceChangeResult,
  PricingReport,
} from "./dto";
import { NotFoundError, readOrEmpty } from "./errors";
import type { AnalyzerDeps } from "./ports";
import { type HeuristicTables, isRevenueStatus } from "./tables";

export type BookingPattern = {
  totalBookings: number;
  windowBookings: number;
  daysBooked: number;
  weekendBookings: number;
  weekdayBookings: number;
  holidayBookings: number;
  recentBookings: number;
  totalRevenue: number;
};

export type DemandAssessment = {
  score: number;
  indicators: string[];
  level: DemandLevel;
  adjustmentPercent: number;
  direction: AdjustmentDirection;
};

/**
 * Tally booking-pattern indicators over the trailing window ending at `now`.
 * A booking takes part when it has not finished before the window opened,
 * so upcoming stays count as demand too.
 */
export function summarizeBookingPattern(
  bookings: Booking[],
  now: Date,
  tables: HeuristicTables
): BookingPattern {
  const windowStart = addDays(now, -tables.pricing.windowDays);
  const holidays = tables.pricing.holidays.map((h) =>
    calendarRange(h.start, h.end)
  );

  const pattern: BookingPattern = {
    totalBookings: bookings.length,
    windowBookings: 0,
    daysBooked: 0,
    weekendBookings: 0,
    weekdayBookings: 0,
    holidayBookings: 0,
    recentBookings: 0,
    totalRevenue: 0,
  };

  for (const booking of bookings) {
    if (isRevenueStatus(tables, booking.status)) {
      pattern.totalRevenue += booking.totalPrice;
    }

    if (booking.endDate.getTime() < windowStart.getTime()) continue;
    pattern.windowBookings++;

    pattern.daysBooked += overlapDays(
      booking.startDate,
      booking.endDate,
      windowStart,
      now
    );

    if (isWeekend(booking.startDate)) {
      pattern.weekendBookings++;
    } else {
      pattern.weekdayBookings++;
    }

    if (
      holidays.some((h) =>
        rangesIntersect(booking.startDate, booking.endDate, h.from, h.to)
      )
    ) {
      pattern.holidayBookings++;
    }

    if (booking.startDate.getTime() >= windowStart.getTime()) {
      pattern.recentBookings++;
    }
  }

  return pattern;
}

export function occupancyRate(pattern: BookingPattern, windowDays: number): number {
  return Math.min(pattern.daysBooked / windowDays, 1.0);
}

export function assessDemand(
  pattern: BookingPattern,
  occupancy: number,
  tables: HeuristicTables
): DemandAssessment {
  const { occupancy: occ, recentBookings: recent, weights } = tables.pricing;
  const indicators: string[] = [];
  let score = 0;

  if (occupancy >= occ.high) {
    score += weights.highOccupancy;
    indicators.push(`High occupancy rate (≥${Math.round(occ.high * 100)}%)`);
  } else if (occupancy >= occ.moderate) {
    score += weights.moderateOccupancy;
    indicators.push("Moderate occupancy rate");
  }

  if (pattern.weekendBookings > pattern.weekdayBookings) {
    score += weights.weekendDominant;
    indicators.push("Strong weekend demand");
  }

  if (pattern.holidayBookings > 0) {
    score += weights.holiday;
    indicators.push(`${pattern.holidayBookings} holiday period bookings`);
  }

  if (pattern.recentBookings >= recent.strong) {
    score += weights.strongRecent;
    indicators.push("Strong recent booking activity");
  } else if (pattern.recentBookings >= recent.some) {
    score += weights.someRecent;
    indicators.push("Some recent booking activity");
  }

  const band =
    tables.pricing.levels.find((l) => score >= l.minScore) ??
    tables.pricing.fallbackLevel;

  return {
    score,
    indicators,
    level: band.level,
    adjustmentPercent: band.adjustmentPercent,
    direction:
      band.adjustmentPercent > 0
        ? "increase"
        : band.adjustmentPercent < 0
        ? "decrease"
        : "maintain",
  };
}

export function suggestPrice(currentPrice: number, adjustmentPercent: number): number {
  return round(currentPrice * (1 + adjustmentPercent / 100), 2);
}

function buildReasons(demand: DemandAssessment, occupancy: number): string[] {
  const reasons = [`Demand level is ${demand.level}`, ...demand.indicators];

  if (demand.direction === "decrease") {
    reasons.push("Low booking activity detected");
    reasons.push("Price reduction may attract more renters");
  } else if (demand.direction === "maintain") {
    reasons.push("Current pricing appears optimal for demand level");
  }

  reasons.push(`Current occupancy: ${Math.round(occupancy * 100)}%`);
  return reasons;
}

function buildNotes(pattern: BookingPattern, windowDays: number): string[] {
  const notes: string[] = [];
  if (pattern.weekendBookings > 0) {
    const share = Math.round(
      (pattern.weekendBookings / Math.max(pattern.windowBookings, 1)) * 100
    );
    notes.push(`Weekend bookings: ${pattern.weekendBookings} (${share}% of total)`);
  }
  if (pattern.holidayBookings > 0) {
    notes.push(`Holiday bookings detected: ${pattern.holidayBookings}`);
  }
  if (pattern.recentBookings > 0) {
    notes.push(`Recent bookings (${windowDays} days): ${pattern.recentBookings}`);
  }
  notes.push(`Total revenue from bookings: $${pattern.totalRevenue.toFixed(2)}`);
  return notes;
}

/**
 * Score a listing's demand from its booking history and propose a price.
 * Throws NotFoundError when the listing does not exist.
 */
export async function analyzePricing(
  listingId: string,
  deps: AnalyzerDeps
): Promise<PricingReport> {
  const listing = await deps.accessor.getListing(listingId);
  if (!listing) {
    throw new NotFoundError("listing", listingId);
  }

  const bookings = await readOrEmpty(
    () => deps.accessor.getBookings(listingId),
    (error) =>
      deps.logger.warn(
        `Bookings unavailable for ${listingId}, scoring as no bookings:`,
        error.message
      )
  );

  const { windowDays } = deps.tables.pricing;
  const pattern = summarizeBookingPattern(bookings, deps.clock.now(), deps.tables);
  const occupancy = occupancyRate(pattern, windowDays);
  const demand = assessDemand(pattern, occupancy, deps.tables);

  const currentPrice = listing.price;
  const suggestedPrice = suggestPrice(currentPrice, demand.adjustmentPercent);

  deps.logger.debug(
    `Pricing ${listingId}: score=${demand.score} level=${demand.level} occupancy=${occupancy.toFixed(2)}`
  );

  return {
    listingId,
    listingTitle: listing.title,
    currentPrice,
    suggestedPrice,
    priceDifference: round(suggestedPrice - currentPrice, 2),
    adjustmentPercent: demand.adjustmentPercent,
    adjustmentDirection: demand.direction,
    demandLevel: demand.level,
    demandScore: demand.score,
    occupancyRate: round(occupancy * 100, 1),
    totalBookings: pattern.totalBookings,
    windowBookings: pattern.windowBookings,
    weekendBookings: pattern.weekendBookings,
    weekdayBookings: pattern.weekdayBookings,
    holidayBookings: pattern.holidayBookings,
    recentBookings: pattern.recentBookings,
    totalRevenue: round(pattern.totalRevenue, 2),
    discountPercent: listing.discountPercent,
    reasons: buildReasons(demand, occupancy),
    notes: buildNotes(pattern, windowDays),
    canTakeAction: demand.adjustmentPercent !== 0,
    message: `Pricing analysis complete for '${listing.title}'.`,
  };
}

/**
 * Ask the store to move a listing to `newPrice`. The store takes a
 * percentage change, so the target is converted against the price read here;
 * a concurrent update between the read and the write is not guarded against.
 */
export async function applyPriceChange(
  listingId: string,
  newPrice: number,
  deps: Pick<AnalyzerDeps, "accessor" | "logger">
): Promise<PriceChangeResult> {
  const listing = await deps.accessor.getListing(listingId);
  if (!listing) {
    return { success: false, message: `Listing '${listingId}' not found.` };
  }

  const oldPrice = listing.price;
  const percentChange = oldPrice > 0 ? ((newPrice - oldPrice) / oldPrice) * 100 : 0;

  const result = await deps.accessor.updatePrice(listingId, percentChange);
  if (result.status !== "success") {
    deps.logger.warn(`Price update rejected for ${listingId}: ${result.message}`);
    return { success: false, message: result.message || "Failed to update price." };
  }

  // The store may round; report what it kept
  const storedPrice = result.newPrice ?? newPrice;
  deps.logger.info(
    `Price for ${listingId} changed from ${oldPrice.toFixed(2)} to ${storedPrice.toFixed(2)}`
  );

  return {
    success: true,
    listingId,
    listingTitle: listing.title,
    oldPrice,
    newPrice: storedPrice,
    message: `Price updated successfully for '${listing.title}' from $${oldPrice.toFixed(
      2
    )} to $${storedPrice.toFixed(2)}.`,
  };
}
