import { round, wholeDays } from "./dates";
import type { Booking, BookingSummary, DiscountChangeResult } from "./dto";
import { NotFoundError, readOrEmpty } from "./errors";
import type { AnalyzerDeps } from "./ports";
import type { BookingTables } from "./tables";

export function averageStayDays(bookings: Booking[]): number {
  if (bookings.length === 0) return 0;
  const total = bookings.reduce((sum, b) => sum + wholeDays(b.startDate, b.endDate), 0);
  return total / bookings.length;
}

// Whole-history days booked over one window length; not clamped
export function historicalOccupancy(bookings: Booking[], windowDays: number): number {
  const total = bookings.reduce((sum, b) => sum + wholeDays(b.startDate, b.endDate), 0);
  return total / windowDays;
}

export function shouldRecommendDiscount(
  avgDays: number,
  occupancy: number,
  tables: BookingTables
): boolean {
  return avgDays < tables.minAverageStayDays || occupancy < tables.minOccupancy;
}

export async function analyzeBookings(
  listingId: string,
  deps: AnalyzerDeps
): Promise<BookingSummary> {
  const listing = await deps.accessor.getListing(listingId);
  if (!listing) {
    throw new NotFoundError("listing", listingId);
  }

  const tables = deps.tables.booking;
  const bookings = await readOrEmpty(
    () => deps.accessor.getBookings(listingId),
    (error) => deps.logger.warn(`Bookings unavailable for ${listingId}:`, error.message)
  );

  const avgDays = averageStayDays(bookings);
  const occupancy = historicalOccupancy(bookings, tables.windowDays);
  const discountRecommended = shouldRecommendDiscount(avgDays, occupancy, tables);

  const message =
    bookings.length === 0
      ? `There are no bookings for '${listing.title}' at the moment. Occupancy is 0%.`
      : `Avg booking duration: ${avgDays.toFixed(1)} days, occupancy: ${Math.round(
          occupancy * 100
        )}% for '${listing.title}'.`;

  return {
    listingId,
    listingTitle: listing.title,
    totalBookings: bookings.length,
    avgDurationDays: round(avgDays, 1),
    occupancyRate: round(occupancy * 100, 1),
    discountRecommended,
    suggestedDiscountPercent: tables.suggestedDiscountPercent,
    currentDiscountPercent: listing.discountPercent,
    message,
  };
}

/**
 * Record a discount annotation for a listing. Only the side-table changes;
 * the listing's price stays as it is.
 */
export async function applyDiscount(
  listingId: string,
  discountPercent: number,
  deps: Pick<AnalyzerDeps, "accessor" | "logger">
): Promise<DiscountChangeResult> {
  const result = await deps.accessor.applyDiscount(listingId, discountPercent);
  if (result.status !== "success") {
    deps.logger.warn(`Discount rejected for ${listingId}: ${result.message}`);
    return { success: false, message: result.message };
  }

  deps.logger.info(`Discount of ${discountPercent}% recorded for ${listingId}`);
  return {
    success: true,
    listingId,
    discountPercent: result.discountPercent ?? discountPercent,
    message: result.message,
  };
}
