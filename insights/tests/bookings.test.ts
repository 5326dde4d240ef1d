import { beforeEach, describe, expect, it } from "vitest";
import type { MemoryDomainAccessor } from "../src/adapters/accessor.memory";
import type { MemoryDiscountStore } from "../src/adapters/discounts.memory";
import {
  analyzeBookings,
  applyDiscount,
  averageStayDays,
  historicalOccupancy,
  shouldRecommendDiscount,
} from "../src/core/bookings";
import { NotFoundError } from "../src/core/errors";
import type { AnalyzerDeps } from "../src/core/ports";
import { booking, buildDeps, listing, tables } from "./fixtures";

describe("booking metrics", () => {
  const stays = [
    booking("b1", "listing-1", "2026-02-01", "2026-02-04"),
    booking("b2", "listing-1", "2026-02-10", "2026-02-11"),
  ];

  it("should average whole-day stay lengths", () => {
    expect(averageStayDays(stays)).toBe(2);
    expect(averageStayDays([])).toBe(0);
  });

  it("should not clamp historical occupancy", () => {
    const long = [
      booking("b1", "listing-1", "2025-11-01", "2025-12-01"),
      booking("b2", "listing-1", "2026-01-01", "2026-01-16"),
    ];

    expect(historicalOccupancy(long, 30)).toBe(1.5);
  });

  it("should recommend a discount for short stays or low occupancy", () => {
    expect(shouldRecommendDiscount(1.5, 0.9, tables.booking)).toBe(true);
    expect(shouldRecommendDiscount(3, 0.2, tables.booking)).toBe(true);
    expect(shouldRecommendDiscount(2, 0.5, tables.booking)).toBe(false);
  });
});

describe("analyzeBookings", () => {
  let accessor: MemoryDomainAccessor;
  let deps: AnalyzerDeps;

  beforeEach(() => {
    ({ accessor, deps } = buildDeps());
    accessor.addListing(listing());
  });

  it("should recommend a discount for a quiet listing", async () => {
    accessor.addBooking(booking("b1", "listing-1", "2026-02-01", "2026-02-04"));
    accessor.addBooking(booking("b2", "listing-1", "2026-02-10", "2026-02-11"));

    const summary = await analyzeBookings("listing-1", deps);

    expect(summary).toEqual({
      listingId: "listing-1",
      listingTitle: "Harbour View Loft",
      totalBookings: 2,
      avgDurationDays: 2,
      occupancyRate: 13.3,
      discountRecommended: true,
      suggestedDiscountPercent: 10,
      currentDiscountPercent: 0,
      message: "Avg booking duration: 2.0 days, occupancy: 13% for 'Harbour View Loft'.",
    });
  });

  it("should not recommend a discount for long, frequent stays", async () => {
    accessor.addBooking(booking("b1", "listing-1", "2026-01-01", "2026-01-11"));
    accessor.addBooking(booking("b2", "listing-1", "2026-01-20", "2026-02-05"));

    const summary = await analyzeBookings("listing-1", deps);

    expect(summary.avgDurationDays).toBe(13);
    expect(summary.occupancyRate).toBe(86.7);
    expect(summary.discountRecommended).toBe(false);
    expect(summary.message).toBe(
      "Avg booking duration: 13.0 days, occupancy: 87% for 'Harbour View Loft'."
    );
  });

  it("should describe a listing without bookings", async () => {
    const summary = await analyzeBookings("listing-1", deps);

    expect(summary.totalBookings).toBe(0);
    expect(summary.occupancyRate).toBe(0);
    expect(summary.discountRecommended).toBe(true);
    expect(summary.message).toBe(
      "There are no bookings for 'Harbour View Loft' at the moment. Occupancy is 0%."
    );
  });

  it("should throw NotFoundError for an unknown listing", async () => {
    await expect(analyzeBookings("missing", deps)).rejects.toThrow(NotFoundError);
  });
});

describe("applyDiscount", () => {
  let accessor: MemoryDomainAccessor;
  let discounts: MemoryDiscountStore;
  let deps: AnalyzerDeps;

  beforeEach(() => {
    ({ accessor, discounts, deps } = buildDeps());
    accessor.addListing(listing());
  });

  it("should record the discount without touching the price", async () => {
    const result = await applyDiscount("listing-1", 15, deps);

    expect(result).toEqual({
      success: true,
      listingId: "listing-1",
      discountPercent: 15,
      message: "Applied 15% discount to 'Harbour View Loft' for longer bookings.",
    });
    expect(discounts.get("listing-1")).toBe(15);

    const updated = await accessor.getListing("listing-1");
    expect(updated?.price).toBe(50);
    expect(updated?.discountPercent).toBe(15);

    const summary = await analyzeBookings("listing-1", deps);
    expect(summary.currentDiscountPercent).toBe(15);
  });

  it("should fail for an unknown listing", async () => {
    const result = await applyDiscount("missing", 15, deps);

    expect(result).toEqual({ success: false, message: "Listing missing not found" });
    expect(discounts.size()).toBe(0);
  });
});
