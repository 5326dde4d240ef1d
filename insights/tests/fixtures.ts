import { silentLogger } from "@rentdash/shared-utils";
import { MemoryDomainAccessor } from "../src/adapters/accessor.memory";
import { MemoryDiscountStore } from "../src/adapters/discounts.memory";
import { loadHeuristicTables } from "../src/adapters/tables.file";
import type { Booking, Listing, Review } from "../src/core/dto";
import type { AnalyzerDeps, Clock } from "../src/core/ports";

// Sunday; the 30-day window opens on Friday 2026-01-30
export const NOW = new Date("2026-03-01T00:00:00.000Z");

export const fixedClock: Clock = { now: () => NOW };

export const tables = loadHeuristicTables();

export function listing(overrides: Partial<Listing> = {}): Listing {
  return {
    id: "listing-1",
    ownerId: "owner-1",
    title: "Harbour View Loft",
    category: "Apartment",
    price: 50,
    status: "active",
    discountPercent: 0,
    ...overrides,
  };
}

export function booking(
  id: string,
  listingId: string,
  start: string,
  end: string,
  overrides: Partial<Booking> = {}
): Booking {
  return {
    id,
    listingId,
    startDate: new Date(`${start}T00:00:00.000Z`),
    endDate: new Date(`${end}T00:00:00.000Z`),
    totalPrice: 100,
    status: "CONFIRMED",
    ...overrides,
  };
}

export function review(
  id: string,
  listingId: string,
  rating: number,
  comment: string,
  overrides: Partial<Review> = {}
): Review {
  return {
    id,
    listingId,
    rating,
    comment,
    createdAt: new Date("2026-02-01T12:00:00.000Z"),
    flagged: false,
    ...overrides,
  };
}

export function buildDeps(): {
  accessor: MemoryDomainAccessor;
  discounts: MemoryDiscountStore;
  deps: AnalyzerDeps;
} {
  const discounts = new MemoryDiscountStore();
  const accessor = new MemoryDomainAccessor(discounts);
  return {
    accessor,
    discounts,
    deps: { accessor, tables, clock: fixedClock, logger: silentLogger },
  };
}
