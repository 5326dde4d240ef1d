import type { Logger } from "@rentdash/shared-utils";
import type {
  Booking,
  DiscountResult,
  Listing,
  PriceUpdateResult,
  Review,
} from "./dto";
import type { HeuristicTables } from "./tables";

// Read/write contract of the upstream listing/booking/review store.
// Implementations throw UpstreamUnavailableError when the store cannot answer.
export interface DomainAccessor {
  getListing(listingId: string): Promise<Listing | null>;
  getAllListings(): Promise<Listing[]>;
  getListingsByOwner(ownerId: string): Promise<Listing[]>;
  getBookings(listingId: string): Promise<Booking[]>;
  getAllBookings(): Promise<Booking[]>; // bulk, for market aggregation
  getReviews(listingId: string): Promise<Review[]>;
  updatePrice(listingId: string, percentChange: number): Promise<PriceUpdateResult>;
  applyDiscount(listingId: string, discountPercent: number): Promise<DiscountResult>;
}

// Side-table for discount annotations, injected into accessors
export interface DiscountStore {
  get(listingId: string): number | undefined;
  set(listingId: string, discountPercent: number): void;
  clear(): void;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

// Everything an analyzer needs; built once at startup and shared across calls
export type AnalyzerDeps = {
  accessor: DomainAccessor;
  tables: HeuristicTables;
  clock: Clock;
  logger: Logger;
};
