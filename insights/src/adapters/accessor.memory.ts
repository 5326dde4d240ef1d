import type {
  Booking,
  DiscountResult,
  Listing,
  PriceUpdateResult,
  Review,
} from "../core/dto";
import { UpstreamUnavailableError } from "../core/errors";
import type { DiscountStore, DomainAccessor } from "../core/ports";
import { round } from "../core/dates";

export type MemorySeed = {
  listings?: Listing[];
  bookings?: Booking[];
  reviews?: Review[];
};

export class MemoryDomainAccessor implements DomainAccessor {
  private listings = new Map<string, Listing>();
  private bookings: Booking[] = [];
  private reviews: Review[] = [];
  private failure: Error | null = null;
  private failingOperations: Array<keyof DomainAccessor> = [];

  // Counters let tests assert that a write never happened
  readonly calls = { updatePrice: 0, applyDiscount: 0 };

  constructor(
    private discounts: DiscountStore,
    seed: MemorySeed = {}
  ) {
    for (const listing of seed.listings ?? []) this.addListing(listing);
    this.bookings = [...(seed.bookings ?? [])];
    this.reviews = [...(seed.reviews ?? [])];
  }

  async getListing(listingId: string): Promise<Listing | null> {
    this.throwIfFailing("getListing");
    const listing = this.listings.get(listingId);
    return listing ? this.withDiscount(listing) : null;
  }

  async getAllListings(): Promise<Listing[]> {
    this.throwIfFailing("getAllListings");
    return [...this.listings.values()].map((l) => this.withDiscount(l));
  }

  async getListingsByOwner(ownerId: string): Promise<Listing[]> {
    this.throwIfFailing("getListingsByOwner");
    return [...this.listings.values()]
      .filter((l) => l.ownerId === ownerId)
      .map((l) => this.withDiscount(l));
  }

  async getBookings(listingId: string): Promise<Booking[]> {
    this.throwIfFailing("getBookings");
    return this.bookings.filter((b) => b.listingId === listingId);
  }

  async getAllBookings(): Promise<Booking[]> {
    this.throwIfFailing("getAllBookings");
    return [...this.bookings];
  }

  async getReviews(listingId: string): Promise<Review[]> {
    this.throwIfFailing("getReviews");
    return this.reviews.filter((r) => r.listingId === listingId);
  }

  async updatePrice(listingId: string, percentChange: number): Promise<PriceUpdateResult> {
    this.calls.updatePrice++;
    this.throwIfFailing("updatePrice");

    const listing = this.listings.get(listingId);
    if (!listing) {
      return { status: "error", message: `Listing ${listingId} not found` };
    }

    const oldPrice = listing.price;
    const newPrice = round(oldPrice * (1 + percentChange / 100), 2);
    this.listings.set(listingId, { ...listing, price: newPrice });

    return {
      status: "success",
      message: `Price for '${listing.title}' updated from ${oldPrice.toFixed(2)} to ${newPrice.toFixed(2)}`,
      oldPrice,
      newPrice,
    };
  }

  async applyDiscount(listingId: string, discountPercent: number): Promise<DiscountResult> {
    this.calls.applyDiscount++;
    this.throwIfFailing("applyDiscount");

    const listing = this.listings.get(listingId);
    if (!listing) {
      return { status: "error", message: `Listing ${listingId} not found` };
    }

    this.discounts.set(listingId, discountPercent);
    return {
      status: "success",
      message: `Applied ${discountPercent}% discount to '${listing.title}' for longer bookings.`,
      discountPercent,
    };
  }

  // Helper methods for testing
  addListing(listing: Listing): void {
    this.listings.set(listing.id, listing);
  }

  addBooking(booking: Booking): void {
    this.bookings.push(booking);
  }

  addReview(review: Review): void {
    this.reviews.push(review);
  }

  /**
   * Make every operation whose name is listed (all of them when none are)
   * throw UpstreamUnavailableError until `failWith(null)`.
   */
  failWith(error: Error | null, operations: Array<keyof DomainAccessor> = []): void {
    this.failure = error;
    this.failingOperations = operations;
  }

  clear(): void {
    this.listings.clear();
    this.bookings = [];
    this.reviews = [];
    this.failure = null;
    this.failingOperations = [];
    this.calls.updatePrice = 0;
    this.calls.applyDiscount = 0;
  }

  private throwIfFailing(operation: keyof DomainAccessor): void {
    if (!this.failure) return;
    if (this.failingOperations.length > 0 && !this.failingOperations.includes(operation)) {
      return;
    }
    throw new UpstreamUnavailableError(operation, this.failure);
  }

  private withDiscount(listing: Listing): Listing {
    return { ...listing, discountPercent: this.discounts.get(listing.id) ?? 0 };
  }
}
