import type { Pool } from "pg";
import type {
  Booking,
  DiscountResult,
  Listing,
  PriceUpdateResult,
  Review,
} from "../core/dto";
import { round } from "../core/dates";
import { UpstreamUnavailableError } from "../core/errors";
import type { DiscountStore, DomainAccessor } from "../core/ports";

type ListingRow = {
  id: string;
  owner_id: string;
  title: string;
  category: string | null;
  price: string; // NUMERIC comes back as text
  status: string;
};

type BookingRow = {
  id: string;
  listing_id: string;
  start_date: Date;
  end_date: Date;
  total_price: string;
  status: string;
};

type ReviewRow = {
  id: string;
  listing_id: string;
  rating: number;
  comment: string | null;
  created_at: Date;
  flagged: boolean;
};

const LISTING_COLUMNS = "id, owner_id, title, category, price, status";
const BOOKING_COLUMNS = "id, listing_id, start_date, end_date, total_price, status";

// Only `query` is used, so a pool or a single client both fit
export type Queryable = Pick<Pool, "query">;

export class SqlDomainAccessor implements DomainAccessor {
  constructor(
    private pool: Queryable,
    private discounts: DiscountStore
  ) {}

  async getListing(listingId: string): Promise<Listing | null> {
    const result = await this.run("getListing", () =>
      this.pool.query<ListingRow>(`SELECT ${LISTING_COLUMNS} FROM listings WHERE id = $1`, [
        listingId,
      ])
    );
    const row = result.rows[0];
    return row ? this.mapRowToListing(row) : null;
  }

  async getAllListings(): Promise<Listing[]> {
    const result = await this.run("getAllListings", () =>
      this.pool.query<ListingRow>(`SELECT ${LISTING_COLUMNS} FROM listings ORDER BY id`)
    );
    return result.rows.map((row) => this.mapRowToListing(row));
  }

  async getListingsByOwner(ownerId: string): Promise<Listing[]> {
    const result = await this.run("getListingsByOwner", () =>
      this.pool.query<ListingRow>(
        `SELECT ${LISTING_COLUMNS} FROM listings WHERE owner_id = $1 ORDER BY id`,
        [ownerId]
      )
    );
    return result.rows.map((row) => this.mapRowToListing(row));
  }

  async getBookings(listingId: string): Promise<Booking[]> {
    const result = await this.run("getBookings", () =>
      this.pool.query<BookingRow>(
        `SELECT ${BOOKING_COLUMNS} FROM bookings WHERE listing_id = $1 ORDER BY start_date`,
        [listingId]
      )
    );
    return result.rows.map(mapRowToBooking);
  }

  async getAllBookings(): Promise<Booking[]> {
    const result = await this.run("getAllBookings", () =>
      this.pool.query<BookingRow>(`SELECT ${BOOKING_COLUMNS} FROM bookings ORDER BY start_date`)
    );
    return result.rows.map(mapRowToBooking);
  }

  async getReviews(listingId: string): Promise<Review[]> {
    const result = await this.run("getReviews", () =>
      this.pool.query<ReviewRow>(
        `SELECT id, listing_id, rating, comment, created_at, flagged
         FROM reviews WHERE listing_id = $1 ORDER BY created_at`,
        [listingId]
      )
    );
    return result.rows.map(mapRowToReview);
  }

  async updatePrice(listingId: string, percentChange: number): Promise<PriceUpdateResult> {
    const listing = await this.getListing(listingId);
    if (!listing) {
      return { status: "error", message: `Listing ${listingId} not found` };
    }

    const oldPrice = listing.price;
    const newPrice = round(oldPrice * (1 + percentChange / 100), 2);

    // Read and write are separate statements; no lock is taken between them
    const result = await this.run("updatePrice", () =>
      this.pool.query<{ price: string }>(
        "UPDATE listings SET price = $2, updated_at = NOW() WHERE id = $1 RETURNING price",
        [listingId, newPrice]
      )
    );
    const row = result.rows[0];
    if (!row) {
      return { status: "error", message: `Listing ${listingId} disappeared during update` };
    }

    return {
      status: "success",
      message: `Price for '${listing.title}' updated from ${oldPrice.toFixed(2)} to ${Number(
        row.price
      ).toFixed(2)}`,
      oldPrice,
      newPrice: Number(row.price),
    };
  }

  async applyDiscount(listingId: string, discountPercent: number): Promise<DiscountResult> {
    const listing = await this.getListing(listingId);
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

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw new UpstreamUnavailableError(operation, error);
    }
  }

  private mapRowToListing(row: ListingRow): Listing {
    return {
      id: row.id,
      ownerId: row.owner_id,
      title: row.title,
      category: row.category ?? "",
      price: Number(row.price),
      status: row.status,
      discountPercent: this.discounts.get(row.id) ?? 0,
    };
  }
}

function mapRowToBooking(row: BookingRow): Booking {
  return {
    id: row.id,
    listingId: row.listing_id,
    startDate: new Date(row.start_date),
    endDate: new Date(row.end_date),
    totalPrice: Number(row.total_price),
    status: row.status,
  };
}

function mapRowToReview(row: ReviewRow): Review {
  return {
    id: row.id,
    listingId: row.listing_id,
    rating: row.rating,
    comment: row.comment ?? "",
    createdAt: new Date(row.created_at),
    flagged: row.flagged,
  };
}
