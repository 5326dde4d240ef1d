/**
 * REST upstream accessor
 *
 * Reads listings, bookings and reviews from the marketplace API and writes
 * price changes back through PATCH. Payload fields are accepted in either
 * snake_case or camelCase.
 */

import { z } from "zod";
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

export type HttpResponse = { status: number; data: unknown };

export interface HttpClient {
  request(
    method: "GET" | "PATCH",
    url: string,
    options?: { body?: unknown; timeout?: number }
  ): Promise<HttpResponse>;
}

export class FetchHttpClient implements HttpClient {
  async request(
    method: "GET" | "PATCH",
    url: string,
    options: { body?: unknown; timeout?: number } = {}
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeout ?? 5000);

    try {
      const response = await fetch(url, {
        method,
        headers: { "Content-Type": "application/json" },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, data: text ? JSON.parse(text) : null };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// ===== Payload schemas =====

const id = z.union([z.string(), z.number()]).transform(String);
const amount = z.coerce.number().finite();

const listingPayload = z.object({
  id,
  owner: z.object({ id }).partial().nullish(),
  ownerId: id.nullish(),
  owner_id: id.nullish(),
  title: z.string().nullish(),
  category: z.string().nullish(),
  type: z.string().nullish(),
  price: amount.optional(),
  basePrice: amount.optional(),
  base_price: amount.optional(),
  status: z.string().nullish(),
});

const bookingPayload = z
  .object({
    id,
    listingId: id.nullish(),
    listing_id: id.nullish(),
    startDate: z.coerce.date().optional(),
    start_date: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
    end_date: z.coerce.date().optional(),
    totalPrice: amount.optional(),
    total_price: amount.optional(),
    status: z.string().nullish(),
  })
  .transform((p, ctx): Booking => {
    const listingId = p.listing_id ?? p.listingId;
    const startDate = p.start_date ?? p.startDate;
    const endDate = p.end_date ?? p.endDate;
    if (!listingId || !startDate || !endDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `booking ${p.id} lacks a listing id or dates`,
      });
      return z.NEVER;
    }
    return {
      id: p.id,
      listingId,
      startDate,
      endDate,
      totalPrice: p.total_price ?? p.totalPrice ?? 0,
      status: p.status ?? "CONFIRMED",
    };
  });

const reviewPayload = z
  .object({
    id,
    listingId: id.nullish(),
    listing_id: id.nullish(),
    rating: z.coerce.number().int().min(1).max(5),
    comment: z.string().nullish(),
    createdAt: z.coerce.date().optional(),
    created_at: z.coerce.date().optional(),
    timestamp: z.coerce.date().optional(),
    flagged: z.boolean().nullish(),
  })
  .transform(
    (p): Review => ({
      id: p.id,
      listingId: p.listing_id ?? p.listingId ?? "",
      rating: p.rating,
      comment: p.comment ?? "",
      createdAt: p.created_at ?? p.createdAt ?? p.timestamp ?? new Date(0),
      flagged: p.flagged ?? false,
    })
  );

const userPayload = z.object({ listings: z.array(listingPayload).default([]) });

type ListingPayload = z.infer<typeof listingPayload>;

export type HttpAccessorOptions = {
  baseUrl: string;
  timeoutMs: number;
  client?: HttpClient;
};

export class HttpDomainAccessor implements DomainAccessor {
  private baseUrl: string;
  private timeoutMs: number;
  private client: HttpClient;

  constructor(
    private discounts: DiscountStore,
    options: HttpAccessorOptions
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.client = options.client ?? new FetchHttpClient();
  }

  async getListing(listingId: string): Promise<Listing | null> {
    const response = await this.send("getListing", "GET", `/listings/${encodeURIComponent(listingId)}`);
    if (response.status === 404) return null;
    this.expectOk("getListing", response);
    return this.toListing(this.parse("getListing", listingPayload, response.data));
  }

  async getAllListings(): Promise<Listing[]> {
    const response = await this.send("getAllListings", "GET", "/listings");
    this.expectOk("getAllListings", response);
    return this.parse("getAllListings", z.array(listingPayload), response.data).map((p) =>
      this.toListing(p)
    );
  }

  async getListingsByOwner(ownerId: string): Promise<Listing[]> {
    const response = await this.send(
      "getListingsByOwner",
      "GET",
      `/users/${encodeURIComponent(ownerId)}`
    );
    // An unknown owner simply holds nothing
    if (response.status === 404) return [];
    this.expectOk("getListingsByOwner", response);
    const user = this.parse("getListingsByOwner", userPayload, response.data);
    return user.listings.map((p) => this.toListing(p, ownerId));
  }

  async getBookings(listingId: string): Promise<Booking[]> {
    const response = await this.send(
      "getBookings",
      "GET",
      `/bookings?listing_id=${encodeURIComponent(listingId)}`
    );
    this.expectOk("getBookings", response);
    // Some upstreams ignore the filter
    return this.parse("getBookings", z.array(bookingPayload), response.data).filter(
      (b) => b.listingId === listingId
    );
  }

  async getAllBookings(): Promise<Booking[]> {
    const response = await this.send("getAllBookings", "GET", "/bookings");
    this.expectOk("getAllBookings", response);
    return this.parse("getAllBookings", z.array(bookingPayload), response.data);
  }

  async getReviews(listingId: string): Promise<Review[]> {
    const response = await this.send(
      "getReviews",
      "GET",
      `/reviews?listing_id=${encodeURIComponent(listingId)}`
    );
    this.expectOk("getReviews", response);
    return this.parse("getReviews", z.array(reviewPayload), response.data)
      .filter((r) => r.listingId === listingId || r.listingId === "")
      .map((r) => ({ ...r, listingId }));
  }

  async updatePrice(listingId: string, percentChange: number): Promise<PriceUpdateResult> {
    const listing = await this.getListing(listingId);
    if (!listing) {
      return { status: "error", message: `Listing ${listingId} not found` };
    }

    const oldPrice = listing.price;
    const newPrice = round(oldPrice * (1 + percentChange / 100), 2);

    let response: HttpResponse;
    try {
      response = await this.client.request(
        "PATCH",
        `${this.baseUrl}/listings/${encodeURIComponent(listingId)}`,
        { body: { basePrice: newPrice }, timeout: this.timeoutMs }
      );
    } catch (error) {
      return {
        status: "error",
        message: `Failed to update price for '${listing.title}': ${
          error instanceof Error ? error.message : String(error)
        }`,
      };
    }

    if (response.status < 200 || response.status >= 300) {
      return {
        status: "error",
        message: `Failed to update price for '${listing.title}': upstream returned HTTP ${response.status}`,
      };
    }

    return {
      status: "success",
      message: `Price for '${listing.title}' updated from ${oldPrice.toFixed(2)} to ${newPrice.toFixed(2)}`,
      oldPrice,
      newPrice,
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

  // ===== Helper Methods =====

  private async send(
    operation: string,
    method: "GET" | "PATCH",
    path: string
  ): Promise<HttpResponse> {
    try {
      return await this.client.request(method, `${this.baseUrl}${path}`, {
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new UpstreamUnavailableError(operation, error);
    }
  }

  private expectOk(operation: string, response: HttpResponse): void {
    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamUnavailableError(
        operation,
        new Error(`upstream returned HTTP ${response.status}`)
      );
    }
  }

  private parse<T>(
    operation: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown
  ): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new UpstreamUnavailableError(
        operation,
        new Error(`unusable payload: ${result.error.errors[0]?.message ?? "invalid"}`)
      );
    }
    return result.data;
  }

  private toListing(p: ListingPayload, ownerFallback = ""): Listing {
    return {
      id: p.id,
      ownerId: p.owner?.id ?? p.ownerId ?? p.owner_id ?? ownerFallback,
      title: p.title ?? "",
      category: p.category ?? p.type ?? "",
      price: p.basePrice ?? p.base_price ?? p.price ?? 0,
      status: p.status ?? "",
      discountPercent: this.discounts.get(p.id) ?? 0,
    };
  }
}
