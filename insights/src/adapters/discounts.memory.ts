import type { DiscountStore } from "../core/ports";

export class MemoryDiscountStore implements DiscountStore {
  private discounts = new Map<string, number>();

  constructor(initial: Record<string, number> = {}) {
    for (const [listingId, pct] of Object.entries(initial)) {
      this.discounts.set(listingId, pct);
    }
  }

  get(listingId: string): number | undefined {
    return this.discounts.get(listingId);
  }

  set(listingId: string, discountPercent: number): void {
    this.discounts.set(listingId, discountPercent);
  }

  clear(): void {
    this.discounts.clear();
  }

  size(): number {
    return this.discounts.size;
  }
}
