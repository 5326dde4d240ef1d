export type ISO = string;

// ===== Domain snapshots (owned by the upstream store) =====

export type Listing = {
  id: string;
  ownerId: string;
  title: string;
  category: string; // free-text grouping key, "Other" when upstream has none
  price: number; // current price per period
  status: string;
  discountPercent: number; // side-table annotation, 0 when none recorded
};

export type Booking = {
  id: string;
  listingId: string;
  startDate: Date;
  endDate: Date;
  totalPrice: number;
  status: string; // compared case-insensitively
};

export type Review = {
  id: string;
  listingId: string;
  rating: number; // 1..5
  comment: string;
  createdAt: Date;
  flagged: boolean;
};

export type PriceUpdateResult = {
  status: "success" | "error";
  message: string;
  oldPrice?: number;
  newPrice?: number;
};

export type DiscountResult = {
  status: "success" | "error";
  message: string;
  discountPercent?: number;
};

// ===== Pricing =====

export type DemandLevel = "High" | "Medium" | "Low" | "Very Low";
export type AdjustmentDirection = "increase" | "maintain" | "decrease";

export type PricingReport = {
  listingId: string;
  listingTitle: string;
  currentPrice: number;
  suggestedPrice: number;
  priceDifference: number;
  adjustmentPercent: number;
  adjustmentDirection: AdjustmentDirection;
  demandLevel: DemandLevel;
  demandScore: number;
  occupancyRate: number; // percent, 1 decimal
  totalBookings: number;
  windowBookings: number;
  weekendBookings: number;
  weekdayBookings: number;
  holidayBookings: number;
  recentBookings: number;
  totalRevenue: number;
  discountPercent: number;
  reasons: string[];
  notes: string[];
  canTakeAction: boolean;
  message: string;
};

export type PriceChangeResult =
  | {
      success: true;
      listingId: string;
      listingTitle: string;
      oldPrice: number;
      newPrice: number;
      message: string;
    }
  | { success: false; message: string };

// ===== Market trends =====

export type TrendStatus =
  | "on_track"
  | "needs_improvement"
  | "opportunity"
  | "low_demand";

export type CategoryTrend = {
  category: string;
  listingCount: number;
  totalBookings: number;
  totalRevenue: number;
  trendScore: number;
};

export type TrendRecommendation = {
  category: string;
  status: TrendStatus;
  message: string;
  advice: string;
};

export type PortfolioSummary = {
  totalListings: number;
  categories: string[];
  totalBookings: number;
  totalRevenue: number;
};

export type TrendReport = {
  title: string;
  ownerId: string;
  portfolio: PortfolioSummary;
  trendingCategories: CategoryTrend[];
  recommendations: TrendRecommendation[];
  message: string;
};

// ===== Reviews =====

export type SatisfactionLevel =
  | "Satisfied"
  | "Neutral"
  | "Dissatisfied"
  | "No Reviews";

export type SentimentLabel =
  | "Very Positive"
  | "Mostly Positive"
  | "Mixed"
  | "Mostly Negative"
  | "Neutral"
  | "No Data";

export type StarBucket = "5_star" | "4_star" | "3_star" | "2_star" | "1_star";

export type RatingDistribution = Record<
  StarBucket,
  { count: number; percentage: number }
>;

export type ThemeSummary = {
  theme: string;
  mentionCount: number;
  sentiment: "positive" | "negative" | "mixed";
};

export type IssueSummary = {
  issue: string;
  count: number;
  examples: string[];
};

export type PraiseSummary = {
  praise: string;
  count: number;
};

export type ReviewReport = {
  title: string;
  listingId: string;
  overallSatisfaction: {
    level: SatisfactionLevel;
    averageRating: number | null;
    maxRating: number;
  };
  totalReviews: number;
  flaggedReviews: number;
  ratingDistribution: RatingDistribution;
  sentimentAnalysis: {
    overall: SentimentLabel;
    positiveMentions: number;
    negativeMentions: number;
  };
  recurringThemes: ThemeSummary[];
  issues: IssueSummary[];
  praise: PraiseSummary[];
  keyInsights: string[];
  recommendations: string[];
  summary: string;
};

// ===== Bookings =====

export type BookingSummary = {
  listingId: string;
  listingTitle: string;
  totalBookings: number;
  avgDurationDays: number;
  occupancyRate: number; // percent, 1 decimal
  discountRecommended: boolean;
  suggestedDiscountPercent: number;
  currentDiscountPercent: number;
  message: string;
};

export type DiscountChangeResult =
  | { success: true; listingId: string; discountPercent: number; message: string }
  | { success: false; message: string };

// ===== HTTP =====

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  details?: unknown;
  timestamp: string;
}
