import { beforeEach, describe, expect, it } from "vitest";
import type { MemoryDomainAccessor } from "../src/adapters/accessor.memory";
import type { AnalyzerDeps } from "../src/core/ports";
import {
  analyzeReviews,
  extractFeedback,
  ratingDistribution,
  satisfactionFor,
  scoreSentiment,
} from "../src/core/reviews";
import { buildDeps, listing, review, tables } from "./fixtures";

const reviewTables = tables.reviews;

describe("review helpers", () => {
  it("should build a rounded rating distribution", () => {
    const distribution = ratingDistribution([
      review("r1", "listing-1", 5, ""),
      review("r2", "listing-1", 4, ""),
      review("r3", "listing-1", 5, ""),
      review("r4", "listing-1", 3, ""),
    ]);

    expect(distribution).toEqual({
      "5_star": { count: 2, percentage: 50 },
      "4_star": { count: 1, percentage: 25 },
      "3_star": { count: 1, percentage: 25 },
      "2_star": { count: 0, percentage: 0 },
      "1_star": { count: 0, percentage: 0 },
    });
  });

  it("should round each share independently when counts do not divide evenly", () => {
    const distribution = ratingDistribution([
      review("r1", "listing-1", 5, ""),
      review("r2", "listing-1", 4, ""),
      review("r3", "listing-1", 3, ""),
    ]);

    expect(distribution).toEqual({
      "5_star": { count: 1, percentage: 33 },
      "4_star": { count: 1, percentage: 33 },
      "3_star": { count: 1, percentage: 33 },
      "2_star": { count: 0, percentage: 0 },
      "1_star": { count: 0, percentage: 0 },
    });
  });

  it("should map averages to satisfaction levels", () => {
    expect(satisfactionFor(4, reviewTables)).toBe("Satisfied");
    expect(satisfactionFor(3.9, reviewTables)).toBe("Neutral");
    expect(satisfactionFor(3, reviewTables)).toBe("Neutral");
    expect(satisfactionFor(2.9, reviewTables)).toBe("Dissatisfied");
  });

  it("should count each keyword once per review", () => {
    const sentiment = scoreSentiment(
      [review("r1", "listing-1", 5, "Great great GREAT place")],
      reviewTables
    );

    expect(sentiment).toEqual({
      overall: "Very Positive",
      positiveMentions: 1,
      negativeMentions: 0,
    });
  });

  it("should call sentiment Neutral when no keyword matches", () => {
    expect(scoreSentiment([review("r1", "listing-1", 3, "It was fine")], reviewTables).overall).toBe(
      "Neutral"
    );
  });

  it("should truncate long issue examples", () => {
    const comment = `Broken heater. ${"a".repeat(100)}`;

    const { issues } = extractFeedback([review("r1", "listing-1", 1, comment)], reviewTables);

    expect(issues).toEqual([
      {
        issue: "broken item/facility",
        count: 1,
        examples: [`${comment.slice(0, 100)}...`],
      },
    ]);
  });

  it("should not split emoji when truncating examples", () => {
    const comment = `Broken ${"😀".repeat(100)}`;

    const { issues } = extractFeedback([review("r1", "listing-1", 1, comment)], reviewTables);

    expect(issues).toEqual([
      {
        issue: "broken item/facility",
        count: 1,
        examples: [`Broken ${"😀".repeat(93)}...`],
      },
    ]);
  });

  it("should only take issues from low ratings and praise from high ones", () => {
    const { issues, praise } = extractFeedback(
      [
        review("r1", "listing-1", 5, "Clean but the wifi was slow"),
        review("r2", "listing-1", 2, "Clean sheets, broken lamp"),
      ],
      reviewTables
    );

    expect(issues.map((i) => i.issue)).toEqual(["broken item/facility"]);
    expect(praise).toEqual([{ praise: "cleanliness", count: 1 }]);
  });
});

describe("analyzeReviews", () => {
  let accessor: MemoryDomainAccessor;
  let deps: AnalyzerDeps;

  beforeEach(() => {
    ({ accessor, deps } = buildDeps());
    accessor.addListing(listing());
  });

  it("should return the canned report when there are no reviews", async () => {
    const report = await analyzeReviews("listing-1", deps);

    expect(report.title).toBe("Review Analysis for 'Harbour View Loft'");
    expect(report.overallSatisfaction).toEqual({
      level: "No Reviews",
      averageRating: null,
      maxRating: 5,
    });
    expect(report.totalReviews).toBe(0);
    expect(report.sentimentAnalysis.overall).toBe("No Data");
    expect(report.ratingDistribution["5_star"]).toEqual({ count: 0, percentage: 0 });
    expect(report.keyInsights).toEqual(["No reviews available for analysis"]);
    expect(report.recommendations).toHaveLength(3);
    expect(report.summary).toBe(
      "No reviews have been submitted for 'Harbour View Loft' yet. Focus on delivering great experiences to earn your first reviews."
    );
  });

  it("should highlight praise for a satisfied listing", async () => {
    accessor.addReview(review("r1", "listing-1", 5, "Spotless and comfortable, great host"));
    accessor.addReview(review("r2", "listing-1", 4, "Clean and cozy, good value"));
    accessor.addReview(review("r3", "listing-1", 5, "Amazing stay", { flagged: true }));

    const report = await analyzeReviews("listing-1", deps);

    expect(report.overallSatisfaction.level).toBe("Satisfied");
    expect(report.overallSatisfaction.averageRating).toBe(4.7);
    expect(report.totalReviews).toBe(3);
    expect(report.flaggedReviews).toBe(1);
    expect(report.issues).toEqual([]);
    expect(report.keyInsights).toEqual([
      "Customers are highly satisfied with this listing",
      "Most praised aspects: excellent cleanliness, comfort, great experience",
    ]);
    expect(report.recommendations).toEqual([
      "Continue maintaining your high standards",
      "Consider raising prices given the positive feedback",
      "Encourage guests to share their positive experiences",
    ]);
    expect(report.summary).toBe(
      "Based on 3 reviews with an average rating of 4.7/5.0, the overall satisfaction is Satisfied. " +
        "Guests appreciate: excellent cleanliness, comfort. " +
        "Priority action: Continue maintaining your high standards"
    );
  });

  it("should turn recurring issues into recommendations", async () => {
    accessor.addReview(
      review("r1", "listing-1", 2, "The room was dirty and the wifi kept dropping")
    );
    accessor.addReview(review("r2", "listing-1", 1, "Dirty bathroom, broken shower"));
    accessor.addReview(review("r3", "listing-1", 3, "Okay location but dirty carpets"));

    const report = await analyzeReviews("listing-1", deps);

    expect(report.overallSatisfaction.level).toBe("Dissatisfied");
    expect(report.overallSatisfaction.averageRating).toBe(2);
    expect(report.issues).toEqual([
      {
        issue: "cleanliness issue",
        count: 3,
        examples: [
          "The room was dirty and the wifi kept dropping",
          "Dirty bathroom, broken shower",
        ],
      },
      {
        issue: "wifi/internet issue",
        count: 1,
        examples: ["The room was dirty and the wifi kept dropping"],
      },
      { issue: "broken item/facility", count: 1, examples: ["Dirty bathroom, broken shower"] },
    ]);
    expect(report.sentimentAnalysis).toEqual({
      overall: "Mostly Negative",
      positiveMentions: 0,
      negativeMentions: 4,
    });
    expect(report.recurringThemes).toEqual([
      { theme: "Cleanliness", mentionCount: 3, sentiment: "negative" },
      { theme: "Location", mentionCount: 1, sentiment: "mixed" },
      { theme: "Amenities", mentionCount: 1, sentiment: "negative" },
    ]);
    expect(report.keyInsights).toEqual([
      "Main issues identified: cleanliness issue, wifi/internet issue, broken item/facility",
    ]);
    expect(report.recommendations).toEqual([
      "Cleanliness mentioned 3x - Deep clean before each guest, consider professional cleaning service",
      "WiFi mentioned 1x - Upgrade internet plan or add WiFi extenders",
    ]);
    expect(report.summary).toBe(
      "Based on 3 reviews with an average rating of 2.0/5.0, the overall satisfaction is Dissatisfied. " +
        "Key issues found: cleanliness issue, wifi/internet issue, broken item/facility. " +
        "Priority action: Cleanliness mentioned 3x"
    );
  });

  it("should fall back to general advice when no issue is recognized", async () => {
    accessor.addReview(review("r1", "listing-1", 3, "It was fine"));
    accessor.addReview(review("r2", "listing-1", 3, "Average stay"));

    const report = await analyzeReviews("listing-1", deps);

    expect(report.overallSatisfaction.level).toBe("Neutral");
    expect(report.keyInsights).toEqual([]);
    expect(report.recommendations).toEqual([
      "Respond to guest feedback and ask for specific improvement suggestions",
      "Small touches like welcome snacks can improve ratings",
    ]);
    expect(report.summary).toBe(
      "Based on 2 reviews with an average rating of 3.0/5.0, the overall satisfaction is Neutral. " +
        "Priority action: Respond to guest feedback and ask for specific improvement suggestions"
    );
  });

  it("should use the listing id as title when the listing cannot be read", async () => {
    accessor.addReview(review("r1", "listing-1", 5, "Perfect"));
    accessor.failWith(new Error("timeout"), ["getListing"]);

    const report = await analyzeReviews("listing-1", deps);

    expect(report.title).toBe("Review Analysis for 'listing-1'");
    expect(report.totalReviews).toBe(1);
  });

  it("should report no reviews when reviews cannot be read", async () => {
    accessor.addReview(review("r1", "listing-1", 5, "Perfect"));
    accessor.failWith(new Error("timeout"), ["getReviews"]);

    const report = await analyzeReviews("listing-1", deps);

    expect(report.overallSatisfaction.level).toBe("No Reviews");
  });
});
