import { round } from "./dates";
import type {
  IssueSummary,
  PraiseSummary,
  RatingDistribution,
  Review,
  ReviewReport,
  SatisfactionLevel,
  SentimentLabel,
  ThemeSummary,
} from "./dto";
import { readOrEmpty } from "./errors";
import type { AnalyzerDeps } from "./ports";
import { fillTemplate, type ReviewTables } from "./tables";

function normalized(review: Review): string {
  return review.comment.toLowerCase();
}

export function ratingDistribution(reviews: Review[]): RatingDistribution {
  const total = reviews.length;
  const entry = (stars: number) => {
    const count = reviews.filter((r) => r.rating === stars).length;
    return { count, percentage: total > 0 ? Math.round((count / total) * 100) : 0 };
  };
  return {
    "5_star": entry(5),
    "4_star": entry(4),
    "3_star": entry(3),
    "2_star": entry(2),
    "1_star": entry(1),
  };
}

export function satisfactionFor(average: number, tables: ReviewTables): SatisfactionLevel {
  if (average >= tables.satisfaction.satisfied) return "Satisfied";
  if (average >= tables.satisfaction.neutral) return "Neutral";
  return "Dissatisfied";
}

/**
 * Keyword-presence sentiment. Each keyword counts at most once per review.
 */
export function scoreSentiment(
  reviews: Review[],
  tables: ReviewTables
): { overall: SentimentLabel; positiveMentions: number; negativeMentions: number } {
  let positiveMentions = 0;
  let negativeMentions = 0;

  for (const review of reviews) {
    const text = normalized(review);
    positiveMentions += tables.positiveKeywords.filter((k) => text.includes(k)).length;
    negativeMentions += tables.negativeKeywords.filter((k) => text.includes(k)).length;
  }

  const total = positiveMentions + negativeMentions;
  if (total === 0) {
    return { overall: "Neutral", positiveMentions, negativeMentions };
  }

  const ratio = positiveMentions / total;
  const { veryPositive, mostlyPositive, mixed } = tables.sentiment;
  const overall: SentimentLabel =
    ratio >= veryPositive
      ? "Very Positive"
      : ratio >= mostlyPositive
      ? "Mostly Positive"
      : ratio >= mixed
      ? "Mixed"
      : "Mostly Negative";

  return { overall, positiveMentions, negativeMentions };
}

export function recurringThemes(reviews: Review[], tables: ReviewTables): ThemeSummary[] {
  const themes: ThemeSummary[] = [];

  for (const [theme, keywords] of Object.entries(tables.themes)) {
    let mentionCount = 0;
    let positive = 0;
    let negative = 0;

    for (const review of reviews) {
      const text = normalized(review);
      if (!keywords.some((k) => text.includes(k))) continue;
      mentionCount++;
      if (review.rating >= tables.positiveThemeMinRating) positive++;
      else if (review.rating <= tables.negativeThemeMaxRating) negative++;
    }

    if (mentionCount > 0) {
      themes.push({
        theme,
        mentionCount,
        sentiment: positive > negative ? "positive" : negative > positive ? "negative" : "mixed",
      });
    }
  }

  return themes.sort((a, b) => b.mentionCount - a.mentionCount).slice(0, tables.topThemes);
}

// Cut by code points so emoji are never split
function excerpt(comment: string, length: number): string {
  const chars = Array.from(comment);
  return chars.length > length ? `${chars.slice(0, length).join("")}...` : comment;
}

export function extractFeedback(
  reviews: Review[],
  tables: ReviewTables
): { issues: IssueSummary[]; praise: PraiseSummary[] } {
  const issues = new Map<string, IssueSummary>();
  const praise = new Map<string, PraiseSummary>();

  for (const review of reviews) {
    const text = normalized(review);

    if (review.rating <= tables.issueMaxRating) {
      for (const [keyword, issue] of Object.entries(tables.issueKeywords)) {
        if (!text.includes(keyword)) continue;
        const entry = issues.get(issue) ?? { issue, count: 0, examples: [] };
        entry.count++;
        if (entry.examples.length < tables.maxExamples) {
          entry.examples.push(excerpt(review.comment, tables.exampleLength));
        }
        issues.set(issue, entry);
      }
    }

    if (review.rating >= tables.praiseMinRating) {
      for (const [keyword, description] of Object.entries(tables.praiseKeywords)) {
        if (!text.includes(keyword)) continue;
        const entry = praise.get(description) ?? { praise: description, count: 0 };
        entry.count++;
        praise.set(description, entry);
      }
    }
  }

  return {
    issues: [...issues.values()].sort((a, b) => b.count - a.count),
    praise: [...praise.values()].sort((a, b) => b.count - a.count),
  };
}

function adviseOwner(
  level: SatisfactionLevel,
  issues: IssueSummary[],
  praise: PraiseSummary[],
  tables: ReviewTables
): { keyInsights: string[]; recommendations: string[] } {
  const keyInsights: string[] = [];
  const recommendations: string[] = [];

  if (level === "Satisfied") {
    keyInsights.push(tables.canned.satisfied.insight);
    if (praise.length > 0) {
      keyInsights.push(
        `Most praised aspects: ${praise.slice(0, 3).map((p) => p.praise).join(", ")}`
      );
    }
    recommendations.push(...tables.canned.satisfied.recommendations);
    return { keyInsights, recommendations };
  }

  if (issues.length > 0) {
    keyInsights.push(
      `Main issues identified: ${issues.slice(0, 3).map((i) => i.issue).join(", ")}`
    );
  }
  if (praise.length > 0) {
    keyInsights.push(
      `Positive aspects to maintain: ${praise.slice(0, 2).map((p) => p.praise).join(", ")}`
    );
  }

  for (const issue of issues.slice(0, tables.seededIssueCount)) {
    const template = tables.issueRecommendations[issue.issue];
    if (template) {
      recommendations.push(fillTemplate(template, { count: issue.count }));
    }
  }

  if (recommendations.length === 0 && level !== "No Reviews") {
    recommendations.push(...tables.canned.fallback[level]);
  }

  return { keyInsights, recommendations };
}

function summarize(
  total: number,
  average: number,
  level: SatisfactionLevel,
  issues: IssueSummary[],
  praise: PraiseSummary[],
  recommendations: string[]
): string {
  let summary =
    `Based on ${total} reviews with an average rating of ${average.toFixed(1)}/5.0, ` +
    `the overall satisfaction is ${level}. `;

  if (issues.length > 0) {
    summary += `Key issues found: ${issues.slice(0, 3).map((i) => i.issue).join(", ")}. `;
  }
  if (praise.length > 0) {
    summary += `Guests appreciate: ${praise.slice(0, 2).map((p) => p.praise).join(", ")}. `;
  }
  const first = recommendations[0];
  if (first !== undefined) {
    summary += `Priority action: ${first.split(" - ")[0]}`;
  }

  return summary.trimEnd();
}

function emptyReport(listingId: string, title: string, tables: ReviewTables): ReviewReport {
  return {
    title: `Review Analysis for '${title}'`,
    listingId,
    overallSatisfaction: {
      level: "No Reviews",
      averageRating: null,
      maxRating: tables.maxRating,
    },
    totalReviews: 0,
    flaggedReviews: 0,
    ratingDistribution: ratingDistribution([]),
    sentimentAnalysis: { overall: "No Data", positiveMentions: 0, negativeMentions: 0 },
    recurringThemes: [],
    issues: [],
    praise: [],
    keyInsights: [...tables.canned.noReviews.insights],
    recommendations: [...tables.canned.noReviews.recommendations],
    summary: fillTemplate(tables.canned.noReviews.summary, { title }),
  };
}

/**
 * Summarize guest satisfaction for a listing from its ratings and the
 * keywords in review comments. A missing listing only affects the title.
 */
export async function analyzeReviews(
  listingId: string,
  deps: AnalyzerDeps
): Promise<ReviewReport> {
  const { accessor, logger } = deps;
  const tables = deps.tables.reviews;

  const reviews = await readOrEmpty(
    () => accessor.getReviews(listingId),
    (error) => logger.warn(`Reviews unavailable for ${listingId}:`, error.message)
  );

  let title = listingId;
  try {
    const listing = await accessor.getListing(listingId);
    if (listing) title = listing.title;
  } catch (error) {
    logger.warn(
      `Listing ${listingId} unavailable, using id as title:`,
      error instanceof Error ? error.message : error
    );
  }

  if (reviews.length === 0) {
    return emptyReport(listingId, title, tables);
  }

  const average = reviews.reduce((sum, r) => sum + r.rating, 0) / reviews.length;
  const level = satisfactionFor(average, tables);
  const { issues, praise } = extractFeedback(reviews, tables);
  const { keyInsights, recommendations } = adviseOwner(level, issues, praise, tables);

  return {
    title: `Review Analysis for '${title}'`,
    listingId,
    overallSatisfaction: {
      level,
      averageRating: round(average, 1),
      maxRating: tables.maxRating,
    },
    totalReviews: reviews.length,
    flaggedReviews: reviews.filter((r) => r.flagged).length,
    ratingDistribution: ratingDistribution(reviews),
    sentimentAnalysis: scoreSentiment(reviews, tables),
    recurringThemes: recurringThemes(reviews, tables),
    issues,
    praise,
    keyInsights,
    recommendations,
    summary: summarize(reviews.length, average, level, issues, praise, recommendations),
  };
}
