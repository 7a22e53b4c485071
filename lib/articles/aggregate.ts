import type {
  ArticleDataset,
  ArticleRecord,
  DashboardSnapshot,
  DatePoint,
  SummaryStats,
  ValueCount,
} from "./types";

export interface DashboardLimits {
  topKeywords: number;
  topCountries: number;
}

export const DEFAULT_LIMITS: DashboardLimits = {
  topKeywords: 5,
  topCountries: 10,
};

function countDistinct(values: Iterable<string | null>): number {
  const seen = new Set<string>();
  for (const value of values) {
    if (value !== null) seen.add(value);
  }
  return seen.size;
}

export function summarize(records: readonly ArticleRecord[]): SummaryStats {
  return {
    totalArticles: records.length,
    uniqueSources: countDistinct(records.map((r) => r.source)),
    uniqueCountries: countDistinct(records.map((r) => r.country)),
  };
}

/**
 * Frequency table of non-null values, most frequent first. Equal counts keep
 * the order in which the values first appear.
 */
export function countValues(
  values: Iterable<string | null>,
  limit?: number
): ValueCount[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  // Map iteration is insertion order and Array.prototype.sort is stable
  const ranked = Array.from(counts, ([label, count]) => ({ label, count })).sort(
    (a, b) => b.count - a.count
  );
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function sentimentDistribution(records: readonly ArticleRecord[]): ValueCount[] {
  return countValues(records.map((r) => r.sentiment));
}

export function topCountries(
  records: readonly ArticleRecord[],
  limit = DEFAULT_LIMITS.topCountries
): ValueCount[] {
  return countValues(
    records.map((r) => r.country),
    limit
  );
}

export function topKeywords(
  records: readonly ArticleRecord[],
  limit = DEFAULT_LIMITS.topKeywords
): ValueCount[] {
  return countValues(
    records.map((r) => r.keyword),
    limit
  );
}

/** Articles per publication day, oldest first. Undated rows are left out. */
export function articlesOverTime(records: readonly ArticleRecord[]): DatePoint[] {
  return countValues(records.map((r) => r.publishedDate))
    .map(({ label, count }) => ({ date: label, count }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function buildDashboard(
  dataset: ArticleDataset,
  limits: DashboardLimits = DEFAULT_LIMITS
): DashboardSnapshot {
  const { records } = dataset;
  return {
    summary: summarize(records),
    sentiment: sentimentDistribution(records),
    topCountries: topCountries(records, limits.topCountries),
    timeline: articlesOverTime(records),
    topKeywords: topKeywords(records, limits.topKeywords),
    columns: dataset.columns.map((column) => ({ ...column })),
  };
}
