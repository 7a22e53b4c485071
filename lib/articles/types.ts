export type ColumnKind = "text" | "number" | "date" | "time";

export interface ColumnSpec {
  id: string;
  kind: ColumnKind;
}

export type CellValue = string | number | null;

/** One cleaned row of the articles CSV. */
export interface ArticleRecord {
  title: string | null;
  source: string | null;
  country: string;
  keyword: string | null;
  sentiment: string;
  /** YYYY-MM-DD */
  publishedDate: string | null;
  /** HH:MM:SS */
  publishedTime: string | null;
  relevanceScore: number | null;
  latitude: number | null;
  longitude: number | null;
  /** Every column of the row by header name, as shown in the table. */
  fields: Record<string, CellValue>;
}

export interface ParseWarning {
  /** Zero-based data row index. */
  row: number;
  message: string;
}

export interface ArticleDataset {
  columns: readonly ColumnSpec[];
  records: readonly ArticleRecord[];
  warnings: readonly ParseWarning[];
}

export interface ValueCount {
  label: string;
  count: number;
}

export interface DatePoint {
  date: string;
  count: number;
}

export interface SummaryStats {
  totalArticles: number;
  uniqueSources: number;
  uniqueCountries: number;
}

export interface DashboardSnapshot {
  summary: SummaryStats;
  sentiment: ValueCount[];
  topCountries: ValueCount[];
  timeline: DatePoint[];
  topKeywords: ValueCount[];
  columns: ColumnSpec[];
}

export type SortDirection = "asc" | "desc";

export interface TableQuery {
  filters: Record<string, string>;
  sort?: { column: string; direction: SortDirection };
  page: number;
  pageSize: number;
}

export interface TablePage {
  columns: ColumnSpec[];
  rows: Record<string, CellValue>[];
  total: number;
  page: number;
  pageSize: number;
  pageCount: number;
}
