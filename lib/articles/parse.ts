import Papa from "papaparse";
import { MissingColumnsError, DatasetLoadError } from "@/lib/errors";
import {
  cleanText,
  parseClockTime,
  parseDayFirstDate,
  parseNumeric,
} from "./clean";
import type {
  ArticleDataset,
  ArticleRecord,
  CellValue,
  ColumnKind,
  ColumnSpec,
  ParseWarning,
} from "./types";

export const REQUIRED_COLUMNS = [
  "title",
  "source",
  "country",
  "published_date",
  "sentiment",
  "keyword",
] as const;

const COLUMN_KINDS = new Map<string, ColumnKind>([
  ["published_date", "date"],
  ["published_time", "time"],
  ["relevance_score", "number"],
  ["latitude", "number"],
  ["longitude", "number"],
]);

const UNKNOWN_COUNTRY = "Unknown";
const UNKNOWN_SENTIMENT = "unknown";

// UTF-8 byte order mark, as-is or as it reads after latin1 decoding
const BOM = /^(?:\uFEFF|\u00EF\u00BB\u00BF)/;

type RawRow = Record<string, unknown>;

function rawCell(row: RawRow, column: string): string | undefined {
  const value = row[column];
  return typeof value === "string" ? value : undefined;
}

function cleanCell(raw: string | undefined, kind: ColumnKind): CellValue {
  switch (kind) {
    case "date":
      return parseDayFirstDate(raw);
    case "time":
      return parseClockTime(raw);
    case "number":
      return parseNumeric(raw);
    case "text":
      return cleanText(raw);
  }
}

function textField(fields: Record<string, CellValue>, column: string): string | null {
  const value = fields[column];
  return typeof value === "string" ? value : null;
}

function numberField(fields: Record<string, CellValue>, column: string): number | null {
  const value = fields[column];
  return typeof value === "number" ? value : null;
}

function toRecord(row: RawRow, columns: readonly ColumnSpec[]): ArticleRecord {
  const fields: Record<string, CellValue> = {};
  for (const column of columns) {
    fields[column.id] = cleanCell(rawCell(row, column.id), column.kind);
  }
  fields.country ??= UNKNOWN_COUNTRY;
  fields.sentiment ??= UNKNOWN_SENTIMENT;

  return Object.freeze({
    title: textField(fields, "title"),
    source: textField(fields, "source"),
    country: textField(fields, "country") ?? UNKNOWN_COUNTRY,
    keyword: textField(fields, "keyword"),
    sentiment: textField(fields, "sentiment") ?? UNKNOWN_SENTIMENT,
    publishedDate: textField(fields, "published_date"),
    publishedTime: textField(fields, "published_time"),
    relevanceScore: numberField(fields, "relevance_score"),
    latitude: numberField(fields, "latitude"),
    longitude: numberField(fields, "longitude"),
    fields: Object.freeze(fields),
  });
}

function emptyDataset(): ArticleDataset {
  return Object.freeze({
    columns: REQUIRED_COLUMNS.map((id) => ({ id, kind: COLUMN_KINDS.get(id) ?? "text" })),
    records: [],
    warnings: [],
  });
}

/**
 * Parses the articles CSV into a frozen dataset.
 *
 * Throws MissingColumnsError when a required column is absent and
 * DatasetLoadError for unterminated quotes or rows wider than the header.
 * Short rows are kept, their missing cells treated as empty, and reported
 * in `warnings`.
 */
export function parseArticlesCsv(text: string): ArticleDataset {
  const result = Papa.parse<RawRow>(text.replace(BOM, ""), {
    header: true,
    delimiter: ",",
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
  });

  const headers = result.meta.fields ?? [];
  if (!headers.length && !result.data.length) return emptyDataset();

  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length) throw new MissingColumnsError(missing);

  const warnings: ParseWarning[] = [];
  for (const err of result.errors) {
    const row = err.row ?? 0;
    if (err.type === "Quotes" || err.code === "TooManyFields") {
      throw new DatasetLoadError(
        "MALFORMED_CSV",
        `Malformed CSV at data row ${row + 1}: ${err.message}`
      );
    }
    warnings.push({ row, message: err.message });
  }

  const columns: ColumnSpec[] = headers.map((id) => ({
    id,
    kind: COLUMN_KINDS.get(id) ?? "text",
  }));
  const records = result.data.map((row) => toRecord(row, columns));

  return Object.freeze({
    columns: Object.freeze(columns),
    records: Object.freeze(records),
    warnings: Object.freeze(warnings),
  });
}
