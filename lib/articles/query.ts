import { InvalidQueryError } from "@/lib/errors";
import type {
  ArticleDataset,
  ArticleRecord,
  CellValue,
  ColumnKind,
  ColumnSpec,
  SortDirection,
  TablePage,
  TableQuery,
} from "./types";

export const MAX_PAGE_SIZE = 100;

type Comparator = "=" | "!=" | ">" | ">=" | "<" | "<=";

export type CellPredicate = (value: CellValue) => boolean;

const OPERATOR = /^(>=|<=|!=|>|<|=)\s*(.*)$/s;
const NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function comparatorPredicate(op: Comparator, operand: string | number): CellPredicate {
  return (value) => {
    if (value === null) return op === "!=";
    const order = compareValues(value, operand);
    switch (op) {
      case "=":
        return order === 0;
      case "!=":
        return order !== 0;
      case ">":
        return order > 0;
      case ">=":
        return order >= 0;
      case "<":
        return order < 0;
      case "<=":
        return order <= 0;
    }
  };
}

function isComparator(value: string): value is Comparator {
  return ["=", "!=", ">", ">=", "<", "<="].includes(value);
}

/**
 * Compiles a table filter expression for a column of the given kind.
 *
 * `=x`, `!=x`, `>x`, `>=x`, `<x` and `<=x` compare; a bare value means
 * "contains" (case-insensitive) for text, equality for numbers and prefix
 * for dates and times. Returns null for a blank expression.
 */
export function parseFilterExpression(
  raw: string,
  kind: ColumnKind
): CellPredicate | null {
  const expression = raw.trim();
  if (!expression) return null;

  const match = OPERATOR.exec(expression);
  const op = match && isComparator(match[1]) ? match[1] : undefined;
  const operand = match ? match[2].trim() : expression;

  if (kind === "number") {
    if (!NUMBER.test(operand)) {
      throw new InvalidQueryError(`Not a number in filter: ${raw}`);
    }
    return comparatorPredicate(op ?? "=", Number(operand));
  }

  if (op) return comparatorPredicate(op, operand);

  if (kind === "text") {
    const needle = operand.toLowerCase();
    return (value) => value !== null && String(value).toLowerCase().includes(needle);
  }
  return (value) => value !== null && String(value).startsWith(operand);
}

function findColumn(columns: readonly ColumnSpec[], id: string): ColumnSpec {
  const column = columns.find((c) => c.id === id);
  if (!column) throw new InvalidQueryError(`Unknown column: ${id}`);
  return column;
}

function sortRecords(
  records: ArticleRecord[],
  column: string,
  direction: SortDirection
): ArticleRecord[] {
  const sign = direction === "asc" ? 1 : -1;
  return records.sort((a, b) => {
    const left = a.fields[column] ?? null;
    const right = b.fields[column] ?? null;
    if (left === null || right === null) {
      // nulls last in both directions
      return left === right ? 0 : left === null ? 1 : -1;
    }
    return sign * compareValues(left, right);
  });
}

/** Filters, sorts and pages the dataset for one table request. */
export function queryArticles(dataset: ArticleDataset, query: TableQuery): TablePage {
  if (!Number.isInteger(query.pageSize) || query.pageSize < 1) {
    throw new InvalidQueryError(`Invalid page size: ${query.pageSize}`);
  }

  const predicates: { column: string; test: CellPredicate }[] = [];
  for (const [id, expression] of Object.entries(query.filters)) {
    const column = findColumn(dataset.columns, id);
    const test = parseFilterExpression(expression, column.kind);
    if (test) predicates.push({ column: column.id, test });
  }

  let matched = dataset.records.filter((record) =>
    predicates.every(({ column, test }) => test(record.fields[column] ?? null))
  );

  if (query.sort) {
    const column = findColumn(dataset.columns, query.sort.column);
    matched = sortRecords(matched, column.id, query.sort.direction);
  }

  const total = matched.length;
  const pageCount = Math.max(1, Math.ceil(total / query.pageSize));
  const page = Math.min(Math.max(1, Math.floor(query.page) || 1), pageCount);
  const start = (page - 1) * query.pageSize;

  return {
    columns: dataset.columns.map((column) => ({ ...column })),
    rows: matched.slice(start, start + query.pageSize).map((record) => ({ ...record.fields })),
    total,
    page,
    pageSize: query.pageSize,
    pageCount,
  };
}
