import { InvalidQueryError } from "@/lib/errors";
import { parseFilterExpression, queryArticles } from "../query";
import type { TableQuery } from "../types";
import { sampleDataset, titles } from "./fixtures";

function run(overrides: Partial<TableQuery> = {}) {
  return queryArticles(sampleDataset(), {
    filters: {},
    page: 1,
    pageSize: 10,
    ...overrides,
  });
}

describe("parseFilterExpression", () => {
  test("blank expressions are ignored", () => {
    expect(parseFilterExpression("   ", "text")).toBeNull();
  });

  test("numbers require a numeric operand", () => {
    expect(() => parseFilterExpression(">high", "number")).toThrow(InvalidQueryError);
  });

  test("a bare date matches by prefix", () => {
    const matches = parseFilterExpression("2024-01", "date");
    expect(matches?.("2024-01-31")).toBe(true);
    expect(matches?.("2023-01-31")).toBe(false);
    expect(matches?.(null)).toBe(false);
  });
});

describe("queryArticles filters", () => {
  test("exact source match returns only that source", () => {
    const page = run({ filters: { source: "=BBC" } });
    expect(titles(page.rows)).toEqual(["A", "C"]);
    expect(page.rows.every((row) => row.source === "BBC")).toBe(true);
  });

  test("bare text is a case-insensitive contains", () => {
    expect(titles(run({ filters: { source: "bb" } }).rows)).toEqual(["A", "C"]);
  });

  test("not-equal keeps rows with no value", () => {
    expect(titles(run({ filters: { source: "!=BBC" } }).rows)).toEqual(["B", "D", "E", "F"]);
  });

  test("numeric comparisons", () => {
    expect(titles(run({ filters: { relevance_score: ">0.5" } }).rows)).toEqual(["A", "F"]);
    expect(titles(run({ filters: { relevance_score: ">= 0.5" } }).rows)).toEqual(["A", "E", "F"]);
    expect(titles(run({ filters: { relevance_score: "2" } }).rows)).toEqual(["F"]);
  });

  test("filters combine", () => {
    const page = run({ filters: { country: "=India", published_date: "2024-01-03" } });
    expect(titles(page.rows)).toEqual(["F"]);
  });

  test("unknown columns are rejected", () => {
    expect(() => run({ filters: { author: "x" } })).toThrow("Unknown column: author");
  });
});

describe("queryArticles sort", () => {
  test("numbers sort numerically with nulls last", () => {
    const desc = run({ sort: { column: "relevance_score", direction: "desc" } });
    expect(titles(desc.rows)).toEqual(["F", "A", "E", "C", "B", "D"]);
    const asc = run({ sort: { column: "relevance_score", direction: "asc" } });
    expect(titles(asc.rows)).toEqual(["C", "E", "A", "F", "B", "D"]);
  });

  test("text sorts descending", () => {
    const page = run({ sort: { column: "title", direction: "desc" } });
    expect(titles(page.rows)).toEqual(["F", "E", "D", "C", "B", "A"]);
  });

  test("sorting by an unknown column is rejected", () => {
    expect(() => run({ sort: { column: "nope", direction: "asc" } })).toThrow(InvalidQueryError);
  });
});

describe("queryArticles paging", () => {
  test("slices the requested page", () => {
    const page = run({ page: 2, pageSize: 4 });
    expect(titles(page.rows)).toEqual(["E", "F"]);
    expect(page).toMatchObject({ total: 6, page: 2, pageSize: 4, pageCount: 2 });
  });

  test("clamps a page past the end", () => {
    const page = run({ page: 9, pageSize: 4 });
    expect(page.page).toBe(2);
    expect(titles(page.rows)).toEqual(["E", "F"]);
  });

  test("an empty result is a single empty page", () => {
    const page = run({ filters: { source: "=Nobody" } });
    expect(page).toMatchObject({ rows: [], total: 0, page: 1, pageCount: 1 });
  });

  test("rejects a zero page size", () => {
    expect(() => run({ pageSize: 0 })).toThrow("Invalid page size: 0");
  });
});
