"use client";

import { useEffect, useRef, useState } from "react";
import type {
  CellValue,
  ColumnSpec,
  SortDirection,
  TablePage,
  TableQuery,
} from "@/lib/articles/types";
import { errorMessage } from "@/lib/errors";

export type PageFetcher = (query: TableQuery) => Promise<TablePage>;

export type Sort = { column: string; direction: SortDirection } | undefined;

const cellStyle = { textAlign: "left" as const, padding: 5, borderBottom: "1px solid #1e2a44" };

// asc -> desc -> unsorted
export function nextSort(current: Sort, column: string): Sort {
  if (current?.column !== column) return { column, direction: "asc" };
  if (current.direction === "asc") return { column, direction: "desc" };
  return undefined;
}

function formatCell(value: CellValue): string {
  return value === null ? "" : String(value);
}

function filterPlaceholder(column: ColumnSpec): string {
  switch (column.kind) {
    case "number":
      return "e.g. >0.5";
    case "date":
      return "e.g. 2024-03";
    default:
      return "filter…";
  }
}

export default function ArticleTable({
  initialPage,
  fetchPage,
  pageSize,
}: {
  initialPage: TablePage;
  fetchPage: PageFetcher;
  pageSize: number;
}) {
  const [data, setData] = useState<TablePage>(initialPage);
  const [filters, setFilters] = useState<Record<string, string>>({});
  const [sort, setSort] = useState<Sort>(undefined);
  const [page, setPage] = useState(1);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);
  const firstRender = useRef(true);

  useEffect(() => {
    // the initial page arrives rendered from the server
    if (firstRender.current) {
      firstRender.current = false;
      return;
    }
    let cancelled = false;
    const timer = setTimeout(() => {
      setLoading(true);
      fetchPage({ filters, sort, page, pageSize }).then(
        (result) => {
          if (cancelled) return;
          setData(result);
          setError(null);
          setLoading(false);
        },
        (err: unknown) => {
          if (cancelled) return;
          setError(errorMessage(err));
          setLoading(false);
        }
      );
    }, 250);
    return () => {
      cancelled = true;
      clearTimeout(timer);
    };
  }, [fetchPage, filters, sort, page, pageSize]);

  const { columns, rows } = data;

  return (
    <div className="card">
      <h3 style={{ marginTop: 0 }}>News Table</h3>
      {error && <div style={{ color: "#ff6b6b", marginBottom: 8 }}>{error}</div>}
      <div style={{ overflowX: "auto", opacity: loading ? 0.6 : 1 }}>
        <table style={{ width: "100%", borderCollapse: "collapse", fontSize: 14 }}>
          <thead>
            <tr>
              {columns.map((column) => (
                <th
                  key={column.id}
                  style={{ ...cellStyle, cursor: "pointer", whiteSpace: "nowrap" }}
                  onClick={() => {
                    setSort((current) => nextSort(current, column.id));
                    setPage(1);
                  }}
                >
                  {column.id}
                  {sort?.column === column.id ? (sort.direction === "asc" ? " ▲" : " ▼") : ""}
                </th>
              ))}
            </tr>
            <tr>
              {columns.map((column) => (
                <th key={column.id} style={cellStyle}>
                  <input
                    className="input"
                    aria-label={`Filter ${column.id}`}
                    placeholder={filterPlaceholder(column)}
                    value={filters[column.id] ?? ""}
                    onChange={(e) => {
                      const value = e.target.value;
                      setFilters((current) => ({ ...current, [column.id]: value }));
                      setPage(1);
                    }}
                  />
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.map((row, i) => (
              <tr key={i}>
                {columns.map((column) => (
                  <td
                    key={column.id}
                    style={{
                      ...cellStyle,
                      maxWidth: 360,
                      overflow: "hidden",
                      textOverflow: "ellipsis",
                      whiteSpace: "nowrap",
                    }}
                  >
                    {formatCell(row[column.id] ?? null)}
                  </td>
                ))}
              </tr>
            ))}
            {!rows.length && (
              <tr>
                <td style={{ ...cellStyle, opacity: 0.7 }} colSpan={columns.length || 1}>
                  No matching articles
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
      <div style={{ display: "flex", gap: 12, alignItems: "center", marginTop: 12 }}>
        <button
          className="button"
          disabled={data.page <= 1}
          onClick={() => setPage(Math.max(1, data.page - 1))}
        >
          Previous
        </button>
        <span style={{ fontSize: 14 }}>
          Page {data.page} of {data.pageCount} ({data.total} articles)
        </span>
        <button
          className="button"
          disabled={data.page >= data.pageCount}
          onClick={() => setPage(data.page + 1)}
        >
          Next
        </button>
      </div>
    </div>
  );
}
