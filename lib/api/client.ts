import { z } from "zod";
import { toSearchParams } from "@/lib/articles/query_params";
import type { TablePage, TableQuery } from "@/lib/articles/types";

const cellSchema = z.union([z.string(), z.number(), z.null()]);

const tablePageSchema = z.object({
  columns: z.array(
    z.object({
      id: z.string(),
      kind: z.enum(["text", "number", "date", "time"]),
    })
  ),
  rows: z.array(z.record(cellSchema)),
  total: z.number(),
  page: z.number(),
  pageSize: z.number(),
  pageCount: z.number(),
});

const errorBodySchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

/** Browser-side call to GET /api/articles. */
export async function fetchArticlesPage(
  query: TableQuery,
  fetchImpl: typeof fetch = fetch
): Promise<TablePage> {
  const res = await fetchImpl(`/api/articles?${toSearchParams(query).toString()}`);
  const body: unknown = await res.json();
  if (!res.ok) {
    const parsed = errorBodySchema.safeParse(body);
    throw new Error(
      parsed.success ? parsed.data.error.message : `Request failed with status ${res.status}`
    );
  }
  return tablePageSchema.parse(body);
}
