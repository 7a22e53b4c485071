import { z } from "zod";
import { InvalidQueryError } from "@/lib/errors";
import { MAX_PAGE_SIZE } from "./query";
import type { TableQuery } from "./types";

const FILTER_PARAM = /^filter\[(.+)\]$/;

const paramsSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
  sort: z.string().trim().min(1).optional(),
  dir: z.enum(["asc", "desc"]).default("asc"),
});

/**
 * Reads a table request from URL search params:
 * `?page=2&pageSize=10&sort=published_date&dir=desc&filter[source]=BBC`.
 */
export function parseTableQuery(
  params: URLSearchParams,
  defaultPageSize: number
): TableQuery {
  const parsed = paramsSchema.safeParse({
    page: params.get("page") ?? undefined,
    pageSize: params.get("pageSize") ?? undefined,
    sort: params.get("sort") ?? undefined,
    dir: params.get("dir") ?? undefined,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "query";
    throw new InvalidQueryError(`Invalid ${where}: ${issue?.message ?? "bad value"}`);
  }

  const filters: Record<string, string> = {};
  params.forEach((value, key) => {
    const match = FILTER_PARAM.exec(key);
    if (match && value.trim()) filters[match[1]] = value;
  });

  const { page, pageSize, sort, dir } = parsed.data;
  return {
    filters,
    sort: sort ? { column: sort, direction: dir } : undefined,
    page,
    pageSize: pageSize ?? defaultPageSize,
  };
}

/** Inverse of parseTableQuery, for the browser table. */
export function toSearchParams(query: TableQuery): URLSearchParams {
  const params = new URLSearchParams();
  params.set("page", String(query.page));
  params.set("pageSize", String(query.pageSize));
  if (query.sort) {
    params.set("sort", query.sort.column);
    params.set("dir", query.sort.direction);
  }
  for (const [column, expression] of Object.entries(query.filters)) {
    if (expression.trim()) params.set(`filter[${column}]`, expression);
  }
  return params;
}
