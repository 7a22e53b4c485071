import { buildDashboard, type DashboardLimits } from "@/lib/articles/aggregate";
import { queryArticles } from "@/lib/articles/query";
import { parseTableQuery } from "@/lib/articles/query_params";
import type { ArticleDataset, DashboardSnapshot, TablePage } from "@/lib/articles/types";
import { DatasetLoadError, InvalidQueryError } from "@/lib/errors";
import { getLogger } from "@/lib/util/logger";

const logger = getLogger("api/handlers");

export interface ApiErrorBody {
  error: { code: string; message: string };
}

export interface JsonResponse<T> {
  status: number;
  body: T | ApiErrorBody;
}

export type DatasetSource = () => Promise<ArticleDataset>;

/** Maps a thrown error to the JSON error response the dashboard API returns. */
export function errorResponse(err: unknown): JsonResponse<never> {
  if (err instanceof InvalidQueryError) {
    return { status: 400, body: { error: { code: "INVALID_QUERY", message: err.message } } };
  }
  if (err instanceof DatasetLoadError) {
    return { status: 503, body: { error: { code: err.code, message: err.message } } };
  }
  logger.error({ err }, "unhandled api error");
  return {
    status: 500,
    body: { error: { code: "INTERNAL", message: "Internal server error" } },
  };
}

export async function handleSummaryRequest(
  loadDataset: DatasetSource,
  limits: DashboardLimits
): Promise<JsonResponse<DashboardSnapshot>> {
  try {
    const dataset = await loadDataset();
    return { status: 200, body: buildDashboard(dataset, limits) };
  } catch (err) {
    return errorResponse(err);
  }
}

/** One table interaction: filter, sort and page the shared dataset. */
export async function handleArticlesRequest(
  url: URL,
  loadDataset: DatasetSource,
  defaultPageSize: number
): Promise<JsonResponse<TablePage>> {
  try {
    const query = parseTableQuery(url.searchParams, defaultPageSize);
    const dataset = await loadDataset();
    const page = queryArticles(dataset, query);
    logger.debug(
      { filters: query.filters, sort: query.sort, page: page.page, total: page.total },
      "articles page served"
    );
    return { status: 200, body: page };
  } catch (err) {
    return errorResponse(err);
  }
}
