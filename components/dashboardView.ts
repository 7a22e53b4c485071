import { buildDashboard, type DashboardLimits } from "@/lib/articles/aggregate";
import { queryArticles } from "@/lib/articles/query";
import type { ArticleDataset, DashboardSnapshot, TablePage } from "@/lib/articles/types";

export interface DashboardView {
  snapshot: DashboardSnapshot;
  initialPage: TablePage;
}

/**
 * What the dashboard shows: the server-rendered view, or one computed in the
 * browser from an uploaded dataset. Clearing the upload returns `server` as is.
 */
export function dashboardView(
  server: DashboardView,
  uploaded: ArticleDataset | null,
  pageSize: number,
  limits: DashboardLimits
): DashboardView {
  if (!uploaded) return server;
  return {
    snapshot: buildDashboard(uploaded, limits),
    initialPage: queryArticles(uploaded, { filters: {}, page: 1, pageSize }),
  };
}
