import Dashboard from "@/components/Dashboard";
import LoadErrorCard from "@/components/LoadErrorCard";
import { buildDashboard } from "@/lib/articles/aggregate";
import { queryArticles } from "@/lib/articles/query";
import { getDataset } from "@/lib/articles/store";
import type { ArticleDataset } from "@/lib/articles/types";
import { getDashboardConfig } from "@/lib/config";
import { DatasetLoadError } from "@/lib/errors";

export const dynamic = "force-dynamic";

export default async function Page() {
  const config = getDashboardConfig();
  const limits = {
    topKeywords: config.topKeywordsLimit,
    topCountries: config.topCountriesLimit,
  };

  let dataset: ArticleDataset | undefined;
  let loadError: DatasetLoadError | undefined;
  try {
    dataset = await getDataset();
  } catch (err) {
    if (!(err instanceof DatasetLoadError)) throw err;
    loadError = err;
  }

  return (
    <main className="grid" style={{ gap: 24 }}>
      <h1 style={{ textAlign: "center", margin: "16px 0" }}>Global News Dashboard</h1>
      {loadError && <LoadErrorCard error={loadError} />}
      {dataset && (
        <Dashboard
          snapshot={buildDashboard(dataset, limits)}
          initialPage={queryArticles(dataset, { filters: {}, page: 1, pageSize: config.pageSize })}
          pageSize={config.pageSize}
          limits={limits}
        />
      )}
    </main>
  );
}
