"use client";

import { useCallback, useMemo, useState } from "react";
import type { DashboardLimits } from "@/lib/articles/aggregate";
import { queryArticles } from "@/lib/articles/query";
import type { DashboardSnapshot, TablePage, TableQuery } from "@/lib/articles/types";
import { fetchArticlesPage } from "@/lib/api/client";
import ArticleTable from "./ArticleTable";
import CSVUploader, { type UploadedDataset } from "./CSVUploader";
import SummaryCards from "./SummaryCards";
import TopKeywords from "./TopKeywords";
import ArticlesOverTime from "./charts/ArticlesOverTime";
import CountryBar from "./charts/CountryBar";
import SentimentPie from "./charts/SentimentPie";
import { dashboardView } from "./dashboardView";

export default function Dashboard({
  snapshot,
  initialPage,
  pageSize,
  limits,
}: {
  snapshot: DashboardSnapshot;
  initialPage: TablePage;
  pageSize: number;
  limits: DashboardLimits;
}) {
  const [upload, setUpload] = useState<UploadedDataset | null>(null);

  const view = useMemo(
    () => dashboardView({ snapshot, initialPage }, upload?.dataset ?? null, pageSize, limits),
    [upload, snapshot, initialPage, pageSize, limits]
  );

  // uploaded files are queried in the browser, the server dataset through /api/articles
  const fetchPage = useCallback(
    (query: TableQuery) =>
      upload
        ? Promise.resolve().then(() => queryArticles(upload.dataset, query))
        : fetchArticlesPage(query),
    [upload]
  );

  const { summary, sentiment, topCountries, timeline, topKeywords } = view.snapshot;

  return (
    <div className="grid" style={{ gap: 24 }}>
      <CSVUploader
        active={upload?.fileName ?? null}
        onLoaded={setUpload}
        onReset={() => setUpload(null)}
      />
      <SummaryCards summary={summary} />
      <div className="grid" style={{ gridTemplateColumns: "repeat(auto-fit, minmax(320px, 1fr))" }}>
        <SentimentPie slices={sentiment} />
        <CountryBar countries={topCountries} />
      </div>
      <ArticlesOverTime points={timeline} />
      <TopKeywords keywords={topKeywords} />
      <hr style={{ width: "100%", borderColor: "#1e2a44" }} />
      <ArticleTable
        key={upload ? `${upload.fileName}-${upload.loadedAt}` : "server"}
        initialPage={view.initialPage}
        fetchPage={fetchPage}
        pageSize={pageSize}
      />
    </div>
  );
}
