import { NextResponse } from "next/server";
import { handleSummaryRequest } from "@/lib/api/handlers";
import { getDataset } from "@/lib/articles/store";
import { getDashboardConfig } from "@/lib/config";

export const dynamic = "force-dynamic";

export async function GET() {
  const config = getDashboardConfig();
  const { status, body } = await handleSummaryRequest(getDataset, {
    topKeywords: config.topKeywordsLimit,
    topCountries: config.topCountriesLimit,
  });
  return NextResponse.json(body, { status });
}
