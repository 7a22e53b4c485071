import { NextRequest, NextResponse } from "next/server";
import { handleArticlesRequest } from "@/lib/api/handlers";
import { getDataset } from "@/lib/articles/store";
import { getDashboardConfig } from "@/lib/config";

export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  const { pageSize } = getDashboardConfig();
  const { status, body } = await handleArticlesRequest(
    new URL(request.url),
    getDataset,
    pageSize
  );
  return NextResponse.json(body, { status });
}
