import { parseArticlesCsv } from "../parse";
import type { ArticleDataset } from "../types";

export const HEADER =
  "title,source,country,published_date,published_time,sentiment,keyword,relevance_score,latitude,longitude";

export const SAMPLE_ROWS = [
  "A,BBC,India,02/01/2024,09:15:00,positive,economy,0.8,28.6,77.2",
  "B,CNN,,03/01/2024,25:00:00,negative,politics,abc,,",
  "C,BBC,India,2024-01-02,10:00:00,,economy,1e-1,NA,1",
  "D,,Kenya,31/02/2024,,neutral,weather,,,",
  "E,Reuters,Kenya,not a date,08:00:00,positive,politics,0.5,,",
  "F,CNN,India,03/01/2024,7:05:00,positive,economy,2,,",
];

export function csv(rows: string[], header = HEADER): string {
  return [header, ...rows].join("\n") + "\n";
}

export function sampleDataset(): ArticleDataset {
  return parseArticlesCsv(csv(SAMPLE_ROWS));
}

export function titles(rows: Record<string, unknown>[]): unknown[] {
  return rows.map((row) => row.title);
}
