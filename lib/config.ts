import path from "node:path";
import { MAX_PAGE_SIZE } from "./articles/query";
import { getEnum, getNumber, getString } from "./util/env";

export const CSV_ENCODINGS = ["latin1", "utf8"] as const;
export type CsvEncoding = (typeof CSV_ENCODINGS)[number];

export interface DashboardConfig {
  /** Absolute path of the articles CSV. */
  csvPath: string;
  csvEncoding: CsvEncoding;
  pageSize: number;
  topKeywordsLimit: number;
  topCountriesLimit: number;
}

function positiveInt(name: string, defaultValue: number, max?: number): number {
  const value = getNumber(name, defaultValue);
  if (!Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    const range = max !== undefined ? `between 1 and ${max}` : "at least 1";
    throw new Error(`Env var ${name} must be an integer ${range}: ${value}`);
  }
  return value;
}

/**
 * Reads the dashboard settings from the environment. Called per use so tests
 * can change process.env between cases.
 */
export function getDashboardConfig(): DashboardConfig {
  return {
    csvPath: path.resolve(process.cwd(), getString("DATA_CSV_PATH", "data.csv")),
    csvEncoding: getEnum("DATA_CSV_ENCODING", CSV_ENCODINGS, "latin1"),
    pageSize: positiveInt("TABLE_PAGE_SIZE", 10, MAX_PAGE_SIZE),
    topKeywordsLimit: positiveInt("TOP_KEYWORDS_LIMIT", 5),
    topCountriesLimit: positiveInt("TOP_COUNTRIES_LIMIT", 10),
  };
}
