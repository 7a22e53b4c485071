import { readFile } from "node:fs/promises";
import { getDashboardConfig, type CsvEncoding } from "@/lib/config";
import { DatasetLoadError, errorCode, errorMessage } from "@/lib/errors";
import { getLogger } from "@/lib/util/logger";
import { parseArticlesCsv } from "./parse";
import type { ArticleDataset } from "./types";

const logger = getLogger("articles/store");

/** Reads and parses an articles CSV from disk. */
export async function loadArticlesFile(
  filePath: string,
  encoding: CsvEncoding = "latin1"
): Promise<ArticleDataset> {
  let text: string;
  try {
    text = await readFile(filePath, { encoding });
  } catch (err) {
    const code = errorCode(err) === "ENOENT" ? "FILE_NOT_FOUND" : "UNREADABLE";
    throw new DatasetLoadError(
      code,
      code === "FILE_NOT_FOUND"
        ? `Articles file not found: ${filePath}`
        : `Could not read articles file ${filePath}: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  const dataset = parseArticlesCsv(text);
  for (const warning of dataset.warnings) {
    logger.warn({ filePath, row: warning.row }, warning.message);
  }
  logger.info(
    {
      filePath,
      rows: dataset.records.length,
      columns: dataset.columns.length,
      warnings: dataset.warnings.length,
    },
    "articles dataset loaded"
  );
  return dataset;
}

let cached: Promise<ArticleDataset> | undefined;

/**
 * The process-wide articles dataset, loaded from DATA_CSV_PATH on first use.
 * A failed load is not cached; the next call reads the file again.
 */
export function getDataset(): Promise<ArticleDataset> {
  if (!cached) {
    const { csvPath, csvEncoding } = getDashboardConfig();
    const pending: Promise<ArticleDataset> = loadArticlesFile(csvPath, csvEncoding).catch(
      (err: unknown) => {
        logger.error({ err, csvPath }, "articles dataset failed to load");
        // a reset may have started a newer load in the meantime
        if (cached === pending) cached = undefined;
        throw err;
      }
    );
    cached = pending;
  }
  return cached;
}

export function resetDatasetCache(): void {
  cached = undefined;
}
