"use client";

import { useState } from "react";
import { parseArticlesCsv } from "@/lib/articles/parse";
import type { ArticleDataset } from "@/lib/articles/types";
import { errorMessage } from "@/lib/errors";

export interface UploadedDataset {
  fileName: string;
  loadedAt: number;
  dataset: ArticleDataset;
}

const DECODE_CHUNK = 0x8000;

/**
 * ISO-8859-1 maps every byte to the code point of the same value. The
 * browser's TextDecoder treats that label as windows-1252, which differs
 * for 0x80-0x9F, so decode by hand to match the server's latin1 read.
 */
export function decodeLatin1(bytes: Uint8Array): string {
  let text = "";
  for (let i = 0; i < bytes.length; i += DECODE_CHUNK) {
    text += String.fromCharCode(...bytes.subarray(i, i + DECODE_CHUNK));
  }
  return text;
}

/** Reads a CSV in the browser with the same rules the server applies to data.csv. */
export async function readArticlesFile(file: Blob): Promise<ArticleDataset> {
  const bytes = new Uint8Array(await file.arrayBuffer());
  return parseArticlesCsv(decodeLatin1(bytes));
}

export default function CSVUploader({
  active,
  onLoaded,
  onReset,
}: {
  active: string | null;
  onLoaded: (upload: UploadedDataset) => void;
  onReset: () => void;
}) {
  const [error, setError] = useState<string | null>(null);

  function handleFile(file: File) {
    setError(null);
    readArticlesFile(file).then(
      (dataset) => onLoaded({ fileName: file.name, loadedAt: Date.now(), dataset }),
      (err: unknown) => setError(errorMessage(err))
    );
  }

  return (
    <div className="card" style={{ display: "grid", gap: 12 }}>
      <h3 style={{ margin: 0 }}>Explore another CSV</h3>
      <input
        className="input"
        type="file"
        accept=".csv,text/csv"
        onChange={(e) => {
          const f = e.target.files?.[0];
          if (f) handleFile(f);
        }}
      />
      {error && <div style={{ color: "#ff6b6b" }}>{error}</div>}
      {active && (
        <div style={{ display: "flex", gap: 12, alignItems: "center", fontSize: 14 }}>
          <span>{`Showing ${active}`}</span>
          <button className="button" onClick={onReset}>
            Back to server dataset
          </button>
        </div>
      )}
    </div>
  );
}
