import { DatasetLoadError, MissingColumnsError } from "@/lib/errors";
import { REQUIRED_COLUMNS, parseArticlesCsv } from "../parse";
import { HEADER, SAMPLE_ROWS, csv, sampleDataset } from "./fixtures";

function loadError(text: string): DatasetLoadError {
  try {
    parseArticlesCsv(text);
  } catch (err) {
    if (err instanceof DatasetLoadError) return err;
    throw err;
  }
  throw new Error("expected parseArticlesCsv to throw");
}

describe("parseArticlesCsv", () => {
  test("types the known columns and keeps header order", () => {
    const { columns } = sampleDataset();
    expect(columns).toEqual([
      { id: "title", kind: "text" },
      { id: "source", kind: "text" },
      { id: "country", kind: "text" },
      { id: "published_date", kind: "date" },
      { id: "published_time", kind: "time" },
      { id: "sentiment", kind: "text" },
      { id: "keyword", kind: "text" },
      { id: "relevance_score", kind: "number" },
      { id: "latitude", kind: "number" },
      { id: "longitude", kind: "number" },
    ]);
  });

  test("cleans a complete row", () => {
    const [first] = sampleDataset().records;
    expect(first).toEqual({
      title: "A",
      source: "BBC",
      country: "India",
      keyword: "economy",
      sentiment: "positive",
      publishedDate: "2024-01-02",
      publishedTime: "09:15:00",
      relevanceScore: 0.8,
      latitude: 28.6,
      longitude: 77.2,
      fields: {
        title: "A",
        source: "BBC",
        country: "India",
        published_date: "2024-01-02",
        published_time: "09:15:00",
        sentiment: "positive",
        keyword: "economy",
        relevance_score: 0.8,
        latitude: 28.6,
        longitude: 77.2,
      },
    });
  });

  test("fills country and sentiment, nulls unparseable values", () => {
    const records = sampleDataset().records;
    expect(records[1]).toMatchObject({
      country: "Unknown",
      publishedTime: null,
      relevanceScore: null,
      latitude: null,
    });
    expect(records[1].fields.country).toBe("Unknown");
    expect(records[2]).toMatchObject({
      sentiment: "unknown",
      relevanceScore: 0.1,
      latitude: null,
      longitude: 1,
    });
    expect(records[2].fields.sentiment).toBe("unknown");
    expect(records[3]).toMatchObject({ source: null, publishedDate: null });
    expect(records[4].publishedDate).toBeNull();
    expect(records[5].publishedTime).toBe("07:05:00");
  });

  test("returns a frozen dataset", () => {
    const dataset = sampleDataset();
    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset.records)).toBe(true);
    expect(Object.isFrozen(dataset.records[0])).toBe(true);
    expect(Object.isFrozen(dataset.records[0].fields)).toBe(true);
  });

  test("trims header names", () => {
    const header = HEADER.split(",").map((h) => ` ${h} `).join(",");
    const dataset = parseArticlesCsv(csv(SAMPLE_ROWS.slice(0, 1), header));
    expect(dataset.columns[0].id).toBe("title");
    expect(dataset.records[0].source).toBe("BBC");
  });

  test.each([
    ["unicode", "\uFEFF"],
    ["latin1-decoded", "\u00EF\u00BB\u00BF"],
  ])("strips a %s byte order mark", (_label, bom) => {
    const dataset = parseArticlesCsv(bom + csv(SAMPLE_ROWS.slice(0, 1)));
    expect(dataset.columns[0].id).toBe("title");
    expect(dataset.records[0].title).toBe("A");
  });

  test("keeps extra columns as text and honours quoting", () => {
    const dataset = parseArticlesCsv(
      csv(
        ['"Hello, world",BBC,India,02/01/2024,positive,economy,https://example.test/a'],
        "title,source,country,published_date,sentiment,keyword,url"
      )
    );
    expect(dataset.columns[6]).toEqual({ id: "url", kind: "text" });
    expect(dataset.records[0].title).toBe("Hello, world");
    expect(dataset.records[0].fields.url).toBe("https://example.test/a");
    expect(dataset.records[0].relevanceScore).toBeNull();
  });

  test("empty input yields an empty dataset", () => {
    const dataset = parseArticlesCsv("");
    expect(dataset.records).toHaveLength(0);
    expect(dataset.columns.map((c) => c.id)).toEqual([...REQUIRED_COLUMNS]);
  });

  test("header-only input yields no records", () => {
    const dataset = parseArticlesCsv(csv([]));
    expect(dataset.records).toHaveLength(0);
    expect(dataset.columns).toHaveLength(10);
  });

  test("missing required columns are reported by name", () => {
    const err = loadError("title,source,published_date,sentiment\nA,BBC,02/01/2024,positive\n");
    expect(err).toBeInstanceOf(MissingColumnsError);
    expect(err.code).toBe("MISSING_COLUMNS");
    expect(err.message).toBe("CSV is missing required column(s): country, keyword");
    expect(err instanceof MissingColumnsError && err.missing).toEqual(["country", "keyword"]);
  });

  test("short rows are kept with a warning", () => {
    const dataset = parseArticlesCsv(csv(["A,BBC"]));
    expect(dataset.warnings).toHaveLength(1);
    expect(dataset.warnings[0].row).toBe(0);
    expect(dataset.records[0]).toMatchObject({
      title: "A",
      source: "BBC",
      country: "Unknown",
      sentiment: "unknown",
      keyword: null,
    });
  });

  test("rows wider than the header are malformed", () => {
    const err = loadError(csv(["A,BBC,India,02/01/2024,,positive,economy,1,2,3,extra"]));
    expect(err.code).toBe("MALFORMED_CSV");
    expect(err.message).toMatch(/^Malformed CSV at data row 1: /);
  });

  test("an unterminated quote is malformed", () => {
    const err = loadError(csv(['"A,BBC,India,02/01/2024,,positive,economy,1,2,3']));
    expect(err.code).toBe("MALFORMED_CSV");
  });
});
