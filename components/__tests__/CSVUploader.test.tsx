import { renderToStaticMarkup } from "react-dom/server";
import CSVUploader, { decodeLatin1, readArticlesFile } from "../CSVUploader";

function latin1Blob(text: string): Blob {
  return new Blob([Uint8Array.from(Buffer.from(text, "latin1"))]);
}

describe("readArticlesFile", () => {
  test("parses an uploaded file as ISO-8859-1", async () => {
    const text =
      "title,source,country,published_date,sentiment,keyword\n" +
      "Café opens,Le Monde,France,01/02/2024,positive,food\n";
    const dataset = await readArticlesFile(latin1Blob(text));
    expect(dataset.records).toHaveLength(1);
    expect(dataset.records[0]).toMatchObject({
      title: "Café opens",
      country: "France",
      publishedDate: "2024-02-01",
    });
  });

  test("rejects a file without the required columns", async () => {
    const blob = latin1Blob("title,source\nA,B\n");
    await expect(readArticlesFile(blob)).rejects.toMatchObject({ code: "MISSING_COLUMNS" });
  });
});

describe("decodeLatin1", () => {
  test("maps the C1 range to its own code points", () => {
    expect(decodeLatin1(Uint8Array.from([0x41, 0x80, 0x9f, 0xe9]))).toBe("A\u0080\u009f\u00e9");
  });

  test("decodes input longer than one chunk", () => {
    const bytes = new Uint8Array(70000).fill(0x61);
    bytes[69999] = 0xff;
    const text = decodeLatin1(bytes);
    expect(text).toHaveLength(70000);
    expect(text.endsWith("a\u00ff")).toBe(true);
  });
});

describe("CSVUploader", () => {
  const noop = () => undefined;

  test("offers a way back while an upload is shown", () => {
    const html = renderToStaticMarkup(
      <CSVUploader active="march.csv" onLoaded={noop} onReset={noop} />
    );
    expect(html).toContain("<span>Showing march.csv</span>");
    expect(html).toContain('<button class="button">Back to server dataset</button>');
  });

  test("hides it for the server dataset", () => {
    const html = renderToStaticMarkup(<CSVUploader active={null} onLoaded={noop} onReset={noop} />);
    expect(html).not.toContain("Back to server dataset");
  });
});
