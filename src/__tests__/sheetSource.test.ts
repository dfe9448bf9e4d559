import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CsvSheetSource,
  SheetFetchError,
  SheetsApiSource,
  createSheetSource,
  parseCsv,
} from "@/lib/sheetSource";

const urls = {
  stock: "https://example.com/stock.csv",
  "new-arrivals": "https://example.com/new.csv",
};

const worksheets = {
  stock: "Warehouse Stock",
  "new-arrivals": "New Arrival",
};

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseCsv", () => {
  it("keeps quoted commas inside a cell", () => {
    expect(parseCsv('barcode,description\nA1,"Widget, large"')).toEqual([
      ["barcode", "description"],
      ["A1", "Widget, large"],
    ]);
  });
});

describe("CsvSheetSource", () => {
  it("fetches the table's export URL and parses it", async () => {
    const fetchMock = vi.fn(async () => new Response("a,b\n1,2", { status: 200 }));
    const source = new CsvSheetSource(urls, fetchMock);

    await expect(source.fetchRows("new-arrivals")).resolves.toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
    expect(fetchMock).toHaveBeenCalledWith("https://example.com/new.csv");
  });

  it("rejects on a non-2xx response", async () => {
    const fetchMock = vi.fn(async () => new Response("not found", { status: 404 }));
    const source = new CsvSheetSource(urls, fetchMock);

    const error = await source.fetchRows("stock").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SheetFetchError);
    expect(error).toMatchObject({
      message: "Request for stock failed with status 404",
      tableId: "stock",
      status: 404,
    });
  });
});

describe("SheetsApiSource", () => {
  it("builds the values URL for a worksheet", () => {
    const source = new SheetsApiSource("sheet-123", "test-key", worksheets);

    expect(source.buildUrl("stock")).toBe(
      "https://sheets.googleapis.com/v4/spreadsheets/sheet-123/values/Warehouse%20Stock?key=test-key"
    );
  });

  it("returns the values as text", async () => {
    const body = { range: "'New Arrival'!A1:Z1000", majorDimension: "ROWS", values: [["a", "b"], ["1", 2]] };
    const fetchMock = vi.fn(async () => new Response(JSON.stringify(body), { status: 200 }));
    const source = new SheetsApiSource("sheet-123", "test-key", worksheets, fetchMock);

    await expect(source.fetchRows("new-arrivals")).resolves.toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
  });

  it("returns no rows for an empty worksheet", async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ range: "A1:Z1000" }), { status: 200 }));
    const source = new SheetsApiSource("sheet-123", "test-key", worksheets, fetchMock);

    await expect(source.fetchRows("stock")).resolves.toEqual([]);
  });

  it("rejects an unexpected response body", async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ values: "oops" }), { status: 200 }));
    const source = new SheetsApiSource("sheet-123", "test-key", worksheets, fetchMock);

    await expect(source.fetchRows("stock")).rejects.toThrow("Unexpected response shape for stock");
  });
});

describe("createSheetSource", () => {
  it("picks the transport from the config", () => {
    expect(createSheetSource({ kind: "csv", urls, cacheTtlSeconds: 600 }).kind).toBe("csv");
    expect(
      createSheetSource({
        kind: "sheets-api",
        spreadsheetId: "sheet-123",
        apiKey: "test-key",
        worksheets,
        cacheTtlSeconds: 600,
      }).kind
    ).toBe("sheets-api");
  });
});
