import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TableId } from "@/types/inventory";
import { isTableUnavailable } from "@/types/inventory";
import type { SheetSource } from "@/lib/sheetSource";
import { createInventoryLoader, loadInventoryTable, resetInventoryLoader } from "@/lib/inventoryLoader";

const rows = [
  ["barcode", "description", "Category", "Cost"],
  ["A1", "Widget", "Tools", "5"],
];

function fakeSource() {
  const fetchRows = vi.fn(async (_tableId: TableId): Promise<string[][]> => rows);
  const source: SheetSource = {
    kind: "fake",
    describe: (tableId) => `fake:${tableId}`,
    fetchRows,
  };
  return { source, fetchRows };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  resetInventoryLoader();
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("createInventoryLoader", () => {
  it("returns the normalized table", async () => {
    const { source } = fakeSource();
    const loader = createInventoryLoader({ source, ttlSeconds: 600, now: () => 0 });

    const result = await loader.load("stock");

    expect(result).toEqual({
      tableId: "stock",
      table: {
        columns: ["barcode", "description", "Category", "internal_cost"],
        rows: [{ barcode: "A1", description: "Widget", Category: "Tools", internal_cost: "5" }],
      },
      error: null,
      loadedAt: "1970-01-01T00:00:00.000Z",
    });
    expect(isTableUnavailable(result)).toBe(false);
  });

  it("reports a failed fetch as an empty, unavailable table", async () => {
    const { source, fetchRows } = fakeSource();
    fetchRows.mockRejectedValueOnce(new Error("boom"));
    const loader = createInventoryLoader({ source, ttlSeconds: 600, now: () => 0 });

    const result = await loader.load("stock");

    expect(result.table).toEqual({ columns: [], rows: [] });
    expect(result.error).toBe("Error loading Warehouse Stock from fake:stock: boom");
    expect(isTableUnavailable(result)).toBe(true);
  });

  it("serves cached results until the TTL passes", async () => {
    const { source, fetchRows } = fakeSource();
    let now = 0;
    const loader = createInventoryLoader({ source, ttlSeconds: 600, now: () => now });

    await loader.load("stock");
    now = 599_999;
    await loader.load("stock");
    expect(fetchRows).toHaveBeenCalledTimes(1);

    now = 600_000;
    await loader.load("stock");
    expect(fetchRows).toHaveBeenCalledTimes(2);
  });

  it("caches each table separately", async () => {
    const { source, fetchRows } = fakeSource();
    const loader = createInventoryLoader({ source, ttlSeconds: 600, now: () => 0 });

    await loader.load("stock");
    await loader.load("new-arrivals");

    expect(fetchRows.mock.calls).toEqual([["stock"], ["new-arrivals"]]);
  });

  it("shares one request between concurrent loads", async () => {
    const { source, fetchRows } = fakeSource();
    const loader = createInventoryLoader({ source, ttlSeconds: 600, now: () => 0 });

    const [first, second] = await Promise.all([loader.load("stock"), loader.load("stock")]);

    expect(fetchRows).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
  });

  it("does not cache failures", async () => {
    const { source, fetchRows } = fakeSource();
    fetchRows.mockRejectedValueOnce(new Error("timeout"));
    const loader = createInventoryLoader({ source, ttlSeconds: 600, now: () => 0 });

    const failed = await loader.load("stock");
    const retried = await loader.load("stock");

    expect(failed.error).not.toBeNull();
    expect(retried.error).toBeNull();
    expect(fetchRows).toHaveBeenCalledTimes(2);
  });

  it("refetches after clear", async () => {
    const { source, fetchRows } = fakeSource();
    const loader = createInventoryLoader({ source, ttlSeconds: 600, now: () => 0 });

    await loader.load("stock");
    loader.clear();
    await loader.load("stock");

    expect(fetchRows).toHaveBeenCalledTimes(2);
  });
});

describe("loadInventoryTable", () => {
  it("reports missing configuration as a load failure", async () => {
    const result = await loadInventoryTable("stock", { INVENTORY_SOURCE: "csv" });

    expect(result.table).toEqual({ columns: [], rows: [] });
    expect(result.error).toBe(
      "Error loading Warehouse Stock: STOCK_CSV_URL and NEW_ARRIVALS_CSV_URL are required for the csv source"
    );
  });

  it("loads through the configured CSV source", async () => {
    const fetchMock = vi.fn(async () => new Response("barcode,Category\nN1,Parts\n", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await loadInventoryTable("new-arrivals", {
      STOCK_CSV_URL: "https://example.com/stock.csv",
      NEW_ARRIVALS_CSV_URL: "https://example.com/new.csv",
    });

    expect(fetchMock).toHaveBeenCalledWith("https://example.com/new.csv");
    expect(result.error).toBeNull();
    expect(result.table.rows).toEqual([{ barcode: "N1", Category: "Parts", internal_cost: null }]);
  });
});
