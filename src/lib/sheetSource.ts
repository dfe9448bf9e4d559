import Papa from "papaparse";
import { z } from "zod";
import type { TableId } from "@/types/inventory";
import type { DataSourceConfig } from "@/config/dataSources";

/**
 * Raw access to a spreadsheet table. Rows come back as read, header first.
 */
export interface SheetSource {
  readonly kind: string;
  describe(tableId: TableId): string;
  fetchRows(tableId: TableId): Promise<string[][]>;
}

export class SheetFetchError extends Error {
  constructor(
    message: string,
    readonly tableId: TableId,
    readonly status?: number
  ) {
    super(message);
    this.name = "SheetFetchError";
  }
}

async function fetchOk(url: string, tableId: TableId, fetchImpl: typeof fetch): Promise<Response> {
  const response = await fetchImpl(url);
  if (!response.ok) {
    throw new SheetFetchError(
      `Request for ${tableId} failed with status ${response.status}`,
      tableId,
      response.status
    );
  }
  return response;
}

export function parseCsv(text: string): string[][] {
  const result = Papa.parse<string[]>(text, { header: false, delimiter: ",", skipEmptyLines: false });
  if (result.errors.length > 0) {
    // papaparse still returns every row it could read
    console.warn(
      `[sheet-source] CSV parsed with ${result.errors.length} issue(s):`,
      result.errors.map((e) => `row ${e.row ?? "?"}: ${e.message}`).join("; ")
    );
  }
  return result.data;
}

export class CsvSheetSource implements SheetSource {
  readonly kind = "csv";

  constructor(
    private readonly urls: Record<TableId, string>,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  describe(tableId: TableId): string {
    return this.urls[tableId];
  }

  async fetchRows(tableId: TableId): Promise<string[][]> {
    const response = await fetchOk(this.urls[tableId], tableId, this.fetchImpl);
    return parseCsv(await response.text());
  }
}

const SHEETS_API_BASE = "https://sheets.googleapis.com/v4/spreadsheets";

const valuesResponseSchema = z.object({
  values: z
    .array(z.array(z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v))))
    .optional(),
});

export class SheetsApiSource implements SheetSource {
  readonly kind = "sheets-api";

  constructor(
    private readonly spreadsheetId: string,
    private readonly apiKey: string,
    private readonly worksheets: Record<TableId, string>,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  describe(tableId: TableId): string {
    return `worksheet '${this.worksheets[tableId]}'`;
  }

  buildUrl(tableId: TableId): string {
    const range = encodeURIComponent(this.worksheets[tableId]);
    const params = new URLSearchParams({ key: this.apiKey });
    return `${SHEETS_API_BASE}/${encodeURIComponent(this.spreadsheetId)}/values/${range}?${params}`;
  }

  async fetchRows(tableId: TableId): Promise<string[][]> {
    const response = await fetchOk(this.buildUrl(tableId), tableId, this.fetchImpl);
    const parsed = valuesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SheetFetchError(`Unexpected response shape for ${tableId}`, tableId);
    }
    return parsed.data.values ?? [];
  }
}

export function createSheetSource(config: DataSourceConfig, fetchImpl: typeof fetch = fetch): SheetSource {
  if (config.kind === "csv") {
    return new CsvSheetSource(config.urls, fetchImpl);
  }
  return new SheetsApiSource(config.spreadsheetId, config.apiKey, config.worksheets, fetchImpl);
}
