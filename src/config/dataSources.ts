/**
 * Spreadsheet source configuration
 *
 * Two transports are supported:
 * - csv:        each table is a published CSV export URL
 * - sheets-api: each table is a worksheet of one spreadsheet, read through
 *               the Sheets API values endpoint with an API key
 */

import { z } from "zod";
import type { TableId } from "@/types/inventory";
import { DEFAULT_CACHE_TTL_SECONDS } from "@/constants/inventoryRules";

export class DataSourceConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataSourceConfigError";
  }
}

const envSchema = z.object({
  INVENTORY_SOURCE: z.enum(["csv", "sheets-api"]).default("csv"),
  STOCK_CSV_URL: z.string().url().optional(),
  NEW_ARRIVALS_CSV_URL: z.string().url().optional(),
  GOOGLE_SHEET_ID: z.string().min(1).optional(),
  GOOGLE_SHEETS_API_KEY: z.string().min(1).optional(),
  STOCK_WORKSHEET: z.string().min(1).default("Warehouse Stock"),
  NEW_ARRIVALS_WORKSHEET: z.string().min(1).default("New Arrival"),
  INVENTORY_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(DEFAULT_CACHE_TTL_SECONDS),
});

export type DataSourceConfig =
  | {
      kind: "csv";
      urls: Record<TableId, string>;
      cacheTtlSeconds: number;
    }
  | {
      kind: "sheets-api";
      spreadsheetId: string;
      apiKey: string;
      worksheets: Record<TableId, string>;
      cacheTtlSeconds: number;
    };

// blank values count as unset
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") result[key] = value.trim();
  }
  return result;
}

export function getDataSourceConfig(env: Record<string, string | undefined> = process.env): DataSourceConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new DataSourceConfigError(`Invalid data source configuration (${issues})`);
  }
  const vars = parsed.data;

  if (vars.INVENTORY_SOURCE === "csv") {
    if (!vars.STOCK_CSV_URL || !vars.NEW_ARRIVALS_CSV_URL) {
      throw new DataSourceConfigError("STOCK_CSV_URL and NEW_ARRIVALS_CSV_URL are required for the csv source");
    }
    return {
      kind: "csv",
      urls: {
        stock: vars.STOCK_CSV_URL,
        "new-arrivals": vars.NEW_ARRIVALS_CSV_URL,
      },
      cacheTtlSeconds: vars.INVENTORY_CACHE_TTL_SECONDS,
    };
  }

  if (!vars.GOOGLE_SHEET_ID || !vars.GOOGLE_SHEETS_API_KEY) {
    throw new DataSourceConfigError("GOOGLE_SHEET_ID and GOOGLE_SHEETS_API_KEY are required for the sheets-api source");
  }
  return {
    kind: "sheets-api",
    spreadsheetId: vars.GOOGLE_SHEET_ID,
    apiKey: vars.GOOGLE_SHEETS_API_KEY,
    worksheets: {
      stock: vars.STOCK_WORKSHEET,
      "new-arrivals": vars.NEW_ARRIVALS_WORKSHEET,
    },
    cacheTtlSeconds: vars.INVENTORY_CACHE_TTL_SECONDS,
  };
}
