import type { LoadResult, TableId } from "@/types/inventory";
import { getTableLabel } from "@/types/inventory";
import { getDataSourceConfig } from "@/config/dataSources";
import { createSheetSource, type SheetSource } from "./sheetSource";
import { emptyTable, normalizeTable } from "./inventoryTable";

export interface InventoryLoader {
  load(tableId: TableId): Promise<LoadResult>;
  clear(): void;
}

interface LoaderOptions {
  source: SheetSource;
  ttlSeconds: number;
  now?: () => number;
}

interface CacheEntry {
  result: LoadResult;
  expiresAt: number;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function failedLoad(tableId: TableId, message: string, now: number = Date.now()): LoadResult {
  return {
    tableId,
    table: emptyTable(),
    error: message,
    loadedAt: new Date(now).toISOString(),
  };
}

async function fetchAndNormalize(source: SheetSource, tableId: TableId, now: number): Promise<LoadResult> {
  const location = source.describe(tableId);
  try {
    const raw = await source.fetchRows(tableId);
    const table = normalizeTable(raw);
    console.log(`[inventory-loader] Loaded ${table.rows.length} rows for ${tableId} (${source.kind})`);
    return {
      tableId,
      table,
      error: null,
      loadedAt: new Date(now).toISOString(),
    };
  } catch (error) {
    console.error(`[inventory-loader] Failed to load ${tableId} from ${location}:`, error);
    return failedLoad(
      tableId,
      `Error loading ${getTableLabel(tableId)} from ${location}: ${describeError(error)}`,
      now
    );
  }
}

/**
 * Loads tables through `source` and keeps successful results for
 * `ttlSeconds`. Concurrent loads of the same table during a miss share one
 * request; failures are never cached.
 */
export function createInventoryLoader({ source, ttlSeconds, now = Date.now }: LoaderOptions): InventoryLoader {
  const cache = new Map<TableId, CacheEntry>();
  const inFlight = new Map<TableId, Promise<LoadResult>>();
  const ttlMs = ttlSeconds * 1000;

  return {
    load(tableId) {
      const cached = cache.get(tableId);
      if (cached && now() < cached.expiresAt) {
        return Promise.resolve(cached.result);
      }

      const pending = inFlight.get(tableId);
      if (pending) return pending;

      const request = fetchAndNormalize(source, tableId, now())
        .then((result) => {
          if (result.error === null && ttlMs > 0) {
            cache.set(tableId, { result, expiresAt: now() + ttlMs });
          }
          return result;
        })
        .finally(() => {
          inFlight.delete(tableId);
        });

      inFlight.set(tableId, request);
      return request;
    },

    clear() {
      cache.clear();
    },
  };
}

let defaultLoader: InventoryLoader | null = null;

/**
 * Loads a table with the loader configured from the environment.
 * Configuration problems are reported the same way as fetch failures.
 */
export async function loadInventoryTable(
  tableId: TableId,
  env: Record<string, string | undefined> = process.env
): Promise<LoadResult> {
  if (!defaultLoader) {
    try {
      const config = getDataSourceConfig(env);
      defaultLoader = createInventoryLoader({
        source: createSheetSource(config),
        ttlSeconds: config.cacheTtlSeconds,
      });
    } catch (error) {
      console.error("[inventory-loader] Data source is not configured:", error);
      return failedLoad(tableId, `Error loading ${getTableLabel(tableId)}: ${describeError(error)}`);
    }
  }
  return defaultLoader.load(tableId);
}

export function resetInventoryLoader(): void {
  defaultLoader = null;
}
