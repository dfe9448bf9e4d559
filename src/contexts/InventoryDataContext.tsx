"use client";

import { createContext, useCallback, useContext, useEffect, useState, type ReactNode } from "react";
import { z } from "zod";
import { TABLE_IDS, getTableLabel, isTableId, type LoadResult, type TableId } from "@/types/inventory";
import { emptyTable } from "@/lib/inventoryTable";

interface InventoryDataContextType {
  results: Record<TableId, LoadResult> | null;
  loading: boolean;
  reload: () => Promise<void>;
}

const loadResultSchema = z.object({
  tableId: z.custom<TableId>((value) => isTableId(value)),
  table: z.object({
    columns: z.array(z.string()),
    rows: z.array(z.record(z.string().nullable())),
  }),
  error: z.string().nullable(),
  loadedAt: z.string(),
});

const InventoryDataContext = createContext<InventoryDataContextType | undefined>(undefined);

async function fetchTable(tableId: TableId): Promise<LoadResult> {
  try {
    const response = await fetch(`/api/inventory?table=${encodeURIComponent(tableId)}`);
    if (!response.ok) {
      const body: { error?: string } = await response.json();
      throw new Error(body.error ?? `HTTP ${response.status}`);
    }
    const parsed = loadResultSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.tableId !== tableId) {
      throw new Error("Unexpected response from /api/inventory");
    }
    return parsed.data;
  } catch (err) {
    console.error(`[InventoryData] Failed to fetch ${tableId}:`, err);
    return {
      tableId,
      table: emptyTable(),
      error: `Error loading ${getTableLabel(tableId)}: ${err instanceof Error ? err.message : String(err)}`,
      loadedAt: new Date().toISOString(),
    };
  }
}

export function InventoryDataProvider({ children }: { children: ReactNode }) {
  const [results, setResults] = useState<Record<TableId, LoadResult> | null>(null);
  const [loading, setLoading] = useState(true);

  const reload = useCallback(async () => {
    setLoading(true);
    const [stock, newArrivals] = await Promise.all(TABLE_IDS.map(fetchTable));
    setResults({ stock, "new-arrivals": newArrivals });
    setLoading(false);
  }, []);

  useEffect(() => {
    void reload();
  }, [reload]);

  return (
    <InventoryDataContext.Provider value={{ results, loading, reload }}>
      {children}
    </InventoryDataContext.Provider>
  );
}

export function useInventoryData() {
  const context = useContext(InventoryDataContext);
  if (context === undefined) {
    throw new Error("useInventoryData must be used within an InventoryDataProvider");
  }
  return context;
}
