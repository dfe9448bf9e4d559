"use client";

import { TABLES, type LoadResult, type TableId } from "@/types/inventory";
import { cn, formatLoadedAt } from "@/lib/utils";

interface NavigationProps {
  results: Record<TableId, LoadResult> | null;
  loading: boolean;
  onReload: () => void;
}

export default function Navigation({ results, loading, onReload }: NavigationProps) {
  return (
    <nav className="bg-white border-b border-gray-200 sticky top-0 z-50 shadow-sm">
      <div className="max-w-[1800px] mx-auto px-6">
        <div className="flex items-center justify-between h-14">
          <h1 className="text-lg font-bold text-gray-900 flex items-center gap-2">
            <span className="text-xl">📦</span>
            Inventory Dashboard
          </h1>

          <div className="flex items-center gap-4">
            {/* last load time per sheet */}
            {results &&
              TABLES.map((table) => {
                const result = results[table.key];
                return (
                  <span
                    key={table.key}
                    className={cn("text-xs", result.error ? "text-red-500" : "text-gray-400")}
                    title={result.error ?? undefined}
                  >
                    {table.name}: {result.error ? "unavailable" : formatLoadedAt(result.loadedAt)}
                  </span>
                );
              })}
            <button
              type="button"
              onClick={onReload}
              disabled={loading}
              className="px-3 py-1.5 rounded-lg text-sm font-medium text-gray-600 hover:bg-gray-100 hover:text-gray-900 transition-all duration-200 disabled:opacity-50"
            >
              {loading ? "Loading…" : "↻ Reload"}
            </button>
          </div>
        </div>
      </div>
    </nav>
  );
}
