"use client";

import { TABLES, type TableId } from "@/types/inventory";
import { cn } from "@/lib/utils";

interface TableTabsProps {
  selectedTab: TableId;
  onTabChange: (tab: TableId) => void;
  counts: Record<TableId, number>;
}

export default function TableTabs({ selectedTab, onTabChange, counts }: TableTabsProps) {
  return (
    <div className="flex flex-wrap items-center gap-2" role="tablist">
      {TABLES.map((table) => (
        <button
          key={table.key}
          type="button"
          role="tab"
          aria-selected={selectedTab === table.key}
          onClick={() => onTabChange(table.key)}
          className={cn(
            "px-4 py-2 rounded-lg font-medium transition-all duration-200 flex items-center gap-2",
            selectedTab === table.key
              ? `${table.activeColor} ${table.activeTextColor}`
              : "bg-gray-100 text-gray-600 hover:bg-gray-200"
          )}
        >
          <span>{table.icon}</span>
          <span>{table.name}</span>
          <span className="text-xs opacity-70">({counts[table.key].toLocaleString("en-US")})</span>
        </button>
      ))}
    </div>
  );
}
