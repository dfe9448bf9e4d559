"use client";

import type { Table } from "@/types/inventory";
import { COST_DISPLAY_LABEL } from "@/constants/inventoryRules";
import { cn, formatCell } from "@/lib/utils";

interface InventoryTableProps {
  // already projected for display
  table: Table;
  emptyMessage?: string;
}

export default function InventoryTable({ table, emptyMessage = "No items match the current filters." }: InventoryTableProps) {
  if (table.rows.length === 0) {
    return (
      <div className="flex items-center justify-center py-10 rounded-lg border border-dashed border-gray-200">
        <p className="text-gray-500 text-sm">{emptyMessage}</p>
      </div>
    );
  }

  return (
    <div className="overflow-x-auto rounded-lg border border-gray-200">
      <table className="inventory-table min-w-max">
        <thead>
          <tr>
            {table.columns.map((column) => (
              <th
                key={column}
                className={cn(column === COST_DISPLAY_LABEL && "bg-amber-50 text-amber-800")}
              >
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {table.rows.map((row, idx) => (
            <tr key={idx}>
              {table.columns.map((column) => (
                <td
                  key={column}
                  className={cn(
                    row[column] === null && "text-gray-300",
                    column === COST_DISPLAY_LABEL && "bg-amber-50/50 font-medium"
                  )}
                >
                  {formatCell(row[column])}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
