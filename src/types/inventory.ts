/**
 * Inventory table model shared by the API route and the dashboard.
 */

// null is the missing-value marker
export type CellValue = string | null;

export type InventoryRow = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: InventoryRow[];
}

export type TableId = "stock" | "new-arrivals";

export const TABLE_IDS: readonly TableId[] = ["stock", "new-arrivals"] as const;

export const TABLES: {
  key: TableId;
  name: string;
  icon: string;
  activeColor: string;
  activeTextColor: string;
}[] = [
  {
    key: "stock",
    name: "Warehouse Stock",
    icon: "🏬",
    activeColor: "bg-slate-800",
    activeTextColor: "text-white",
  },
  {
    key: "new-arrivals",
    name: "New Arrival",
    icon: "🆕",
    activeColor: "bg-emerald-600",
    activeTextColor: "text-white",
  },
];

export function isTableId(value: unknown): value is TableId {
  return TABLE_IDS.some((id) => id === value);
}

export function getTableLabel(tableId: TableId): string {
  return TABLES.find((t) => t.key === tableId)?.name ?? tableId;
}

export interface LoadResult {
  tableId: TableId;
  table: Table;
  // user-visible message when the source could not be loaded
  error: string | null;
  loadedAt: string;
}

/**
 * An empty table from a failed load means "unavailable", which is different
 * from a loaded table whose filters match nothing.
 */
export function isTableUnavailable(result: LoadResult): boolean {
  return result.error !== null;
}

export interface CategoryIndex {
  options: string[];
  warning: string | null;
}

export interface CategorySummaryRow {
  category: string;
  stock: number;
  newArrivals: number;
}
