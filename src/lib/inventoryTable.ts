/**
 * Table normalization, filtering and display projection
 *
 * All functions are pure: they take a Table and return a new one (or the
 * same one for identity filters) without mutating their input.
 */

import type {
  CategoryIndex,
  CategorySummaryRow,
  CellValue,
  InventoryRow,
  Table,
  TableId,
} from "@/types/inventory";
import {
  ALL_CATEGORIES,
  CATEGORY_COLUMN,
  COST_COLUMN,
  COST_DISPLAY_LABEL,
  COST_FIELD,
  SEARCH_FIELD_ALIASES,
  UNCATEGORIZED,
} from "@/constants/inventoryRules";

export function emptyTable(): Table {
  return { columns: [], rows: [] };
}

// trim; blank -> "Unnamed: N"; duplicates -> "name.1", "name.2", ...
function normalizeHeader(header: string[]): string[] {
  const seen = new Map<string, number>();
  const used = new Set<string>();

  return header.map((raw, index) => {
    const trimmed = raw.trim();
    const base = trimmed === "" ? `Unnamed: ${index}` : trimmed;

    let name = base;
    let count = seen.get(base) ?? 0;
    while (used.has(name)) {
      count++;
      name = `${base}.${count}`;
    }
    seen.set(base, count);
    used.add(name);
    return name;
  });
}

function toCell(value: string | undefined): CellValue {
  if (value === undefined || value === "") return null;
  return value;
}

function isBlankRow(row: InventoryRow): boolean {
  return Object.values(row).every((value) => value === null || value.trim() === "");
}

/**
 * Builds a normalized Table from raw sheet rows (first row = header).
 *
 * - header cells trimmed
 * - rows that are empty in every source column dropped
 * - the cost column (any casing) renamed to `internal_cost`, or created empty
 * - `Category` created with `Uncategorized` when missing
 */
export function normalizeTable(raw: string[][]): Table {
  if (raw.length === 0) return emptyTable();

  const sourceColumns = normalizeHeader(raw[0]);
  const rows: InventoryRow[] = [];

  for (const cells of raw.slice(1)) {
    const row: InventoryRow = {};
    sourceColumns.forEach((column, i) => {
      row[column] = toCell(cells[i]);
    });
    if (!isBlankRow(row)) rows.push(row);
  }

  let columns = sourceColumns;
  let result = rows;

  const costColumn = columns.find((c) => c.trim().toLowerCase() === COST_COLUMN);
  if (costColumn !== undefined) {
    columns = columns.map((c) => (c === costColumn ? COST_FIELD : c));
    result = result.map((row) => renameKey(row, costColumn, COST_FIELD));
  } else if (!columns.includes(COST_FIELD)) {
    columns = [...columns, COST_FIELD];
    result = result.map((row) => ({ ...row, [COST_FIELD]: null }));
  }

  if (!columns.includes(CATEGORY_COLUMN)) {
    columns = [...columns, CATEGORY_COLUMN];
    result = result.map((row) => ({ ...row, [CATEGORY_COLUMN]: UNCATEGORIZED }));
  }

  return { columns, rows: result };
}

function renameKey(row: InventoryRow, from: string, to: string): InventoryRow {
  const next: InventoryRow = {};
  for (const [key, value] of Object.entries(row)) {
    next[key === from ? to : key] = value;
  }
  return next;
}

function categoryText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = String(value).trim();
  return trimmed === "" ? null : trimmed;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Category filter options across all tables, "All Categories" first.
 * Falls back to the sentinel alone (with a warning) when any table has no
 * category column, e.g. because it failed to load.
 */
export function buildCategoryIndex(tables: Table[]): CategoryIndex {
  const missing = tables.some((t) => !t.columns.includes(CATEGORY_COLUMN));
  if (missing) {
    return {
      options: [ALL_CATEGORIES],
      warning: `Column '${CATEGORY_COLUMN}' not found in every sheet. Category filtering is unavailable.`,
    };
  }

  const values = new Set<string>();
  for (const table of tables) {
    for (const row of table.rows) {
      const category = categoryText(row[CATEGORY_COLUMN]);
      if (category !== null) values.add(category);
    }
  }

  return {
    options: [ALL_CATEGORIES, ...Array.from(values).sort(compareText)],
    warning: null,
  };
}

export function filterByCategory(table: Table, category: string): Table {
  if (category === ALL_CATEGORIES) return table;

  const selected = category.trim();
  return {
    columns: table.columns,
    rows: table.rows.filter((row) => categoryText(row[CATEGORY_COLUMN]) === selected),
  };
}

export function isSearchActive(query: string): boolean {
  return query.trim() !== "";
}

/**
 * Resolves each alias group to the first matching column of the table.
 */
export function resolveSearchFields(
  table: Table,
  aliases: readonly (readonly string[])[] = SEARCH_FIELD_ALIASES
): string[] {
  const byLower = new Map(table.columns.map((c) => [c.toLowerCase(), c] as const));
  const fields: string[] = [];
  for (const group of aliases) {
    const match = group.map((alias) => byLower.get(alias.toLowerCase())).find((c) => c !== undefined);
    if (match !== undefined) fields.push(match);
  }
  return fields;
}

/**
 * Case-insensitive substring search over the barcode and description fields
 * (OR across fields). Callers should check `isSearchActive` first: an empty
 * query matches every row.
 */
export function searchTable(
  table: Table,
  query: string,
  fields: string[] = resolveSearchFields(table)
): Table {
  const needle = query.trim().toLowerCase();

  return {
    columns: table.columns,
    rows: table.rows.filter((row) =>
      fields.some((field) => String(row[field] ?? "").toLowerCase().includes(needle))
    ),
  };
}

export function filterAndSearch(table: Table, category: string, query: string): Table {
  const filtered = filterByCategory(table, category);
  return isSearchActive(query) ? searchTable(filtered, query) : filtered;
}

/**
 * Column-trimmed view for rendering. The category column is always removed;
 * cost is removed unless `revealCost`, in which case it is shown as
 * `INTERNAL_COST`.
 */
export function projectForDisplay(table: Table, revealCost: boolean): Table {
  const hidden = new Set<string>([CATEGORY_COLUMN]);
  if (!revealCost) hidden.add(COST_FIELD);

  const rename = (column: string) => (revealCost && column === COST_FIELD ? COST_DISPLAY_LABEL : column);

  const columns = table.columns.filter((c) => !hidden.has(c)).map(rename);
  const rows = table.rows.map((row) => {
    const next: InventoryRow = {};
    for (const column of table.columns) {
      if (hidden.has(column)) continue;
      next[rename(column)] = row[column] ?? null;
    }
    return next;
  });

  return { columns, rows };
}

/**
 * Row counts per category for each table, sorted by category.
 */
export function summarizeCategories(tables: Record<TableId, Table>): CategorySummaryRow[] {
  const counts = new Map<string, CategorySummaryRow>();

  const count = (table: Table, key: "stock" | "newArrivals") => {
    for (const row of table.rows) {
      const category = categoryText(row[CATEGORY_COLUMN]) ?? UNCATEGORIZED;
      const entry = counts.get(category) ?? { category, stock: 0, newArrivals: 0 };
      entry[key]++;
      counts.set(category, entry);
    }
  };

  count(tables.stock, "stock");
  count(tables["new-arrivals"], "newArrivals");

  return Array.from(counts.values()).sort((a, b) => compareText(a.category, b.category));
}
