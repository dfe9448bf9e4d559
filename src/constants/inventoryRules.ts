/**
 * Column and filter rules
 *
 * Column names the dashboard depends on, and the sentinels used when a
 * source sheet does not carry them. Changing a value here changes every view.
 */

/**
 * Grouping column used by the sidebar filter
 */
export const CATEGORY_COLUMN = "Category";

/**
 * Assigned to every row when the source has no category column
 */
export const UNCATEGORIZED = "Uncategorized";

/**
 * First option of the category filter; selects every row
 */
export const ALL_CATEGORIES = "All Categories";

/**
 * Cost column as it appears in the sheet (matched trimmed, case-insensitive)
 */
export const COST_COLUMN = "cost";

/**
 * Standardized name of the cost field after loading
 */
export const COST_FIELD = "internal_cost";

/**
 * Header shown when cost is revealed
 */
export const COST_DISPLAY_LABEL = COST_FIELD.toUpperCase();

/**
 * Searchable fields. Each group lists header aliases, matched
 * case-insensitively; the first alias present in a table is used.
 */
export const SEARCH_FIELD_ALIASES: readonly (readonly string[])[] = [
  ["item barcode", "barcode"],
  ["description"],
] as const;

/**
 * Default lifetime of a loaded table in the server cache
 */
export const DEFAULT_CACHE_TTL_SECONDS = 600;
