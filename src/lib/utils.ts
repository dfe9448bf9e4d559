/**
 * Formatting helpers
 */

import type { CellValue } from "@/types/inventory";

/**
 * Class name join, skipping falsy entries
 */
export function cn(...classes: (string | boolean | undefined | null)[]): string {
  return classes.filter(Boolean).join(" ");
}

/**
 * Cell text for display; missing values render as an em dash
 */
export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "—";
  return value;
}

/**
 * "1 item" / "1,234 items"
 */
export function formatItemCount(count: number): string {
  return `${count.toLocaleString("en-US")} ${count === 1 ? "item" : "items"}`;
}

/**
 * ISO timestamp to "HH:MM" (local time), for the "loaded at" caption
 * @returns empty string for an unparseable timestamp
 */
export function formatLoadedAt(isoString: string): string {
  const date = new Date(isoString);
  if (Number.isNaN(date.getTime())) return "";
  const hours = date.getHours().toString().padStart(2, "0");
  const minutes = date.getMinutes().toString().padStart(2, "0");
  return `${hours}:${minutes}`;
}
