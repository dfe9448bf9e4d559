import type { NextApiRequest, NextApiResponse } from "next";
import { TABLE_IDS, isTableId, type LoadResult } from "@/types/inventory";
import { loadInventoryTable } from "@/lib/inventoryLoader";

export default async function handler(
  req: NextApiRequest,
  res: NextApiResponse<LoadResult | { error: string }>
) {
  if (req.method !== "GET") {
    return res.status(405).json({ error: "Method not allowed" });
  }

  const { table } = req.query;

  if (!isTableId(table)) {
    return res.status(400).json({
      error: `table parameter must be one of: ${TABLE_IDS.join(", ")}`,
    });
  }

  console.log(`[inventory] Loading table=${table}`);

  // load failures come back as an empty table with `error` set
  const result = await loadInventoryTable(table);

  if (result.error) {
    console.warn(`[inventory] ${table} unavailable: ${result.error}`);
  } else {
    console.log(`[inventory] ${table}: ${result.table.rows.length} rows, ${result.table.columns.length} columns`);
  }

  return res.status(200).json(result);
}
