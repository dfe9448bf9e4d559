"use client";

import {
  Bar,
  BarChart,
  CartesianGrid,
  Legend,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { CategorySummaryRow } from "@/types/inventory";

interface CategoryChartProps {
  data: CategorySummaryRow[];
}

export default function CategoryChart({ data }: CategoryChartProps) {
  if (data.length === 0) {
    return null;
  }

  return (
    <div className="card">
      <h3 className="text-sm font-semibold text-gray-700 mb-3">Items per category</h3>
      <div className="h-64">
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }} barCategoryGap="20%">
            <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" />
            <XAxis
              dataKey="category"
              tick={{ fontSize: 12, fill: "#6b7280" }}
              axisLine={{ stroke: "#d1d5db" }}
            />
            <YAxis
              allowDecimals={false}
              tick={{ fontSize: 12, fill: "#6b7280" }}
              axisLine={{ stroke: "#d1d5db" }}
            />
            <Tooltip />
            <Legend wrapperStyle={{ fontSize: 12 }} />
            <Bar dataKey="stock" name="Warehouse Stock" fill="#1e293b" radius={[4, 4, 0, 0]} />
            <Bar dataKey="newArrivals" name="New Arrival" fill="#059669" radius={[4, 4, 0, 0]} />
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
}
