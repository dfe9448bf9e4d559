"use client";

import type { CategoryIndex } from "@/types/inventory";
import { ALL_CATEGORIES } from "@/constants/inventoryRules";

interface CategorySidebarProps {
  categoryIndex: CategoryIndex;
  selectedCategory: string;
  onCategoryChange: (category: string) => void;
}

export default function CategorySidebar({
  categoryIndex,
  selectedCategory,
  onCategoryChange,
}: CategorySidebarProps) {
  const { options, warning } = categoryIndex;

  return (
    <aside className="w-full lg:w-64 shrink-0 space-y-3">
      <h3 className="text-sm font-semibold text-gray-700">Filters</h3>

      <label className="block text-xs font-medium text-gray-500" htmlFor="category-filter">
        Category
      </label>
      <select
        id="category-filter"
        value={options.includes(selectedCategory) ? selectedCategory : ALL_CATEGORIES}
        onChange={(e) => onCategoryChange(e.target.value)}
        disabled={options.length <= 1}
        className="w-full px-3 py-2 bg-white border border-gray-300 rounded-md text-sm text-gray-800 focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-blue-500 disabled:bg-gray-50"
      >
        {options.map((option) => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>

      {warning && (
        <p role="alert" className="px-3 py-2 rounded-md bg-yellow-50 border border-yellow-200 text-xs text-yellow-800">
          ⚠️ {warning}
        </p>
      )}
    </aside>
  );
}
