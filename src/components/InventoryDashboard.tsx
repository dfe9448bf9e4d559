"use client";

import { useDeferredValue, useMemo, useState } from "react";
import { TABLES, getTableLabel, isTableUnavailable, type TableId } from "@/types/inventory";
import { ALL_CATEGORIES } from "@/constants/inventoryRules";
import {
  buildCategoryIndex,
  filterAndSearch,
  filterByCategory,
  isSearchActive,
  projectForDisplay,
  summarizeCategories,
} from "@/lib/inventoryTable";
import { useInventoryData } from "@/contexts/InventoryDataContext";
import { formatItemCount } from "@/lib/utils";
import Navigation from "./Navigation";
import SectionTitle from "./SectionTitle";
import CategorySidebar from "./CategorySidebar";
import SearchBox from "./SearchBox";
import TableTabs from "./TableTabs";
import InventoryTable from "./InventoryTable";
import CategoryChart from "./CategoryChart";

export default function InventoryDashboard() {
  const { results, loading, reload } = useInventoryData();

  const [selectedCategory, setSelectedCategory] = useState<string>(ALL_CATEGORIES);
  const [query, setQuery] = useState("");
  const deferredQuery = useDeferredValue(query);
  const [selectedTab, setSelectedTab] = useState<TableId>("stock");

  const categoryIndex = useMemo(
    () => (results ? buildCategoryIndex(TABLES.map((t) => results[t.key].table)) : null),
    [results]
  );

  // falls back to all rows when filtering is unavailable or a reload dropped the selection
  const effectiveCategory =
    categoryIndex && !categoryIndex.warning && categoryIndex.options.includes(selectedCategory)
      ? selectedCategory
      : ALL_CATEGORIES;

  const browseViews = useMemo(() => {
    if (!results) return null;
    const view = (key: TableId) => projectForDisplay(filterByCategory(results[key].table, effectiveCategory), false);
    return { stock: view("stock"), "new-arrivals": view("new-arrivals") };
  }, [results, effectiveCategory]);

  const searchActive = isSearchActive(deferredQuery);

  // cost is only revealed in search results
  const searchViews = useMemo(() => {
    if (!results || !searchActive) return null;
    const view = (key: TableId) => projectForDisplay(filterAndSearch(results[key].table, effectiveCategory, deferredQuery), true);
    return { stock: view("stock"), "new-arrivals": view("new-arrivals") };
  }, [results, searchActive, effectiveCategory, deferredQuery]);

  const summary = useMemo(
    () =>
      results
        ? summarizeCategories({ stock: results.stock.table, "new-arrivals": results["new-arrivals"].table })
        : [],
    [results]
  );

  if (!results || !categoryIndex || !browseViews) {
    return (
      <>
        <Navigation results={null} loading={loading} onReload={() => void reload()} />
        <main className="max-w-[1800px] mx-auto px-6 py-12">
          <div className="flex items-center justify-center py-20">
            <p className="text-gray-500">Loading inventory…</p>
          </div>
        </main>
      </>
    );
  }

  const unavailable = TABLES.filter((t) => isTableUnavailable(results[t.key]));
  const selectedResult = results[selectedTab];

  return (
    <>
      <Navigation results={results} loading={loading} onReload={() => void reload()} />
      <main className="max-w-[1800px] mx-auto px-6 py-8">
        {unavailable.map((t) => (
          <div
            key={t.key}
            role="alert"
            className="mb-3 px-4 py-3 rounded-lg bg-red-50 border border-red-200 text-sm text-red-700"
          >
            {results[t.key].error}
          </div>
        ))}

        <div className="flex flex-col lg:flex-row gap-8">
          <CategorySidebar
            categoryIndex={categoryIndex}
            selectedCategory={effectiveCategory}
            onCategoryChange={setSelectedCategory}
          />

          <div className="flex-1 min-w-0 space-y-6">
            <SearchBox query={query} onQueryChange={setQuery} />

            {searchViews ? (
              <section>
                <SectionTitle title="Search Results" icon="🔍" colorClass="bg-amber-500" />
                {TABLES.filter((t) => !isTableUnavailable(results[t.key])).map((t) => (
                  <div key={t.key} className="mb-6">
                    <h3 className="text-sm font-semibold text-gray-700 mb-2">
                      {t.icon} {t.name} · {formatItemCount(searchViews[t.key].rows.length)}
                    </h3>
                    <InventoryTable
                      table={searchViews[t.key]}
                      emptyMessage={`No items in ${t.name} match "${deferredQuery.trim()}".`}
                    />
                  </div>
                ))}
              </section>
            ) : (
              <section>
                <TableTabs
                  selectedTab={selectedTab}
                  onTabChange={setSelectedTab}
                  counts={{
                    stock: browseViews.stock.rows.length,
                    "new-arrivals": browseViews["new-arrivals"].rows.length,
                  }}
                />
                <SectionTitle
                  title={getTableLabel(selectedTab)}
                  count={browseViews[selectedTab].rows.length}
                  colorClass={selectedTab === "stock" ? "bg-slate-800" : "bg-emerald-600"}
                />
                {isTableUnavailable(selectedResult) ? (
                  <p className="text-sm text-gray-500">This sheet is currently unavailable.</p>
                ) : (
                  <InventoryTable table={browseViews[selectedTab]} />
                )}
              </section>
            )}

            <CategoryChart data={summary} />
          </div>
        </div>
      </main>
    </>
  );
}
