"use client";

interface SearchBoxProps {
  query: string;
  onQueryChange: (query: string) => void;
}

export default function SearchBox({ query, onQueryChange }: SearchBoxProps) {
  return (
    <div className="relative w-full max-w-xl">
      <span className="absolute left-3 top-1/2 -translate-y-1/2 text-gray-400">🔍</span>
      <input
        type="search"
        value={query}
        onChange={(e) => onQueryChange(e.target.value)}
        placeholder="Search by item barcode or description"
        aria-label="Search items"
        className="w-full pl-9 pr-3 py-2 bg-white border border-gray-300 rounded-lg text-sm text-gray-800 focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-blue-500"
      />
    </div>
  );
}
