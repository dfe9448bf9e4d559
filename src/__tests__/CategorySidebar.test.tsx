// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest";
import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import CategorySidebar from "@/components/CategorySidebar";

afterEach(() => {
  cleanup();
});

describe("CategorySidebar", () => {
  it("lists the category options and reports changes", () => {
    const onCategoryChange = vi.fn();
    render(
      <CategorySidebar
        categoryIndex={{ options: ["All Categories", "Parts", "Tools"], warning: null }}
        selectedCategory="All Categories"
        onCategoryChange={onCategoryChange}
      />
    );

    const select = screen.getByLabelText("Category");
    expect(screen.getAllByRole("option").map((o) => o.textContent)).toEqual(["All Categories", "Parts", "Tools"]);

    fireEvent.change(select, { target: { value: "Tools" } });
    expect(onCategoryChange).toHaveBeenCalledWith("Tools");
    expect(screen.queryByRole("alert")).toBeNull();
  });

  it("shows the warning and disables the filter when categories are unavailable", () => {
    render(
      <CategorySidebar
        categoryIndex={{
          options: ["All Categories"],
          warning: "Column 'Category' not found in every sheet. Category filtering is unavailable.",
        }}
        selectedCategory="All Categories"
        onCategoryChange={() => {}}
      />
    );

    expect(screen.getByRole("alert").textContent).toBe(
      "⚠️ Column 'Category' not found in every sheet. Category filtering is unavailable."
    );
    expect(screen.getByRole<HTMLSelectElement>("combobox").disabled).toBe(true);
  });
});
