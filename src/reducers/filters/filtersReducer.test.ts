import { describe, it, expect } from "vitest";
import { filtersReducer, initialState } from ".";

describe("filtersReducer", () => {
  it("updates one criterion at a time", () => {
    const s1 = filtersReducer(initialState, { type: "set-category", value: "Work" });
    const s2 = filtersReducer(s1, { type: "set-keyword", value: "urg" });
    expect(s2).toEqual({ ...initialState, category: "Work", keyword: "urg" });
  });

  it("treats an empty date as no date", () => {
    const s1 = filtersReducer(initialState, { type: "set-date", value: "2024-06-01" });
    expect(s1.date).toBe("2024-06-01");
    expect(filtersReducer(s1, { type: "set-date", value: "" }).date).toBeNull();
  });

  it("keeps selections that are still offered", () => {
    const s1 = filtersReducer(initialState, { type: "set-category", value: "Home" });
    const s2 = filtersReducer(s1, {
      type: "sync-options",
      categories: ["All Categories", "Work", "Home"],
      priorities: ["All Priorities"],
    });
    expect(s2).toBe(s1);
  });

  it("falls back to the sentinels for removed values", () => {
    const s1 = filtersReducer(initialState, { type: "set-category", value: "Home" });
    const s2 = filtersReducer(s1, { type: "set-priority", value: "2" });
    const s3 = filtersReducer(s2, {
      type: "sync-options",
      categories: ["All Categories", "Work"],
      priorities: ["All Priorities", "1"],
    });
    expect(s3.category).toBe("All Categories");
    expect(s3.priority).toBe("All Priorities");
  });

  it("resets every criterion", () => {
    const s1 = filtersReducer(initialState, { type: "set-completion", value: "Completed" });
    expect(filtersReducer(s1, { type: "reset-filters" })).toEqual(initialState);
  });
});
