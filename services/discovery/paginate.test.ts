import { describe, it, expect } from "vitest";
import { paginate } from "./paginate";

const items = Array.from({ length: 25 }, (_, i) => i + 1);

describe("paginate", () => {
  it("splits 25 items of size 10 into 3 pages", () => {
    const page = paginate(items, 2, 10);
    expect(page).toEqual({
      items: [11, 12, 13, 14, 15, 16, 17, 18, 19, 20],
      page: 2,
      pageSize: 10,
      totalCount: 25,
      totalPages: 3,
      hasPrev: true,
      hasNext: true,
    });
  });

  it("clamps pages past the end to the last page", () => {
    const page = paginate(items, 4, 10);
    expect(page.page).toBe(3);
    expect(page.items).toEqual([21, 22, 23, 24, 25]);
    expect(page.hasNext).toBe(false);
    expect(page.hasPrev).toBe(true);
  });

  it("clamps pages below one to the first page", () => {
    const page = paginate(items, 0, 10);
    expect(page.page).toBe(1);
    expect(page.hasPrev).toBe(false);
  });

  it("fits an exact multiple on one page", () => {
    const page = paginate(items.slice(0, 10), 1, 10);
    expect(page.totalPages).toBe(1);
    expect(page.hasNext).toBe(false);
  });

  it("returns a single empty page for no items", () => {
    expect(paginate([], 3, 10)).toEqual({
      items: [],
      page: 1,
      pageSize: 10,
      totalCount: 0,
      totalPages: 1,
      hasPrev: false,
      hasNext: false,
    });
  });
});
