import { paginate } from "../pagination.js";

const items = Array.from({ length: 23 }, (_, i) => i + 1);

describe("paginate", () => {
  it("returns the requested page", () => {
    const page = paginate(items, "2", 10);
    expect(page.items).toEqual([11, 12, 13, 14, 15, 16, 17, 18, 19, 20]);
    expect(page.page).toBe(2);
    expect(page.numPages).toBe(3);
    expect(page.totalCount).toBe(23);
  });

  it("falls back to the first page for junk", () => {
    expect(paginate(items, "abc", 10).page).toBe(1);
    expect(paginate(items, undefined, 10).page).toBe(1);
  });

  it("clamps past-the-end pages to the last one", () => {
    const page = paginate(items, "99", 10);
    expect(page.page).toBe(3);
    expect(page.items).toEqual([21, 22, 23]);
  });

  it("sends zero and negative pages to the last one", () => {
    expect(paginate(items, "0", 10).page).toBe(3);
    const page = paginate(items, "-2", 10);
    expect(page.page).toBe(3);
    expect(page.items).toEqual([21, 22, 23]);
  });

  it("has one empty page for an empty list", () => {
    expect(paginate([], "3", 10)).toEqual({ items: [], page: 1, numPages: 1, totalCount: 0 });
  });
});
