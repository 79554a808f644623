import { describe, it, expect } from "vitest";
import { analyzeConcentration, groupValues, safeDivide, shareStats } from "./concentration";

describe("safeDivide", () => {
  it("divides finite numbers", () => {
    expect(safeDivide(6, 3)).toBe(2);
  });

  it("returns null instead of failing on degenerate input", () => {
    expect(safeDivide(0, 0)).toBeNull();
    expect(safeDivide(1, 0)).toBeNull();
    expect(safeDivide(null, 1)).toBeNull();
    expect(safeDivide(1, undefined)).toBeNull();
    expect(safeDivide(Number.NaN, 1)).toBeNull();
    expect(safeDivide(1, Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe("shareStats", () => {
  it("computes max share and HHI for an even split", () => {
    expect(shareStats([100, 100])).toEqual({ max_share: 0.5, hhi: 5000 });
  });

  it("gives a single counterparty full concentration", () => {
    expect(shareStats([250])).toEqual({ max_share: 1, hhi: 10000 });
  });

  it("rounds HHI to an integer", () => {
    expect(shareStats([50, 30, 20])).toEqual({ max_share: 0.5, hhi: 3800 });
  });

  it("returns nulls when the total is zero or there are no values", () => {
    expect(shareStats([0, 0])).toEqual({ max_share: null, hhi: null });
    expect(shareStats([])).toEqual({ max_share: null, hhi: null });
  });
});

describe("groupValues", () => {
  it("sums duplicate pairs and skips missing values", () => {
    const grouped = groupValues([
      { entity: "V", counterparty: "A", value: 50 },
      { entity: "V", counterparty: "A", value: 50 },
      { entity: "V", counterparty: "B", value: null },
      { entity: "V", counterparty: "C", value: Number.NaN },
    ]);
    expect(Array.from(grouped.get("V") ?? [])).toEqual([["A", 100]]);
  });
});

describe("analyzeConcentration", () => {
  it("reports per-entity stats in first-seen order", () => {
    expect(
      analyzeConcentration([
        { entity: "V", counterparty: "A", value: 50 },
        { entity: "W", counterparty: "A", value: 0 },
        { entity: "V", counterparty: "A", value: 50 },
        { entity: "V", counterparty: "B", value: 100 },
      ])
    ).toEqual([
      { entity: "V", max_share: 0.5, hhi: 5000, counterparty_count: 2 },
      { entity: "W", max_share: null, hhi: null, counterparty_count: 1 },
    ]);
  });
});
