import { describe, it, expect } from "vitest";
import { calculateTablePlan } from "./groupSizing";

describe("calculateTablePlan", () => {
  it("covers every participant exactly for all counts from 6 to 60", () => {
    for (let n = 6; n <= 60; n++) {
      const plan = calculateTablePlan(n, true);
      expect(plan.fours * 4 + plan.threes * 3).toBe(n);
      expect(plan.threes).toBeGreaterThanOrEqual(0);
      expect(plan.threes).toBeLessThanOrEqual(3);
      expect(plan.fours).toBeGreaterThanOrEqual(0);
    }
  });

  it.each([
    [6, 0, 2],
    [7, 1, 1],
    [8, 2, 0],
    [9, 0, 3],
    [10, 1, 2],
    [11, 2, 1],
    [13, 1, 3],
    [16, 4, 0],
  ])("plans %i participants as %i fours and %i threes", (n, fours, threes) => {
    expect(calculateTablePlan(n, true)).toEqual({ fours, threes });
  });

  it("leaves the remainder out when 3-seat tables are disallowed", () => {
    expect(calculateTablePlan(10, false)).toEqual({ fours: 2, threes: 0 });
    expect(calculateTablePlan(12, false)).toEqual({ fours: 3, threes: 0 });
  });

  it("only plans threes when the table size cap is 3", () => {
    expect(calculateTablePlan(10, true, 3)).toEqual({ fours: 0, threes: 3 });
    expect(calculateTablePlan(9, true, 3)).toEqual({ fours: 0, threes: 3 });
  });

  it("never returns a negative plan for small pools", () => {
    expect(calculateTablePlan(1, true)).toEqual({ fours: 0, threes: 0 });
    expect(calculateTablePlan(2, true)).toEqual({ fours: 0, threes: 0 });
    expect(calculateTablePlan(3, true)).toEqual({ fours: 0, threes: 1 });
    expect(calculateTablePlan(4, true)).toEqual({ fours: 1, threes: 0 });
    expect(calculateTablePlan(5, true)).toEqual({ fours: 0, threes: 1 });
    expect(calculateTablePlan(0, true)).toEqual({ fours: 0, threes: 0 });
  });
});
