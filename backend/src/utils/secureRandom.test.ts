import { describe, it, expect } from "vitest";
import {
  ROOM_CODE_ALPHABET,
  cryptoRandom,
  generateRoomCode,
  shuffled,
  weightedPick,
} from "./secureRandom";
import { fixedRandom, seededRandom } from "../testing/fixtures";

describe("cryptoRandom", () => {
  it("draws floats in [0, 1)", () => {
    for (let i = 0; i < 100; i++) {
      const value = cryptoRandom.nextFloat();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("draws integers below the bound", () => {
    expect(cryptoRandom.nextInt(1)).toBe(0);
    for (let i = 0; i < 100; i++) {
      const value = cryptoRandom.nextInt(5);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(5);
    }
  });

  it("backs weightedPick by default", () => {
    expect(["a", "b"]).toContain(weightedPick(["a", "b"], () => 1));
  });
});

describe("weightedPick", () => {
  const items = ["a", "b", "c"];
  const weights: Record<string, number> = { a: 1, b: 2, c: 1 };

  it("picks by cumulative weight", () => {
    const weightOf = (item: string) => weights[item] ?? 0;
    expect(weightedPick(items, weightOf, fixedRandom(0))).toBe("a");
    expect(weightedPick(items, weightOf, fixedRandom(0.5))).toBe("b");
    expect(weightedPick(items, weightOf, fixedRandom(0.8))).toBe("c");
  });

  it("never picks a zero-weight item", () => {
    expect(weightedPick(["x", "y"], (i) => (i === "x" ? 0 : 1), fixedRandom(0))).toBe("y");
  });

  it("throws on an empty list", () => {
    expect(() => weightedPick([], () => 1)).toThrow("weightedPick: no items");
  });
});

describe("shuffled", () => {
  it("returns a permutation and leaves the input alone", () => {
    const input = [1, 2, 3, 4, 5, 6];
    const output = shuffled(input, seededRandom(5));
    expect([...output].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(input).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe("generateRoomCode", () => {
  it("uses only unambiguous characters", () => {
    for (let i = 0; i < 50; i++) {
      const code = generateRoomCode(8);
      expect(code).toHaveLength(8);
      expect([...code].every((ch) => ROOM_CODE_ALPHABET.includes(ch))).toBe(true);
    }
    expect(ROOM_CODE_ALPHABET).not.toMatch(/[01OIL]/);
  });
});
