import { describe, it, expect } from "vitest";
import {
  nextPermutation,
  permutations,
  enumerateRowsStartingAtZero,
  factorial,
  ROWS_STARTING_AT_ZERO,
} from "../../src/enumeration/permutations";
import { InvalidRowError } from "../../src/errors";

function take<T>(iterator: Iterator<T>, count: number): T[] {
  const items: T[] = [];
  for (let i = 0; i < count; i++) {
    const next = iterator.next();
    if (next.done) break;
    items.push(next.value);
  }
  return items;
}

function compareLex(a: number[], b: number[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

describe("factorial", () => {
  it("computes small factorials", () => {
    expect(factorial(0)).toBe(1);
    expect(factorial(1)).toBe(1);
    expect(factorial(5)).toBe(120);
  });

  it("matches the number of rows starting on 0", () => {
    expect(factorial(11)).toBe(39916800);
    expect(ROWS_STARTING_AT_ZERO).toBe(factorial(11));
  });

  it("rejects negative input", () => {
    expect(() => factorial(-1)).toThrow(RangeError);
  });
});

describe("nextPermutation", () => {
  it("advances to the next lexicographic order", () => {
    const values = [1, 2, 3];
    expect(nextPermutation(values)).toBe(true);
    expect(values).toEqual([1, 3, 2]);
    expect(nextPermutation(values)).toBe(true);
    expect(values).toEqual([2, 1, 3]);
  });

  it("returns false and leaves the last permutation untouched", () => {
    const values = [3, 2, 1];
    expect(nextPermutation(values)).toBe(false);
    expect(values).toEqual([3, 2, 1]);
  });

  it("only permutes from the start index", () => {
    const values = [0, 3, 2, 1];
    expect(nextPermutation(values, 1)).toBe(false);
    expect(values).toEqual([0, 3, 2, 1]);

    const other = [5, 1, 2];
    expect(nextPermutation(other, 1)).toBe(true);
    expect(other).toEqual([5, 2, 1]);
  });
});

describe("permutations", () => {
  it("yields all orders of three values", () => {
    expect([...permutations([3, 1, 2])]).toEqual([
      [1, 2, 3],
      [1, 3, 2],
      [2, 1, 3],
      [2, 3, 1],
      [3, 1, 2],
      [3, 2, 1],
    ]);
  });

  it("yields every permutation of seven values exactly once", () => {
    const seen = new Set<string>();
    for (const perm of permutations([1, 2, 3, 4, 5, 6, 7])) {
      seen.add(perm.join(","));
    }
    expect(seen.size).toBe(factorial(7));
  });
});

describe("enumerateRowsStartingAtZero", () => {
  it("starts with the chromatic row and proceeds lexicographically", () => {
    const rows = take(enumerateRowsStartingAtZero(), 3).map((row) => row.prime());
    expect(rows).toEqual([
      [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11],
      [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 11, 10],
      [0, 1, 2, 3, 4, 5, 6, 7, 8, 10, 9, 11],
    ]);
  });

  it("yields distinct, increasing rows that begin on 0", () => {
    const rows = take(enumerateRowsStartingAtZero(), 2000).map((row) => row.prime());
    expect(rows).toHaveLength(2000);
    expect(new Set(rows.map((r) => r.join(" "))).size).toBe(2000);
    for (let i = 0; i < rows.length; i++) {
      expect(rows[i][0]).toBe(0);
      expect([...rows[i]].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
      if (i > 0) {
        expect(compareLex(rows[i - 1], rows[i])).toBeLessThan(0);
      }
    }
  });

  it("covers every order of the last seven positions before position 4 moves", () => {
    // 7! rows keep 0 1 2 3 4 in front; the next one does not
    const rows = take(enumerateRowsStartingAtZero(), factorial(7) + 1).map((row) => row.prime());
    const prefixes = new Set(rows.slice(0, factorial(7)).map((r) => r.slice(0, 5).join(" ")));
    const tails = new Set(rows.slice(0, factorial(7)).map((r) => r.slice(5).join(" ")));
    expect([...prefixes]).toEqual(["0 1 2 3 4"]);
    expect(tails.size).toBe(factorial(7));
    expect(rows[factorial(7)].slice(0, 6)).toEqual([0, 1, 2, 3, 5, 4]);
  });

  it("stops at the limit", () => {
    expect([...enumerateRowsStartingAtZero({ limit: 5 })]).toHaveLength(5);
  });

  it("rejects a negative limit", () => {
    expect(() => enumerateRowsStartingAtZero({ limit: -1 }).next()).toThrow(RangeError);
  });

  it("restarts from the beginning on every call", () => {
    const first = enumerateRowsStartingAtZero();
    take(first, 10);
    const again = take(enumerateRowsStartingAtZero(), 1);
    expect(again[0].prime()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
  });

  it("ends on the descending row and then stops", () => {
    const rows = [...enumerateRowsStartingAtZero({ from: [0, 11, 10, 9, 8, 7, 6, 5, 4, 2, 1, 3] })];
    expect(rows.map((row) => row.toString())).toEqual([
      "0 11 10 9 8 7 6 5 4 2 1 3",
      "0 11 10 9 8 7 6 5 4 2 3 1",
      "0 11 10 9 8 7 6 5 4 3 1 2",
      "0 11 10 9 8 7 6 5 4 3 2 1",
    ]);
  });

  it("resumes from a given row and still honours the limit", () => {
    const rows = [...enumerateRowsStartingAtZero({ from: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 11, 10], limit: 2 })];
    expect(rows.map((row) => row.toString())).toEqual([
      "0 1 2 3 4 5 6 7 8 9 11 10",
      "0 1 2 3 4 5 6 7 8 10 9 11",
    ]);
  });

  it("rejects a resume row that is not a row starting on 0", () => {
    expect(() => enumerateRowsStartingAtZero({ from: [1, 0, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11] }).next()).toThrow(
      RangeError
    );
    expect(() => enumerateRowsStartingAtZero({ from: [0, 0, 0] }).next()).toThrow(InvalidRowError);
  });
});
