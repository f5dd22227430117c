import { describe, expect, test } from "vitest";

import { advanceRow, computeProvenTerms, INITIAL_ROW, rowAt } from "../../src/sequence/proven";
import { InputError } from "../../src/utils/errors";

const FIRST_TWELVE_TERMS = [
  1n,
  3n,
  13n,
  75n,
  561n,
  5355n,
  63405n,
  894915n,
  14511105n,
  263544435n,
  5284255725n,
  116065424475n,
];

describe("advanceRow", () => {
  test("derives generation 2 from the initial row", () => {
    // n = 1: next[0] = -(-1) * 1 = 1, next[1] = -1 * (2 - 3 - 1) = 2
    expect(advanceRow([-1n])).toEqual([1n, 2n]);
  });

  test("derives generations 3 through 5", () => {
    expect(advanceRow([1n, 2n])).toEqual([-2n, -5n, -6n]);
    expect(advanceRow([-2n, -5n, -6n])).toEqual([6n, 21n, 24n, 24n]);
    expect(advanceRow([6n, 21n, 24n, 24n])).toEqual([-24n, -108n, -189n, -120n, -120n]);
  });

  test("produces one more entry than it receives", () => {
    expect(advanceRow([3n, -7n, 11n, 0n])).toHaveLength(5);
  });

  test("does not mutate the input row", () => {
    const row = [-2n, -5n, -6n];
    advanceRow(row);
    expect(row).toEqual([-2n, -5n, -6n]);
  });

  test("accepts arbitrary integer rows", () => {
    // n = 2: [-(5) * 2, 0 * (2 - 2) + 5 * (2 - 7), 0 * (4 - 7)]
    expect(advanceRow([5n, 0n])).toEqual([-10n, -25n, 0n]);
  });

  test("rejects an empty row", () => {
    expect(() => advanceRow([])).toThrow(InputError);
  });
});

describe("computeProvenTerms", () => {
  test("returns an empty sequence for zero terms", () => {
    expect(computeProvenTerms(0)).toEqual([]);
  });

  test("matches the known first twelve terms", () => {
    expect(computeProvenTerms(12)).toEqual(FIRST_TWELVE_TERMS);
  });

  test("returns exactly the requested number of terms", () => {
    for (let count = 1; count <= 25; count++) {
      expect(computeProvenTerms(count)).toHaveLength(count);
    }
  });

  test("is a prefix of the next longer computation", () => {
    for (let count = 1; count <= 20; count++) {
      expect(computeProvenTerms(count + 1).slice(0, count)).toEqual(computeProvenTerms(count));
    }
  });

  test("returns identical results on repeated calls", () => {
    expect(computeProvenTerms(15)).toEqual(computeProvenTerms(15));
  });

  test("keeps exact values beyond the safe integer range", () => {
    expect(computeProvenTerms(30)[29]).toBe(6713096094366913650520838179332541546875n);
  });

  test("rejects negative and fractional counts", () => {
    expect(() => computeProvenTerms(-1)).toThrow(InputError);
    expect(() => computeProvenTerms(2.5)).toThrow(InputError);
    expect(() => computeProvenTerms(Number.NaN)).toThrow(InputError);
  });
});

describe("INITIAL_ROW", () => {
  test("is frozen and unchanged by either entry point", () => {
    computeProvenTerms(6);
    rowAt(6);

    expect(Object.isFrozen(INITIAL_ROW)).toBe(true);
    expect(INITIAL_ROW).toEqual([-1n]);
  });

  test("hands callers a fresh copy", () => {
    const row = rowAt(1);
    row[0] = 7n;

    expect(rowAt(1)).toEqual([-1n]);
  });
});

describe("rowAt", () => {
  test("returns the initial row for generation 1", () => {
    expect(rowAt(1)).toEqual([-1n]);
  });

  test("returns the row of a later generation", () => {
    expect(rowAt(4)).toEqual([6n, 21n, 24n, 24n]);
  });

  test("has length equal to its generation", () => {
    expect(rowAt(17)).toHaveLength(17);
  });

  test("rejects generation 0", () => {
    expect(() => rowAt(0)).toThrow(InputError);
  });
});
