/**
 * Proven recursion for A300793.
 *
 * Each generation n carries a row b(n, 0..n-1) of auxiliary integers. The
 * term a(n) is the row sum times (-1)^n, and the next row follows from the
 * current one by a two-term linear update.
 */

import { InputError } from "../utils/errors";
import { assertGeneration, assertTermCount } from "./input";
import type { Row, SequenceResult } from "./types";

export const INITIAL_ROW: Row = Object.freeze([-1n]);

/**
 * Derives the row of generation n+1 from the row of generation n, where n is
 * the length of `currentRow`. The input is left untouched.
 */
export function advanceRow(currentRow: Row): bigint[] {
  const n = currentRow.length;
  if (n === 0) {
    throw new InputError("Cannot advance an empty row");
  }

  const size = BigInt(n);
  const nextRow: bigint[] = [-currentRow[0] * size];

  for (let j = 1; j < n; j++) {
    const column = BigInt(j);
    nextRow.push(
      currentRow[j] * (2n * column - size) + currentRow[j - 1] * (2n * column - 3n * size - 1n)
    );
  }

  // Boundary column j = n has no b(n, n) contribution.
  nextRow.push(currentRow[n - 1] * (2n * size - 3n * size - 1n));
  return nextRow;
}

function sumRow(row: Row): bigint {
  let total = 0n;
  for (const value of row) {
    total += value;
  }
  return total;
}

export function computeProvenTerms(count: number): SequenceResult {
  assertTermCount(count);

  const terms: SequenceResult = [];
  let row: bigint[] = [...INITIAL_ROW];

  for (let n = 1; n <= count; n++) {
    const sign = n % 2 === 0 ? 1n : -1n;
    terms.push(sign * sumRow(row));
    row = advanceRow(row);
  }

  return terms;
}

/** Returns b(generation, :), starting from b(1, :) = [-1]. */
export function rowAt(generation: number): bigint[] {
  assertGeneration(generation);

  let row: bigint[] = [...INITIAL_ROW];
  for (let current = 1; current < generation; current++) {
    row = advanceRow(row);
  }
  return row;
}
