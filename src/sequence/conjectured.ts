import { assertTermCount } from "./input";
import type { SequenceResult } from "./types";

const SEED_TERMS: readonly bigint[] = [1n, 3n, 13n];

/**
 * Evaluates the conjectured three-term recurrence
 *
 *   a[i] = 4(i-1)^2(i-2) a[i-3] - 2(3i-2)(i-1) a[i-2] + (4i-1) a[i-1]
 *
 * where storage index i holds a(i+1). The coefficients use the storage index,
 * not the term index.
 */
export function computeConjecturedTerms(count: number): SequenceResult {
  assertTermCount(count);

  if (count <= SEED_TERMS.length) {
    return SEED_TERMS.slice(0, count);
  }

  const terms: SequenceResult = [...SEED_TERMS];
  for (let i = SEED_TERMS.length; i < count; i++) {
    const k = BigInt(i);
    terms.push(
      4n * (k - 1n) ** 2n * (k - 2n) * terms[i - 3] -
        2n * (3n * k - 2n) * (k - 1n) * terms[i - 2] +
        (4n * k - 1n) * terms[i - 1]
    );
  }

  return terms;
}
