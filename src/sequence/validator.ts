import type { EngineMode } from "../config/env";

import { ValidationError } from "../utils/errors";
import { log, logCheckedTerm } from "../utils/logger";
import { computeConjecturedTerms } from "./conjectured";
import { assertTermCount } from "./input";
import { computeProvenTerms } from "./proven";
import type { ReportedTerm, TermMismatch } from "./types";

export function reportTerms(terms: readonly bigint[]): ReportedTerm[] {
  return terms.map((value, position) => ({
    index: position + 1,
    value,
  }));
}

export function findFirstMismatch(
  proven: readonly bigint[],
  conjectured: readonly bigint[]
): null | TermMismatch {
  const length = Math.max(proven.length, conjectured.length);

  for (let position = 0; position < length; position++) {
    const provenValue = position < proven.length ? proven[position] : undefined;
    const conjecturedValue = position < conjectured.length ? conjectured[position] : undefined;

    if (provenValue !== conjecturedValue) {
      return {
        conjectured: conjecturedValue,
        index: position + 1,
        proven: provenValue,
      };
    }
  }

  return null;
}

/**
 * Compares the two engines' outputs term by term and pairs each agreed value
 * with its 1-based index.
 */
export function crossValidate(
  proven: readonly bigint[],
  conjectured: readonly bigint[]
): ReportedTerm[] {
  const mismatch = findFirstMismatch(proven, conjectured);

  if (proven.length !== conjectured.length) {
    throw new ValidationError(
      `Engines produced different lengths: proven=${proven.length}, conjectured=${conjectured.length}`,
      undefined,
      { mismatch: mismatch ?? undefined }
    );
  }

  if (mismatch) {
    throw new ValidationError(
      `Engines disagree at a(${mismatch.index}): proven=${String(mismatch.proven)}, conjectured=${String(mismatch.conjectured)}`,
      undefined,
      { mismatch }
    );
  }

  return reportTerms(proven);
}

export function validateAndReport(count: number): ReportedTerm[] {
  assertTermCount(count);

  const proven = computeProvenTerms(count);
  const conjectured = computeConjecturedTerms(count);
  const report = crossValidate(proven, conjectured);

  for (const term of report) {
    logCheckedTerm(term);
  }
  log(`Cross-validated ${report.length} terms`);

  return report;
}

export function computeReport(count: number, mode: EngineMode): ReportedTerm[] {
  switch (mode) {
    case "both":
      return validateAndReport(count);
    case "conjectured":
      return reportTerms(computeConjecturedTerms(count));
    case "proven":
      return reportTerms(computeProvenTerms(count));
  }
}
