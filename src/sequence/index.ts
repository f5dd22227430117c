export { computeConjecturedTerms } from "./conjectured";
export {
  assertGeneration,
  assertTermCount,
  parseGenerationArgument,
  parseTermCountArgument,
} from "./input";
export { advanceRow, computeProvenTerms, INITIAL_ROW, rowAt } from "./proven";
export type { ReportedTerm, Row, SequenceResult, TermMismatch } from "./types";
export {
  computeReport,
  crossValidate,
  findFirstMismatch,
  reportTerms,
  validateAndReport,
} from "./validator";
