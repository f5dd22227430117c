/** One row of the auxiliary b values; the row at generation n has n entries. */
export type Row = readonly bigint[];

/** Terms a(1), a(2), ... stored from index 0. */
export type SequenceResult = bigint[];

export type ReportedTerm = {
  index: number;
  value: bigint;
};

/** First position where the two engines disagree; `undefined` marks a missing term. */
export type TermMismatch = {
  conjectured: bigint | undefined;
  index: number;
  proven: bigint | undefined;
};
