import { z } from "zod";

import { InputError } from "../utils/errors";

export const termCountSchema = z
  .number()
  .int("Term count must be an integer")
  .nonnegative("Term count must be non-negative")
  .max(Number.MAX_SAFE_INTEGER, "Term count must be a safe integer");

export const generationSchema = z
  .number()
  .int("Generation must be an integer")
  .positive("Generation must be at least 1");

const DECIMAL_DIGITS_PATTERN = /^\d+$/;

function firstIssueMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? "invalid value";
}

export function assertTermCount(count: number): void {
  const parsed = termCountSchema.safeParse(count);
  if (!parsed.success) {
    throw new InputError(`Invalid term count ${String(count)}: ${firstIssueMessage(parsed.error)}`);
  }
}

export function assertGeneration(generation: number): void {
  const parsed = generationSchema.safeParse(generation);
  if (!parsed.success) {
    throw new InputError(
      `Invalid generation ${String(generation)}: ${firstIssueMessage(parsed.error)}`
    );
  }
}

/**
 * Parses a command-line term count. Only plain decimal digits are accepted,
 * so "1e3", "0x10" and "2.0" are rejected rather than coerced.
 */
export function parseTermCountArgument(raw: string): number {
  const trimmed = raw.trim();
  if (!DECIMAL_DIGITS_PATTERN.test(trimmed)) {
    throw new InputError(`Term count must be a non-negative integer, received "${raw}"`);
  }

  const count = Number(trimmed);
  assertTermCount(count);
  return count;
}

export function parseGenerationArgument(raw: string): number {
  const trimmed = raw.trim();
  if (!DECIMAL_DIGITS_PATTERN.test(trimmed)) {
    throw new InputError(`Generation must be a positive integer, received "${raw}"`);
  }

  const generation = Number(trimmed);
  assertGeneration(generation);
  return generation;
}
