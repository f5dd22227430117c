import type { ReportedTerm } from "../sequence/types";
import type { SequenceConfig } from "../types/config";

let config: null | Pick<SequenceConfig, "verbose"> = null;

export function initializeLogger(sequenceConfig: Pick<SequenceConfig, "verbose">): void {
  config = sequenceConfig;
}

function shouldLog(): boolean {
  return config?.verbose ?? false;
}

export function log(message: string): void {
  if (shouldLog()) {
    console.log(`[LOG] ${message}`);
  }
}

export function logError(message: string, error?: unknown): void {
  console.error(`[ERROR] ${message}`);
  if (error instanceof Error && shouldLog()) {
    console.error(error.stack);
  }
}

export function logCheckedTerm(term: ReportedTerm): void {
  if (shouldLog()) {
    console.log(`[CHECK] a(${term.index})=${term.value} agrees across engines`);
  }
}
