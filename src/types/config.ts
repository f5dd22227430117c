import { env, type EngineMode } from "../config/env";

export type SequenceConfig = {
  engine: EngineMode;
  maxTerms: number;
  verbose: boolean;
};

export function getSequenceConfig(): SequenceConfig {
  return {
    engine: env.A300793_ENGINE,
    maxTerms: env.A300793_MAX_TERMS,
    verbose: env.A300793_VERBOSE,
  };
}
