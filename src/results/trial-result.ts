import type {
  ExecutionOutcome,
  MeasurementSource,
  TrialResult,
  TrialSpec
} from "../core/types.js";
import type { ParsedResultRecord } from "./result-parser.js";

type ResultIdentity = {
  spec: TrialSpec;
  batchNumber: number;
  source: MeasurementSource;
};

const identity = (input: ResultIdentity) => ({
  sequence_number: input.spec.sequence_number,
  repetition: input.spec.repetition,
  levels: input.spec.levels,
  batch_number: input.batchNumber,
  measurement_source: input.source
});

/** Terminal result for a trial whose remote execution did not succeed. */
export const resultFromFailedOutcome = (
  input: ResultIdentity & { outcome: Exclude<ExecutionOutcome, { status: "SUCCESS" }> }
): TrialResult =>
  Object.freeze({
    ...identity(input),
    runtime_s: null,
    energy_j: null,
    power_w: null,
    status: input.outcome.status,
    status_token: null
  });

export const resultFromRecord = (
  input: ResultIdentity & { record: ParsedResultRecord; powerW?: number | null }
): TrialResult => {
  const success = input.record.status === "SUCCESS";
  return Object.freeze({
    ...identity(input),
    runtime_s: success ? input.record.runtime_s : null,
    energy_j: success ? input.record.energy_j : null,
    power_w: success ? (input.powerW ?? null) : null,
    status: input.record.status,
    status_token: input.record.status_token
  });
};
