export type Factor = {
  name: string;
  levels: string[];
};

/** Partial assignment factor → allowed levels. A spec matching every entry is excluded. */
export type ExclusionRule = Record<string, string[]>;

export type FactorAssignment = Readonly<Record<string, string>>;

export type TrialSpec = Readonly<{
  sequence_number: number;
  repetition: number;
  levels: FactorAssignment;
}>;

export type RemoteSession = Readonly<{
  host: string;
  user: string;
  remoteDir: string;
  timeoutMs: number;
  transferTimeoutMs: number;
}>;

export type ExecutionOutcome =
  | { readonly status: "SUCCESS"; readonly exitCode: 0; readonly elapsedMs: number }
  | {
      readonly status: "FAILED";
      readonly exitCode: number;
      readonly stderrExcerpt: string;
      readonly elapsedMs: number;
    }
  | { readonly status: "TIMEOUT"; readonly elapsedMs: number };

export type TrialStatus = "SUCCESS" | "FAILED" | "TIMEOUT" | "MISSING";

export type MeasurementSource = "dut" | "synthetic";

export type TrialResult = Readonly<{
  sequence_number: number;
  repetition: number;
  levels: FactorAssignment;
  runtime_s: number | null;
  energy_j: number | null;
  power_w: number | null;
  status: TrialStatus;
  status_token: string | null;
  batch_number: number;
  measurement_source: MeasurementSource;
}>;

export type RunMode = "mock" | "live";
