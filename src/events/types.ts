import type { RunMode, TrialResult, TrialSpec } from "../core/types.js";
import type { RetrievalReport } from "../remote/artifact-retrieval.js";

export type RunStartedPayload = {
  run_id: string;
  started_at: string;
  mode: RunMode;
  plan_sha256: string;
  k_planned: number;
  batch_size: number;
  seed: number;
};

export type StopReason = "completed" | "user_interrupt";

export type RunCompletedPayload = {
  run_id: string;
  completed_at: string;
  stop_reason: StopReason;
  k_attempted: number;
  k_succeeded: number;
};

export type RunFailedPayload = {
  run_id: string;
  completed_at: string;
  error: string;
  error_code?: string;
};

export type TrialPlannedPayload = {
  spec: TrialSpec;
  batch_number: number;
};

export type BatchStartedPayload = {
  batch_number: number;
  first_sequence_number: number;
};

export type BatchPausedPayload = {
  completed_batch: number;
  trials_in_batch: number;
  next_batch: number;
};

export type TrialStartedPayload = {
  spec: TrialSpec;
  batch_number: number;
  command?: string;
};

export type TrialCompletedPayload = {
  result: TrialResult;
};

export type ArtifactRetrievedPayload = {
  sequence_number: number;
  local_dir: string;
  files: RetrievalReport;
};

export type ArtifactWrittenPayload = {
  path: string;
  record_count?: number;
};

export type WarningRaisedPayload = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type Event =
  | { type: "run.started"; payload: RunStartedPayload }
  | { type: "run.completed"; payload: RunCompletedPayload }
  | { type: "run.failed"; payload: RunFailedPayload }
  | { type: "trial.planned"; payload: TrialPlannedPayload }
  | { type: "batch.started"; payload: BatchStartedPayload }
  | { type: "batch.paused"; payload: BatchPausedPayload }
  | { type: "trial.started"; payload: TrialStartedPayload }
  | { type: "trial.completed"; payload: TrialCompletedPayload }
  | { type: "artifact.retrieved"; payload: ArtifactRetrievedPayload }
  | { type: "artifact.written"; payload: ArtifactWrittenPayload }
  | { type: "warning.raised"; payload: WarningRaisedPayload };

export type EventType = Event["type"];

export type EventPayloadMap = {
  [K in EventType]: Extract<Event, { type: K }>["payload"];
};
