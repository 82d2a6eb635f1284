import { resolve } from "node:path";

import type { TrialResult, TrialSpec, TrialStatus } from "../core/types.js";
import type { GcLabResolvedConfig } from "../config/types.js";
import type { EventBus } from "../events/event-bus.js";
import type {
  ArtifactWrittenPayload,
  RunCompletedPayload,
  RunFailedPayload,
  RunStartedPayload,
  StopReason,
  TrialCompletedPayload,
  TrialPlannedPayload
} from "../events/types.js";
import { createJsonlWriter, writeJsonAtomic, writeTextAtomic, type JsonlWriter } from "./io.js";
import { formatRunTable } from "./run-table.js";

export type RunManifest = {
  run_id: string;
  experiment: string;
  mode: RunStartedPayload["mode"] | null;
  started_at: string | null;
  completed_at: string | null;
  stop_reason: StopReason | "error" | null;
  error: { message: string; code?: string } | null;
  plan_sha256: string;
  config_sha256: string;
  seed: number;
  batch_size: number;
  k_planned: number;
  k_attempted: number;
  status_counts: Record<TrialStatus, number>;
  artifacts: string[];
  trials: Array<{ spec: TrialSpec; result: TrialResult | null }>;
};

export interface ArtifactWriterOptions {
  runDir: string;
  runId: string;
  resolvedConfig: GcLabResolvedConfig;
  configSha256: string;
  plan: ReadonlyArray<TrialSpec>;
  planSha256: string;
}

const emptyStatusCounts = (): Record<TrialStatus, number> => ({
  SUCCESS: 0,
  FAILED: 0,
  TIMEOUT: 0,
  MISSING: 0
});

export const MANIFEST_FILENAME = "manifest.json";
export const PLAN_FILENAME = "plan.jsonl";
export const TRIALS_FILENAME = "trials.jsonl";
export const RUN_TABLE_FILENAME = "run_table.csv";

/**
 * Persists a run from its events: plan and results as JSON Lines while the
 * run progresses, then a manifest listing every planned trial exactly once.
 */
export class ArtifactWriter {
  private readonly runDir: string;
  private readonly resolvedConfig: GcLabResolvedConfig;
  private readonly plan: ReadonlyArray<TrialSpec>;
  private readonly planWriter: JsonlWriter;
  private readonly trialsWriter: JsonlWriter;
  private readonly results = new Map<number, TrialResult>();
  private readonly extraArtifacts = new Set<string>();
  private readonly unsubs: Array<() => void> = [];
  private manifest: RunManifest;
  private closed = false;

  constructor(options: ArtifactWriterOptions) {
    this.runDir = options.runDir;
    this.resolvedConfig = options.resolvedConfig;
    this.plan = options.plan;
    this.planWriter = createJsonlWriter(resolve(this.runDir, PLAN_FILENAME));
    this.trialsWriter = createJsonlWriter(resolve(this.runDir, TRIALS_FILENAME));
    this.manifest = {
      run_id: options.runId,
      experiment: options.resolvedConfig.experiment.name,
      mode: null,
      started_at: null,
      completed_at: null,
      stop_reason: null,
      error: null,
      plan_sha256: options.planSha256,
      config_sha256: options.configSha256,
      seed: options.resolvedConfig.experiment.seed,
      batch_size: options.resolvedConfig.experiment.batch_size,
      k_planned: options.plan.length,
      k_attempted: 0,
      status_counts: emptyStatusCounts(),
      artifacts: [],
      trials: []
    };
  }

  get manifestPath(): string {
    return resolve(this.runDir, MANIFEST_FILENAME);
  }

  attach(bus: EventBus): void {
    this.unsubs.push(
      bus.subscribeSafe(
        "run.started",
        (payload) => this.onRunStarted(payload),
        (error) => this.onSubscriberError(bus, "run.started", error)
      ),
      bus.subscribeSafe(
        "trial.planned",
        (payload) => this.onTrialPlanned(payload),
        (error) => this.onSubscriberError(bus, "trial.planned", error)
      ),
      bus.subscribeSafe(
        "trial.completed",
        (payload) => this.onTrialCompleted(payload),
        (error) => this.onSubscriberError(bus, "trial.completed", error)
      ),
      bus.subscribeSafe(
        "artifact.written",
        (payload) => this.onArtifactWritten(payload),
        (error) => this.onSubscriberError(bus, "artifact.written", error)
      ),
      bus.subscribeSafe(
        "run.completed",
        (payload) => this.onRunCompleted(payload),
        (error) => this.onSubscriberError(bus, "run.completed", error)
      ),
      bus.subscribeSafe(
        "run.failed",
        (payload) => this.onRunFailed(payload),
        (error) => this.onSubscriberError(bus, "run.failed", error)
      )
    );
  }

  private onSubscriberError(bus: EventBus, eventType: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    bus.emit({
      type: "warning.raised",
      payload: {
        message: `ArtifactWriter handler failed for ${eventType}: ${message}`,
        source: "artifacts",
        recorded_at: new Date().toISOString()
      }
    });
  }

  detach(): void {
    this.unsubs.splice(0).forEach((unsub) => unsub());
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await Promise.all([this.planWriter.close(), this.trialsWriter.close()]);
  }

  getManifest(): RunManifest {
    return this.manifest;
  }

  private onRunStarted(payload: RunStartedPayload): void {
    writeJsonAtomic(resolve(this.runDir, "config.resolved.json"), this.resolvedConfig);
    this.manifest = {
      ...this.manifest,
      mode: payload.mode,
      started_at: payload.started_at
    };
    this.writeManifest();
  }

  private onTrialPlanned(payload: TrialPlannedPayload): void {
    this.planWriter.append({ ...payload.spec, batch_number: payload.batch_number });
  }

  private onTrialCompleted(payload: TrialCompletedPayload): void {
    const { result } = payload;
    if (this.results.has(result.sequence_number)) {
      throw new Error(`Trial ${result.sequence_number} already has a recorded result`);
    }
    this.results.set(result.sequence_number, result);
    this.trialsWriter.append(result);
  }

  private onArtifactWritten(payload: ArtifactWrittenPayload): void {
    this.extraArtifacts.add(payload.path);
  }

  private onRunCompleted(payload: RunCompletedPayload): void {
    this.finalize({
      completed_at: payload.completed_at,
      stop_reason: payload.stop_reason,
      error: null
    });
  }

  private onRunFailed(payload: RunFailedPayload): void {
    this.finalize({
      completed_at: payload.completed_at,
      stop_reason: "error",
      error: { message: payload.error, ...(payload.error_code ? { code: payload.error_code } : {}) }
    });
  }

  private finalize(outcome: Pick<RunManifest, "completed_at" | "stop_reason" | "error">): void {
    const statusCounts = emptyStatusCounts();
    for (const result of this.results.values()) {
      statusCounts[result.status] += 1;
    }

    const trials = this.plan.map((spec) => ({
      spec,
      result: this.results.get(spec.sequence_number) ?? null
    }));
    const factorNames = this.resolvedConfig.factors.map((factor) => factor.name);
    writeTextAtomic(resolve(this.runDir, RUN_TABLE_FILENAME), formatRunTable(factorNames, trials));

    this.manifest = {
      ...this.manifest,
      ...outcome,
      k_attempted: this.results.size,
      status_counts: statusCounts,
      artifacts: [
        PLAN_FILENAME,
        TRIALS_FILENAME,
        RUN_TABLE_FILENAME,
        "config.resolved.json",
        ...Array.from(this.extraArtifacts)
      ],
      trials
    };
    this.writeManifest();
  }

  private writeManifest(): void {
    writeJsonAtomic(this.manifestPath, this.manifest);
  }
}
