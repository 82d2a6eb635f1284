import { createWriteStream } from "node:fs";

import type { EventBus } from "../events/event-bus.js";
import type { TrialResult } from "../core/types.js";

const formatLevels = (levels: Readonly<Record<string, string>>): string =>
  Object.entries(levels)
    .map(([name, level]) => `${name}=${level}`)
    .join(" ");

const formatMeasurement = (result: TrialResult): string => {
  if (result.status !== "SUCCESS") {
    return result.status_token ? `${result.status} (${result.status_token})` : result.status;
  }
  const parts = [
    `runtime=${result.runtime_s ?? "n/a"}s`,
    `energy=${result.energy_j ?? "n/a"}J`
  ];
  if (result.power_w !== null) {
    parts.push(`power=${result.power_w}W`);
  }
  return `SUCCESS ${parts.join(" ")}`;
};

/** Appends one timestamped line per run event to `execution.log`. */
export class ExecutionLogger {
  private stream: ReturnType<typeof createWriteStream> | null;
  private unsubs: Array<() => void> = [];

  constructor(logPath: string) {
    this.stream = createWriteStream(logPath, { flags: "a" });
  }

  private append(line: string): void {
    if (!this.stream) {
      return;
    }
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  attach(bus: EventBus): void {
    const onError = (eventType: string, error: unknown): void => {
      const message = error instanceof Error ? error.message : String(error);
      this.append(`Execution log subscriber error (${eventType}): ${message}`);
    };

    this.unsubs.push(
      bus.subscribeSafe(
        "run.started",
        (payload) => {
          this.append(`Run started: ${payload.run_id} (${payload.mode})`);
          this.append(
            `Plan ${payload.plan_sha256.slice(0, 12)} | trials ${payload.k_planned} | batch ${payload.batch_size} | seed ${payload.seed}`
          );
        },
        (error) => onError("run.started", error)
      ),
      bus.subscribeSafe(
        "batch.started",
        (payload) => {
          this.append(
            `Batch ${payload.batch_number} started at run ${payload.first_sequence_number}`
          );
        },
        (error) => onError("batch.started", error)
      ),
      bus.subscribeSafe(
        "batch.paused",
        (payload) => {
          this.append(
            `Batch ${payload.completed_batch} complete: ${payload.trials_in_batch} runs, waiting for operator`
          );
        },
        (error) => onError("batch.paused", error)
      ),
      bus.subscribeSafe(
        "trial.started",
        (payload) => {
          const suffix = payload.command ? ` :: ${payload.command}` : "";
          this.append(
            `Run ${payload.spec.sequence_number} rep ${payload.spec.repetition} ${formatLevels(payload.spec.levels)}${suffix}`
          );
        },
        (error) => onError("trial.started", error)
      ),
      bus.subscribeSafe(
        "artifact.retrieved",
        (payload) => {
          const missing = Object.entries(payload.files)
            .filter(([, ok]) => !ok)
            .map(([file]) => file);
          if (missing.length > 0) {
            this.append(`Run ${payload.sequence_number} missing artifacts: ${missing.join(", ")}`);
          }
        },
        (error) => onError("artifact.retrieved", error)
      ),
      bus.subscribeSafe(
        "trial.completed",
        (payload) => {
          this.append(
            `Run ${payload.result.sequence_number} ${formatMeasurement(payload.result)}`
          );
        },
        (error) => onError("trial.completed", error)
      ),
      bus.subscribeSafe(
        "warning.raised",
        (payload) => {
          const source = payload.source ? `[${payload.source}] ` : "";
          this.append(`Warning: ${source}${payload.message}`);
        },
        (error) => onError("warning.raised", error)
      ),
      bus.subscribeSafe(
        "run.completed",
        (payload) => {
          this.append(
            `Run completed: ${payload.run_id} (${payload.stop_reason}) ${payload.k_succeeded}/${payload.k_attempted} succeeded`
          );
        },
        (error) => onError("run.completed", error)
      ),
      bus.subscribeSafe(
        "run.failed",
        (payload) => {
          const code = payload.error_code ? ` [${payload.error_code}]` : "";
          this.append(`Run failed: ${payload.run_id}${code} (${payload.error})`);
        },
        (error) => onError("run.failed", error)
      )
    );
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      return;
    }
    this.stream = null;
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  detach(): void {
    this.unsubs.forEach((unsubscribe) => unsubscribe());
    this.unsubs = [];
  }
}
