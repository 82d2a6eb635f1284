import { setTimeout as delay } from "node:timers/promises";

import { GcLabError, errorMessage, isCancelled } from "../core/errors.js";
import type { RunMode, TrialResult, TrialSpec } from "../core/types.js";
import { trialResultDir } from "../artifacts/run-dir.js";
import { batchNumberFor } from "../engine/batch-scheduler.js";
import type { EventBus } from "../events/event-bus.js";
import type { StopReason } from "../events/types.js";
import { createTrialContext, type ExperimentHooks } from "./lifecycle-hooks.js";

export type RunExperimentOptions = {
  runId: string;
  mode: RunMode;
  plan: ReadonlyArray<TrialSpec>;
  planSha256: string;
  batchSize: number;
  seed: number;
  hooks: ExperimentHooks;
  bus: EventBus;
  /** Parent of the per-trial artifact directories. */
  resultsDir: string;
  /** Pause between consecutive trials. */
  cooldownMs?: number;
  /** Aborting stops the run before the next trial starts. */
  signal?: AbortSignal;
  now?: () => Date;
};

export type ExperimentRunResult = {
  runId: string;
  stopReason: StopReason;
  results: TrialResult[];
};

/** Resolves false when `signal` aborts first. */
const cooldown = async (ms: number, signal?: AbortSignal): Promise<boolean> => {
  if (ms <= 0) {
    return !signal?.aborted;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
};

/**
 * Walks the plan strictly in order, one trial at a time, calling the hooks
 * in their fixed sequence. A CancelledError from any hook stops the plan
 * and is rethrown after the stop has been recorded.
 */
export const runExperiment = async (
  options: RunExperimentOptions
): Promise<ExperimentRunResult> => {
  const { bus, hooks, plan } = options;
  const now = options.now ?? (() => new Date());
  const results: TrialResult[] = [];
  let stopReason: StopReason = "completed";

  bus.emit({
    type: "run.started",
    payload: {
      run_id: options.runId,
      started_at: now().toISOString(),
      mode: options.mode,
      plan_sha256: options.planSha256,
      k_planned: plan.length,
      batch_size: options.batchSize,
      seed: options.seed
    }
  });
  plan.forEach((spec) => {
    bus.emit({
      type: "trial.planned",
      payload: { spec, batch_number: batchNumberFor(spec.sequence_number, options.batchSize) }
    });
  });

  const finish = async (reason: StopReason): Promise<void> => {
    bus.emit({
      type: "run.completed",
      payload: {
        run_id: options.runId,
        completed_at: now().toISOString(),
        stop_reason: reason,
        k_attempted: results.length,
        k_succeeded: results.filter((result) => result.status === "SUCCESS").length
      }
    });
    await bus.flush();
  };

  let closed = false;
  const closeExperiment = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;
    await hooks.afterExperiment();
  };

  /** A failing afterExperiment on an error path becomes a warning; the original error stands. */
  const closeAfterError = async (): Promise<void> => {
    try {
      await closeExperiment();
    } catch (closeError) {
      bus.emit({
        type: "warning.raised",
        payload: {
          message: `afterExperiment failed: ${errorMessage(closeError)}`,
          source: "lifecycle",
          recorded_at: now().toISOString()
        }
      });
    }
  };

  try {
    await hooks.beforeExperiment();

    for (const [index, spec] of plan.entries()) {
      const proceed =
        index === 0
          ? !options.signal?.aborted
          : await cooldown(options.cooldownMs ?? 0, options.signal);
      if (!proceed) {
        stopReason = "user_interrupt";
        break;
      }

      await hooks.beforeRun();
      const context = createTrialContext(
        spec,
        trialResultDir(options.resultsDir, spec.sequence_number)
      );
      await hooks.startRun(context);
      await hooks.startMeasurement(context);
      await hooks.interact(context);
      await hooks.stopMeasurement(context);
      await hooks.stopRun(context);
      const result = await hooks.populateRunData(context);
      if (result) {
        results.push(result);
        bus.emit({ type: "trial.completed", payload: { result } });
      }
    }

    await closeExperiment();
  } catch (error) {
    await closeAfterError();
    if (isCancelled(error)) {
      await finish("user_interrupt");
      throw error;
    }
    bus.emit({
      type: "run.failed",
      payload: {
        run_id: options.runId,
        completed_at: now().toISOString(),
        error: errorMessage(error),
        ...(error instanceof GcLabError ? { error_code: error.code } : {})
      }
    });
    await bus.flush();
    throw error;
  }

  await finish(stopReason);
  return { runId: options.runId, stopReason, results };
};
