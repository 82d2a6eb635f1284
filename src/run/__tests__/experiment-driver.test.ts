import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CancelledError, ConfigurationError } from "../../core/errors.js";
import type { TrialResult } from "../../core/types.js";
import { EventBus } from "../../events/event-bus.js";
import type { EventPayloadMap, EventType } from "../../events/types.js";
import { generateTrialPlan } from "../../planning/planner.js";
import { runExperiment } from "../experiment-driver.js";
import type { ExperimentHooks, TrialContext } from "../lifecycle-hooks.js";

// --- Helpers ---

const { plan, planSha256 } = generateTrialPlan(
  [
    { name: "gc", levels: ["Serial", "G1"] },
    { name: "workload", levels: ["Light", "Heavy"] }
  ],
  [{ gc: ["G1"], workload: ["Heavy"] }],
  1
);

const collect = <T extends EventType>(bus: EventBus, type: T): Array<EventPayloadMap[T]> => {
  const payloads: Array<EventPayloadMap[T]> = [];
  bus.subscribe(type, (payload) => {
    payloads.push(payload);
  });
  return payloads;
};

const successFor = (context: TrialContext): TrialResult => ({
  sequence_number: context.spec.sequence_number,
  repetition: context.spec.repetition,
  levels: context.spec.levels,
  runtime_s: context.runNumber,
  energy_j: context.runNumber * 10,
  power_w: null,
  status: "SUCCESS",
  status_token: "SUCCESS",
  batch_number: 1,
  measurement_source: "synthetic"
});

class RecordingHooks implements ExperimentHooks {
  readonly calls: string[] = [];
  failOn?: { hook: string; run: number; error: Error };
  private current = 0;

  /** Hooks without a context belong to the trial after the last one seen. */
  private record(hook: string, context?: TrialContext): void {
    const run = context?.runNumber ?? this.current + 1;
    this.current = context?.runNumber ?? this.current;
    this.calls.push(context ? `${hook}:${context.runNumber}` : hook);
    if (this.failOn?.hook === hook && this.failOn.run === run) {
      throw this.failOn.error;
    }
  }

  beforeExperiment(): void {
    this.record("beforeExperiment");
  }
  beforeRun(): void {
    this.record("beforeRun");
  }
  startRun(context: TrialContext): void {
    this.record("startRun", context);
  }
  startMeasurement(context: TrialContext): void {
    this.record("startMeasurement", context);
  }
  interact(context: TrialContext): void {
    this.record("interact", context);
  }
  stopMeasurement(context: TrialContext): void {
    this.record("stopMeasurement", context);
  }
  stopRun(context: TrialContext): void {
    this.record("stopRun", context);
  }
  populateRunData(context: TrialContext): TrialResult {
    this.record("populateRunData", context);
    return successFor(context);
  }
  afterExperiment(): void {
    this.record("afterExperiment");
  }
}

describe("runExperiment", () => {
  let resultsDir: string;

  beforeEach(() => {
    resultsDir = mkdtempSync(join(tmpdir(), "gclab-driver-"));
  });

  afterEach(() => {
    rmSync(resultsDir, { recursive: true, force: true });
  });

  const baseOptions = (hooks: ExperimentHooks, bus: EventBus) => ({
    runId: "driver-test",
    mode: "mock" as const,
    plan,
    planSha256,
    batchSize: 2,
    seed: 42,
    hooks,
    bus,
    resultsDir,
    now: () => new Date("2024-03-01T12:00:00.000Z")
  });

  it("calls the hooks in their fixed order for every trial", async () => {
    const hooks = new RecordingHooks();
    await runExperiment(baseOptions(hooks, new EventBus()));

    const perTrial = (run: number) => [
      "beforeRun",
      `startRun:${run}`,
      `startMeasurement:${run}`,
      `interact:${run}`,
      `stopMeasurement:${run}`,
      `stopRun:${run}`,
      `populateRunData:${run}`
    ];
    expect(hooks.calls).toEqual([
      "beforeExperiment",
      ...perTrial(1),
      ...perTrial(2),
      ...perTrial(3),
      "afterExperiment"
    ]);
  });

  it("hands each trial its own artifact directory", async () => {
    const contexts: TrialContext[] = [];
    const hooks = new RecordingHooks();
    const original = hooks.startRun.bind(hooks);
    hooks.startRun = (context) => {
      contexts.push(context);
      original(context);
    };

    await runExperiment(baseOptions(hooks, new EventBus()));

    expect(contexts.map((context) => context.runDir)).toEqual([
      join(resultsDir, "run_1"),
      join(resultsDir, "run_2"),
      join(resultsDir, "run_3")
    ]);
    expect(contexts.every((context) => context.version === 1)).toBe(true);
  });

  it("announces the plan and reports every result", async () => {
    const bus = new EventBus();
    const started = collect(bus, "run.started");
    const planned = collect(bus, "trial.planned");
    const completed = collect(bus, "trial.completed");
    const finished = collect(bus, "run.completed");

    const result = await runExperiment(baseOptions(new RecordingHooks(), bus));

    expect(started).toEqual([
      {
        run_id: "driver-test",
        started_at: "2024-03-01T12:00:00.000Z",
        mode: "mock",
        plan_sha256: planSha256,
        k_planned: 3,
        batch_size: 2,
        seed: 42
      }
    ]);
    expect(planned.map((payload) => payload.batch_number)).toEqual([1, 1, 2]);
    expect(completed.map((payload) => payload.result.sequence_number)).toEqual([1, 2, 3]);
    expect(finished).toEqual([
      {
        run_id: "driver-test",
        completed_at: "2024-03-01T12:00:00.000Z",
        stop_reason: "completed",
        k_attempted: 3,
        k_succeeded: 3
      }
    ]);
    expect(result.stopReason).toBe("completed");
    expect(result.results.map((entry) => entry.energy_j)).toEqual([10, 20, 30]);
  });

  it("records a cancel, runs afterExperiment and rethrows", async () => {
    const bus = new EventBus();
    const finished = collect(bus, "run.completed");
    const hooks = new RecordingHooks();
    hooks.failOn = { hook: "beforeRun", run: 2, error: new CancelledError() };

    await expect(runExperiment(baseOptions(hooks, bus))).rejects.toBeInstanceOf(CancelledError);

    expect(hooks.calls.at(-1)).toBe("afterExperiment");
    expect(hooks.calls.filter((call) => call.startsWith("interact"))).toEqual(["interact:1"]);
    expect(finished).toHaveLength(1);
    expect(finished[0]).toMatchObject({ stop_reason: "user_interrupt", k_attempted: 1 });
  });

  it("stops before the next trial once the signal aborts", async () => {
    const bus = new EventBus();
    const controller = new AbortController();
    bus.subscribe("trial.completed", (payload) => {
      if (payload.result.sequence_number === 1) {
        controller.abort();
      }
    });

    const result = await runExperiment({
      ...baseOptions(new RecordingHooks(), bus),
      signal: controller.signal
    });

    expect(result.stopReason).toBe("user_interrupt");
    expect(result.results.map((entry) => entry.sequence_number)).toEqual([1]);
  });

  it("interrupts a cooldown when the signal aborts", async () => {
    const bus = new EventBus();
    const controller = new AbortController();
    bus.subscribe("trial.completed", () => {
      setTimeout(() => controller.abort(), 5);
    });

    const result = await runExperiment({
      ...baseOptions(new RecordingHooks(), bus),
      cooldownMs: 60_000,
      signal: controller.signal
    });

    expect(result.stopReason).toBe("user_interrupt");
    expect(result.results).toHaveLength(1);
  });

  it("keeps the original failure when afterExperiment also fails", async () => {
    const bus = new EventBus();
    const warnings = collect(bus, "warning.raised");
    const hooks = new RecordingHooks();
    hooks.failOn = { hook: "interact", run: 1, error: new Error("ssh vanished") };
    hooks.afterExperiment = () => {
      throw new Error("cleanup failed");
    };

    await expect(runExperiment(baseOptions(hooks, bus))).rejects.toThrow("ssh vanished");

    expect(warnings).toEqual([
      {
        message: "afterExperiment failed: cleanup failed",
        source: "lifecycle",
        recorded_at: "2024-03-01T12:00:00.000Z"
      }
    ]);
  });

  it("reports other failures as run.failed", async () => {
    const bus = new EventBus();
    const failed = collect(bus, "run.failed");
    const hooks = new RecordingHooks();
    hooks.failOn = {
      hook: "interact",
      run: 2,
      error: new ConfigurationError("bad level")
    };

    await expect(runExperiment(baseOptions(hooks, bus))).rejects.toThrow("bad level");

    expect(hooks.calls.slice(-2)).toEqual(["interact:2", "afterExperiment"]);
    expect(failed).toEqual([
      {
        run_id: "driver-test",
        completed_at: "2024-03-01T12:00:00.000Z",
        error: "bad level",
        error_code: "CONFIGURATION_ERROR"
      }
    ]);
  });
});
