import { describe, expect, it } from "vitest";

import type { TrialResult } from "../../core/types.js";
import { EventBus } from "../../events/event-bus.js";
import { attachConsoleReporter, formatResultRow } from "../console-reporter.js";

const result = (overrides: Partial<TrialResult> = {}): TrialResult => ({
  sequence_number: 4,
  repetition: 1,
  levels: { subject: "DaCapo", gc: "G1", workload: "Heavy", jdk: "openjdk" },
  runtime_s: 12.3456,
  energy_j: 410.5,
  power_w: 33.25,
  status: "SUCCESS",
  status_token: "SUCCESS",
  batch_number: 1,
  measurement_source: "dut",
  ...overrides
});

describe("formatResultRow", () => {
  it("shows the measurements of a successful run", () => {
    expect(formatResultRow(result(), 48)).toBe(
      "[4/48] batch 1 DaCapo G1 Heavy openjdk rep 1 -> 12.346 s 410.500 J 33.25 W"
    );
  });

  it("shows the raw status token of a failed run", () => {
    const failed = result({
      status: "FAILED",
      status_token: "FAILED_137",
      runtime_s: null,
      energy_j: null,
      power_w: null
    });
    expect(formatResultRow(failed, 48)).toBe(
      "[4/48] batch 1 DaCapo G1 Heavy openjdk rep 1 -> FAILED_137"
    );
  });
});

describe("attachConsoleReporter", () => {
  it("prints progress until detached", () => {
    const bus = new EventBus();
    const lines: string[] = [];
    const detach = attachConsoleReporter(bus, (line) => lines.push(line));

    bus.emit({
      type: "run.started",
      payload: {
        run_id: "r1",
        started_at: "2024-01-01T00:00:00.000Z",
        mode: "live",
        plan_sha256: "0".repeat(64),
        k_planned: 48,
        batch_size: 6,
        seed: 42
      }
    });
    bus.emit({ type: "batch.started", payload: { batch_number: 1, first_sequence_number: 1 } });
    detach();
    bus.emit({ type: "trial.completed", payload: { result: result() } });

    expect(lines).toEqual(["Run r1 (live): 48 runs, batch size 6", "-- batch 1 --"]);
  });
});
