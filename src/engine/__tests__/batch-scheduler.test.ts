import { PassThrough } from "node:stream";

import { describe, expect, it } from "vitest";

import { CancelledError, ConfigurationError } from "../../core/errors.js";
import {
  BatchScheduler,
  batchNumberFor,
  countBatches,
  shouldPauseBefore
} from "../batch-scheduler.js";
import {
  ManualGate,
  createAutoConfirmGate,
  createConsoleGate,
  formatPausePrompt,
  type BatchPause
} from "../operator-gate.js";

// --- Helpers ---

const runTrial = async (scheduler: BatchScheduler): Promise<number> => {
  await scheduler.beforeTrial();
  return scheduler.trialStarted();
};

describe("shouldPauseBefore", () => {
  it("pauses before trials N+1, 2N+1, ... and never before the first", () => {
    const pauses = Array.from({ length: 10 }, (_, i) => i + 1).filter((seq) =>
      shouldPauseBefore(seq, 3)
    );
    expect(pauses).toEqual([4, 7, 10]);
  });

  it("pauses before every trial after the first with a batch size of one", () => {
    expect([1, 2, 3].map((seq) => shouldPauseBefore(seq, 1))).toEqual([false, true, true]);
  });

  it("rejects a batch size below one", () => {
    expect(() => shouldPauseBefore(2, 0)).toThrow(ConfigurationError);
  });
});

describe("batch numbering", () => {
  it("assigns trials to 1-based batches", () => {
    expect([1, 6, 7, 12, 13].map((seq) => batchNumberFor(seq, 6))).toEqual([1, 1, 2, 2, 3]);
  });

  it("counts a partial final batch", () => {
    expect(countBatches(13, 6)).toBe(3);
    expect(countBatches(0, 6)).toBe(0);
  });
});

describe("BatchScheduler", () => {
  it("runs a full batch without consulting the gate", async () => {
    const gate = new ManualGate();
    const scheduler = new BatchScheduler({ batchSize: 2, gate });

    expect(await runTrial(scheduler)).toBe(1);
    expect(await runTrial(scheduler)).toBe(1);
    expect(gate.pauses).toEqual([]);
  });

  it("blocks before the next batch until the operator confirms", async () => {
    const gate = new ManualGate();
    const seen: BatchPause[] = [];
    const scheduler = new BatchScheduler({
      batchSize: 2,
      gate,
      onPause: (pause) => seen.push(pause)
    });
    await runTrial(scheduler);
    await runTrial(scheduler);

    const next = scheduler.beforeTrial();
    const pause = await gate.whenWaiting();
    expect(pause).toEqual({ completedBatch: 1, trialsInBatch: 2, nextBatch: 2 });
    expect(seen).toEqual([pause]);
    expect(gate.waiting).toBe(true);

    expect(gate.confirm()).toBe(true);
    expect(await next).toBe(2);
    expect(scheduler.trialsInCurrentBatch).toBe(0);
    expect(scheduler.trialStarted()).toBe(2);
  });

  it("surfaces an operator cancel as CancelledError", async () => {
    const gate = new ManualGate();
    const scheduler = new BatchScheduler({ batchSize: 1, gate });
    await runTrial(scheduler);

    const next = scheduler.beforeTrial();
    await gate.whenWaiting();
    gate.cancel("stop now");

    await expect(next).rejects.toBeInstanceOf(CancelledError);
    await expect(next).rejects.toThrow("stop now");
    expect(scheduler.currentBatch).toBe(1);
  });

  it("cancels a pending pause when the signal aborts", async () => {
    const gate = new ManualGate();
    const controller = new AbortController();
    const scheduler = new BatchScheduler({ batchSize: 1, gate, signal: controller.signal });
    await runTrial(scheduler);

    const next = scheduler.beforeTrial();
    await gate.whenWaiting();
    controller.abort();

    await expect(next).rejects.toBeInstanceOf(CancelledError);
    expect(gate.waiting).toBe(false);
  });

  it("rejects a batch size below one at construction", () => {
    expect(() => new BatchScheduler({ batchSize: 0, gate: new ManualGate() })).toThrow(
      "batch size must be an integer >= 1, got 0"
    );
  });
});

describe("operator gates", () => {
  it("auto-confirm reports each pause", async () => {
    const pauses: BatchPause[] = [];
    const gate = createAutoConfirmGate((pause) => pauses.push(pause));
    await gate.waitForConfirmation({ completedBatch: 3, trialsInBatch: 6, nextBatch: 4 });
    expect(pauses).toEqual([{ completedBatch: 3, trialsInBatch: 6, nextBatch: 4 }]);
  });

  it("auto-confirm refuses to continue once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const gate = createAutoConfirmGate();
    const pause = { completedBatch: 1, trialsInBatch: 1, nextBatch: 2 };
    await expect(gate.waitForConfirmation(pause, controller.signal)).rejects.toBeInstanceOf(
      CancelledError
    );
  });

  it("console gate resumes on ENTER", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const gate = createConsoleGate({ input, output });
    const pause = { completedBatch: 1, trialsInBatch: 6, nextBatch: 2 };

    const waiting = gate.waitForConfirmation(pause);
    input.write("\n");
    await waiting;

    expect(output.read()?.toString()).toBe(formatPausePrompt(pause));
  });

  it("console gate cancels when input closes", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const gate = createConsoleGate({ input, output });

    const waiting = gate.waitForConfirmation({ completedBatch: 2, trialsInBatch: 6, nextBatch: 3 });
    input.end();

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
  });

  it("formats the pause prompt", () => {
    expect(formatPausePrompt({ completedBatch: 2, trialsInBatch: 6, nextBatch: 3 })).toBe(
      "Batch 2 complete (6 runs). Press ENTER to start batch 3, Ctrl-C to stop: "
    );
  });
});
