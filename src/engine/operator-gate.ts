import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";

import { CancelledError } from "../core/errors.js";

export type BatchPause = {
  completedBatch: number;
  trialsInBatch: number;
  nextBatch: number;
};

export interface OperatorGate {
  /** Resolves on operator confirmation; rejects with CancelledError on interrupt. */
  waitForConfirmation(pause: BatchPause, signal?: AbortSignal): Promise<void>;
}

export const formatPausePrompt = (pause: BatchPause): string =>
  `Batch ${pause.completedBatch} complete (${pause.trialsInBatch} runs). ` +
  `Press ENTER to start batch ${pause.nextBatch}, Ctrl-C to stop: `;

export const createConsoleGate = (
  streams: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } = {
    input: stdin,
    output: stdout
  }
): OperatorGate => ({
  waitForConfirmation: async (pause, signal) => {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const rl = createInterface({ input: streams.input, output: streams.output, terminal: false });
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    signal?.addEventListener("abort", abort, { once: true });
    rl.once("SIGINT", abort);
    rl.once("close", abort);

    try {
      await rl.question(formatPausePrompt(pause), { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new CancelledError("Experiment stopped by operator during batch pause");
      }
      throw error;
    } finally {
      signal?.removeEventListener("abort", abort);
      rl.off("close", abort);
      rl.close();
    }
  }
});

export const createAutoConfirmGate = (onPause?: (pause: BatchPause) => void): OperatorGate => ({
  waitForConfirmation: async (pause, signal) => {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    onPause?.(pause);
  }
});

type PendingConfirmation = {
  pause: BatchPause;
  resolve: () => void;
  reject: (error: Error) => void;
};

/** Gate driven by explicit confirm/cancel calls; used by tests and embedding callers. */
export class ManualGate implements OperatorGate {
  private pending: PendingConfirmation | null = null;
  private readonly waiters: Array<(pause: BatchPause) => void> = [];
  readonly pauses: BatchPause[] = [];

  waitForConfirmation(pause: BatchPause, signal?: AbortSignal): Promise<void> {
    if (this.pending) {
      return Promise.reject(new Error("ManualGate is already waiting for confirmation"));
    }
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    this.pauses.push(pause);
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.cancel();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.pending = {
        pause,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        }
      };
      this.waiters.splice(0).forEach((notify) => notify(pause));
    });
  }

  get waiting(): boolean {
    return this.pending !== null;
  }

  /** Resolves once the gate is blocked (immediately if it already is). */
  whenWaiting(): Promise<BatchPause> {
    if (this.pending) {
      return Promise.resolve(this.pending.pause);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  confirm(): boolean {
    const pending = this.pending;
    if (!pending) {
      return false;
    }
    this.pending = null;
    pending.resolve();
    return true;
  }

  cancel(message?: string): boolean {
    const pending = this.pending;
    if (!pending) {
      return false;
    }
    this.pending = null;
    pending.reject(new CancelledError(message));
    return true;
  }
}
