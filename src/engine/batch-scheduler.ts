import { CancelledError, ConfigurationError, isCancelled } from "../core/errors.js";
import type { BatchPause, OperatorGate } from "./operator-gate.js";

const assertBatchSize = (batchSize: number): void => {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(`batch size must be an integer >= 1, got ${batchSize}`);
  }
};

/** True before trials N+1, 2N+1, ... for batch size N; never before trial 1. */
export const shouldPauseBefore = (sequenceNumber: number, batchSize: number): boolean => {
  assertBatchSize(batchSize);
  return sequenceNumber > 1 && (sequenceNumber - 1) % batchSize === 0;
};

export const batchNumberFor = (sequenceNumber: number, batchSize: number): number => {
  assertBatchSize(batchSize);
  return Math.ceil(sequenceNumber / batchSize);
};

export const countBatches = (trialCount: number, batchSize: number): number => {
  assertBatchSize(batchSize);
  return Math.ceil(trialCount / batchSize);
};

export type BatchSchedulerOptions = {
  batchSize: number;
  gate: OperatorGate;
  signal?: AbortSignal;
  onPause?: (pause: BatchPause) => void;
};

export class BatchScheduler {
  private readonly batchSize: number;
  private readonly gate: OperatorGate;
  private readonly signal?: AbortSignal;
  private readonly onPause?: (pause: BatchPause) => void;
  private trialsInBatch = 0;
  private batchNumber = 1;

  constructor(options: BatchSchedulerOptions) {
    assertBatchSize(options.batchSize);
    this.batchSize = options.batchSize;
    this.gate = options.gate;
    this.signal = options.signal;
    this.onPause = options.onPause;
  }

  get currentBatch(): number {
    return this.batchNumber;
  }

  get trialsInCurrentBatch(): number {
    return this.trialsInBatch;
  }

  /**
   * Blocks for operator confirmation when the current batch is full, then
   * opens the next batch. Returns the batch the upcoming trial belongs to.
   */
  async beforeTrial(): Promise<number> {
    if (this.trialsInBatch >= this.batchSize) {
      await this.awaitOperatorConfirmation();
      this.batchNumber += 1;
      this.trialsInBatch = 0;
    }
    return this.batchNumber;
  }

  trialStarted(): number {
    this.trialsInBatch += 1;
    return this.batchNumber;
  }

  async awaitOperatorConfirmation(): Promise<void> {
    const pause: BatchPause = {
      completedBatch: this.batchNumber,
      trialsInBatch: this.trialsInBatch,
      nextBatch: this.batchNumber + 1
    };
    this.onPause?.(pause);

    try {
      await this.gate.waitForConfirmation(pause, this.signal);
    } catch (error) {
      if (isCancelled(error)) {
        throw error;
      }
      if (this.signal?.aborted) {
        throw new CancelledError();
      }
      throw error;
    }
  }
}
