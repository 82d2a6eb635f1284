import type { TrialResult, TrialSpec } from "../core/types.js";

/**
 * Everything a hook learns about the trial in flight. Versioned so that
 * persisted contexts stay readable when fields are added.
 */
export type TrialContext = Readonly<{
  version: 1;
  spec: TrialSpec;
  /** 1-based position in the plan; equals `spec.sequence_number`. */
  runNumber: number;
  /** Local directory reserved for this trial's retrieved artifacts. */
  runDir: string;
}>;

export const createTrialContext = (spec: TrialSpec, runDir: string): TrialContext =>
  Object.freeze({
    version: 1,
    spec,
    runNumber: spec.sequence_number,
    runDir
  });

/**
 * Hooks invoked by the experiment driver. For each trial the order is
 * beforeRun, startRun, startMeasurement, interact, stopMeasurement, stopRun,
 * populateRunData; beforeExperiment and afterExperiment bracket the whole plan.
 */
export interface ExperimentHooks {
  beforeExperiment(): Promise<void> | void;
  beforeRun(): Promise<void> | void;
  startRun(context: TrialContext): Promise<void> | void;
  startMeasurement(context: TrialContext): Promise<void> | void;
  interact(context: TrialContext): Promise<void> | void;
  stopMeasurement(context: TrialContext): Promise<void> | void;
  stopRun(context: TrialContext): Promise<void> | void;
  populateRunData(context: TrialContext): Promise<TrialResult | null> | TrialResult | null;
  afterExperiment(): Promise<void> | void;
}
