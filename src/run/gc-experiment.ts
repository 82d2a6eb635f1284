import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import type {
  ExecutionOutcome,
  MeasurementSource,
  RemoteSession,
  RunMode,
  TrialResult
} from "../core/types.js";
import { BatchScheduler } from "../engine/batch-scheduler.js";
import type { OperatorGate } from "../engine/operator-gate.js";
import type { EventBus } from "../events/event-bus.js";
import {
  ENERGY_FILENAME,
  RESULT_FILENAME,
  retrieveArtifacts,
  type RetrievalReport
} from "../remote/artifact-retrieval.js";
import { buildRemoteCommand, type ScriptRouter } from "../remote/command-builder.js";
import { checkConnectivity, executeRemote } from "../remote/remote-client.js";
import type { RemoteTransport } from "../remote/transport.js";
import { formatResultLine, parseResultFile } from "../results/result-parser.js";
import { resultFromFailedOutcome, resultFromRecord } from "../results/trial-result.js";
import type { SyntheticMeasurementModel } from "../simulation/measurement-model.js";
import { formatSyntheticCsv } from "../simulation/synthetic-csv.js";
import type { WarningSink } from "../utils/warnings.js";
import type { ExperimentHooks, TrialContext } from "./lifecycle-hooks.js";

export type GcExperimentOptions = {
  mode: RunMode;
  batchSize: number;
  gate: OperatorGate;
  router: ScriptRouter;
  model: SyntheticMeasurementModel;
  bus: EventBus;
  warningSink: WarningSink;
  /** Required in live mode. */
  session?: RemoteSession | null;
  transport?: RemoteTransport;
  signal?: AbortSignal;
};

type TrialState = {
  batchNumber: number;
  command?: string;
  outcome?: ExecutionOutcome;
  powerW?: number;
  retrieval?: RetrievalReport;
};

/**
 * GC energy experiment expressed as lifecycle hooks. Live mode drives the
 * DUT over the remote transport; mock mode substitutes the synthetic model
 * and writes DUT-format files locally so both paths share one parser.
 */
export class GcExperiment implements ExperimentHooks {
  private readonly mode: RunMode;
  private readonly router: ScriptRouter;
  private readonly model: SyntheticMeasurementModel;
  private readonly bus: EventBus;
  private readonly warningSink: WarningSink;
  private readonly session: RemoteSession | null;
  private readonly transport: RemoteTransport | null;
  private readonly scheduler: BatchScheduler;
  private readonly states = new Map<number, TrialState>();

  constructor(options: GcExperimentOptions) {
    this.mode = options.mode;
    this.router = options.router;
    this.model = options.model;
    this.bus = options.bus;
    this.warningSink = options.warningSink;
    this.session = options.session ?? null;
    this.transport = options.transport ?? null;
    if (this.mode === "live" && (!this.session || !this.transport)) {
      throw new Error("Live mode requires a remote session and a transport");
    }
    this.scheduler = new BatchScheduler({
      batchSize: options.batchSize,
      gate: options.gate,
      signal: options.signal,
      onPause: (pause) =>
        this.bus.emit({
          type: "batch.paused",
          payload: {
            completed_batch: pause.completedBatch,
            trials_in_batch: pause.trialsInBatch,
            next_batch: pause.nextBatch
          }
        })
    });
  }

  get measurementSource(): MeasurementSource {
    return this.mode === "mock" ? "synthetic" : "dut";
  }

  async beforeExperiment(): Promise<void> {
    if (this.mode === "mock") {
      this.warningSink.warn(
        "Mock mode: energy and runtime figures are synthetic, not measured",
        "experiment"
      );
      return;
    }
    const { session, transport } = this.remote();
    const check = await checkConnectivity(session, transport);
    if (!check.ok) {
      this.warningSink.warn(
        `SSH connectivity check to ${session.user}@${session.host} failed: ${check.detail}`,
        "remote"
      );
    }
  }

  async beforeRun(): Promise<void> {
    await this.scheduler.beforeTrial();
  }

  startRun(context: TrialContext): void {
    const sequenceNumber = context.spec.sequence_number;
    if (this.scheduler.trialsInCurrentBatch === 0) {
      this.bus.emit({
        type: "batch.started",
        payload: {
          batch_number: this.scheduler.currentBatch,
          first_sequence_number: sequenceNumber
        }
      });
    }
    const batchNumber = this.scheduler.trialStarted();
    this.states.set(sequenceNumber, { batchNumber });
  }

  startMeasurement(context: TrialContext): void {
    const state = this.stateFor(context);
    if (this.mode === "live") {
      state.command = buildRemoteCommand(context.spec, this.remote().session, this.router);
    }
    this.bus.emit({
      type: "trial.started",
      payload: {
        spec: context.spec,
        batch_number: state.batchNumber,
        ...(state.command ? { command: state.command } : {})
      }
    });
  }

  async interact(context: TrialContext): Promise<void> {
    const state = this.stateFor(context);
    if (this.mode === "mock") {
      state.outcome = this.simulateTrial(context, state);
      return;
    }
    if (!state.command) {
      throw new Error(`Run ${context.runNumber} has no remote command`);
    }
    const { session, transport } = this.remote();
    state.outcome = await executeRemote(session, state.command, transport);
  }

  async stopMeasurement(context: TrialContext): Promise<void> {
    const state = this.stateFor(context);
    if (state.outcome?.status !== "SUCCESS") {
      return;
    }
    if (this.mode === "mock") {
      state.retrieval = { [ENERGY_FILENAME]: true, [RESULT_FILENAME]: true };
    } else {
      const { session, transport } = this.remote();
      state.retrieval = await retrieveArtifacts(
        session,
        context.spec.sequence_number,
        context.runDir,
        transport,
        this.warningSink
      );
    }
    this.bus.emit({
      type: "artifact.retrieved",
      payload: {
        sequence_number: context.spec.sequence_number,
        local_dir: context.runDir,
        files: state.retrieval
      }
    });
  }

  stopRun(context: TrialContext): void {
    const outcome = this.stateFor(context).outcome;
    if (outcome?.status === "FAILED") {
      const detail = outcome.stderrExcerpt.trim();
      this.warningSink.warn(
        `Run ${context.runNumber} exited with code ${outcome.exitCode}${detail ? `: ${detail}` : ""}`,
        "remote"
      );
    } else if (outcome?.status === "TIMEOUT") {
      this.warningSink.warn(
        `Run ${context.runNumber} timed out after ${outcome.elapsedMs}ms; the DUT process may still be running`,
        "remote"
      );
    }
  }

  populateRunData(context: TrialContext): TrialResult | null {
    const state = this.stateFor(context);
    this.states.delete(context.spec.sequence_number);
    const identity = {
      spec: context.spec,
      batchNumber: state.batchNumber,
      source: this.measurementSource
    };

    const outcome = state.outcome;
    if (!outcome) {
      return null;
    }
    if (outcome.status !== "SUCCESS") {
      return resultFromFailedOutcome({ ...identity, outcome });
    }

    const record = parseResultFile(context.runDir);
    if (record.problem) {
      this.warningSink.warn(`Run ${context.runNumber}: ${record.problem}`, "results");
    }
    return resultFromRecord({ ...identity, record, powerW: state.powerW ?? null });
  }

  afterExperiment(): void {
    if (this.states.size > 0) {
      const pending = Array.from(this.states.keys()).join(", ");
      this.warningSink.warn(`Runs left without a result: ${pending}`, "experiment");
      this.states.clear();
    }
  }

  private simulateTrial(context: TrialContext, state: TrialState): ExecutionOutcome {
    const { levels } = context.spec;
    const measurement = this.model.simulate({
      gc: levels.gc ?? "",
      workload: levels.workload ?? "",
      jdk: levels.jdk ?? ""
    });
    state.powerW = measurement.powerWatts;

    mkdirSync(context.runDir, { recursive: true });
    writeFileSync(
      join(context.runDir, ENERGY_FILENAME),
      formatSyntheticCsv({
        energyJoules: measurement.energyJoules,
        executionSeconds: measurement.runtimeSeconds
      }),
      "utf8"
    );
    writeFileSync(
      join(context.runDir, RESULT_FILENAME),
      `${formatResultLine({
        sequenceNumber: context.spec.sequence_number,
        levels,
        repetition: context.spec.repetition,
        runtimeSeconds: measurement.runtimeSeconds,
        energyJoules: measurement.energyJoules,
        statusToken: "SUCCESS"
      })}\n`,
      "utf8"
    );

    return {
      status: "SUCCESS",
      exitCode: 0,
      elapsedMs: Math.round(measurement.runtimeSeconds * 1000)
    };
  }

  private stateFor(context: TrialContext): TrialState {
    const state = this.states.get(context.spec.sequence_number);
    if (!state) {
      throw new Error(`Run ${context.runNumber} was not started`);
    }
    return state;
  }

  private remote(): { session: RemoteSession; transport: RemoteTransport } {
    if (!this.session || !this.transport) {
      throw new Error("No remote session is configured");
    }
    return { session: this.session, transport: this.transport };
  }
}
