import { resolve } from "node:path";

import { ArtifactWriter } from "../artifacts/artifact-writer.js";
import { createRunDir, generateRunId } from "../artifacts/run-dir.js";
import { resolveConfig, type ResolveConfigResult } from "../config/resolve-config.js";
import type { DutEnvironment } from "../config/types.js";
import type { RunMode } from "../core/types.js";
import {
  createAutoConfirmGate,
  createConsoleGate,
  type OperatorGate
} from "../engine/operator-gate.js";
import { EventBus } from "../events/event-bus.js";
import { compileRunPlan, type CompiledRunPlan } from "../planning/compiled-plan.js";
import { createSshTransport, type RemoteTransport } from "../remote/transport.js";
import { SyntheticMeasurementModel } from "../simulation/measurement-model.js";
import { ExecutionLogger } from "../ui/execution-log.js";
import {
  createConsoleWarningSink,
  createEventWarningSink,
  type WarningSink
} from "../utils/warnings.js";
import { runExperiment, type ExperimentRunResult } from "./experiment-driver.js";
import { GcExperiment } from "./gc-experiment.js";

export type RunServiceOptions = {
  configPath?: string;
  rootDir?: string;
  env?: DutEnvironment;
  mode?: RunMode;
  runsDir?: string;
  bus?: EventBus;
  /** Defaults to the console gate in live mode and auto-confirm in mock mode. */
  gate?: OperatorGate;
  transport?: RemoteTransport;
  warningSink?: WarningSink;
  forwardWarningEvents?: boolean;
  /** Install SIGINT/SIGTERM handlers that stop the run after the current trial. */
  handleSignals?: boolean;
  runId?: string;
};

export type RunServiceResult = ExperimentRunResult & {
  runDir: string;
  mode: RunMode;
};

type Shutdown = {
  signal: AbortSignal;
  dispose: () => void;
};

const setupShutdownHandlers = (warningSink: WarningSink, enabled: boolean): Shutdown => {
  const controller = new AbortController();
  if (!enabled) {
    return { signal: controller.signal, dispose: () => undefined };
  }

  const requestShutdown = (signalName: string): void => {
    if (controller.signal.aborted) {
      return;
    }
    warningSink.warn(
      `${signalName} received: finishing the current run, then stopping`,
      "shutdown"
    );
    controller.abort();
  };

  const onSigint = (): void => requestShutdown("SIGINT");
  const onSigterm = (): void => requestShutdown("SIGTERM");
  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener("SIGINT", onSigint);
      process.removeListener("SIGTERM", onSigterm);
    }
  };
};

const registerWarningForwarder = (
  bus: EventBus,
  sink: WarningSink,
  forward: boolean
): (() => void) => {
  if (!forward) {
    return () => undefined;
  }
  return bus.subscribeSafe("warning.raised", (payload) => {
    sink.warn(payload.message, payload.source);
  });
};

export type PreparedRun = {
  resolved: ResolveConfigResult;
  compiled: CompiledRunPlan;
  resultsDir: string;
};

export const prepareRun = (options: RunServiceOptions): PreparedRun => {
  const resolved = resolveConfig({
    configPath: options.configPath,
    rootDir: options.rootDir,
    env: options.env,
    mode: options.mode
  });
  const runId = options.runId ?? generateRunId();
  const runsRoot = resolve(
    options.rootDir ?? process.cwd(),
    options.runsDir ?? resolved.resolvedConfig.output.runs_dir
  );
  const { runDir, resultsDir } = createRunDir({ outRoot: runsRoot, runId });
  const compiled = compileRunPlan({ runId, runDir, resolvedConfig: resolved.resolvedConfig });
  return { resolved, compiled, resultsDir };
};

/**
 * Resolves the configuration, lays out the run directory, wires persistence
 * and logging onto the event bus, then drives the experiment.
 */
export const runExperimentService = async (
  options: RunServiceOptions = {}
): Promise<RunServiceResult> => {
  const { resolved, compiled, resultsDir } = prepareRun(options);
  const { runId, runDir, resolvedConfig } = compiled;
  const consoleSink = options.warningSink ?? createConsoleWarningSink();
  resolved.warnings.forEach((warning) => consoleSink.warn(warning, "config"));

  const bus = options.bus ?? new EventBus();
  const stopWarningForwarder = registerWarningForwarder(
    bus,
    consoleSink,
    options.forwardWarningEvents ?? true
  );
  const warningSink = createEventWarningSink(bus);

  const writer = new ArtifactWriter({
    runDir,
    runId,
    resolvedConfig,
    configSha256: resolved.configSha256,
    plan: compiled.plan,
    planSha256: compiled.planSha256
  });
  writer.attach(bus);
  const logger = new ExecutionLogger(resolve(runDir, "execution.log"));
  logger.attach(bus);
  bus.emit({ type: "artifact.written", payload: { path: "execution.log" } });

  const shutdown = setupShutdownHandlers(consoleSink, options.handleSignals ?? false);
  const mode = resolved.mode;
  const experiment = new GcExperiment({
    mode,
    batchSize: resolvedConfig.experiment.batch_size,
    gate: options.gate ?? (mode === "live" ? createConsoleGate() : createAutoConfirmGate()),
    router: resolved.router,
    model: new SyntheticMeasurementModel(resolvedConfig.experiment.seed),
    bus,
    warningSink,
    session: resolved.session,
    transport:
      options.transport ??
      createSshTransport({
        connectTimeoutSeconds: resolvedConfig.remote.connect_timeout_seconds,
        extraOptions: resolvedConfig.remote.ssh_options
      }),
    signal: shutdown.signal
  });

  try {
    const result = await runExperiment({
      runId,
      mode,
      plan: compiled.plan,
      planSha256: compiled.planSha256,
      batchSize: resolvedConfig.experiment.batch_size,
      seed: resolvedConfig.experiment.seed,
      hooks: experiment,
      bus,
      resultsDir,
      cooldownMs: resolvedConfig.experiment.cooldown_ms,
      signal: shutdown.signal
    });
    return { ...result, runDir, mode };
  } finally {
    shutdown.dispose();
    await writer.close();
    await logger.close();
    writer.detach();
    logger.detach();
    stopWarningForwarder();
  }
};
