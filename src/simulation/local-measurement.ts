import { ConfigurationError, errorMessage } from "../core/errors.js";
import { excerpt, runBounded, type BoundedCall } from "../remote/remote-client.js";
import { runLocalProcess } from "../remote/transport.js";
import type { WarningSink } from "../utils/warnings.js";
import type { SyntheticMeasurementModel } from "./measurement-model.js";
import { writeSyntheticCsv } from "./synthetic-csv.js";

export const DEFAULT_LOCAL_TIMEOUT_MS = 300_000;

/** Elapsed time charged when the command could not be started at all. */
const SPAWN_FAILURE_ELAPSED_S = 0.1;

export type LocalMeasurement = {
  exitCode: number;
  elapsedSeconds: number;
  energyJoules: number;
  timedOut: boolean;
  outputFile: string;
};

const summarizeCall = (
  call: BoundedCall,
  binary: string,
  timeoutMs: number
): { exitCode: number; elapsedSeconds: number; problem?: string } => {
  switch (call.kind) {
    case "exited":
      return {
        exitCode: call.exit.exitCode,
        elapsedSeconds: call.elapsedMs / 1000,
        problem:
          call.exit.exitCode === 0
            ? undefined
            : `${binary} exited with code ${call.exit.exitCode}: ${excerpt(call.exit.stderr.trim())}`
      };
    case "timeout":
      return {
        exitCode: 1,
        elapsedSeconds: timeoutMs / 1000,
        problem: `${binary} timed out after ${timeoutMs}ms`
      };
    case "error":
      return {
        exitCode: 1,
        elapsedSeconds: SPAWN_FAILURE_ELAPSED_S,
        problem: `${binary} could not be started: ${errorMessage(call.error)}`
      };
  }
};

/**
 * Runs a command on this machine, times it, and records a synthetic energy
 * figure for it in `outputFile`.
 */
export const measureLocalCommand = async (
  commandTokens: string[],
  outputFile: string,
  model: SyntheticMeasurementModel,
  options: { timeoutMs?: number; warningSink?: WarningSink } = {}
): Promise<LocalMeasurement> => {
  const [binary, ...args] = commandTokens;
  if (!binary) {
    throw new ConfigurationError("measureLocalCommand requires a command to run");
  }
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOCAL_TIMEOUT_MS;

  const call = await runBounded(timeoutMs, (signal) => runLocalProcess(binary, args, signal));
  const { exitCode, elapsedSeconds, problem } = summarizeCall(call, binary, timeoutMs);
  if (problem) {
    options.warningSink?.warn(problem, "measure");
  }

  const energyJoules = model.simulateFromCommand(commandTokens, elapsedSeconds);
  writeSyntheticCsv(outputFile, { energyJoules, executionSeconds: elapsedSeconds });

  return {
    exitCode,
    elapsedSeconds,
    energyJoules,
    timedOut: call.kind === "timeout",
    outputFile
  };
};
