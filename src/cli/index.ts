#!/usr/bin/env node
import "dotenv/config";

import { resolve } from "node:path";
import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { DEFAULT_CONFIG_PATH, resolveConfig } from "../config/resolve-config.js";
import type { DutEnvironment } from "../config/types.js";
import { ConfigurationError, GcLabError, errorMessage, isCancelled } from "../core/errors.js";
import type { RunMode } from "../core/types.js";
import { countBatches } from "../engine/batch-scheduler.js";
import { EventBus } from "../events/event-bus.js";
import { generateTrialPlan } from "../planning/planner.js";
import { buildRemoteCommand } from "../remote/command-builder.js";
import { checkConnectivity } from "../remote/remote-client.js";
import { createSshTransport } from "../remote/transport.js";
import { runExperimentService } from "../run/run-service.js";
import { measureLocalCommand } from "../simulation/local-measurement.js";
import {
  DEFAULT_SYNTHETIC_SEED,
  SyntheticMeasurementModel
} from "../simulation/measurement-model.js";
import { attachConsoleReporter } from "../ui/console-reporter.js";
import { getAssetRoot, readPackageVersion } from "../utils/asset-root.js";
import { createConsoleWarningSink } from "../utils/warnings.js";

const EXIT_INTERRUPTED = 130;

const printUsage = (): void => {
  console.log("Usage:");
  console.log("  gclab validate [config.json] [--mock|--live]");
  console.log("  gclab plan [config.json] [--commands]");
  console.log("  gclab check [config.json]");
  console.log("  gclab run [config.json] [--mock|--live] [--out <runs_dir>] [--yes]");
  console.log("  gclab measure --out <energy.csv> [--seed N] [--timeout-ms N] -- <command...>");
  console.log("");
  console.log("Environment (or .env): DUT_USER, DUT_HOST, DUT_EXPERIMENT_DIR,");
  console.log("  DUT_TIMEOUT_SECONDS, ENERGY_MOCK_MODE");
};

type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | boolean>;
  /** Everything after a bare `--`. */
  rest: string[];
};

const parseArgs = (args: string[]): ParsedArgs => {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  const separator = args.indexOf("--");
  const head = separator >= 0 ? args.slice(0, separator) : args;
  const rest = separator >= 0 ? args.slice(separator + 1) : [];

  for (let i = 0; i < head.length; i += 1) {
    const arg = head[i];
    if (arg.startsWith("--")) {
      const next = head[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[arg] = next;
        i += 1;
      } else {
        flags[arg] = true;
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags, rest };
};

const BOOLEAN_FLAGS = new Set(["--mock", "--live", "--yes", "--commands"]);

/** Boolean flags never consume the following token. */
const normalizeBooleanFlags = (parsed: ParsedArgs): ParsedArgs => {
  const positional = [...parsed.positional];
  const flags = { ...parsed.flags };
  for (const name of BOOLEAN_FLAGS) {
    const value = flags[name];
    if (typeof value === "string") {
      positional.push(value);
      flags[name] = true;
    }
  }
  return { ...parsed, positional, flags };
};

const getFlag = (flags: ParsedArgs["flags"], name: string): string | undefined => {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
};

const hasFlag = (flags: ParsedArgs["flags"], name: string): boolean => Boolean(flags[name]);

const getFlagNumber = (flags: ParsedArgs["flags"], name: string): number | undefined => {
  const value = getFlag(flags, name);
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} expects a number, got ${value}`);
  }
  return parsed;
};

const resolveModeFlag = (flags: ParsedArgs["flags"]): RunMode | undefined => {
  const mock = hasFlag(flags, "--mock");
  const live = hasFlag(flags, "--live");
  if (mock && live) {
    throw new ConfigurationError("Use either --mock or --live (not both).");
  }
  if (mock) {
    return "mock";
  }
  return live ? "live" : undefined;
};

const readEnvironment = (): DutEnvironment => ({
  DUT_USER: process.env.DUT_USER,
  DUT_HOST: process.env.DUT_HOST,
  DUT_EXPERIMENT_DIR: process.env.DUT_EXPERIMENT_DIR,
  DUT_TIMEOUT_SECONDS: process.env.DUT_TIMEOUT_SECONDS,
  ENERGY_MOCK_MODE: process.env.ENERGY_MOCK_MODE
});

const promptYesNo = async (question: string): Promise<boolean> => {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    return false;
  }
  const rl = createInterface({ input, output });
  try {
    const answer = await rl.question(`${question} [y/N]: `);
    return answer.trim().toLowerCase().startsWith("y");
  } finally {
    rl.close();
  }
};

const resolveForCli = (parsed: ParsedArgs, mode?: RunMode) =>
  resolveConfig({
    configPath: resolve(process.cwd(), parsed.positional[0] ?? DEFAULT_CONFIG_PATH),
    env: readEnvironment(),
    mode
  });

const runValidate = (parsed: ParsedArgs): void => {
  const result = resolveForCli(parsed, resolveModeFlag(parsed.flags));
  const { experiment, factors } = result.resolvedConfig;
  const { plan } = generateTrialPlan(
    factors,
    result.resolvedConfig.exclusions,
    experiment.repetitions
  );
  console.log(`Config OK: ${experiment.name} (${result.mode} mode)`);
  factors.forEach((factor) => console.log(`  ${factor.name}: ${factor.levels.join(", ")}`));
  const batches = countBatches(plan.length, experiment.batch_size);
  console.log(`  ${plan.length} runs in ${batches} batches of ${experiment.batch_size}`);
  if (result.session) {
    console.log(`  DUT: ${result.session.user}@${result.session.host}:${result.session.remoteDir}`);
  }
  result.warnings.forEach((warning) => console.warn(`Warning: ${warning}`));
};

const runPlan = (parsed: ParsedArgs): void => {
  const result = resolveForCli(parsed, "mock");
  const { experiment, factors, exclusions } = result.resolvedConfig;
  const { plan, planSha256 } = generateTrialPlan(factors, exclusions, experiment.repetitions);
  const showCommands = hasFlag(parsed.flags, "--commands");
  const session = result.session;
  if (showCommands && !session) {
    throw new ConfigurationError("--commands needs DUT_USER, DUT_HOST and DUT_EXPERIMENT_DIR");
  }

  console.log(`Plan ${planSha256.slice(0, 12)}: ${plan.length} runs`);
  plan.forEach((spec) => {
    const levels = factors.map((factor) => spec.levels[factor.name]).join(" ");
    const line = `${String(spec.sequence_number).padStart(4)}  rep ${spec.repetition}  ${levels}`;
    console.log(
      showCommands && session
        ? `${line}\n      ${buildRemoteCommand(spec, session, result.router)}`
        : line
    );
  });
};

const runCheck = async (parsed: ParsedArgs): Promise<void> => {
  const result = resolveForCli(parsed, "live");
  const { session } = result;
  if (!session) {
    throw new ConfigurationError("No DUT session configured");
  }
  const transport = createSshTransport({
    connectTimeoutSeconds: result.resolvedConfig.remote.connect_timeout_seconds,
    extraOptions: result.resolvedConfig.remote.ssh_options
  });
  const check = await checkConnectivity(session, transport);
  if (!check.ok) {
    console.error(`SSH to ${session.user}@${session.host} failed: ${check.detail}`);
    process.exitCode = 1;
    return;
  }
  console.log(`SSH to ${session.user}@${session.host} OK`);
};

const runRun = async (parsed: ParsedArgs): Promise<void> => {
  const mode = resolveModeFlag(parsed.flags);
  const preview = resolveForCli(parsed, mode);
  if (preview.mode === "live" && !hasFlag(parsed.flags, "--yes")) {
    const { experiment } = preview.resolvedConfig;
    const session = preview.session;
    console.log(`About to run ${experiment.name} on ${session?.user}@${session?.host}`);
    const proceed = await promptYesNo("Start the experiment?");
    if (!proceed) {
      console.log("Aborted. Pass --yes to skip this prompt.");
      return;
    }
  }

  const bus = new EventBus();
  const detachReporter = attachConsoleReporter(bus);
  try {
    const result = await runExperimentService({
      configPath: resolve(process.cwd(), parsed.positional[0] ?? DEFAULT_CONFIG_PATH),
      env: readEnvironment(),
      mode,
      runsDir: getFlag(parsed.flags, "--out"),
      bus,
      warningSink: createConsoleWarningSink(),
      handleSignals: true
    });
    console.log(`Artifacts: ${result.runDir}`);
    if (result.stopReason === "user_interrupt") {
      process.exitCode = EXIT_INTERRUPTED;
    }
  } finally {
    detachReporter();
  }
};

const runMeasure = async (parsed: ParsedArgs): Promise<void> => {
  const outputFile = getFlag(parsed.flags, "--out");
  if (!outputFile) {
    throw new ConfigurationError("measure requires --out <energy.csv>");
  }
  if (parsed.rest.length === 0) {
    throw new ConfigurationError("measure requires a command after --");
  }
  const model = new SyntheticMeasurementModel(
    getFlagNumber(parsed.flags, "--seed") ?? DEFAULT_SYNTHETIC_SEED
  );
  const measurement = await measureLocalCommand(parsed.rest, resolve(outputFile), model, {
    timeoutMs: getFlagNumber(parsed.flags, "--timeout-ms"),
    warningSink: createConsoleWarningSink()
  });
  const energy = measurement.energyJoules.toFixed(3);
  const elapsed = measurement.elapsedSeconds.toFixed(3);
  console.log(`${energy} J over ${elapsed} s (synthetic) -> ${measurement.outputFile}`);
  process.exitCode = measurement.exitCode;
};

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printUsage();
    return;
  }
  if (args[0] === "--version") {
    console.log(readPackageVersion(getAssetRoot()));
    return;
  }

  const command = args[0];
  const parsed = normalizeBooleanFlags(parseArgs(args.slice(1)));

  try {
    switch (command) {
      case "validate":
        runValidate(parsed);
        return;
      case "plan":
        runPlan(parsed);
        return;
      case "check":
        await runCheck(parsed);
        return;
      case "run":
        await runRun(parsed);
        return;
      case "measure":
        await runMeasure(parsed);
        return;
      default:
        printUsage();
        process.exitCode = 1;
    }
  } catch (error) {
    if (isCancelled(error)) {
      console.error(error.message);
      process.exitCode = EXIT_INTERRUPTED;
      return;
    }
    const code = error instanceof GcLabError ? ` [${error.code}]` : "";
    console.error(`${errorMessage(error)}${code}`);
    process.exitCode = 1;
  }
};

void main();
