import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ErrorObject } from "ajv";

import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { RemoteSession, RunMode } from "../core/types.js";
import { validatePlanInputs } from "../planning/planner.js";
import {
  COMMAND_FACTORS,
  isShellToken,
  resolveScriptRouter,
  type ScriptRouter
} from "../remote/command-builder.js";
import { DEFAULT_SYNTHETIC_SEED } from "../simulation/measurement-model.js";
import { sha256Hex } from "../utils/fingerprint.js";
import { formatAjvErrors, validateConfig } from "./schema-validation.js";
import type { DutEnvironment, GcLabConfigFile, GcLabResolvedConfig } from "./types.js";

export const DEFAULT_CONFIG_PATH = "gclab.config.json";

export const DEFAULTS = {
  repetitions: 1,
  batchSize: 6,
  cooldownMs: 0,
  timeoutSeconds: 5400,
  transferTimeoutSeconds: 120,
  connectTimeoutSeconds: 10,
  scripts: {
    benchmark: "Run_Single_Experiment.sh",
    service: "Service_Apps_Run_Single_Experiment.sh"
  },
  runsDir: "runs"
} as const;

export interface ResolveConfigOptions {
  configPath?: string;
  rootDir?: string;
  env?: DutEnvironment;
  /** Overrides ENERGY_MOCK_MODE when set. */
  mode?: RunMode;
}

export interface ResolveConfigResult {
  resolvedConfig: GcLabResolvedConfig;
  mode: RunMode;
  /** Null when the DUT variables are absent, which only mock mode allows. */
  session: RemoteSession | null;
  router: ScriptRouter;
  configSha256: string;
  warnings: string[];
}

const readJsonFile = (path: string): { raw: string; value: unknown } => {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read config ${path}: ${errorMessage(error)}`);
  }
  try {
    return { raw, value: JSON.parse(raw) };
  } catch (error) {
    throw new ConfigurationError(`Config ${path} is not valid JSON: ${errorMessage(error)}`);
  }
};

const assertValid = (
  name: string,
  valid: boolean,
  errors: ErrorObject[] | null | undefined
): void => {
  if (valid) {
    return;
  }
  throw new ConfigurationError(`${name} is invalid`, formatAjvErrors(name, errors));
};

/** Longest timeout a Node timer can hold, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

const TRUTHY = new Set(["1", "true", "yes", "on"]);

export const isMockModeEnabled = (value: string | undefined): boolean =>
  value !== undefined && TRUTHY.has(value.trim().toLowerCase());

const parseTimeoutOverride = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`DUT_TIMEOUT_SECONDS must be a positive number, got ${value}`);
  }
  if (parsed > MAX_TIMEOUT_SECONDS) {
    throw new ConfigurationError(
      `DUT_TIMEOUT_SECONDS must be at most ${MAX_TIMEOUT_SECONDS}, got ${value}`
    );
  }
  return parsed;
};

export const applyDefaults = (
  config: GcLabConfigFile,
  env: DutEnvironment = {}
): GcLabResolvedConfig => {
  const remote: NonNullable<GcLabConfigFile["remote"]> = config.remote ?? {};
  return {
    experiment: {
      name: config.experiment.name,
      repetitions: config.experiment.repetitions ?? DEFAULTS.repetitions,
      batch_size: config.experiment.batch_size ?? DEFAULTS.batchSize,
      cooldown_ms: config.experiment.cooldown_ms ?? DEFAULTS.cooldownMs,
      seed: config.experiment.seed ?? DEFAULT_SYNTHETIC_SEED
    },
    factors: config.factors.map((factor) => ({ name: factor.name, levels: [...factor.levels] })),
    exclusions: (config.exclusions ?? []).map((rule) => ({ ...rule })),
    remote: {
      timeout_seconds:
        parseTimeoutOverride(env.DUT_TIMEOUT_SECONDS) ??
        remote.timeout_seconds ??
        DEFAULTS.timeoutSeconds,
      transfer_timeout_seconds: remote.transfer_timeout_seconds ?? DEFAULTS.transferTimeoutSeconds,
      connect_timeout_seconds: remote.connect_timeout_seconds ?? DEFAULTS.connectTimeoutSeconds,
      ssh_options: [...(remote.ssh_options ?? [])],
      scripts: { ...(remote.scripts ?? DEFAULTS.scripts) },
      subjects: { ...(remote.subjects ?? {}) },
      default_category: remote.default_category ?? "benchmark"
    },
    output: {
      runs_dir: config.output?.runs_dir ?? DEFAULTS.runsDir
    }
  };
};

/** Every factor the remote script and the synthetic model consume must be declared. */
const collectCommandFactorErrors = (config: GcLabResolvedConfig): string[] => {
  const errors: string[] = [];
  for (const name of COMMAND_FACTORS) {
    const factor = config.factors.find((candidate) => candidate.name === name);
    if (!factor) {
      errors.push(`factor ${name} is required`);
      continue;
    }
    for (const level of factor.levels) {
      if (!isShellToken(level)) {
        errors.push(
          `factor ${name} level ${JSON.stringify(level)} contains characters the DUT script cannot take`
        );
      }
    }
  }
  return errors;
};

export const buildRemoteSession = (
  config: GcLabResolvedConfig,
  env: DutEnvironment
): { session: RemoteSession | null; missing: string[] } => {
  const entries = {
    DUT_USER: env.DUT_USER?.trim() ?? "",
    DUT_HOST: env.DUT_HOST?.trim() ?? "",
    DUT_EXPERIMENT_DIR: env.DUT_EXPERIMENT_DIR?.trim() ?? ""
  };
  const missing = Object.entries(entries)
    .filter(([, value]) => value.length === 0)
    .map(([key]) => key);
  if (missing.length > 0) {
    return { session: null, missing };
  }

  return {
    session: Object.freeze({
      user: entries.DUT_USER,
      host: entries.DUT_HOST,
      remoteDir: entries.DUT_EXPERIMENT_DIR,
      timeoutMs: Math.round(config.remote.timeout_seconds * 1000),
      transferTimeoutMs: Math.round(config.remote.transfer_timeout_seconds * 1000)
    }),
    missing
  };
};

/**
 * Read → validate → apply defaults and environment → re-validate. Every
 * problem found surfaces as one ConfigurationError before any trial runs.
 */
export const resolveConfig = (options: ResolveConfigOptions = {}): ResolveConfigResult => {
  const rootDir = options.rootDir ?? process.cwd();
  const configPath = resolve(rootDir, options.configPath ?? DEFAULT_CONFIG_PATH);
  const env = options.env ?? {};
  const warnings: string[] = [];

  const { raw, value } = readJsonFile(configPath);
  if (!validateConfig(value)) {
    throw new ConfigurationError(
      `config ${configPath} is invalid`,
      formatAjvErrors("config", validateConfig.errors)
    );
  }

  const resolvedConfig = applyDefaults(value, env);
  assertValid("resolved config", validateConfig(resolvedConfig), validateConfig.errors);

  const commandErrors = collectCommandFactorErrors(resolvedConfig);
  if (commandErrors.length > 0) {
    throw new ConfigurationError("config factors are incomplete", commandErrors);
  }
  validatePlanInputs(
    resolvedConfig.factors,
    resolvedConfig.exclusions,
    resolvedConfig.experiment.repetitions
  );

  const subjectLevels =
    resolvedConfig.factors.find((factor) => factor.name === "subject")?.levels ?? [];
  const router = resolveScriptRouter(resolvedConfig.remote, subjectLevels);

  const mode: RunMode =
    options.mode ?? (isMockModeEnabled(env.ENERGY_MOCK_MODE) ? "mock" : "live");
  const { session, missing } = buildRemoteSession(resolvedConfig, env);
  if (!session) {
    if (mode === "live") {
      throw new ConfigurationError(
        "Live runs need the DUT connection settings",
        missing.map((key) => `${key} is not set`)
      );
    }
    warnings.push(`DUT settings incomplete (${missing.join(", ")}); remote commands are unavailable`);
  }

  return {
    resolvedConfig,
    mode,
    session,
    router,
    configSha256: sha256Hex(raw),
    warnings
  };
};
