import { ConfigurationError } from "../core/errors.js";
import type { RemoteSession, TrialSpec } from "../core/types.js";

export type ScriptCategory = "benchmark" | "service";

export type ScriptRoutingConfig = {
  scripts: Record<ScriptCategory, string>;
  subjects: Record<string, ScriptCategory>;
  default_category: ScriptCategory;
};

/** Subject → remote script, resolved once for every declared subject level. */
export type ScriptRouter = ReadonlyMap<string, string>;

/** Factors substituted into the remote invocation, in argument order. */
export const COMMAND_FACTORS = ["subject", "gc", "workload", "jdk"] as const;

export type CommandFactor = (typeof COMMAND_FACTORS)[number];

const SHELL_TOKEN = /^[A-Za-z0-9._+-]+$/;
const SCRIPT_NAME = /^[A-Za-z0-9._-]+$/;
const SAFE_PATH = /^[A-Za-z0-9_./~+-]+$/;

export const isShellToken = (value: string): boolean => SHELL_TOKEN.test(value);

export const shellQuote = (value: string): string =>
  SAFE_PATH.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;

export const resolveScriptRouter = (
  routing: ScriptRoutingConfig,
  subjectLevels: string[]
): ScriptRouter => {
  const errors: string[] = [];

  for (const [category, script] of Object.entries(routing.scripts)) {
    if (!SCRIPT_NAME.test(script)) {
      errors.push(`script for ${category} must be a plain file name, got ${JSON.stringify(script)}`);
    }
  }

  const declared = new Set(subjectLevels);
  for (const subject of Object.keys(routing.subjects)) {
    if (!declared.has(subject)) {
      errors.push(`script routing names undeclared subject ${subject}`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigurationError("Invalid remote script routing", errors);
  }

  const router = new Map<string, string>();
  for (const subject of subjectLevels) {
    const category = routing.subjects[subject] ?? routing.default_category;
    router.set(subject, routing.scripts[category]);
  }
  return router;
};

const requireLevel = (spec: TrialSpec, factor: CommandFactor): string => {
  const level = spec.levels[factor];
  if (level === undefined) {
    throw new ConfigurationError(`Trial ${spec.sequence_number} has no level for factor ${factor}`);
  }
  if (!isShellToken(level)) {
    throw new ConfigurationError(
      `Level ${JSON.stringify(level)} of factor ${factor} cannot be passed to the remote script`
    );
  }
  return level;
};

export const buildRemoteCommand = (
  spec: TrialSpec,
  session: RemoteSession,
  router: ScriptRouter
): string => {
  const [subject, gc, workload, jdk] = COMMAND_FACTORS.map((factor) => requireLevel(spec, factor));
  const script = router.get(subject);
  if (!script) {
    throw new ConfigurationError(`No remote script is routed for subject ${subject}`);
  }

  return (
    `cd ${shellQuote(session.remoteDir)} && ` +
    `./${script} ${subject} ${gc} ${workload} ${jdk} ${spec.repetition} ${spec.sequence_number}`
  );
};
