import type { GcLabResolvedConfig } from "../config/types.js";
import type { TrialSpec } from "../core/types.js";
import { generateTrialPlan } from "./planner.js";

const deepFreeze = <T>(value: T): T => {
  if (value === null || typeof value !== "object") {
    return value;
  }
  Object.values(value).forEach((nested: unknown) => {
    deepFreeze(nested);
  });
  return Object.freeze(value);
};

/** Everything a run executes against, frozen before the first trial. */
export type CompiledRunPlan = Readonly<{
  runId: string;
  runDir: string;
  resolvedConfig: Readonly<GcLabResolvedConfig>;
  plan: ReadonlyArray<TrialSpec>;
  planSha256: string;
}>;

export const compileRunPlan = (input: {
  runId: string;
  runDir: string;
  resolvedConfig: GcLabResolvedConfig;
}): CompiledRunPlan => {
  const clonedConfig = structuredClone(input.resolvedConfig);
  const generated = generateTrialPlan(
    clonedConfig.factors,
    clonedConfig.exclusions,
    clonedConfig.experiment.repetitions
  );

  return deepFreeze({
    runId: input.runId,
    runDir: input.runDir,
    resolvedConfig: clonedConfig,
    plan: generated.plan,
    planSha256: generated.planSha256
  });
};
