import { ConfigurationError } from "../core/errors.js";
import type { ExclusionRule, Factor, FactorAssignment, TrialSpec } from "../core/types.js";
import { fingerprint } from "../utils/fingerprint.js";

export type TrialPlan = {
  plan: TrialSpec[];
  planSha256: string;
};

const collectFactorErrors = (factors: Factor[]): string[] => {
  const errors: string[] = [];
  const seenNames = new Set<string>();

  if (factors.length === 0) {
    errors.push("at least one factor is required");
  }

  factors.forEach((factor, index) => {
    const label = factor.name.trim().length > 0 ? factor.name : `factors[${index}]`;
    if (factor.name.trim().length === 0) {
      errors.push(`factors[${index}] has an empty name`);
    }
    if (seenNames.has(factor.name)) {
      errors.push(`factor ${label} is declared more than once`);
    }
    seenNames.add(factor.name);

    if (factor.levels.length === 0) {
      errors.push(`factor ${label} has no levels`);
      return;
    }
    const seenLevels = new Set<string>();
    for (const level of factor.levels) {
      if (seenLevels.has(level)) {
        errors.push(`factor ${label} repeats level ${level}`);
      }
      seenLevels.add(level);
    }
  });

  return errors;
};

const collectExclusionErrors = (factors: Factor[], exclusions: ExclusionRule[]): string[] => {
  const errors: string[] = [];
  const levelsByFactor = new Map(factors.map((factor) => [factor.name, new Set(factor.levels)]));

  exclusions.forEach((rule, index) => {
    const entries = Object.entries(rule);
    if (entries.length === 0) {
      errors.push(`exclusions[${index}] constrains no factor`);
    }
    for (const [factorName, levels] of entries) {
      const declared = levelsByFactor.get(factorName);
      if (!declared) {
        errors.push(`exclusions[${index}] references undeclared factor ${factorName}`);
        continue;
      }
      for (const level of levels) {
        if (!declared.has(level)) {
          errors.push(`exclusions[${index}] references undeclared level ${factorName}=${level}`);
        }
      }
    }
  });

  return errors;
};

/** First factor varies slowest; the declared order is the enumeration order. */
const cartesianProduct = (factors: Factor[]): FactorAssignment[] => {
  let combinations: Array<Record<string, string>> = [{}];
  for (const factor of factors) {
    const next: Array<Record<string, string>> = [];
    for (const partial of combinations) {
      for (const level of factor.levels) {
        next.push({ ...partial, [factor.name]: level });
      }
    }
    combinations = next;
  }
  return combinations;
};

export const matchesExclusion = (levels: FactorAssignment, rule: ExclusionRule): boolean =>
  Object.entries(rule).every(([factorName, allowed]) => {
    const level = levels[factorName];
    return level !== undefined && allowed.includes(level);
  });

export const validatePlanInputs = (
  factors: Factor[],
  exclusions: ExclusionRule[],
  repetitions: number
): void => {
  const errors = collectFactorErrors(factors);
  if (!Number.isInteger(repetitions) || repetitions < 1) {
    errors.push(`repetitions must be an integer >= 1, got ${repetitions}`);
  }
  errors.push(...collectExclusionErrors(factors, exclusions));

  if (errors.length > 0) {
    throw new ConfigurationError("Invalid trial plan inputs", errors);
  }
};

export const generateTrialPlan = (
  factors: Factor[],
  exclusions: ExclusionRule[],
  repetitions: number
): TrialPlan => {
  validatePlanInputs(factors, exclusions, repetitions);

  const plan: TrialSpec[] = [];
  let sequenceNumber = 0;

  for (const combination of cartesianProduct(factors)) {
    if (exclusions.some((rule) => matchesExclusion(combination, rule))) {
      continue;
    }
    for (let repetition = 0; repetition < repetitions; repetition += 1) {
      sequenceNumber += 1;
      plan.push(
        Object.freeze({
          sequence_number: sequenceNumber,
          repetition,
          levels: Object.freeze({ ...combination })
        })
      );
    }
  }

  return { plan, planSha256: fingerprint(plan) };
};

export const countCombinations = (factors: Factor[]): number =>
  factors.reduce((product, factor) => product * factor.levels.length, 1);
