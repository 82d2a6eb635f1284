import { createSeededGenerator, type SeededGenerator } from "../utils/seeded-rng.js";

export const DEFAULT_SYNTHETIC_SEED = 42;

export const ENERGY_FLOOR_J = 0.1;
export const RUNTIME_FLOOR_S = 0.05;

type GcBaseline = {
  energy: number;
  time: number;
  variance: number;
};

const GC_BASELINES: Record<string, GcBaseline> = {
  serial: { energy: 3.2, time: 0.35, variance: 0.15 },
  parallel: { energy: 4.1, time: 0.22, variance: 0.25 },
  g1: { energy: 3.8, time: 0.28, variance: 0.35 }
};

const FALLBACK_GC = "g1";

const WORKLOAD_MULTIPLIERS: Record<string, number> = {
  light: 1.0,
  medium: 2.3,
  heavy: 3.5
};

const RUNTIME_WORKLOAD_EXPONENT = 0.8;
const RUNTIME_VARIANCE_SHARE = 0.8;
const ENERGY_NOISE_SD = 0.3;

const JDK_VENDOR_FACTORS: Array<{ vendor: string; factor: number }> = [
  { vendor: "oracle", factor: 1.05 },
  { vendor: "openjdk", factor: 1.0 }
];

// Command-level model used when a real local command was timed.
const COMMAND_BASE_POWER_W = 8.0;
const COMMAND_JAVA_POWER_W = 12.0;
const COMMAND_VARIANCE_SD = 0.08;

const COMMAND_GC_FLAGS: Record<string, number> = {
  "-XX:+UseSerialGC": 0.85,
  "-XX:+UseParallelGC": 1.0,
  "-XX:+UseG1GC": 1.12
};
const COMMAND_DEFAULT_GC_MULTIPLIER = 0.95;

const COMMAND_WORKLOAD_MULTIPLIERS: Record<string, number> = {
  light: 1.0,
  medium: 1.7,
  heavy: 2.4
};

export type SyntheticFactors = {
  gc: string;
  workload: string;
  jdk: string;
};

export type SyntheticMeasurement = {
  energyJoules: number;
  runtimeSeconds: number;
  powerWatts: number;
};

/** "G1GC", "G1" and "g1" share one baseline. */
export const normalizeGcKey = (gc: string): string =>
  gc.toLowerCase().replace(/[^a-z0-9]/g, "").replace(/gc$/, "");

export const jdkVendorFactor = (jdk: string): number => {
  const normalized = jdk.toLowerCase();
  return JDK_VENDOR_FACTORS.find((entry) => normalized.startsWith(entry.vendor))?.factor ?? 1.0;
};

const round6 = (value: number): number => Math.round(value * 1e6) / 1e6;

export const derivePower = (energyJoules: number, runtimeSeconds: number): number =>
  runtimeSeconds > 0 ? energyJoules / runtimeSeconds : 0;

const isJavaToken = (token: string): boolean => /(^|[\\/])java(\.exe)?$/.test(token);

const commandWorkloadMultiplier = (tokens: string[]): number => {
  for (const token of tokens) {
    const value = token.toLowerCase().replace(/^--workload=/, "");
    const multiplier = COMMAND_WORKLOAD_MULTIPLIERS[value];
    if (multiplier !== undefined) {
      return multiplier;
    }
  }
  return 1.0;
};

const commandGcMultiplier = (tokens: string[]): number => {
  for (const token of tokens) {
    const multiplier = COMMAND_GC_FLAGS[token];
    if (multiplier !== undefined) {
      return multiplier;
    }
  }
  return COMMAND_DEFAULT_GC_MULTIPLIER;
};

/**
 * Seeded stand-in for energy instrumentation. Output is uncalibrated and
 * must be tagged as synthetic wherever it is recorded.
 *
 * Every call advances the owned generator, so identical seeds and identical
 * call sequences yield identical figures.
 */
export class SyntheticMeasurementModel {
  readonly seed: number;
  private readonly rng: SeededGenerator;

  constructor(seed: number = DEFAULT_SYNTHETIC_SEED) {
    this.seed = seed;
    this.rng = createSeededGenerator(seed);
  }

  simulate(factors: SyntheticFactors): SyntheticMeasurement {
    const baseline = GC_BASELINES[normalizeGcKey(factors.gc)] ?? GC_BASELINES[FALLBACK_GC];
    const workload = WORKLOAD_MULTIPLIERS[factors.workload.toLowerCase()] ?? 1.0;
    const vendor = jdkVendorFactor(factors.jdk);

    const variance = this.rng.gaussian(1.0, baseline.variance);
    const noise = this.rng.gaussian(0, ENERGY_NOISE_SD);

    const energyJoules = Math.max(
      ENERGY_FLOOR_J,
      baseline.energy * workload * vendor * variance + noise
    );
    const runtimeSeconds = Math.max(
      RUNTIME_FLOOR_S,
      baseline.time *
        workload ** RUNTIME_WORKLOAD_EXPONENT *
        (1 + (variance - 1) * RUNTIME_VARIANCE_SHARE)
    );

    return {
      energyJoules: round6(energyJoules),
      runtimeSeconds: round6(runtimeSeconds),
      powerWatts: round6(derivePower(energyJoules, runtimeSeconds))
    };
  }

  simulateFromCommand(commandTokens: string[], elapsedSeconds: number): number {
    const basePower = commandTokens.some(isJavaToken) ? COMMAND_JAVA_POWER_W : COMMAND_BASE_POWER_W;
    const power =
      basePower *
      commandGcMultiplier(commandTokens) *
      commandWorkloadMultiplier(commandTokens) *
      this.rng.gaussian(1.0, COMMAND_VARIANCE_SD);
    const noise = this.rng.gaussian(0, ENERGY_NOISE_SD);
    return Math.max(ENERGY_FLOOR_J, power * Math.max(0, elapsedSeconds) + noise);
  }
}
