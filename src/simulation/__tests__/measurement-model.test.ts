import { describe, expect, it } from "vitest";

import {
  DEFAULT_SYNTHETIC_SEED,
  ENERGY_FLOOR_J,
  RUNTIME_FLOOR_S,
  SyntheticMeasurementModel,
  jdkVendorFactor,
  normalizeGcKey
} from "../measurement-model.js";

// --- Helpers ---

const draw = (model: SyntheticMeasurementModel, workload: string, count: number) =>
  Array.from({ length: count }, () => model.simulate({ gc: "Serial", workload, jdk: "openjdk" }));

const mean = (values: number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

describe("SyntheticMeasurementModel", () => {
  it("defaults to seed 42", () => {
    expect(DEFAULT_SYNTHETIC_SEED).toBe(42);
    expect(new SyntheticMeasurementModel().seed).toBe(42);
  });

  it("repeats the same sequence for the same seed", () => {
    const first = draw(new SyntheticMeasurementModel(7), "Medium", 5);
    const second = draw(new SyntheticMeasurementModel(7), "Medium", 5);
    expect(second).toEqual(first);
  });

  it("diverges for a different seed", () => {
    const first = draw(new SyntheticMeasurementModel(7), "Medium", 3);
    const second = draw(new SyntheticMeasurementModel(8), "Medium", 3);
    expect(second).not.toEqual(first);
  });

  it("spends more energy and time on heavier workloads", () => {
    const light = draw(new SyntheticMeasurementModel(), "Light", 200);
    const heavy = draw(new SyntheticMeasurementModel(), "Heavy", 200);

    expect(mean(heavy.map((m) => m.energyJoules))).toBeGreaterThan(
      mean(light.map((m) => m.energyJoules))
    );
    expect(mean(heavy.map((m) => m.runtimeSeconds))).toBeGreaterThan(
      mean(light.map((m) => m.runtimeSeconds))
    );
  });

  it("never reports values below the floors", () => {
    const model = new SyntheticMeasurementModel(3);
    const samples = Array.from({ length: 300 }, () =>
      model.simulate({ gc: "G1", workload: "Light", jdk: "oracle" })
    );
    expect(samples.every((m) => m.energyJoules >= ENERGY_FLOOR_J)).toBe(true);
    expect(samples.every((m) => m.runtimeSeconds >= RUNTIME_FLOOR_S)).toBe(true);
  });

  it("derives power from energy and runtime", () => {
    const [sample] = draw(new SyntheticMeasurementModel(), "Light", 1);
    expect(sample.powerWatts).toBeCloseTo(sample.energyJoules / sample.runtimeSeconds, 2);
  });

  it("falls back to the G1 baseline for an unknown collector", () => {
    const unknown = new SyntheticMeasurementModel(11).simulate({
      gc: "Shenandoah",
      workload: "Light",
      jdk: "openjdk"
    });
    const g1 = new SyntheticMeasurementModel(11).simulate({
      gc: "G1GC",
      workload: "Light",
      jdk: "openjdk"
    });
    expect(unknown).toEqual(g1);
  });

  it("draws a deterministic energy figure for a timed command", () => {
    const tokens = ["java", "-XX:+UseSerialGC", "-jar", "app.jar", "heavy"];
    const first = new SyntheticMeasurementModel().simulateFromCommand(tokens, 2);
    const second = new SyntheticMeasurementModel().simulateFromCommand(tokens, 2);
    expect(second).toBe(first);
    expect(first).toBeGreaterThanOrEqual(ENERGY_FLOOR_J);
  });

  it("charges only noise for a command that took no time", () => {
    const energy = new SyntheticMeasurementModel().simulateFromCommand(["true"], 0);
    expect(energy).toBeGreaterThanOrEqual(ENERGY_FLOOR_J);
    expect(energy).toBeLessThan(2);
  });
});

describe("factor normalization", () => {
  it("treats collector spellings alike", () => {
    expect(["G1", "G1GC", "g1", "Serial", "ParallelGC"].map(normalizeGcKey)).toEqual([
      "g1",
      "g1",
      "g1",
      "serial",
      "parallel"
    ]);
  });

  it("weights vendors by name prefix", () => {
    expect(jdkVendorFactor("oracle-21")).toBe(1.05);
    expect(jdkVendorFactor("OpenJDK")).toBe(1.0);
    expect(jdkVendorFactor("temurin")).toBe(1.0);
  });
});
