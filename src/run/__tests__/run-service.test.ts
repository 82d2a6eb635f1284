import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ManualGate } from "../../engine/operator-gate.js";
import { createMemoryWarningSink } from "../../utils/warnings.js";
import { runExperimentService } from "../run-service.js";

// --- Helpers ---

const config = {
  experiment: { name: "service-test", batch_size: 2, cooldown_ms: 0, seed: 42 },
  factors: [
    { name: "subject", levels: ["DaCapo"] },
    { name: "gc", levels: ["Serial", "G1"] },
    { name: "workload", levels: ["Light", "Heavy"] },
    { name: "jdk", levels: ["openjdk"] }
  ],
  exclusions: [{ gc: ["G1"], workload: ["Heavy"] }],
  output: { runs_dir: "out" }
};

const readLines = (path: string): string[] =>
  readFileSync(path, "utf8")
    .split("\n")
    .filter((line) => line.length > 0);

const readJson = (path: string): unknown => JSON.parse(readFileSync(path, "utf8"));

describe("runExperimentService", () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = mkdtempSync(join(tmpdir(), "gclab-service-"));
    writeFileSync(join(rootDir, "gclab.config.json"), JSON.stringify(config), "utf8");
  });

  afterEach(() => {
    rmSync(rootDir, { recursive: true, force: true });
  });

  it("runs a mock experiment and persists the run directory", async () => {
    const warnings = createMemoryWarningSink();
    const result = await runExperimentService({
      rootDir,
      env: {},
      mode: "mock",
      runId: "mock-run",
      warningSink: warnings
    });

    const runDir = join(rootDir, "out", "mock-run");
    expect(result.runDir).toBe(runDir);
    expect(result.mode).toBe("mock");
    expect(result.stopReason).toBe("completed");
    expect(result.results.map((entry) => entry.status)).toEqual(["SUCCESS", "SUCCESS", "SUCCESS"]);

    const manifest = readJson(join(runDir, "manifest.json"));
    expect(manifest).toMatchObject({
      run_id: "mock-run",
      experiment: "service-test",
      mode: "mock",
      stop_reason: "completed",
      error: null,
      seed: 42,
      batch_size: 2,
      k_planned: 3,
      k_attempted: 3,
      status_counts: { SUCCESS: 3, FAILED: 0, TIMEOUT: 0, MISSING: 0 }
    });

    expect(readLines(join(runDir, "plan.jsonl"))).toHaveLength(3);
    const trials = readLines(join(runDir, "trials.jsonl")).map((line): unknown => JSON.parse(line));
    expect(trials).toEqual(JSON.parse(JSON.stringify(result.results)));

    expect(readLines(join(runDir, "run_table.csv"))[0]).toBe(
      "__run_id,__done,sequence_number,repetition,subject,gc,workload,jdk," +
        "batch_number,status,status_token,runtime_s,energy_j,power_w,measurement_source"
    );
    expect(existsSync(join(runDir, "config.resolved.json"))).toBe(true);
    expect(existsSync(join(runDir, "dut_results", "run_3", "result.csv"))).toBe(true);

    const log = readLines(join(runDir, "execution.log"));
    expect(log.at(-1)).toMatch(/ Run completed: mock-run \(completed\) 3\/3 succeeded$/);

    expect(warnings.records.map((record) => record.message)).toContain(
      "Mock mode: energy and runtime figures are synthetic, not measured"
    );
  });

  it("reproduces synthetic figures for the same seed", async () => {
    const first = await runExperimentService({
      rootDir,
      env: {},
      mode: "mock",
      runId: "first",
      warningSink: createMemoryWarningSink()
    });
    const second = await runExperimentService({
      rootDir,
      env: {},
      mode: "mock",
      runId: "second",
      warningSink: createMemoryWarningSink()
    });

    expect(second.results.map((entry) => entry.energy_j)).toEqual(
      first.results.map((entry) => entry.energy_j)
    );
  });

  it("lists unrun trials in the manifest when the operator stops at a pause", async () => {
    const gate = new ManualGate();
    const running = runExperimentService({
      rootDir,
      env: {},
      mode: "mock",
      runId: "stopped",
      gate,
      warningSink: createMemoryWarningSink()
    });
    await gate.whenWaiting();
    gate.cancel();
    await expect(running).rejects.toThrow("Experiment cancelled by operator");

    const manifest = readJson(join(rootDir, "out", "stopped", "manifest.json"));
    expect(manifest).toMatchObject({ stop_reason: "user_interrupt", k_attempted: 2 });
    const table = readLines(join(rootDir, "out", "stopped", "run_table.csv"));
    expect(table.slice(1).map((row) => row.split(",")[1])).toEqual(["DONE", "DONE", "TODO"]);
  });
});
