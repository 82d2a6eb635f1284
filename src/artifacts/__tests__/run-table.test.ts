import { describe, expect, it } from "vitest";

import type { TrialResult, TrialSpec } from "../../core/types.js";
import { generateRunId, trialResultDir } from "../run-dir.js";
import { formatRunTable } from "../run-table.js";

const spec = (sequenceNumber: number, gc: string): TrialSpec => ({
  sequence_number: sequenceNumber,
  repetition: 0,
  levels: { gc, workload: "Light" }
});

const failed: TrialResult = {
  ...spec(2, "G1"),
  runtime_s: null,
  energy_j: null,
  power_w: null,
  status: "FAILED",
  status_token: "FAILED_2",
  batch_number: 1,
  measurement_source: "dut"
};

describe("formatRunTable", () => {
  it("writes one row per planned trial with empty cells for absent values", () => {
    const succeeded: TrialResult = {
      ...spec(1, "Serial"),
      runtime_s: 12.5,
      energy_j: 301.25,
      power_w: 24.1,
      status: "SUCCESS",
      status_token: "SUCCESS",
      batch_number: 1,
      measurement_source: "synthetic"
    };

    const table = formatRunTable(
      ["gc", "workload"],
      [
        { spec: spec(1, "Serial"), result: succeeded },
        { spec: spec(2, "G1"), result: failed },
        { spec: spec(3, "G1"), result: null }
      ]
    );

    expect(table.split("\n")).toEqual([
      "__run_id,__done,sequence_number,repetition,gc,workload,batch_number,status,status_token," +
        "runtime_s,energy_j,power_w,measurement_source",
      "run_1,DONE,1,0,Serial,Light,1,SUCCESS,SUCCESS,12.5,301.25,24.1,synthetic",
      "run_2,DONE,2,0,G1,Light,1,FAILED,FAILED_2,,,,dut",
      "run_3,TODO,3,0,G1,Light,,,,,,,",
      ""
    ]);
  });
});

describe("run directory naming", () => {
  it("stamps run ids with the UTC second and a hex suffix", () => {
    expect(generateRunId(new Date("2024-01-31T12:34:56.789Z"), "ABCDEF99")).toBe(
      "20240131T123456Z_abcdef"
    );
    expect(generateRunId(new Date("2024-01-31T00:00:00Z"), "zz1")).toBe(
      "20240131T000000Z_100000"
    );
    expect(generateRunId()).toMatch(/^\d{8}T\d{6}Z_[0-9a-f]{6}$/);
  });

  it("names per-trial directories after the sequence number", () => {
    expect(trialResultDir("/runs/r1/dut_results", 14)).toBe("/runs/r1/dut_results/run_14");
  });
});
