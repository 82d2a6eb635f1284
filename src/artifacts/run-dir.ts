import { randomBytes } from "node:crypto";
import { mkdirSync } from "node:fs";
import { resolve } from "node:path";

const pad = (value: number): string => value.toString().padStart(2, "0");

const normalizeSuffix = (value: string): string => {
  const normalized = value.toLowerCase().replace(/[^a-f0-9]/g, "");
  return normalized.slice(0, 6).padEnd(6, "0");
};

/** `20240131T120000Z_a1b2c3`: UTC second plus a six-digit hex suffix. */
export const generateRunId = (now: Date = new Date(), suffix?: string): string => {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const tail = suffix !== undefined ? normalizeSuffix(suffix) : randomBytes(3).toString("hex");
  return `${date}T${time}Z_${tail}`;
};

export type RunDirLayout = {
  runDir: string;
  /** Parent of the per-trial `run_<n>` directories holding retrieved DUT files. */
  resultsDir: string;
};

export const createRunDir = (options: { outRoot?: string; runId: string }): RunDirLayout => {
  const outRoot = resolve(options.outRoot ?? "runs");
  const runDir = resolve(outRoot, options.runId);
  const resultsDir = resolve(runDir, "dut_results");
  mkdirSync(resultsDir, { recursive: true });
  return { runDir, resultsDir };
};

export const trialResultDir = (resultsDir: string, sequenceNumber: number): string =>
  resolve(resultsDir, `run_${sequenceNumber}`);
