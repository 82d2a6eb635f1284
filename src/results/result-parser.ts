import { readFileSync } from "node:fs";
import { join } from "node:path";

import { errorMessage } from "../core/errors.js";
import type { TrialStatus } from "../core/types.js";
import { RESULT_FILENAME } from "../remote/artifact-retrieval.js";

export const FAILED_SENTINEL = "FAILED";
export const MIN_RESULT_FIELDS = 9;

const RUNTIME_FIELD = 6;
const ENERGY_FIELD = 7;
const STATUS_FIELD = 8;

export type ParsedResultRecord = {
  status: TrialStatus;
  status_token: string | null;
  runtime_s: number | null;
  energy_j: number | null;
  /** Why the record degraded, when it did. */
  problem?: string;
};

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

type NumericField = { ok: true; value: number | null } | { ok: false };

const parseNumericField = (raw: string): NumericField => {
  const value = raw.trim();
  if (value === FAILED_SENTINEL) {
    return { ok: true, value: null };
  }
  if (!NUMBER_PATTERN.test(value)) {
    return { ok: false };
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? { ok: true, value: parsed } : { ok: false };
};

/** The DUT writes `FAILED_<exit code>` for non-timeout failures. */
export const normalizeStatusToken = (token: string): TrialStatus => {
  if (token === "SUCCESS" || token === "TIMEOUT" || token === "MISSING") {
    return token;
  }
  return "FAILED";
};

const degraded = (
  status: "MISSING" | "FAILED",
  problem: string,
  statusToken: string | null = null
): ParsedResultRecord => ({
  status,
  status_token: statusToken,
  runtime_s: null,
  energy_j: null,
  problem
});

export const parseResultLine = (line: string): ParsedResultRecord => {
  const trimmed = line.trim();
  const fields = trimmed.length === 0 ? [] : trimmed.split(",");
  if (fields.length < MIN_RESULT_FIELDS) {
    return degraded(
      "MISSING",
      `expected at least ${MIN_RESULT_FIELDS} fields, found ${fields.length}`
    );
  }

  const statusToken = fields[STATUS_FIELD].trim();
  const runtime = parseNumericField(fields[RUNTIME_FIELD]);
  const energy = parseNumericField(fields[ENERGY_FIELD]);
  if (!runtime.ok || !energy.ok) {
    const bad = !runtime.ok ? fields[RUNTIME_FIELD] : fields[ENERGY_FIELD];
    return degraded("FAILED", `non-numeric measurement ${JSON.stringify(bad.trim())}`, statusToken);
  }

  const status = normalizeStatusToken(statusToken);
  if (status !== "SUCCESS") {
    return { status, status_token: statusToken, runtime_s: null, energy_j: null };
  }

  return {
    status,
    status_token: statusToken,
    runtime_s: runtime.value,
    energy_j: energy.value
  };
};

const pad = (value: number): string => value.toString().padStart(2, "0");

const formatLocalTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Renders a record in the layout the DUT script writes:
 * run,subject,gc,workload,jdk,rep,runtime,energy,status,timestamp.
 */
export const formatResultLine = (input: {
  sequenceNumber: number;
  levels: Readonly<Record<string, string>>;
  repetition: number;
  runtimeSeconds: number | null;
  energyJoules: number | null;
  statusToken: string;
  completedAt?: Date;
}): string =>
  [
    input.sequenceNumber,
    input.levels.subject ?? "",
    input.levels.gc ?? "",
    input.levels.workload ?? "",
    input.levels.jdk ?? "",
    input.repetition,
    input.runtimeSeconds ?? FAILED_SENTINEL,
    input.energyJoules ?? FAILED_SENTINEL,
    input.statusToken,
    formatLocalTimestamp(input.completedAt ?? new Date())
  ].join(",");

/** Reads the first line of `result.csv` in `localDir`. Never throws. */
export const parseResultFile = (localDir: string): ParsedResultRecord => {
  const path = join(localDir, RESULT_FILENAME);
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    return degraded("MISSING", `cannot read ${path}: ${errorMessage(error)}`);
  }
  const firstLine = raw.split(/\r?\n/).find((line) => line.trim().length > 0) ?? "";
  return parseResultLine(firstLine);
};
