import { stringify } from "csv-stringify/sync";

import type { TrialResult, TrialSpec } from "../core/types.js";

export type RunTableRow = {
  spec: TrialSpec;
  result: TrialResult | null;
};

const formatNumber = (value: number | null | undefined): string =>
  value === null || value === undefined ? "" : String(value);

/**
 * One row per planned trial, factor columns in declaration order. Trials that
 * never ran are marked TODO with empty measurement cells.
 */
export const formatRunTable = (factorNames: string[], rows: RunTableRow[]): string => {
  const columns = [
    "__run_id",
    "__done",
    "sequence_number",
    "repetition",
    ...factorNames,
    "batch_number",
    "status",
    "status_token",
    "runtime_s",
    "energy_j",
    "power_w",
    "measurement_source"
  ];

  const records = rows.map(({ spec, result }) => [
    `run_${spec.sequence_number}`,
    result ? "DONE" : "TODO",
    String(spec.sequence_number),
    String(spec.repetition),
    ...factorNames.map((name) => spec.levels[name] ?? ""),
    formatNumber(result?.batch_number),
    result?.status ?? "",
    result?.status_token ?? "",
    formatNumber(result?.runtime_s),
    formatNumber(result?.energy_j),
    formatNumber(result?.power_w),
    result?.measurement_source ?? ""
  ]);

  return stringify(records, { header: true, columns });
};
