import { readFileSync, writeFileSync } from "node:fs";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { derivePower } from "./measurement-model.js";

export const SYNTHETIC_CSV_COLUMNS = [
  "timestamp",
  "energy_joules",
  "power_watts",
  "execution_time"
] as const;

export type SyntheticCsvRow = {
  energyJoules: number;
  executionSeconds: number;
  timestamp?: number;
};

export const formatSyntheticCsv = (row: SyntheticCsvRow): string => {
  const timestamp = row.timestamp ?? Math.floor(Date.now() / 1000);
  return stringify(
    [
      {
        timestamp,
        energy_joules: row.energyJoules.toFixed(6),
        power_watts: derivePower(row.energyJoules, row.executionSeconds).toFixed(6),
        execution_time: row.executionSeconds.toFixed(6)
      }
    ],
    { header: true, columns: [...SYNTHETIC_CSV_COLUMNS] }
  );
};

export const writeSyntheticCsv = (path: string, row: SyntheticCsvRow): void => {
  writeFileSync(path, formatSyntheticCsv(row), "utf8");
};

/** Energy from the first data row, or null when the file is absent or malformed. */
export const readSyntheticEnergy = (path: string): number | null => {
  let rows: unknown;
  try {
    rows = parse(readFileSync(path, "utf8"), { columns: true, skip_empty_lines: true });
  } catch {
    return null;
  }

  if (!Array.isArray(rows) || rows.length === 0) {
    return null;
  }
  const first: unknown = rows[0];
  if (typeof first !== "object" || first === null || !("energy_joules" in first)) {
    return null;
  }
  const energy = Number(first.energy_joules);
  return Number.isFinite(energy) ? energy : null;
};
