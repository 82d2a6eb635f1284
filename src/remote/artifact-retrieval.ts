import { mkdirSync } from "node:fs";
import { join } from "node:path";

import { errorMessage } from "../core/errors.js";
import type { RemoteSession } from "../core/types.js";
import type { WarningSink } from "../utils/warnings.js";
import { excerpt, runBounded } from "./remote-client.js";
import type { RemoteTransport } from "./transport.js";

export const ENERGY_FILENAME = "energy.csv";
export const RESULT_FILENAME = "result.csv";
export const RESULT_FILENAMES = [ENERGY_FILENAME, RESULT_FILENAME] as const;

export type RetrievalReport = Record<string, boolean>;

export const remoteResultDir = (session: RemoteSession, sequenceNumber: number): string =>
  `${session.remoteDir.replace(/\/+$/, "")}/results/run_${sequenceNumber}`;

/**
 * Copies each expected result file independently; a failed copy is reported
 * as `false` and never aborts the remaining copies.
 */
export const retrieveArtifacts = async (
  session: RemoteSession,
  sequenceNumber: number,
  localDir: string,
  transport: RemoteTransport,
  warningSink?: WarningSink
): Promise<RetrievalReport> => {
  mkdirSync(localDir, { recursive: true });

  const remoteDir = remoteResultDir(session, sequenceNumber);
  const report: RetrievalReport = {};

  for (const filename of RESULT_FILENAMES) {
    const call = await runBounded(session.transferTimeoutMs, (signal) =>
      transport.copyFrom(session, `${remoteDir}/${filename}`, join(localDir, filename), signal)
    );

    if (call.kind === "exited" && call.exit.exitCode === 0) {
      report[filename] = true;
      continue;
    }

    report[filename] = false;
    const reason =
      call.kind === "timeout"
        ? `timed out after ${session.transferTimeoutMs}ms`
        : call.kind === "error"
          ? errorMessage(call.error)
          : excerpt(call.exit.stderr.trim()) || `exit code ${call.exit.exitCode}`;
    warningSink?.warn(
      `Run ${sequenceNumber}: could not retrieve ${filename} (${reason})`,
      "artifacts"
    );
  }

  return report;
};
