import type { EventBus } from "../events/event-bus.js";
import type { TrialResult } from "../core/types.js";

const fixed = (value: number | null, digits: number): string =>
  value === null ? "-" : value.toFixed(digits);

export const formatResultRow = (result: TrialResult, planned: number): string => {
  const levels = Object.values(result.levels).join(" ");
  const head =
    `[${result.sequence_number}/${planned}] batch ${result.batch_number} ` +
    `${levels} rep ${result.repetition}`;
  if (result.status !== "SUCCESS") {
    return `${head} -> ${result.status_token ?? result.status}`;
  }
  const power = result.power_w === null ? "" : ` ${fixed(result.power_w, 2)} W`;
  return `${head} -> ${fixed(result.runtime_s, 3)} s ${fixed(result.energy_j, 3)} J${power}`;
};

/** Prints run progress to stdout as events arrive. */
export const attachConsoleReporter = (
  bus: EventBus,
  print: (line: string) => void = (line) => console.log(line)
): (() => void) => {
  let planned = 0;
  const unsubs = [
    bus.subscribeSafe("run.started", (payload) => {
      planned = payload.k_planned;
      print(
        `Run ${payload.run_id} (${payload.mode}): ${payload.k_planned} runs, batch size ${payload.batch_size}`
      );
    }),
    bus.subscribeSafe("batch.started", (payload) => {
      print(`-- batch ${payload.batch_number} --`);
    }),
    bus.subscribeSafe("trial.completed", (payload) => {
      print(formatResultRow(payload.result, planned));
    }),
    bus.subscribeSafe("run.completed", (payload) => {
      print(
        `Finished (${payload.stop_reason}): ${payload.k_succeeded}/${payload.k_attempted} runs succeeded`
      );
    })
  ];
  return () => unsubs.forEach((unsubscribe) => unsubscribe());
};
