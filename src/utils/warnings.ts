import type { EventBus } from "../events/event-bus.js";

export type WarningRecord = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type WarningSink = {
  warn: (message: string, source?: string) => void;
};

export const createConsoleWarningSink = (): WarningSink => ({
  warn: (message: string, source?: string) => {
    if (source) {
      console.warn(`[${source}] ${message}`);
    } else {
      console.warn(message);
    }
  }
});

/** Publishes warnings as `warning.raised` so they land in the execution log. */
export const createEventWarningSink = (bus: EventBus): WarningSink => ({
  warn: (message: string, source?: string) => {
    bus.emit({
      type: "warning.raised",
      payload: {
        message,
        source,
        recorded_at: new Date().toISOString()
      }
    });
  }
});

export const createMemoryWarningSink = (): WarningSink & { records: WarningRecord[] } => {
  const records: WarningRecord[] = [];
  return {
    records,
    warn: (message: string, source?: string) => {
      records.push({ message, source, recorded_at: new Date().toISOString() });
    }
  };
};
