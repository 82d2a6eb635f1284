import { errorMessage } from "../core/errors.js";
import type { ExecutionOutcome, RemoteSession } from "../core/types.js";
import type { RemoteTransport, TransportExit } from "./transport.js";

export const STDERR_EXCERPT_CHARS = 500;

/** Exit code reported when the transport itself could not be started. */
export const TRANSPORT_ERROR_EXIT_CODE = 255;

/** Largest delay a Node timer honors; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type BoundedCall =
  | { kind: "exited"; exit: TransportExit; elapsedMs: number }
  | { kind: "timeout"; elapsedMs: number }
  | { kind: "error"; error: unknown; elapsedMs: number };

/**
 * Races a transport call against a wall-clock bound. On timeout the call's
 * signal is aborted so the local connection is torn down; nothing is sent to
 * the DUT, whose process state is left untracked.
 */
export const runBounded = async (
  timeoutMs: number,
  start: (signal: AbortSignal) => Promise<TransportExit>
): Promise<BoundedCall> => {
  const startedAt = Date.now();
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const call = start(controller.signal).then(
    (exit): BoundedCall => ({ kind: "exited", exit, elapsedMs: Date.now() - startedAt }),
    (error: unknown): BoundedCall => ({ kind: "error", error, elapsedMs: Date.now() - startedAt })
  );
  const deadline = new Promise<BoundedCall>((resolve) => {
    timer = setTimeout(
      () => resolve({ kind: "timeout", elapsedMs: Date.now() - startedAt }),
      Math.min(Math.max(0, timeoutMs), MAX_TIMER_DELAY_MS)
    );
  });

  try {
    const settled = await Promise.race([call, deadline]);
    if (settled.kind === "timeout") {
      controller.abort();
    }
    return settled;
  } finally {
    clearTimeout(timer);
  }
};

export const excerpt = (text: string, limit = STDERR_EXCERPT_CHARS): string => text.slice(0, limit);

export const classifyOutcome = (call: BoundedCall): ExecutionOutcome => {
  switch (call.kind) {
    case "timeout":
      return { status: "TIMEOUT", elapsedMs: call.elapsedMs };
    case "error":
      return {
        status: "FAILED",
        exitCode: TRANSPORT_ERROR_EXIT_CODE,
        stderrExcerpt: excerpt(errorMessage(call.error)),
        elapsedMs: call.elapsedMs
      };
    case "exited":
      if (call.exit.exitCode === 0) {
        return { status: "SUCCESS", exitCode: 0, elapsedMs: call.elapsedMs };
      }
      return {
        status: "FAILED",
        exitCode: call.exit.exitCode,
        stderrExcerpt: excerpt(call.exit.stderr),
        elapsedMs: call.elapsedMs
      };
  }
};

export const executeRemote = async (
  session: RemoteSession,
  command: string,
  transport: RemoteTransport
): Promise<ExecutionOutcome> =>
  classifyOutcome(
    await runBounded(session.timeoutMs, (signal) => transport.exec(session, command, signal))
  );

export type ConnectivityCheck = { ok: true } | { ok: false; detail: string };

export const checkConnectivity = async (
  session: RemoteSession,
  transport: RemoteTransport,
  timeoutMs = 10_000
): Promise<ConnectivityCheck> => {
  const outcome = classifyOutcome(
    await runBounded(timeoutMs, (signal) =>
      transport.exec(session, 'echo "connectivity check"', signal)
    )
  );
  switch (outcome.status) {
    case "SUCCESS":
      return { ok: true };
    case "TIMEOUT":
      return { ok: false, detail: `no response within ${timeoutMs}ms` };
    case "FAILED":
      return {
        ok: false,
        detail: outcome.stderrExcerpt.trim() || `exit code ${outcome.exitCode}`
      };
  }
};
