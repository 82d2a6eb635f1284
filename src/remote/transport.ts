import { spawn } from "node:child_process";

import type { RemoteSession } from "../core/types.js";

export type TransportExit = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * Channel to the DUT. Implementations must stop waiting once `signal` aborts;
 * aborting tears down the local side of the connection only.
 */
export interface RemoteTransport {
  exec(session: RemoteSession, command: string, signal: AbortSignal): Promise<TransportExit>;
  copyFrom(
    session: RemoteSession,
    remotePath: string,
    localPath: string,
    signal: AbortSignal
  ): Promise<TransportExit>;
}

export type SshTransportOptions = {
  sshBinary?: string;
  scpBinary?: string;
  connectTimeoutSeconds?: number;
  extraOptions?: string[];
};

const MAX_CAPTURED_CHARS = 64 * 1024;

const DEFAULT_CONNECT_TIMEOUT_SECONDS = 10;

const destination = (session: RemoteSession): string => `${session.user}@${session.host}`;

const commonOptions = (options: SshTransportOptions): string[] => [
  "-o",
  "BatchMode=yes",
  "-o",
  `ConnectTimeout=${options.connectTimeoutSeconds ?? DEFAULT_CONNECT_TIMEOUT_SECONDS}`,
  ...(options.extraOptions ?? [])
];

export const buildSshArgs = (
  session: RemoteSession,
  command: string,
  options: SshTransportOptions = {}
): string[] => [...commonOptions(options), destination(session), command];

export const buildScpArgs = (
  session: RemoteSession,
  remotePath: string,
  localPath: string,
  options: SshTransportOptions = {}
): string[] => [
  ...commonOptions(options),
  "-q",
  `${destination(session)}:${remotePath}`,
  localPath
];

const appendCapped = (current: string, chunk: Buffer): string =>
  current.length >= MAX_CAPTURED_CHARS
    ? current
    : (current + chunk.toString("utf8")).slice(0, MAX_CAPTURED_CHARS);

export type LocalProcessOptions = {
  /**
   * Start the child in its own process group so a terminal Ctrl-C reaches
   * only the controller; the child then ends on `signal` or on its own.
   */
  detached?: boolean;
};

export const runLocalProcess = (
  binary: string,
  args: string[],
  signal: AbortSignal,
  options: LocalProcessOptions = {}
): Promise<TransportExit> =>
  new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error(`${binary} aborted before start`));
      return;
    }

    const child = spawn(binary, args, {
      stdio: ["ignore", "pipe", "pipe"],
      detached: options.detached ?? false
    });
    let stdout = "";
    let stderr = "";

    const onAbort = (): void => {
      child.kill("SIGTERM");
    };
    signal.addEventListener("abort", onAbort, { once: true });

    child.stdout.on("data", (chunk: Buffer) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr = appendCapped(stderr, chunk);
    });
    child.once("error", (error) => {
      signal.removeEventListener("abort", onAbort);
      reject(error);
    });
    child.once("close", (code) => {
      signal.removeEventListener("abort", onAbort);
      resolve({ exitCode: code ?? -1, stdout, stderr });
    });
  });

export const createSshTransport = (options: SshTransportOptions = {}): RemoteTransport => {
  const sshBinary = options.sshBinary ?? "ssh";
  const scpBinary = options.scpBinary ?? "scp";

  return {
    exec: (session, command, signal) =>
      runLocalProcess(sshBinary, buildSshArgs(session, command, options), signal, {
        detached: true
      }),
    copyFrom: (session, remotePath, localPath, signal) =>
      runLocalProcess(scpBinary, buildScpArgs(session, remotePath, localPath, options), signal, {
        detached: true
      })
  };
};
