import { spawn } from "node:child_process";
import { startTimer } from "../../shared/utils/timers.js";

export interface ProcessRequest {
  readonly command: string;
  readonly args: readonly string[];
  readonly env: NodeJS.ProcessEnv;
  readonly timeoutMs: number;
  /** Kills the child when aborted */
  readonly signal: AbortSignal;
}

export interface ProcessResult {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
}

/** Starts a process and waits for it to exit. Rejects only when it cannot start. */
export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessResult>;

/** Keep at most this many trailing characters of each stream */
const MAX_CAPTURE = 16_384;

/** Time a child gets to exit after SIGTERM before it is sent SIGKILL */
export const KILL_GRACE_MS = 5_000;

const appendTail = (buffer: string, chunk: string): string => {
  const next = buffer + chunk;
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
};

export const spawnProcess: ProcessRunner = (request) =>
  new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(request.command, [...request.args], {
      env: request.env,
      signal: request.signal,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let started = false;

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout = appendTail(stdout, chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr = appendTail(stderr, chunk);
    });

    let cancelKill = (): void => {};
    const forceKillLater = (): void => {
      cancelKill();
      cancelKill = startTimer(KILL_GRACE_MS, () => {
        child.kill("SIGKILL");
      });
    };

    const cancelTimeout = startTimer(request.timeoutMs, () => {
      timedOut = true;
      child.kill("SIGTERM");
      forceKillLater();
    });

    // spawn() already sends SIGTERM on abort; follow up in case it is ignored.
    const onAbort = (): void => forceKillLater();
    request.signal.addEventListener("abort", onAbort, { once: true });

    const cleanup = (): void => {
      cancelTimeout();
      cancelKill();
      request.signal.removeEventListener("abort", onAbort);
    };

    child.once("spawn", () => {
      started = true;
    });

    // An abort after start surfaces as an "error" followed by "close";
    // "close" carries the result, so only a failed start rejects.
    child.once("error", (error) => {
      if (!started) {
        cleanup();
        reject(error);
      }
    });

    child.once("close", (exitCode, signal) => {
      cleanup();
      resolve({ exitCode, signal, stdout, stderr, timedOut });
    });
  });
