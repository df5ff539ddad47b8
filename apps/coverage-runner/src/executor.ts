import { spawn, type ChildProcess } from "node:child_process";
import os from "node:os";
import type { ComparisonRun } from "shared-types";
import { SPAWN_FAILURE_MARKER, TIMEOUT_MARKER } from "./metrics";

export const TIMEOUT_EXIT_CODE = 124;
export const SPAWN_FAILURE_EXIT_CODE = 127;
/** Largest timeout a Node timer can hold, in whole seconds. */
export const MAX_TIMEOUT_SEC = Math.floor((2 ** 31 - 1) / 1000);

const SIGNAL_NUMBERS: ReadonlyMap<string, number> = new Map(Object.entries(os.constants.signals));

/** Shell convention: 128 + signal number, or 1 for a signal this platform does not number. */
export function signalExitCode(signal: string): number {
  const n = SIGNAL_NUMBERS.get(signal);
  return n === undefined ? 1 : 128 + n;
}

export function clampTimeoutSec(timeoutSec: number): number {
  return Math.min(MAX_TIMEOUT_SEC, Math.max(1, timeoutSec));
}

export type ComparisonRequest = {
  command: string;
  args: readonly string[];
  cwd?: string;
  envVar: string;
  locator: string;
  timeoutSec: number;
  env?: NodeJS.ProcessEnv;
};

const active = new Set<ChildProcess>();

function killTree(child: ChildProcess): void {
  if (child.pid === undefined) return;
  if (process.platform !== "win32") {
    try {
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch {
      // group already gone; fall through to the direct kill
    }
  }
  child.kill("SIGKILL");
}

/** Kills every comparison still running, e.g. when the runner is interrupted. */
export function killActiveComparisons(): number {
  const n = active.size;
  for (const child of active) killTree(child);
  active.clear();
  return n;
}

/**
 * Runs the comparison test for one sample. Never rejects: spawn errors and
 * timeouts come back as a non-zero exit code with a marker line in the output.
 */
export function runComparison(req: ComparisonRequest): Promise<ComparisonRun> {
  const timeoutSec = clampTimeoutSec(req.timeoutSec);

  return new Promise<ComparisonRun>((resolve) => {
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;

    const finish = (run: ComparisonRun) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      active.delete(child);
      resolve(run);
    };

    const child = spawn(req.command, [...req.args], {
      cwd: req.cwd,
      env: { ...(req.env ?? process.env), [req.envVar]: req.locator },
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
      shell: false,
    });

    active.add(child);

    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child);
    }, timeoutSec * 1000);

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => (stdout += chunk));
    child.stderr?.on("data", (chunk: string) => (stderr += chunk));

    child.once("error", (err) => {
      finish({
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        output: `${SPAWN_FAILURE_MARKER}: ${req.command}: ${err.message}`,
        timedOut: false,
      });
    });

    child.once("close", (code, signal) => {
      const output = `${stdout}\n${stderr}`;
      if (timedOut) {
        finish({ exitCode: TIMEOUT_EXIT_CODE, output: `${output}\n${TIMEOUT_MARKER}: ${timeoutSec}s`, timedOut: true });
        return;
      }
      if (code === null) {
        const name = signal ?? "unknown signal";
        finish({ exitCode: signalExitCode(name), output: `${output}\nterminated by ${name}`, timedOut: false });
        return;
      }
      finish({ exitCode: code, output, timedOut: false });
    });
  });
}
