/**
 * Process Runner — one external tool invocation.
 *
 * Output is exposed as an async iterable of stdout lines so the caller can
 * watch lines arrive while timeout and cancellation run alongside. Exactly
 * one outcome is produced per invocation and cached for repeated queries.
 */

import { execa, ExecaError } from 'execa';

export type ProcessStatus = 'succeeded' | 'failed' | 'timed-out' | 'cancelled';

export interface ProcessOutcome {
  status: ProcessStatus;
  exitCode: number | null;
  stderr: string;
  durationMs: number;
}

export interface ProcessSpec {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs: number;
  /** Time between the graceful and the forced kill. */
  killGraceMs?: number;
  signal?: AbortSignal;
}

export interface ProcessHandle {
  readonly pid: number | undefined;
  lines(): AsyncIterable<string>;
  outcome(): Promise<ProcessOutcome>;
  cancel(): void;
}

/** Starts a process. Stage executors take one of these so tests can fake it. */
export type ProcessLauncher = (spec: ProcessSpec) => ProcessHandle;

export const DEFAULT_KILL_GRACE_MS = 5_000;
const MAX_STDERR_CHARS = 4_000;

export function tailText(text: string, maxChars = MAX_STDERR_CHARS): string {
  return text.length > maxChars ? text.slice(-maxChars) : text;
}

export const startProcess: ProcessLauncher = (spec) => {
  const controller = new AbortController();
  const external = spec.signal;
  const forwardAbort = () => controller.abort();
  if (external) {
    if (external.aborted) controller.abort();
    else external.addEventListener('abort', forwardAbort, { once: true });
  }

  const startedAt = Date.now();
  const subprocess = execa(spec.command, spec.args, {
    cwd: spec.cwd,
    env: spec.env,
    stdin: 'ignore',
    // stdout is consumed line by line through lines(); only stderr is kept.
    buffer: { stdout: false },
    reject: false,
    timeout: spec.timeoutMs,
    cancelSignal: controller.signal,
    killSignal: 'SIGTERM',
    forceKillAfterDelay: spec.killGraceMs ?? DEFAULT_KILL_GRACE_MS,
  });

  // The stage-wide signal outlives this invocation.
  const detach = () => external?.removeEventListener('abort', forwardAbort);
  void subprocess.then(detach, detach);

  let cached: Promise<ProcessOutcome> | null = null;

  const outcome = (): Promise<ProcessOutcome> => {
    cached ??= subprocess.then((result): ProcessOutcome => {
      const durationMs = result.durationMs ?? Date.now() - startedAt;
      const stderr = tailText(result.stderr ?? '');
      if (result.isCanceled) {
        return { status: 'cancelled', exitCode: result.exitCode ?? null, stderr, durationMs };
      }
      if (result.timedOut) {
        return { status: 'timed-out', exitCode: result.exitCode ?? null, stderr, durationMs };
      }
      if (!result.failed && result.exitCode === 0) {
        return { status: 'succeeded', exitCode: 0, stderr, durationMs };
      }
      const failure: unknown = result;
      const spawnFailed = failure instanceof ExecaError && failure.exitCode === undefined && !failure.signal;
      return {
        status: 'failed',
        exitCode: result.exitCode ?? null,
        stderr: spawnFailed ? tailText(failure.shortMessage) : stderr,
        durationMs,
      };
    });
    return cached;
  };

  async function* lines(): AsyncGenerator<string> {
    try {
      for await (const line of subprocess) {
        yield line;
      }
    } catch {
      // The iterator rejects when the process fails; the outcome carries why.
      return;
    }
  }

  return {
    pid: subprocess.pid,
    lines,
    outcome,
    cancel: () => controller.abort(),
  };
};
