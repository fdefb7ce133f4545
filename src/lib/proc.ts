import { spawn } from 'node:child_process';
import { PassThrough, type Readable } from 'node:stream';

export type ProcResult = { code: number; stdout: string; stderr: string };

/**
 * A function that executes a command and returns code/stdout/stderr.
 * Used to inject a fake runner in tests.
 */
export type Runner = (
  cmd: string,
  args: string[],
  opts?: { signal?: AbortSignal },
) => Promise<ProcResult>;

export const DEFAULT_KILL_GRACE_MS = 2000;

/**
 * Send SIGTERM, then SIGKILL if the child is still around after `graceMs`.
 * Returns a function that cancels the pending SIGKILL.
 */
function terminate(child: ReturnType<typeof spawn>, graceMs: number): () => void {
  child.kill('SIGTERM');
  const timer = setTimeout(() => {
    if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
  }, graceMs);
  timer.unref();
  return () => clearTimeout(timer);
}

/**
 * Spawn a child process and collect stdout/stderr while optionally streaming output.
 *
 * - When `quiet` is false, mirrors child output to the current process stdout/stderr.
 * - When `onStdout` is provided, it receives stdout chunks (useful for progress parsing).
 * - When `signal` aborts, the child is terminated and the promise resolves once it exits.
 * - Resolves with exit `code`, aggregated `stdout`, and `stderr`. A child killed by a
 *   signal, or one that failed to spawn, reports a non-zero code.
 */
export function spawnStreaming(
  cmd: string,
  args: string[],
  {
    quiet = false,
    onStdout,
    onStderr,
    signal,
    killGraceMs = DEFAULT_KILL_GRACE_MS,
  }: {
    quiet?: boolean;
    onStdout?: (chunk: string) => void;
    onStderr?: (chunk: string) => void;
    signal?: AbortSignal;
    killGraceMs?: number;
  } = {},
) {
  return new Promise<ProcResult>((resolve) => {
    if (signal?.aborted) {
      resolve({ code: 1, stdout: '', stderr: 'aborted before start' });
      return;
    }
    const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '',
      stderr = '';
    let cancelKill: (() => void) | null = null;
    const onAbort = () => {
      cancelKill = terminate(child, killGraceMs);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    const finish = (res: ProcResult) => {
      signal?.removeEventListener('abort', onAbort);
      if (cancelKill) cancelKill();
      resolve(res);
    };

    child.stdout.on('data', (d: Buffer) => {
      const s = d.toString();
      stdout += s;
      if (onStdout) onStdout(s);
      else if (!quiet) process.stdout.write(s);
    });
    child.stderr.on('data', (d: Buffer) => {
      const s = d.toString();
      stderr += s;
      if (onStderr) onStderr(s);
      else if (!quiet) process.stderr.write(s);
    });
    child.on('error', (err) => {
      stderr += String(err);
      finish({ code: 1, stdout, stderr });
    });
    child.on('close', (code) => finish({ code: code ?? 1, stdout, stderr }));
  });
}

/** Runner backed by real child processes. */
export const spawnRunner: Runner = (cmd, args, opts) =>
  spawnStreaming(cmd, args, { quiet: true, signal: opts?.signal });

/**
 * Spawn a child process and expose its stdout as a stream.
 *
 * The returned stream only ends once the child has exited with code 0; any
 * other exit destroys it with the error produced by `onExitError`, so a
 * consumer never mistakes a truncated stream for a complete one.
 */
export function spawnStream(
  cmd: string,
  args: string[],
  {
    signal,
    killGraceMs = DEFAULT_KILL_GRACE_MS,
    onExitError,
  }: {
    signal?: AbortSignal;
    killGraceMs?: number;
    onExitError: (code: number | null, stderr: string, spawnError?: Error) => Error;
  },
): Readable {
  const out = new PassThrough();
  const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
  let stderr = '';
  let spawnError: Error | undefined;
  let cancelKill: (() => void) | null = null;
  let settled = false;

  const onAbort = () => {
    cancelKill = terminate(child, killGraceMs);
  };
  if (signal?.aborted) onAbort();
  else signal?.addEventListener('abort', onAbort, { once: true });

  // the consumer giving up (e.g. a failed pipeline) also stops the child
  out.on('close', () => {
    if (settled || cancelKill) return;
    if (child.exitCode === null && child.signalCode === null) onAbort();
  });

  child.stdout.pipe(out, { end: false });
  child.stderr.on('data', (d: Buffer) => {
    stderr += d.toString();
  });
  const settle = (code: number | null) => {
    if (settled) return;
    settled = true;
    signal?.removeEventListener('abort', onAbort);
    if (cancelKill) cancelKill();
    if (code === 0 && !spawnError) out.end();
    else out.destroy(onExitError(code, stderr.trim(), spawnError));
  };
  child.on('error', (err) => {
    spawnError = err;
    // a child that never started will not necessarily emit 'close'
    if (child.pid === undefined) settle(null);
  });
  child.on('close', (code) => settle(code));
  return out;
}
