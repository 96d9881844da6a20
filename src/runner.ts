import { spawn } from 'node:child_process';

export interface RunOptions {
  env?: Record<string, string>;
  cwd?: string;
  timeoutMs?: number | null;
  signal?: AbortSignal;
  maxOutputBytes?: number;
}

export interface RunResult {
  output: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  outputTruncated: boolean;
  error: string | null;
  timedOut: boolean;
  cancelled: boolean;
}

const KILL_GRACE_MS = 2000;
const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

/**
 * Runs argv[0] with the remaining entries as arguments and collects stdout and
 * stderr into one buffer in arrival order. Never rejects: spawn failures,
 * timeouts and cancellation are reported on the result.
 */
export function runProcess(argv: readonly string[], options: RunOptions = {}): Promise<RunResult> {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error('Command is required');
  }
  const maxOutputBytes = options.maxOutputBytes && options.maxOutputBytes > 0
    ? options.maxOutputBytes
    : DEFAULT_MAX_OUTPUT_BYTES;
  const startedAt = new Date().toISOString();

  const chunks: Buffer[] = [];
  let size = 0;
  let outputTruncated = false;
  let timedOut = false;
  let cancelled = false;
  let errorMessage: string | null = null;

  return new Promise<RunResult>((resolve) => {
    if (options.signal?.aborted) {
      const finishedAt = new Date().toISOString();
      resolve({
        output: '',
        exitCode: null,
        signal: null,
        startedAt,
        finishedAt,
        durationMs: 0,
        outputTruncated: false,
        error: 'execution cancelled',
        timedOut: false,
        cancelled: true,
      });
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd || process.cwd(),
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const append = (chunk: Buffer) => {
      if (outputTruncated) return;
      const remaining = maxOutputBytes - size;
      const slice = chunk.length > remaining ? chunk.subarray(0, remaining) : chunk;
      chunks.push(slice);
      size += slice.length;
      if (slice.length < chunk.length) outputTruncated = true;
    };

    child.stdout.on('data', append);
    child.stderr.on('data', append);

    let timeout: NodeJS.Timeout | null = null;
    let killTimer: NodeJS.Timeout | null = null;
    if (options.timeoutMs && options.timeoutMs > 0) {
      timeout = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
        }, KILL_GRACE_MS);
      }, options.timeoutMs);
    }

    const onAbort = () => {
      cancelled = true;
      child.kill('SIGKILL');
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    let settled = false;
    const finish = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      if (timeout) clearTimeout(timeout);
      if (killTimer) clearTimeout(killTimer);
      options.signal?.removeEventListener('abort', onAbort);
      const finishedAt = new Date().toISOString();
      let error = errorMessage;
      if (cancelled) {
        error = 'execution cancelled';
      } else if (timedOut) {
        error = `command timed out after ${options.timeoutMs}ms`;
      }
      resolve({
        output: Buffer.concat(chunks).toString('utf8'),
        exitCode: code,
        signal,
        startedAt,
        finishedAt,
        durationMs: Date.now() - Date.parse(startedAt),
        outputTruncated,
        error,
        timedOut,
        cancelled,
      });
    };

    child.on('error', (err) => {
      errorMessage = err.message || 'spawn error';
      // No pid means the process never started.
      if (child.pid === undefined) finish(null, null);
    });

    child.on('close', (code, signal) => {
      finish(typeof code === 'number' ? code : null, signal);
    });
  });
}

/** Human-readable failure reason for a finished run, or null when it succeeded. */
export function describeFailure(result: RunResult): string | null {
  if (result.error) return result.error;
  if (result.exitCode !== null && result.exitCode !== 0) return `exit status ${result.exitCode}`;
  if (result.exitCode === null && result.signal) return `terminated by ${result.signal}`;
  return null;
}
