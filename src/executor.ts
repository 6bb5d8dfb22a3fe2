import execa from 'execa';
import type { Readable } from 'node:stream';
import { ExecutionResult } from './types.js';
import { Semaphore } from './semaphore.js';
import { errnoCode, errorMessage } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 64 * 1024;
export const DEFAULT_MAX_CONCURRENT = 4;
export const TRUNCATION_MARKER = '\n... (output truncated)';

/** How long to wait for pipes to drain once the process has exited */
const STREAM_DRAIN_GRACE_MS = 1000;

const SANDBOX_PATH = '/usr/local/bin:/usr/bin:/bin';

export interface ExecutorOptions {
  /** Working directory for every command; the document root */
  root: string;
  timeoutMs?: number;
  /** Per-stream capture cap */
  maxOutputBytes?: number;
  /** Bound on simultaneously running processes */
  maxConcurrent?: number;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Environment handed to every command. Nothing is inherited from the
 * server process.
 */
export function buildSandboxEnv(root: string): Record<string, string> {
  return {
    PATH: SANDBOX_PATH,
    HOME: root,
    LANG: 'C.UTF-8',
    LC_ALL: 'C.UTF-8',
  };
}

/**
 * Accumulates a stream up to a byte cap; the rest is drained and dropped
 */
class CappedBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer | string): void {
    const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    const room = this.limit - this.size;

    if (room <= 0) {
      this.truncated = this.truncated || data.length > 0;
      return;
    }
    if (data.length > room) {
      this.chunks.push(data.subarray(0, room));
      this.size += room;
      this.truncated = true;
      return;
    }
    this.chunks.push(data);
    this.size += data.length;
  }

  get byteLength(): number {
    return this.size;
  }

  toString(): string {
    const data = Buffer.concat(this.chunks);
    if (!this.truncated) {
      return data.toString('utf-8');
    }
    return data.subarray(0, completeUtf8Length(data)).toString('utf-8') + TRUNCATION_MARKER;
  }
}

/**
 * Length of `data` without a multi-byte UTF-8 sequence cut off at its end
 */
export function completeUtf8Length(data: Buffer): number {
  for (let back = 1; back <= Math.min(4, data.length); back++) {
    const byte = data[data.length - back];
    if ((byte & 0xc0) === 0x80) {
      continue; // continuation byte
    }
    const expected = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
    return expected > back ? data.length - back : data.length;
  }
  return data.length;
}

function drained(stream: Readable | null): Promise<void> {
  if (!stream || stream.destroyed || stream.readableEnded) {
    return Promise.resolve();
  }
  return new Promise(resolve => {
    stream.once('close', () => resolve());
    stream.once('end', () => resolve());
  });
}

/**
 * Send SIGKILL to a whole process group. Returns false if the group is
 * already gone.
 */
function killProcessGroup(pid: number): boolean {
  try {
    process.kill(-pid, 'SIGKILL');
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ESRCH') {
      return false;
    }
    throw error;
  }
}

/**
 * Runs validated argument vectors inside the document root.
 *
 * Commands are spawned directly (no shell), each as the leader of its own
 * process group so that a timeout or cancellation can take down every
 * descendant at once.
 */
export class SandboxedExecutor {
  private readonly root: string;
  private readonly timeoutMs: number;
  private readonly maxOutputBytes: number;
  private readonly slots: Semaphore;
  private readonly live = new Set<number>();

  constructor(options: ExecutorOptions) {
    this.root = options.root;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.slots = new Semaphore(options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
  }

  /**
   * Execute an argument vector. Never retries and never throws for a
   * command that ran; timeouts and cancellations come back as a result
   * with the matching status.
   */
  async execute(tokens: readonly string[], options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const [verb, ...args] = tokens;
    if (verb === undefined) {
      throw new Error('Cannot execute an empty command');
    }

    const startTime = Date.now();
    let release: () => void;
    try {
      release = await this.slots.acquire(options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        return abortedBeforeStart(startTime);
      }
      throw error;
    }

    try {
      return await this.run(verb, args, options.timeoutMs ?? this.timeoutMs, startTime, options.signal);
    } finally {
      release();
    }
  }

  /**
   * Kill every process group still running. Used on shutdown.
   */
  killAll(): number {
    let killed = 0;
    for (const pid of this.live) {
      if (killProcessGroup(pid)) {
        killed++;
      }
    }
    this.live.clear();
    return killed;
  }

  /** Default wall-clock limit in milliseconds */
  get timeout(): number {
    return this.timeoutMs;
  }

  get concurrency(): { running: number; waiting: number } {
    return { running: this.slots.size - this.slots.free, waiting: this.slots.pending };
  }

  private async run(
    verb: string,
    args: string[],
    timeoutMs: number,
    startTime: number,
    signal?: AbortSignal
  ): Promise<ExecutionResult> {
    const stdout = new CappedBuffer(this.maxOutputBytes);
    const stderr = new CappedBuffer(this.maxOutputBytes);
    let stopped: 'timeout' | 'aborted' | null = null;

    const subprocess = execa(verb, args, {
      cwd: this.root,
      env: buildSandboxEnv(this.root),
      extendEnv: false,
      shell: false,
      detached: true,
      buffer: false,
      reject: false,
      stdin: 'ignore',
      stripFinalNewline: false,
    });

    const pid = subprocess.pid;
    if (pid !== undefined) {
      this.live.add(pid);
    }

    const stop = (reason: 'timeout' | 'aborted'): void => {
      if (stopped) {
        return;
      }
      stopped = reason;
      if (pid === undefined) {
        return;
      }
      try {
        killProcessGroup(pid);
      } catch (error) {
        logger.warn(`Failed to kill process group ${pid}: ${errorMessage(error)}`);
        subprocess.kill('SIGKILL');
      }
    };

    const timer = setTimeout(() => stop('timeout'), timeoutMs);
    const onAbort = (): void => stop('aborted');
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      onAbort();
    }

    subprocess.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    subprocess.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    let exitCode: number | null = null;
    let terminatedBy: string | undefined;
    try {
      const result = await subprocess;
      exitCode = typeof result.exitCode === 'number' ? result.exitCode : null;
      terminatedBy = result.signal;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      if (pid !== undefined) {
        this.live.delete(pid);
        // Reap descendants that outlived the leader
        try {
          killProcessGroup(pid);
        } catch (error) {
          logger.debug(`Process group ${pid} cleanup: ${errorMessage(error)}`);
        }
      }
    }

    await Promise.race([
      Promise.all([drained(subprocess.stdout), drained(subprocess.stderr)]),
      new Promise<void>(resolve => setTimeout(resolve, STREAM_DRAIN_GRACE_MS).unref()),
    ]);
    subprocess.stdout?.destroy();
    subprocess.stderr?.destroy();

    const duration = Date.now() - startTime;
    const base = {
      stdout: stdout.toString(),
      truncated: stdout.truncated || stderr.truncated,
      duration_ms: duration,
    };

    if (stopped) {
      return { ...base, stderr: stderr.toString(), exit_code: null, status: stopped };
    }

    if (exitCode === null && !terminatedBy) {
      // The verb could not be started at all (missing binary, permissions)
      const message = stderr.byteLength > 0 ? stderr.toString() : `${verb}: failed to start\n`;
      return { ...base, stderr: message, exit_code: 127, status: 'exited' };
    }

    return {
      ...base,
      stderr: terminatedBy ? `${stderr.toString()}terminated by ${terminatedBy}\n` : stderr.toString(),
      exit_code: exitCode,
      status: 'exited',
    };
  }
}

function abortedBeforeStart(startTime: number): ExecutionResult {
  return {
    stdout: '',
    stderr: '',
    exit_code: null,
    duration_ms: Date.now() - startTime,
    truncated: false,
    status: 'aborted',
  };
}
