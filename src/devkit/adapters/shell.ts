import { platform as osPlatform } from 'os';
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import type { ExecutionResult } from '../types.js';
import { appendCapped } from '../utils.js';
import { errnoCode } from '../errors.js';

export interface ShellRunOptions {
  cwd: string;
  timeout_ms: number;
  env?: Readonly<Record<string, string>>;
  /** Per-stream capture cap. Bytes past it are read and discarded. */
  max_output_bytes?: number;
  /** Time between the polite and the forceful kill. */
  kill_grace_ms?: number;
  signal?: AbortSignal;
}

export const DEFAULT_MAX_OUTPUT_BYTES = 50_000_000;
export const DEFAULT_KILL_GRACE_MS = 5_000;
/** After SIGKILL, how long to wait for 'close' before settling anyway. */
const KILL_REAP_MS = 250;
/** After 'exit', how long a grandchild may hold the pipes open. */
const EXIT_DRAIN_MS = 2_000;

export abstract class ShellAdapter {
  abstract run(file: string, args: readonly string[], options: ShellRunOptions): Promise<ExecutionResult>;
  abstract which(binary: string): Promise<string | null>;

  /**
   * Factory: returns the appropriate adapter for the given (or current) OS.
   */
  static create(platform: NodeJS.Platform = osPlatform()): ShellAdapter {
    return platform === 'win32' ? new WindowsAdapter() : new PosixAdapter();
  }
}

// ─── Inline implementations ───────────────────────────────────────────────────

class WindowsAdapter extends ShellAdapter {
  async run(file: string, args: readonly string[], options: ShellRunOptions): Promise<ExecutionResult> {
    return spawnSupervised(file, args, options, { detached: false, windowsHide: true, terminate: taskkill });
  }

  async which(binary: string): Promise<string | null> {
    const result = await this.run('where', [binary], { cwd: process.cwd(), timeout_ms: 5000 });
    if (result.exitCode !== 0) return null;
    const first = result.stdout.trim().split(/\r?\n/)[0];
    return first || null;
  }
}

class PosixAdapter extends ShellAdapter {
  async run(file: string, args: readonly string[], options: ShellRunOptions): Promise<ExecutionResult> {
    // detached puts the child at the head of its own process group so the
    // whole tree (npm lifecycle scripts, uv build backends) can be signalled.
    return spawnSupervised(file, args, options, { detached: true, windowsHide: false, terminate: killGroup });
  }

  async which(binary: string): Promise<string | null> {
    const result = await this.run('which', [binary], { cwd: process.cwd(), timeout_ms: 5000 });
    if (result.exitCode !== 0) return null;
    return result.stdout.trim().split('\n')[0] || null;
  }
}

// ─── Termination strategies ──────────────────────────────────────────────────

type Terminator = (child: ChildProcess, force: boolean) => void;

function killGroup(child: ChildProcess, force: boolean): void {
  if (child.pid === undefined) return;
  const signal = force ? 'SIGKILL' : 'SIGTERM';
  try {
    process.kill(-child.pid, signal);
  } catch (err) {
    // ESRCH: the group is already gone
    if (errnoCode(err) !== 'ESRCH') child.kill(signal);
  }
}

function taskkill(child: ChildProcess, force: boolean): void {
  if (child.pid === undefined) return;
  const args = ['/pid', String(child.pid), '/T', ...(force ? ['/F'] : [])];
  const killer = spawn('taskkill', args, { windowsHide: true, stdio: 'ignore' });
  killer.on('error', () => {
    child.kill(force ? 'SIGKILL' : 'SIGTERM');
  });
}

// ─── Shared supervision ──────────────────────────────────────────────────────

interface PlatformSpawn {
  detached: boolean;
  windowsHide: boolean;
  terminate: Terminator;
}

interface Capture {
  chunks: Buffer[];
  held: number;
  truncated: boolean;
}

function spawnSupervised(
  file: string,
  args: readonly string[],
  options: ShellRunOptions,
  platform: PlatformSpawn,
): Promise<ExecutionResult> {
  const limit = options.max_output_bytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  const grace = options.kill_grace_ms ?? DEFAULT_KILL_GRACE_MS;
  const started = Date.now();
  const stdout: Capture = { chunks: [], held: 0, truncated: false };
  const stderr: Capture = { chunks: [], held: 0, truncated: false };

  const result = (exitCode: number, extra: Partial<ExecutionResult> = {}): ExecutionResult => ({
    exitCode,
    stdout: Buffer.concat(stdout.chunks).toString('utf8'),
    stderr: Buffer.concat(stderr.chunks).toString('utf8'),
    durationMs: Date.now() - started,
    timedOut: false,
    cancelled: false,
    truncated: { stdout: stdout.truncated, stderr: stderr.truncated },
    ...extra,
  });

  if (options.signal?.aborted) {
    return Promise.resolve(result(1, { cancelled: true }));
  }

  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(file, [...args], {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        shell: false,
        detached: platform.detached,
        windowsHide: platform.windowsHide,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      resolve(result(1, { stderr: message, spawnError: message }));
      return;
    }

    let settled = false;
    let stopping: 'timeout' | 'cancel' | null = null;
    const notes: string[] = [];
    let graceTimer: NodeJS.Timeout | undefined;
    let reapTimer: NodeJS.Timeout | undefined;
    let drainTimer: NodeJS.Timeout | undefined;

    const capture = (target: Capture) => (chunk: Buffer) => {
      const next = appendCapped(target.chunks, target.held, chunk, limit);
      target.held = next.held;
      if (next.dropped) target.truncated = true;
    };
    child.stdout?.on('data', capture(stdout));
    child.stderr?.on('data', capture(stderr));

    const stop = (reason: 'timeout' | 'cancel') => {
      if (settled || stopping) return;
      stopping = reason;
      platform.terminate(child, false);
      graceTimer = setTimeout(() => {
        platform.terminate(child, true);
        reapTimer = setTimeout(() => finish(1), KILL_REAP_MS);
      }, grace);
    };

    const timer = setTimeout(() => stop('timeout'), options.timeout_ms);
    const onAbort = () => stop('cancel');
    options.signal?.addEventListener('abort', onAbort, { once: true });

    function finish(exitCode: number, spawnError?: string): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(graceTimer);
      clearTimeout(reapTimer);
      clearTimeout(drainTimer);
      options.signal?.removeEventListener('abort', onAbort);

      // the group can outlive its leader (lifecycle scripts, build backends)
      platform.terminate(child, true);
      child.stdout?.destroy();
      child.stderr?.destroy();

      const base = result(exitCode, {
        timedOut: stopping === 'timeout',
        cancelled: stopping === 'cancel',
        pid: child.pid,
        ...(spawnError ? { spawnError } : {}),
      });
      if (notes.length) base.stderr += (base.stderr ? '\n' : '') + notes.join('\n');
      resolve(base);
    }

    child.on('error', (err) => {
      notes.push(err.message);
      if (child.pid === undefined) finish(1, err.message);
    });

    child.on('exit', (code) => {
      drainTimer = setTimeout(() => finish(code ?? 1), EXIT_DRAIN_MS);
    });

    child.on('close', (code) => {
      finish(code ?? 1);
    });
  });
}
