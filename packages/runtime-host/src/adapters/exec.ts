/**
 * Bulwark Runtime Host — Shell Executor
 *
 * Implements the ShellExecutor interface from @bulwark/kernel using
 * node:child_process.spawn with the system shell.
 *
 * TERMINATION:
 *   A timeout or an aborted signal sends SIGTERM to the child, then SIGKILL
 *   after a grace period if it is still running. Output collected before
 *   termination is returned with `timedOut` / `cancelled` set; the exit code
 *   is null when the child died from a signal.
 *
 * OUTPUT:
 *   stdout and stderr are each capped at `maxOutputBytes`; bytes past the cap
 *   are discarded and a marker line is appended.
 */

import { spawn } from 'node:child_process';
import type { ShellExecutor, ShellRunOptions, ShellRunResult } from '@bulwark/kernel';
import { isNodeError } from '@bulwark/kernel';

export const DEFAULT_KILL_GRACE_MS = 2_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export interface NodeShellExecutorOptions {
  readonly killGraceMs?: number | undefined;
  readonly maxOutputBytes?: number | undefined;
  /** Defaults to the system shell (`/bin/sh`, or cmd.exe on Windows). */
  readonly shell?: string | undefined;
}

/** Collects chunks up to a byte cap. */
class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private dropped = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.dropped += chunk.length;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.size += kept.length;
    this.dropped += chunk.length - kept.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    return this.dropped > 0 ? `${text}\n[output truncated: ${this.dropped} bytes dropped]` : text;
  }
}

export class NodeShellExecutor implements ShellExecutor {
  private readonly killGraceMs: number;
  private readonly maxOutputBytes: number;
  private readonly shell: string | boolean;

  constructor(options: NodeShellExecutorOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.shell = options.shell ?? true;
  }

  run(command: string, options: ShellRunOptions): Promise<ShellRunResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        shell: this.shell,
        stdio: ['ignore', 'pipe', 'pipe'],
        // Own process group, so termination reaches the shell's children too.
        detached: process.platform !== 'win32',
      });

      const signalChild = (signal: NodeJS.Signals): void => {
        if (process.platform !== 'win32' && child.pid !== undefined) {
          try {
            process.kill(-child.pid, signal);
            return;
          } catch (err: unknown) {
            if (!isNodeError(err, 'ESRCH')) throw err;
          }
        }
        child.kill(signal);
      };

      const stdout = new OutputBuffer(this.maxOutputBytes);
      const stderr = new OutputBuffer(this.maxOutputBytes);
      let timedOut = false;
      let cancelled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const terminate = (): void => {
        if (child.exitCode !== null || child.signalCode !== null || killTimer !== undefined) return;
        signalChild('SIGTERM');
        killTimer = setTimeout(() => {
          signalChild('SIGKILL');
        }, this.killGraceMs);
      };

      const timeoutTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, options.timeoutMs);

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };
      if (options.signal?.aborted === true) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }

      const cleanup = (): void => {
        clearTimeout(timeoutTimer);
        if (killTimer !== undefined) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      child.stdout.on('data', (chunk: Buffer) => { stdout.push(chunk); });
      child.stderr.on('data', (chunk: Buffer) => { stderr.push(chunk); });

      child.on('close', (exitCode: number | null) => {
        cleanup();
        resolve({
          exitCode,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          timedOut,
          cancelled,
        });
      });

      child.on('error', (err: Error) => {
        cleanup();
        reject(err);
      });
    });
  }
}
