/**
 * A process launched by wdkeeper, leading its own process group
 */

import { type SpawnOptions, spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import {
  DEFAULT_OUTPUT_LIMIT_BYTES,
  ErrorCode,
  err,
  getSystemErrorCode,
  ok,
  type Result,
  WdkeeperError
} from '@wdkeeper/core';

/**
 * The part of a ChildProcess the manager relies on
 */
export interface SpawnedProcess {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit' | 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;
export type KillFn = (pid: number, signal: NodeJS.Signals) => void;

/**
 * OS entry points used to start and signal processes
 */
export type ProcessDriver = {
  spawn: SpawnFn;
  kill: KillFn;
  platform: NodeJS.Platform;
};

export const nodeProcessDriver: ProcessDriver = {
  spawn,
  kill: (pid, signal) => {
    process.kill(pid, signal);
  },
  platform: process.platform
};

export type LaunchOptions = {
  command: string;
  args: readonly string[];
  env?: Record<string, string>;
  outputLimitBytes?: number;
  driver?: ProcessDriver;
};

/**
 * Keeps the last `limit` bytes written to a stream
 */
class OutputTail {
  private buffer = Buffer.alloc(0);

  constructor(private readonly limit: number) {}

  push(chunk: Buffer | string): void {
    const next = Buffer.concat([this.buffer, Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)]);
    this.buffer = next.length > this.limit ? next.subarray(next.length - this.limit) : next;
  }

  toString(): string {
    return this.buffer.toString('utf8');
  }
}

function toSpawnError(error: unknown, command: string): WdkeeperError {
  const notFound = getSystemErrorCode(error) === 'ENOENT';
  return new WdkeeperError(
    notFound ? ErrorCode.E_SERVER_EXECUTABLE_NOT_FOUND : ErrorCode.E_SERVER_SPAWN_FAILED,
    notFound
      ? `Automation server executable not found: ${command}`
      : `Failed to launch automation server: ${error instanceof Error ? error.message : String(error)}`,
    { context: { command }, cause: error }
  );
}

export class ManagedProcess {
  readonly pid: number;
  readonly command: string;
  private readonly child: SpawnedProcess;
  private readonly driver: ProcessDriver;
  private readonly stdoutTail: OutputTail;
  private readonly stderrTail: OutputTail;
  private readonly exitWaiters = new Set<() => void>();
  private readonly closeWaiters = new Set<() => void>();
  private exitInfo: { code: number | null; signal: NodeJS.Signals | null } | undefined;
  private closed = false;
  private lastError: Error | undefined;

  private constructor(child: SpawnedProcess, pid: number, command: string, driver: ProcessDriver, limit: number) {
    this.child = child;
    this.pid = pid;
    this.command = command;
    this.driver = driver;
    this.stdoutTail = new OutputTail(limit);
    this.stderrTail = new OutputTail(limit);

    child.stdout?.on('data', (chunk: Buffer | string) => this.stdoutTail.push(chunk));
    child.stderr?.on('data', (chunk: Buffer | string) => this.stderrTail.push(chunk));

    child.once('exit', (code, signal) => {
      this.exitInfo = { code, signal };
      for (const waiter of this.exitWaiters) waiter();
      this.exitWaiters.clear();
    });
    child.once('close', () => {
      this.closed = true;
      for (const waiter of this.closeWaiters) waiter();
      this.closeWaiters.clear();
    });
    child.on('error', (error) => {
      this.lastError = error;
    });
  }

  /**
   * Spawn detached with stdout/stderr piped; resolves once the OS reports the spawn
   */
  static launch(options: LaunchOptions): Promise<Result<ManagedProcess>> {
    const { command, args } = options;
    const driver = options.driver ?? nodeProcessDriver;
    const limit = options.outputLimitBytes ?? DEFAULT_OUTPUT_LIMIT_BYTES;

    let child: SpawnedProcess;
    try {
      child = driver.spawn(command, args, {
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...options.env }
      });
    } catch (error) {
      return Promise.resolve(err(toSpawnError(error, command)));
    }

    return new Promise((resolve) => {
      child.once('error', (error) => resolve(err(toSpawnError(error, command))));
      child.once('spawn', () => {
        if (child.pid === undefined) {
          resolve(err(toSpawnError(new Error('No pid assigned'), command)));
          return;
        }
        resolve(ok(new ManagedProcess(child, child.pid, command, driver, limit)));
      });
    });
  }

  /** The child leads its own group */
  get pgid(): number {
    return this.pid;
  }

  get exited(): boolean {
    return this.exitInfo !== undefined || this.child.exitCode !== null || this.child.signalCode !== null;
  }

  get exitCode(): number | null {
    return this.exitInfo?.code ?? this.child.exitCode;
  }

  get signalCode(): NodeJS.Signals | null {
    return this.exitInfo?.signal ?? this.child.signalCode;
  }

  /** Error emitted by the child after it started, such as a failed kill */
  get error(): Error | undefined {
    return this.lastError;
  }

  get stdout(): string {
    return this.stdoutTail.toString();
  }

  get stderr(): string {
    return this.stderrTail.toString();
  }

  /**
   * Signal the whole process group. Returns false when the group is already gone.
   */
  signalGroup(signal: NodeJS.Signals): boolean {
    try {
      if (this.driver.platform === 'win32') {
        return this.child.kill(signal);
      }
      this.driver.kill(-this.pgid, signal);
      return true;
    } catch (error) {
      if (getSystemErrorCode(error) === 'ESRCH') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Resolve true once the process has exited, or false after `timeoutMs`
   */
  waitForExit(timeoutMs?: number): Promise<boolean> {
    if (this.exited) return Promise.resolve(true);

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const onExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      this.exitWaiters.add(onExit);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.exitWaiters.delete(onExit);
          resolve(this.exited);
        }, timeoutMs);
      }
    });
  }

  /**
   * Wait (bounded) for the output streams to flush after exit
   */
  drainOutput(timeoutMs = 200): Promise<void> {
    if (this.closed) return Promise.resolve();

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.closeWaiters.delete(onClose);
        resolve();
      }, timeoutMs);
      const onClose = () => {
        clearTimeout(timer);
        resolve();
      };
      this.closeWaiters.add(onClose);
    });
  }
}
