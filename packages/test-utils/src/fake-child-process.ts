import { EventEmitter } from 'node:events';
import { constants } from 'node:os';
import { PassThrough } from 'node:stream';

const SIGNAL_NAMES = new Set(Object.keys(constants.signals));

function isSignal(value: string): value is NodeJS.Signals {
  return SIGNAL_NAMES.has(value);
}

function signalFromNumber(value: number): NodeJS.Signals {
  const name = Object.entries(constants.signals).find(([, n]) => n === value)?.[0];
  return name !== undefined && isSignal(name) ? name : 'SIGTERM';
}

function noSuchProcess(pid: number): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`kill ESRCH ${pid}`);
  error.code = 'ESRCH';
  error.syscall = 'kill';
  return error;
}

/**
 * Child process double. Exits on any delivered signal unless told to ignore it.
 */
export class FakeChildProcess extends EventEmitter {
  pid: number | undefined;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  /** Every signal delivered, in order */
  readonly signals: NodeJS.Signals[] = [];
  /** Signals the process survives */
  readonly ignoreSignals = new Set<NodeJS.Signals>();

  constructor(pid: number | undefined) {
    super();
    this.pid = pid;
  }

  get exited(): boolean {
    return this.exitCode !== null || this.signalCode !== null;
  }

  kill(signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
    if (this.exited) return false;
    this.deliver(typeof signal === 'number' ? signalFromNumber(signal) : signal);
    return true;
  }

  deliver(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (this.exited || this.ignoreSignals.has(signal)) return;
    this.exit(null, signal);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }
}

export type FakeSpawnOptions = {
  detached?: boolean;
  env?: NodeJS.ProcessEnv;
};

export type FakeSpawnRecord = {
  command: string;
  args: readonly string[];
  options: FakeSpawnOptions;
  child: FakeChildProcess;
  /** Signals sent to the child's process group */
  groupSignals: NodeJS.Signals[];
};

export type FakeSpawnBehavior = {
  /** Called once the child has emitted 'spawn' */
  onSpawn?: (child: FakeChildProcess, record: FakeSpawnRecord) => void;
  /** Fail the spawn with this error instead */
  error?: NodeJS.ErrnoException;
  /** Other group members outlive the leader until the group gets SIGKILL */
  lingeringGroup?: boolean;
};

/**
 * Stand-in for the OS process table: hands out fake children from `spawn`
 * and routes `kill(pid)` or `kill(-pgid)` to them.
 */
export class FakeProcessTable {
  readonly spawned: FakeSpawnRecord[] = [];
  behavior: FakeSpawnBehavior;
  private nextPid = 41000;

  constructor(behavior: FakeSpawnBehavior = {}) {
    this.behavior = behavior;
  }

  get last(): FakeSpawnRecord | undefined {
    return this.spawned[this.spawned.length - 1];
  }

  spawn = (command: string, args: readonly string[], options: FakeSpawnOptions): FakeChildProcess => {
    const { error, onSpawn } = this.behavior;
    const child = new FakeChildProcess(error ? undefined : this.nextPid++);
    const record: FakeSpawnRecord = { command, args: [...args], options, child, groupSignals: [] };
    this.spawned.push(record);

    setImmediate(() => {
      if (error) {
        child.emit('error', error);
        return;
      }
      child.emit('spawn');
      onSpawn?.(child, record);
    });

    return child;
  };

  kill = (pid: number, signal: NodeJS.Signals): void => {
    const target = Math.abs(pid);
    const record = this.spawned.find((r) => r.child.pid === target);
    if (!record) {
      throw noSuchProcess(pid);
    }
    if (pid < 0 && this.groupAlive(record)) {
      record.groupSignals.push(signal);
      if (!record.child.exited) record.child.deliver(signal);
      return;
    }
    if (record.child.exited) {
      throw noSuchProcess(pid);
    }
    record.child.deliver(signal);
  };

  private groupAlive(record: FakeSpawnRecord): boolean {
    if (!record.child.exited) return true;
    return this.behavior.lingeringGroup === true && !record.groupSignals.includes('SIGKILL');
  }
}

export function createSpawnError(code: string, command: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`spawn ${command} ${code}`);
  error.code = code;
  error.syscall = `spawn ${command}`;
  error.path = command;
  return error;
}
