/**
 * Automation server lifecycle manager
 *
 * Probes the server, launches it when absent, waits for readiness and
 * stops only the process it launched itself. Public operations are
 * serialized and never reject for expected failures.
 */

import {
  createEndpoint,
  createErrorFromUnknown,
  createSilentLogger,
  DEFAULT_BASE_PATH,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_HOST,
  DEFAULT_HTTP_PROBE_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PORT,
  DEFAULT_SERVER_COMMAND,
  DEFAULT_START_TIMEOUT_MS,
  DEFAULT_TCP_PROBE_TIMEOUT_MS,
  ErrorCode,
  getBaseUrl,
  type LifecycleLogger,
  type LifecycleState,
  type ServerConfig,
  type ServerEndpoint,
  type ServerInfo,
  type TimeoutConfig,
  WdkeeperError
} from '@wdkeeper/core';
import { createOperationLock, type OperationLock } from './operation-lock.js';
import { buildHealthProbes, runProbeChain } from './probes/chain.js';
import type { HealthProbe, ProbeOutcome } from './probes/types.js';
import { buildLaunchArgs } from './process/launch-args.js';
import { ManagedProcess, nodeProcessDriver, type ProcessDriver } from './process/managed-process.js';

export type AutomationServerManagerOptions = {
  /** Takes precedence over host/port */
  endpoint?: ServerEndpoint;
  host?: string;
  port?: number;
  command?: string;
  extraArgs?: readonly string[];
  env?: Record<string, string>;
  /** WebDriver base path for the protocol status and session-listing probes */
  basePath?: string;
  timeouts?: Partial<TimeoutConfig>;
  outputLimitBytes?: number;
  logger?: LifecycleLogger;
  /** OS process entry points; tests substitute a fake */
  driver?: ProcessDriver;
};

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function describeOutcome(outcome: ProbeOutcome): string {
  switch (outcome.kind) {
    case 'up':
      return `${outcome.probe}: up`;
    case 'inconclusive':
      return `${outcome.probe}: ${outcome.reason}`;
    case 'error':
      return `${outcome.probe}: ${outcome.error.code}`;
  }
}

export class AutomationServerManager {
  readonly endpoint: ServerEndpoint;
  readonly url: string;
  readonly command: string;
  readonly timeouts: Readonly<TimeoutConfig>;
  private readonly extraArgs: readonly string[];
  private readonly env: Record<string, string> | undefined;
  private readonly outputLimitBytes: number | undefined;
  private readonly logger: LifecycleLogger;
  private readonly driver: ProcessDriver;
  private readonly probes: readonly HealthProbe[];
  private readonly lock: OperationLock = createOperationLock();
  private process: ManagedProcess | undefined;
  private lastError: WdkeeperError | undefined;

  constructor(options: AutomationServerManagerOptions = {}) {
    this.endpoint =
      options.endpoint ?? createEndpoint(options.host ?? DEFAULT_HOST, options.port ?? DEFAULT_PORT);
    this.url = getBaseUrl(this.endpoint);
    this.command = options.command ?? DEFAULT_SERVER_COMMAND;
    this.extraArgs = [...(options.extraArgs ?? [])];
    this.env = options.env;
    this.outputLimitBytes = options.outputLimitBytes;
    this.logger = options.logger ?? createSilentLogger();
    this.driver = options.driver ?? nodeProcessDriver;
    this.timeouts = Object.freeze({
      startMs: DEFAULT_START_TIMEOUT_MS,
      pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
      gracePeriodMs: DEFAULT_GRACE_PERIOD_MS,
      httpProbeMs: DEFAULT_HTTP_PROBE_TIMEOUT_MS,
      tcpProbeMs: DEFAULT_TCP_PROBE_TIMEOUT_MS,
      ...options.timeouts
    });
    this.probes = buildHealthProbes(this.endpoint, {
      basePath: options.basePath ?? DEFAULT_BASE_PATH,
      httpProbeMs: this.timeouts.httpProbeMs,
      tcpProbeMs: this.timeouts.tcpProbeMs
    });
  }

  /**
   * Build a manager from the `server` section of a configuration file
   */
  static fromConfig(
    config: ServerConfig,
    options: Pick<AutomationServerManagerOptions, 'logger' | 'driver'> = {}
  ): AutomationServerManager {
    return new AutomationServerManager({
      host: config.host,
      port: config.port,
      command: config.command,
      extraArgs: config.args,
      env: config.env,
      basePath: config.basePath,
      timeouts: config.timeouts,
      ...options
    });
  }

  /** True while a launched process is held */
  get ownsProcess(): boolean {
    return this.process !== undefined;
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  /**
   * Error recorded by the most recent failing operation, cleared by the next successful one
   */
  getLastError(): WdkeeperError | undefined {
    return this.lastError;
  }

  isRunning(): Promise<boolean> {
    return this.lock.runExclusive('isRunning', () => this.probe());
  }

  startServer(timeoutMs: number = this.timeouts.startMs): Promise<boolean> {
    return this.lock.runExclusive('startServer', () => this.settle(this.start(timeoutMs)));
  }

  stopServer(): Promise<boolean> {
    return this.lock.runExclusive('stopServer', () => this.settle(this.stop()));
  }

  /**
   * Launch only when nothing answers; a healthy server is left alone
   */
  ensureRunning(timeoutMs: number = this.timeouts.startMs): Promise<boolean> {
    return this.lock.runExclusive('ensureRunning', () =>
      this.settle(
        (async () => {
          if (await this.probe()) {
            this.logger.info({ url: this.url, ownsProcess: this.ownsProcess }, 'Automation server already running');
            return true;
          }
          return this.start(timeoutMs);
        })()
      )
    );
  }

  restartServer(timeoutMs: number = this.timeouts.startMs): Promise<boolean> {
    return this.lock.runExclusive('restartServer', () =>
      this.settle(
        (async () => {
          if (this.process && !(await this.stop())) {
            this.logger.error({ url: this.url }, 'Restart aborted: previous server could not be stopped');
            return false;
          }
          return this.start(timeoutMs);
        })()
      )
    );
  }

  async getInfo(): Promise<ServerInfo> {
    return this.lock.runExclusive('getInfo', async () => {
      const running = await this.probe();
      const info: ServerInfo = {
        host: this.endpoint.host,
        port: this.endpoint.port,
        url: this.url,
        running,
        ownsProcess: this.ownsProcess
      };
      if (this.process) info.pid = this.process.pid;
      return info;
    });
  }

  /**
   * Reconstruct the lifecycle state from a live probe, the handle and the last failure
   */
  getState(): Promise<LifecycleState> {
    return this.lock.runExclusive('getState', async (): Promise<LifecycleState> => {
      if (await this.probe()) {
        return this.process ? 'running-managed' : 'running-external';
      }
      return this.lastError ? 'failed' : 'stopped';
    });
  }

  private async settle(operation: Promise<boolean>): Promise<boolean> {
    const succeeded = await operation;
    if (succeeded) this.lastError = undefined;
    return succeeded;
  }

  private fail(error: WdkeeperError, extra: Record<string, unknown> = {}): void {
    this.lastError = error;
    this.logger.error({ code: error.code, ...error.context, ...extra }, error.message);
  }

  private async probe(): Promise<boolean> {
    try {
      const verdict = await runProbeChain(this.probes);
      if (verdict.running) {
        this.logger.debug({ url: this.url, probe: verdict.by }, 'Automation server is up');
      } else {
        this.logger.debug(
          { url: this.url, outcomes: verdict.outcomes.map(describeOutcome) },
          'Automation server is not reachable'
        );
      }
      return verdict.running;
    } catch (error) {
      this.logger.warn({ url: this.url, error }, 'Health probe failed unexpectedly');
      return false;
    }
  }

  private async start(timeoutMs: number): Promise<boolean> {
    if (this.process) {
      this.logger.info({ pid: this.process.pid }, 'Stopping previously launched automation server');
      if (!(await this.stop())) return false;
    }

    const args = buildLaunchArgs(this.endpoint, this.extraArgs);
    this.logger.info({ command: this.command, args }, 'Starting automation server');

    const launched = await ManagedProcess.launch({
      command: this.command,
      args,
      env: this.env,
      outputLimitBytes: this.outputLimitBytes,
      driver: this.driver
    });
    if (!launched.ok) {
      this.fail(launched.error);
      return false;
    }

    const child = launched.value;
    this.process = child;
    this.logger.info({ pid: child.pid, url: this.url }, 'Automation server launched');

    try {
      const deadline = Date.now() + timeoutMs;

      while (Date.now() < deadline) {
        if (await this.probe()) {
          if (child.exited) {
            // Something else answers on this port
            this.logger.warn(
              { pid: child.pid, exitCode: child.exitCode },
              'Launched process exited but a server answers; not taking ownership'
            );
            this.process = undefined;
          }
          this.logger.info({ url: this.url, pid: this.pid }, 'Automation server is ready');
          return true;
        }

        await sleep(Math.min(this.timeouts.pollIntervalMs, Math.max(0, deadline - Date.now())));

        if (child.exited) {
          await child.drainOutput();
          this.process = undefined;
          this.fail(
            new WdkeeperError(
              ErrorCode.E_SERVER_EXITED_EARLY,
              `Automation server exited before becoming ready (code ${child.exitCode}, signal ${child.signalCode})`,
              {
                context: {
                  pid: child.pid,
                  command: this.command,
                  exitCode: child.exitCode,
                  signal: child.signalCode
                }
              }
            ),
            { stderr: child.stderr.trim() }
          );
          return false;
        }
      }

      const timeout = new WdkeeperError(
        ErrorCode.E_SERVER_START_TIMEOUT,
        `Automation server did not become ready within ${timeoutMs}ms`,
        { context: { pid: child.pid, url: this.url }, recoverable: true }
      );
      this.fail(timeout);
      await this.stop();
      this.lastError = timeout;
      return false;
    } catch (error) {
      const failure = createErrorFromUnknown(error, ErrorCode.E_SERVER_START_FAILED, {
        pid: child.pid,
        command: this.command
      });
      this.fail(failure);
      await this.stop();
      this.lastError = failure;
      return false;
    }
  }

  private async stop(): Promise<boolean> {
    const child = this.process;
    if (!child) {
      this.logger.info({ url: this.url }, 'No launched automation server to stop');
      return true;
    }

    try {
      this.logger.info({ pid: child.pid }, 'Stopping automation server');

      const signalled = child.signalGroup('SIGTERM');
      if (signalled && !(await child.waitForExit(this.timeouts.gracePeriodMs))) {
        this.logger.warn(
          { pid: child.pid, gracePeriodMs: this.timeouts.gracePeriodMs },
          'Automation server ignored SIGTERM, sending SIGKILL'
        );
        child.signalGroup('SIGKILL');
        await child.waitForExit();
      }
      // Members that outlived the group leader
      if (signalled && child.signalGroup('SIGKILL')) {
        this.logger.warn({ pgid: child.pgid }, 'Killed processes left in the automation server group');
      }

      if (child.error) {
        this.logger.warn({ pid: child.pid, error: child.error }, 'Automation server process reported an error');
      }
      this.logger.info(
        { pid: child.pid, exitCode: child.exitCode, signal: child.signalCode },
        'Automation server stopped'
      );
      return true;
    } catch (error) {
      this.fail(createErrorFromUnknown(error, ErrorCode.E_SERVER_STOP_FAILED, { pid: child.pid }));
      return false;
    } finally {
      this.process = undefined;
    }
  }
}
