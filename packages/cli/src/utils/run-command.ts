import { spawn } from 'node:child_process';
import { constants } from 'node:os';

/**
 * Exit code for a child killed by a signal, as shells report it
 */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  return 128 + constants.signals[signal];
}

/**
 * Run a command with inherited stdio and resolve with its exit code.
 * A signal arriving through `shutdown` is forwarded to the command.
 */
export function runCommand(
  command: string,
  args: readonly string[],
  env: NodeJS.ProcessEnv,
  shutdown?: Promise<NodeJS.Signals>
): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit', env });

    void shutdown?.then((signal) => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    });

    child.once('error', reject);
    child.once('exit', (code, signal) => {
      if (code !== null) {
        resolve(code);
      } else {
        resolve(signal ? exitCodeForSignal(signal) : 1);
      }
    });
  });
}

/**
 * Resolve with the first SIGINT or SIGTERM
 */
export function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}
