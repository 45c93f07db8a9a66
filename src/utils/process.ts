import { spawn } from 'node:child_process';
import { CommandResult } from '../types';
import { Logger } from '../logger';

export interface RunOptions {
  cwd?: string;
  /** Replaces the environment entirely; nothing is inherited from this process. */
  env: Record<string, string>;
}

/**
 * Seam between the build pipeline and external processes.
 * Resolves with any exit code; rejects only when the process could not start.
 */
export interface CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<CommandResult>;
}

/** Raised when a command cannot be started at all (missing binary, bad cwd). */
export class CommandSpawnError extends Error {
  constructor(
    readonly command: string,
    cause: Error,
  ) {
    super(`could not start ${command}: ${cause.message}`);
    this.name = 'CommandSpawnError';
  }
}

/**
 * Raised for a non-zero exit. The message names only the command; its
 * arguments and output can carry credentials and stay on the instance.
 */
export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly result: CommandResult,
  ) {
    super(`${command} exited with code ${result.exitCode}`);
    this.name = 'CommandFailedError';
  }
}

export const RESTRICTED_PATH = '/usr/local/sbin:/usr/local/bin:/usr/sbin:/usr/bin:/sbin:/bin';

/** Environment for child processes: fixed PATH, isolated HOME, plus the given variables. */
export function minimalEnv(homeDir: string, extra: Record<string, string> = {}): Record<string, string> {
  return { PATH: RESTRICTED_PATH, HOME: homeDir, ...extra };
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.once('error', (err) => reject(new CommandSpawnError(command, err)));
      child.once('close', (code, signal) => {
        resolve({
          // A signal-terminated process has no exit code; report it as a failure.
          exitCode: code ?? (signal ? 128 : 1),
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
      });
    });
  }
}

/**
 * Run a command and throw CommandFailedError on a non-zero exit. Output is
 * logged at debug level only.
 */
export async function runChecked(
  runner: CommandRunner,
  log: Logger,
  command: string,
  args: string[],
  options: RunOptions,
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) log.debug('exit code', { command, exitCode: result.exitCode });
  if (result.stdout !== '') log.debug('OUT', { command, stdout: result.stdout });
  if (result.stderr !== '') log.debug('ERR', { command, stderr: result.stderr });
  if (result.exitCode !== 0) {
    throw new CommandFailedError(command, result);
  }
  return result;
}
