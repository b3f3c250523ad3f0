/**
 * Runs adb and scrcpy as opaque executables.
 *
 * A nonzero exit code is a normal outcome ("device offline", "no devices") and is
 * returned to the caller; only a missing executable or a timeout rejects.
 */

import { execFile, spawn, ChildProcess } from 'child_process';
import { CommandTimeoutError, ErrorCode, LaunchError, QuestCastError } from './types/Errors';
import { Logger } from './Logger';

export const DEFAULT_COMMAND_TIMEOUT_MS = 4000;

// Errno codes meaning the executable itself could not be started
const LAUNCH_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'ENOEXEC']);

export interface ProcessResult {
  exitCode: number;
  /** stdout followed by stderr */
  output: string;
}

export interface DetachedSpawnOptions {
  cwd?: string;
}

/**
 * Seam between the device logic and real processes
 */
export interface CommandRunner {
  run(executable: string, args: string[], timeoutMs?: number): Promise<ProcessResult>;
  /**
   * Start a process that outlives this one. Resolves with its pid once started.
   */
  spawnDetached(
    executable: string,
    args: string[],
    options?: DetachedSpawnOptions
  ): Promise<number | undefined>;
}

function getErrorCode(error: unknown): unknown {
  if (error instanceof Error && 'code' in error) {
    return error.code;
  }
  return undefined;
}

/**
 * Map a spawn failure to LaunchError (missing/unusable executable) or UNKNOWN_LAUNCH_ERROR
 */
export function toLaunchFailure(executable: string, error: unknown): QuestCastError {
  const code = getErrorCode(error);
  if (typeof code === 'string' && LAUNCH_ERROR_CODES.has(code)) {
    return new LaunchError(executable, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new QuestCastError(
    ErrorCode.UNKNOWN_LAUNCH_ERROR,
    `Failed to start ${executable}`,
    message,
    { cause: error }
  );
}

export class ProcessRunner implements CommandRunner {
  private readonly logger = new Logger('ProcessRunner');

  run(
    executable: string,
    args: string[],
    timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS
  ): Promise<ProcessResult> {
    this.logger.debug(`${executable} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      execFile(
        executable,
        args,
        { timeout: timeoutMs, windowsHide: true },
        (error, stdout, stderr) => {
          const output = `${stdout ?? ''}${stderr ?? ''}`;

          if (!error) {
            this.logger.debug(`exit 0: ${output.trim()}`);
            resolve({ exitCode: 0, output });
            return;
          }

          const code: unknown = error.code;
          if (typeof code === 'string' && LAUNCH_ERROR_CODES.has(code)) {
            this.logger.error(`Could not start ${executable}: ${error.message}`);
            reject(new LaunchError(executable, error));
            return;
          }

          if (error.killed && code !== 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
            this.logger.warn(`${executable} ${args.join(' ')} timed out after ${timeoutMs} ms`);
            reject(new CommandTimeoutError(executable, timeoutMs));
            return;
          }

          const exitCode = typeof code === 'number' ? code : 1;
          this.logger.debug(`exit ${exitCode}: ${output.trim()}`);
          resolve({ exitCode, output });
        }
      );
    });
  }

  spawnDetached(
    executable: string,
    args: string[],
    options: DetachedSpawnOptions = {}
  ): Promise<number | undefined> {
    this.logger.info(`Starting ${executable} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(executable, args, {
          cwd: options.cwd,
          detached: true,
          stdio: 'ignore',
          windowsHide: true,
        });
      } catch (error) {
        reject(toLaunchFailure(executable, error));
        return;
      }

      child.once('spawn', () => {
        child.unref();
        this.logger.info(`${executable} started with pid ${child.pid}`);
        resolve(child.pid);
      });

      child.once('error', (error: Error) => {
        this.logger.error(`${executable} failed to start: ${error.message}`);
        reject(toLaunchFailure(executable, error));
      });
    });
  }
}
