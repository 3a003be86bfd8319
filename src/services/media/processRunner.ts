/**
 * Child process plumbing for yt-dlp
 *
 * Two shapes are needed: a one-shot command whose whole output is collected
 * (metadata mode) and a long-running process whose output is consumed line by
 * line (downloads). Both sit behind small function types so services can be
 * tested with in-process fakes.
 */

import { execFile, spawn } from 'child_process';
import { createInterface } from 'readline';
import { PassThrough } from 'stream';
import { promisify } from 'util';
import { BYTES_PER_MB } from '../../config/constants.js';
import { createServiceLogger } from '../../middleware/logging.js';
import { getErrorCode } from '../../utils/errorHandling.js';

const logger = createServiceLogger('processRunner');

const execFilePromise = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/**
 * Run a command to completion. Rejects on spawn failure or non-zero exit; the
 * rejection carries `code` and `stderr` like Node's execFile errors do.
 */
export type CommandExecutor = (
  command: string,
  args: string[],
  options?: { signal?: AbortSignal | undefined }
) => Promise<CommandOutput>;

export const execCommand: CommandExecutor = async (command, args, options = {}) => {
  const { stdout, stderr } = await execFilePromise(command, args, {
    encoding: 'utf8',
    // --dump-json documents for long videos run to several megabytes
    maxBuffer: 64 * BYTES_PER_MB,
    windowsHide: true,
    signal: options.signal,
  });
  return { stdout, stderr };
};

/**
 * How a launched process ended. `error` is set when it could not be started.
 */
export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export interface RunningProcess {
  /** stdout and stderr interleaved, one entry per line */
  lines: AsyncIterable<string>;
  /** Always resolves, never rejects */
  exit: Promise<ProcessExit>;
  /** Terminate the process if it is still running */
  kill(): void;
}

export type ProcessLauncher = (command: string, args: string[]) => RunningProcess;

export const spawnProcess: ProcessLauncher = (command, args) => {
  // Own process group, so kill() also reaches ffmpeg and other helpers
  // that inherit the output pipes
  const detached = process.platform !== 'win32';
  const child = spawn(command, args, {
    stdio: ['ignore', 'pipe', 'pipe'],
    shell: false,
    windowsHide: true,
    detached,
  });

  const merged = new PassThrough();
  child.stdout.pipe(merged, { end: false });
  child.stderr.pipe(merged, { end: false });

  const exit = new Promise<ProcessExit>(resolve => {
    child.once('error', error => {
      merged.end();
      resolve({ code: null, signal: null, error });
    });
    // 'close' fires after both output streams have drained into `merged`
    child.once('close', (code, signal) => {
      merged.end();
      resolve({ code, signal });
    });
  });

  const lines = createInterface({ input: merged, crlfDelay: Infinity });

  return {
    lines,
    exit,
    kill: () => {
      if (child.exitCode !== null || child.signalCode !== null) {
        return;
      }
      if (detached && child.pid !== undefined) {
        try {
          process.kill(-child.pid, 'SIGTERM');
          return;
        } catch (error) {
          logger.debug('Process group kill failed, signalling the child only', {
            pid: child.pid,
            code: getErrorCode(error),
          });
        }
      }
      child.kill('SIGTERM');
    },
  };
};
