/**
 * DownloadOrchestrator
 *
 * Runs one yt-dlp download and exposes it as an async sequence of progress
 * events. The sequence always ends with exactly one 'done' or 'error' event,
 * except when the run is cancelled, in which case it simply stops.
 *
 * Cancellation:
 * - aborting `signal` kills the process
 * - a consumer that stops iterating (break, return, throw) kills it too
 */

import { randomUUID } from 'crypto';
import fs from 'fs-extra';
import { createServiceLogger } from '../../middleware/logging.js';
import { BYTES_PER_MB } from '../../config/constants.js';
import { DownloadRequest, OutputExt, ProgressEvent } from '../../types/media.js';
import { getErrorMessage, isNotFoundError } from '../../utils/errorHandling.js';
import { buildDownloadArgs, resolveOutput } from './downloadArgs.js';
import { ProgressTracker } from './progressParser.js';
import { ProcessLauncher, RunningProcess, spawnProcess } from './processRunner.js';

const logger = createServiceLogger('DownloadOrchestrator');

/** Tail of the tool output kept for the failure log */
const OUTPUT_TAIL_LINES = 20;

export interface DownloadOrchestratorOptions {
  ytDlpPath: string;
  tempDir: string;
  ffmpegPath?: string | undefined;
  cookiesFile?: string | undefined;
  launcher?: ProcessLauncher;
}

/**
 * "12.3" for a byte count, in binary megabytes
 */
export function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MB).toFixed(1);
}

function errorEvent(message: string): ProgressEvent {
  return { stage: 'error', percent: 0, error: message };
}

const SIZE_LIMIT_PREFIX = 'File too large';

/**
 * Whether an error event reports a size-ceiling rejection (its text is then
 * meant for the end user as-is)
 */
export function isSizeLimitFailure(event: ProgressEvent): boolean {
  return event.stage === 'error' && (event.error ?? '').startsWith(SIZE_LIMIT_PREFIX);
}

export class DownloadOrchestrator {
  private readonly options: DownloadOrchestratorOptions;
  private readonly launcher: ProcessLauncher;

  constructor(options: DownloadOrchestratorOptions) {
    this.options = options;
    this.launcher = options.launcher ?? spawnProcess;
  }

  async *run(request: DownloadRequest): AsyncGenerator<ProgressEvent, void, undefined> {
    const { mode, formatId, url, signal } = request;
    const fileId = request.fileId ?? randomUUID();
    const output = resolveOutput(this.options.tempDir, fileId, mode);
    const tracker = new ProgressTracker(mode);

    yield tracker.initialEvent();

    if (signal?.aborted) {
      return;
    }

    const cookiesFile =
      this.options.cookiesFile && (await fs.pathExists(this.options.cookiesFile))
        ? this.options.cookiesFile
        : undefined;
    const args = buildDownloadArgs(url, formatId, mode, output.template, {
      ffmpegPath: this.options.ffmpegPath,
      cookiesFile,
    });

    logger.info('Starting download', { jobId: fileId, url, formatId, mode });

    let child: RunningProcess;
    try {
      child = this.launcher(this.options.ytDlpPath, args);
    } catch (error) {
      logger.error('Failed to start yt-dlp', { jobId: fileId, error: getErrorMessage(error) });
      yield errorEvent('Failed to start download');
      return;
    }

    const onAbort = (): void => child.kill();
    signal?.addEventListener('abort', onAbort, { once: true });

    const tail: string[] = [];
    let finished = false;

    try {
      for await (const line of child.lines) {
        if (signal?.aborted) {
          break;
        }
        tail.push(line);
        if (tail.length > OUTPUT_TAIL_LINES) {
          tail.shift();
        }
        for (const event of tracker.consume(line)) {
          yield event;
        }
      }

      const exit = await child.exit;

      if (signal?.aborted) {
        logger.info('Download cancelled', { jobId: fileId });
        finished = true;
        return;
      }

      if (exit.error) {
        logger.error('Failed to start yt-dlp', { jobId: fileId, error: exit.error.message });
        finished = true;
        yield errorEvent('Failed to start download');
        return;
      }

      if (exit.code !== 0) {
        logger.warn('yt-dlp download failed', {
          jobId: fileId,
          url,
          exitCode: exit.code,
          signal: exit.signal,
          output: tail.join('\n'),
        });
        finished = true;
        yield errorEvent('Download failed');
        return;
      }

      finished = true;
      yield await this.verifyArtifact(fileId, output.finalPath, output.ext, request);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!finished) {
        child.kill();
      }
    }
  }

  /**
   * Terminal event for a process that exited cleanly
   */
  private async verifyArtifact(
    fileId: string,
    finalPath: string,
    ext: OutputExt,
    { maxBytes, limitLabel = 'Limit' }: DownloadRequest
  ): Promise<ProgressEvent> {
    const limitMb = maxBytes === undefined ? undefined : Math.floor(maxBytes / BYTES_PER_MB);

    let size: number;
    try {
      size = (await fs.stat(finalPath)).size;
    } catch (error) {
      if (!isNotFoundError(error)) {
        logger.error('Cannot stat download output', { jobId: fileId, error: getErrorMessage(error) });
        return errorEvent('Download failed');
      }
      // A clean exit with no artifact means yt-dlp skipped the format
      logger.warn('Download finished without output file', { jobId: fileId, path: finalPath });
      return errorEvent(
        limitMb === undefined
          ? 'Download failed'
          : `${SIZE_LIMIT_PREFIX}. ${limitLabel} is ${limitMb} MB.`
      );
    }

    if (maxBytes !== undefined && size > maxBytes) {
      logger.warn('Download exceeds size limit', { jobId: fileId, size, maxBytes });
      await this.discard(fileId, finalPath);
      return errorEvent(
        `${SIZE_LIMIT_PREFIX} (${formatMegabytes(size)} MB). ${limitLabel} is ${limitMb} MB.`
      );
    }

    logger.info('Download complete', { jobId: fileId, size, sizeMB: formatMegabytes(size) });
    return { stage: 'done', percent: 100, fileId, ext };
  }

  private async discard(fileId: string, filePath: string): Promise<void> {
    try {
      await fs.remove(filePath);
    } catch (error) {
      logger.warn('Failed to remove oversized download', {
        jobId: fileId,
        path: filePath,
        error: getErrorMessage(error),
      });
    }
  }
}
