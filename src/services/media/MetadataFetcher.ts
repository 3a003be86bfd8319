/**
 * MetadataFetcher
 *
 * Runs yt-dlp in --dump-json mode and maps its document onto MediaMetadata.
 * Nothing is downloaded; the caller's AbortSignal is the only timeout.
 */

import fs from 'fs-extra';
import { createServiceLogger } from '../../middleware/logging.js';
import { MetadataFetchError, MetadataParseError } from '../../errors/index.js';
import { FormatCandidate, MediaMetadata } from '../../types/media.js';
import { YtDlpFormat, YtDlpInfo, ytDlpInfoSchema } from '../../validation/ytDlpSchemas.js';
import { getErrorCode, getErrorMessage, getErrorStderr, toError } from '../../utils/errorHandling.js';
import { CommandExecutor, execCommand } from './processRunner.js';

const logger = createServiceLogger('MetadataFetcher');

export interface MetadataFetcherOptions {
  ytDlpPath: string;
  /** Netscape cookie file, passed only when it exists */
  cookiesFile?: string | undefined;
  executor?: CommandExecutor;
}

/**
 * Most useful line of yt-dlp's stderr: the last "ERROR:" line, otherwise the
 * last non-empty one.
 */
export function extractDiagnostic(stderr: string): string | undefined {
  const lines = stderr
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  const errorLine = [...lines].reverse().find(line => line.includes('ERROR:'));
  return errorLine ?? lines[lines.length - 1];
}

function toCandidate(format: YtDlpFormat): FormatCandidate {
  return {
    formatId: format.format_id,
    containerExt: format.ext,
    height: format.height ?? 0,
    videoCodec: format.vcodec ?? null,
    audioCodec: format.acodec ?? null,
    bitrateKbps: format.abr ?? format.tbr ?? 0,
    sizeBytes: format.filesize ?? null,
    approxSizeBytes: format.filesize_approx ?? null,
  };
}

export function toMediaMetadata(info: YtDlpInfo): MediaMetadata {
  return {
    id: info.id,
    title: info.title,
    uploaderName: info.uploader || info.channel || 'Unknown',
    durationSeconds: info.duration ?? 0,
    thumbnailUrl: info.thumbnail ?? '',
    formats: (info.formats ?? []).map(toCandidate),
  };
}

export class MetadataFetcher {
  private readonly ytDlpPath: string;
  private readonly cookiesFile: string | undefined;
  private readonly executor: CommandExecutor;

  constructor(options: MetadataFetcherOptions) {
    this.ytDlpPath = options.ytDlpPath;
    this.cookiesFile = options.cookiesFile;
    this.executor = options.executor ?? execCommand;
  }

  /**
   * Fetch metadata for a single video
   *
   * @throws MetadataFetchError when yt-dlp cannot run or exits non-zero
   * @throws MetadataParseError when its output is not a usable document
   */
  async fetch(url: string, signal?: AbortSignal): Promise<MediaMetadata> {
    const args = ['--dump-json', '--no-download', '--no-warnings', '--no-playlist'];
    if (this.cookiesFile && (await fs.pathExists(this.cookiesFile))) {
      args.push('--cookies', this.cookiesFile);
    }
    args.push(url);

    logger.debug('Fetching metadata', { url });
    const startedAt = Date.now();

    let stdout: string;
    try {
      ({ stdout } = await this.executor(this.ytDlpPath, args, { signal }));
    } catch (error) {
      throw this.toFetchError(error, url);
    }

    const info = this.parse(stdout, url);
    logger.info('Metadata fetched', {
      url,
      id: info.id,
      formats: info.formats.length,
      durationMs: Date.now() - startedAt,
    });
    return info;
  }

  private parse(stdout: string, url: string): MediaMetadata {
    let document: unknown;
    try {
      document = JSON.parse(stdout.trim());
    } catch (error) {
      logger.warn('yt-dlp printed non-JSON metadata', { url, error: getErrorMessage(error) });
      throw new MetadataParseError({ service: 'MetadataFetcher', metadata: { url } }, toError(error));
    }

    const result = ytDlpInfoSchema.safeParse(document);
    if (!result.success) {
      logger.warn('yt-dlp metadata did not match schema', {
        url,
        issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      throw new MetadataParseError({ service: 'MetadataFetcher', metadata: { url } }, result.error);
    }

    return toMediaMetadata(result.data);
  }

  private toFetchError(error: unknown, url: string): MetadataFetchError {
    const code = getErrorCode(error);
    const context = { service: 'MetadataFetcher', operation: 'fetch', metadata: { url } };

    // ENOENT, EACCES, ABORT_ERR: the process never ran to completion
    if (code !== undefined && !/^\d+$/.test(code)) {
      logger.error('yt-dlp could not be run', { url, code, error: getErrorMessage(error) });
      return new MetadataFetchError(getErrorMessage(error), null, context, toError(error));
    }

    const exitCode = code === undefined ? null : Number(code);
    const message =
      extractDiagnostic(getErrorStderr(error)) ?? `yt-dlp exited with code ${exitCode ?? 'unknown'}`;

    logger.warn('yt-dlp metadata fetch failed', { url, exitCode, diagnostic: message });
    return new MetadataFetchError(message, exitCode, context, toError(error));
  }
}
