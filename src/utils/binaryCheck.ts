/**
 * Binary Availability Checker
 *
 * Verifies that the external media tools are available at startup.
 * yt-dlp is required; ffmpeg is only needed for merging and mp3 extraction,
 * so a missing ffmpeg is a warning.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../middleware/logging.js';
import { DependencyError } from '../errors/index.js';
import { getErrorMessage } from './errorHandling.js';
import type { MediaToolConfig } from '../config/types.js';

const execFilePromise = promisify(execFile);

export interface BinaryCheckResult {
  binary: string;
  available: boolean;
  version?: string;
  error?: string;
}

export type VersionProbe = (binary: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const defaultProbe: VersionProbe = (binary, args) =>
  execFilePromise(binary, args, {
    timeout: 5000, // 5 second timeout
  });

/**
 * Check if a binary is available and get its version
 */
export async function checkBinary(
  binaryName: string,
  versionArgs: string[] = ['--version'],
  probe: VersionProbe = defaultProbe
): Promise<BinaryCheckResult> {
  try {
    const { stdout, stderr } = await probe(binaryName, versionArgs);

    const output = stdout || stderr;
    const versionMatch = output.match(/version\s+([\w.-]+)|^v?([\d][\w.-]*)/im);
    const version = versionMatch ? versionMatch[1] || versionMatch[2] || 'unknown' : 'unknown';

    return {
      binary: binaryName,
      available: true,
      version,
    };
  } catch (error) {
    return {
      binary: binaryName,
      available: false,
      error: getErrorMessage(error),
    };
  }
}

/**
 * ffmpeg binary for a configured --ffmpeg-location, which may be the binary
 * itself or the directory holding it
 */
function resolveFfmpegBinary(ffmpegPath: string | undefined): string {
  if (!ffmpegPath) {
    return 'ffmpeg';
  }
  return /ffmpeg(\.exe)?$/i.test(ffmpegPath) ? ffmpegPath : `${ffmpegPath.replace(/[\\/]+$/, '')}/ffmpeg`;
}

/**
 * Check the media tools at startup
 *
 * @throws DependencyError when yt-dlp cannot be run
 */
export async function checkRequiredBinaries(
  media: MediaToolConfig,
  probe: VersionProbe = defaultProbe
): Promise<BinaryCheckResult[]> {
  logger.info('Checking binary dependencies...');

  const binaries = [
    { name: media.ytDlpPath, args: ['--version'], required: true, purpose: 'Metadata and downloads' },
    // FFmpeg tools use single-dash version flag
    { name: resolveFfmpegBinary(media.ffmpegPath), args: ['-version'], required: false, purpose: 'Merging and mp3 extraction' },
  ];

  const results: BinaryCheckResult[] = [];

  for (const binary of binaries) {
    const result = await checkBinary(binary.name, binary.args, probe);
    results.push(result);

    if (result.available) {
      logger.info(`✓ ${binary.name} found`, {
        service: 'binaryCheck',
        binary: binary.name,
        version: result.version,
      });
      continue;
    }

    if (binary.required) {
      logger.error(`✗ ${binary.name} not found - ${binary.purpose}`, {
        service: 'binaryCheck',
        binary: binary.name,
        error: result.error,
      });
      throw new DependencyError(binary.name, `Required dependency missing: ${binary.name} (${binary.purpose})`);
    }

    logger.warn(`✗ ${binary.name} not found - ${binary.purpose}`, {
      service: 'binaryCheck',
      binary: binary.name,
      error: result.error,
    });
  }

  return results;
}
