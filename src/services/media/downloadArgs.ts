import path from 'path';
import { DownloadMode, OutputExt } from '../../types/media.js';
import { OUTPUT } from '../../config/constants.js';

export interface ToolOptions {
  ffmpegPath?: string | undefined;
  /** Only passed when the file exists */
  cookiesFile?: string | undefined;
}

export interface OutputTarget {
  /** Value for yt-dlp's -o */
  template: string;
  /** Where the finished artifact ends up */
  finalPath: string;
  ext: OutputExt;
}

/**
 * Output locations for a job. Audio uses an %(ext)s template because
 * yt-dlp renames the file after extracting to mp3.
 */
export function resolveOutput(tempDir: string, fileId: string, mode: DownloadMode): OutputTarget {
  if (mode === 'audio') {
    return {
      template: path.join(tempDir, `${fileId}.%(ext)s`),
      finalPath: path.join(tempDir, `${fileId}.${OUTPUT.AUDIO_EXT}`),
      ext: OUTPUT.AUDIO_EXT,
    };
  }

  const finalPath = path.join(tempDir, `${fileId}.${OUTPUT.VIDEO_EXT}`);
  return { template: finalPath, finalPath, ext: OUTPUT.VIDEO_EXT };
}

/**
 * Format expression for a mode. Video pairs the chosen stream with the best
 * audio, preferring m4a so the merge into mp4 needs no re-encode, and falls
 * back to the format alone when it already carries audio.
 */
export function formatExpression(formatId: string, mode: DownloadMode): string {
  if (mode === 'audio') {
    return formatId;
  }
  return [
    `${formatId}+bestaudio[ext=${OUTPUT.PREFERRED_AUDIO_EXT}]`,
    `${formatId}+bestaudio`,
    formatId,
  ].join('/');
}

/**
 * Full yt-dlp argument list for a download
 */
export function buildDownloadArgs(
  url: string,
  formatId: string,
  mode: DownloadMode,
  outputTemplate: string,
  tools: ToolOptions = {}
): string[] {
  const args = ['-f', formatExpression(formatId, mode)];

  if (mode === 'audio') {
    args.push('-x', '--audio-format', OUTPUT.AUDIO_EXT, '--audio-quality', '0');
  } else {
    args.push('--merge-output-format', OUTPUT.VIDEO_EXT);
  }

  args.push('--newline', '--no-playlist', '--no-warnings', '-o', outputTemplate);

  if (tools.ffmpegPath) {
    args.push('--ffmpeg-location', tools.ffmpegPath);
  }
  if (tools.cookiesFile) {
    args.push('--cookies', tools.cookiesFile);
  }

  args.push(url);
  return args;
}
