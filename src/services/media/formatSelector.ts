/**
 * Format selection
 *
 * Turns the raw yt-dlp format list into the short lists offered to users,
 * and picks a format on its own for the Telegram bot.
 * All functions are pure; Array.prototype.sort is stable, so formats with
 * equal keys keep yt-dlp's order.
 */

import { FormatCandidate, FormatChoice } from '../../types/media.js';
import { FORMAT_SELECTION } from '../../config/constants.js';

function hasCodec(codec: string | null): codec is string {
  return codec !== null && codec !== '' && codec !== 'none';
}

function knownSize(format: FormatCandidate): number | null {
  return format.sizeBytes ?? format.approxSizeBytes;
}

/**
 * Candidates the web client and the bot can use as the video leg of an mp4
 */
function isMp4Video(format: FormatCandidate): boolean {
  return (
    format.containerExt === FORMAT_SELECTION.VIDEO_CONTAINER &&
    hasCodec(format.videoCodec) &&
    format.height > 0
  );
}

/**
 * Up to five mp4 video formats, one per height, tallest first
 */
export function selectVideoChoices(formats: readonly FormatCandidate[]): FormatChoice[] {
  const sorted = formats.filter(isMp4Video).sort((a, b) => b.height - a.height);

  const seenHeights = new Set<number>();
  const choices: FormatChoice[] = [];

  for (const format of sorted) {
    if (seenHeights.has(format.height)) {
      continue;
    }
    seenHeights.add(format.height);

    choices.push({
      formatId: format.formatId,
      qualityLabel: `${format.height}p`,
      height: format.height,
      estimatedSizeBytes: knownSize(format),
    });

    if (choices.length === FORMAT_SELECTION.MAX_CHOICES) {
      break;
    }
  }

  return choices;
}

/**
 * Up to five audio-only formats, highest bitrate first.
 * Bitrates within the same 10 kbps bucket count as duplicates.
 */
export function selectAudioChoices(formats: readonly FormatCandidate[]): FormatChoice[] {
  const sorted = formats
    .filter(f => hasCodec(f.audioCodec) && !hasCodec(f.videoCodec) && f.bitrateKbps > 0)
    .sort((a, b) => b.bitrateKbps - a.bitrateKbps);

  const seenBuckets = new Set<number>();
  const choices: FormatChoice[] = [];

  for (const format of sorted) {
    const bucket = Math.round(format.bitrateKbps / FORMAT_SELECTION.AUDIO_BUCKET_KBPS);
    if (seenBuckets.has(bucket)) {
      continue;
    }
    seenBuckets.add(bucket);

    choices.push({
      formatId: format.formatId,
      qualityLabel: `${Math.round(format.bitrateKbps)} kbps`,
      bitrateKbps: format.bitrateKbps,
      estimatedSizeBytes: knownSize(format),
    });

    if (choices.length === FORMAT_SELECTION.MAX_CHOICES) {
      break;
    }
  }

  return choices;
}

/**
 * Pick the video format the bot downloads without asking.
 *
 * Order of preference:
 * 1. tallest format whose estimated size (known size + 15% for the audio
 *    track) fits the ceiling
 * 2. tallest format at or below 720p
 * 3. the shortest format available
 *
 * @returns the format id, or null when there is no mp4 video at all
 */
export function pickBotFormat(
  formats: readonly FormatCandidate[],
  ceilingBytes: number
): string | null {
  const ranked = formats
    .filter(isMp4Video)
    .map(format => {
      const size = knownSize(format);
      return {
        format,
        estimate: size === null ? null : size * FORMAT_SELECTION.SIZE_INFLATION,
      };
    })
    .sort((a, b) => b.format.height - a.format.height);

  const fitting = ranked.find(r => r.estimate !== null && r.estimate <= ceilingBytes);
  if (fitting) {
    return fitting.format.formatId;
  }

  const safe = ranked.find(r => r.format.height <= FORMAT_SELECTION.SAFE_HEIGHT);
  if (safe) {
    return safe.format.formatId;
  }

  const smallest = ranked[ranked.length - 1];
  return smallest ? smallest.format.formatId : null;
}
