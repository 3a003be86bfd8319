/**
 * yt-dlp progress protocol
 *
 * yt-dlp run with --newline prints one status line per update on its merged
 * output. Destination and percent rules are checked independently, so one line
 * may yield both; merge and extract are mutually exclusive. Lines matching
 * nothing are ignored.
 */

import { DownloadMode, ProgressEvent } from '../../types/media.js';

export type ProgressLineKind = 'destination' | 'percent' | 'merge' | 'extract';

export interface ProgressLine {
  kind: ProgressLineKind;
  /** Only set for 'percent' */
  percent?: number;
}

const DESTINATION_PATTERN = /\[download\] Destination:/;
const PERCENT_PATTERN = /\[download\]\s+([\d.]+)%/;
const MERGE_PATTERN = /\[Merger\]/;
const EXTRACT_PATTERN = /\[ExtractAudio\]/;

/**
 * Classify a single output line, in destination, percent, merge/extract order
 */
export function classifyLine(line: string): ProgressLine[] {
  const parsed: ProgressLine[] = [];

  if (DESTINATION_PATTERN.test(line)) {
    parsed.push({ kind: 'destination' });
  }

  const match = PERCENT_PATTERN.exec(line);
  if (match) {
    const percent = Number(match[1]);
    // "1.2.3%" and similar garbage
    if (Number.isFinite(percent)) {
      parsed.push({ kind: 'percent', percent });
    }
  }

  if (MERGE_PATTERN.test(line)) {
    parsed.push({ kind: 'merge' });
  } else if (EXTRACT_PATTERN.test(line)) {
    parsed.push({ kind: 'extract' });
  }

  return parsed;
}

/**
 * Turns the line stream of one download run into progress events.
 *
 * A video download fetches the video stream and then the audio stream, each
 * announced by a "Destination:" line; the second one switches the reported
 * stage to downloading_audio. An audio download only ever reports
 * downloading_audio.
 */
export class ProgressTracker {
  private legs = 0;

  constructor(private readonly mode: DownloadMode) {}

  /**
   * Event emitted before the process starts
   */
  initialEvent(): ProgressEvent {
    return {
      stage: this.mode === 'audio' ? 'downloading_audio' : 'downloading_video',
      percent: 0,
    };
  }

  consume(line: string): ProgressEvent[] {
    return classifyLine(line).flatMap(parsed => this.toEvents(parsed));
  }

  private toEvents(parsed: ProgressLine): ProgressEvent[] {
    switch (parsed.kind) {
      case 'destination':
        this.legs += 1;
        if (this.legs === 2 && this.mode === 'video') {
          return [{ stage: 'downloading_audio', percent: 0 }];
        }
        return [];

      case 'percent':
        return [{ stage: this.downloadStage(), percent: parsed.percent ?? 0 }];

      case 'merge':
        return [{ stage: 'merging', percent: -1 }];

      case 'extract':
        return [{ stage: 'converting', percent: -1 }];
    }
  }

  private downloadStage(): 'downloading_video' | 'downloading_audio' {
    if (this.mode === 'audio' || this.legs >= 2) {
      return 'downloading_audio';
    }
    return 'downloading_video';
  }
}
