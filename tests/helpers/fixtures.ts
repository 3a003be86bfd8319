import { FormatCandidate, MediaMetadata } from '../../src/types/media.js';

export function videoFormat(overrides: Partial<FormatCandidate> & { formatId: string; height: number }): FormatCandidate {
  return {
    containerExt: 'mp4',
    videoCodec: 'avc1.64001F',
    audioCodec: 'none',
    bitrateKbps: 0,
    sizeBytes: null,
    approxSizeBytes: null,
    ...overrides,
  };
}

export function audioFormat(overrides: Partial<FormatCandidate> & { formatId: string; bitrateKbps: number }): FormatCandidate {
  return {
    containerExt: 'm4a',
    height: 0,
    videoCodec: 'none',
    audioCodec: 'mp4a.40.2',
    sizeBytes: null,
    approxSizeBytes: null,
    ...overrides,
  };
}

export const MB = 1024 * 1024;

export function sampleMetadata(overrides: Partial<MediaMetadata> = {}): MediaMetadata {
  return {
    id: 'abc123',
    title: 'Test clip',
    uploaderName: 'Test Channel',
    durationSeconds: 125,
    thumbnailUrl: 'https://img.example.com/thumb.jpg',
    formats: [
      videoFormat({ formatId: '137', height: 1080, sizeBytes: 80 * MB }),
      videoFormat({ formatId: '136', height: 720, sizeBytes: 40 * MB }),
      audioFormat({ formatId: '140', bitrateKbps: 129.5, sizeBytes: 2 * MB }),
    ],
    ...overrides,
  };
}
