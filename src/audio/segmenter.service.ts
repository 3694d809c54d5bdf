import { Injectable, Logger } from '@nestjs/common';
import {
  CANONICAL_FORMAT,
  blockAlign,
  bytesPerMs,
  encodeWav,
  normalizeLoudness,
} from './wav';

export const LONG_AUDIO_THRESHOLD_MS = 60_000;
export const SEGMENT_LENGTH_MS = 45_000;

export interface SegmentWindow {
  index: number;
  startMs: number;
  endMs: number;
}

export interface Segment extends SegmentWindow {
  // canonical WAV
  audio: Buffer;
  // false for the implicit whole-recording segment
  split: boolean;
}

export function planSegments(totalMs: number): SegmentWindow[] {
  if (totalMs <= LONG_AUDIO_THRESHOLD_MS) {
    return [{ index: 0, startMs: 0, endMs: totalMs }];
  }

  const windows: SegmentWindow[] = [];
  for (let start = 0; start < totalMs; start += SEGMENT_LENGTH_MS) {
    windows.push({
      index: windows.length,
      startMs: start,
      endMs: Math.min(start + SEGMENT_LENGTH_MS, totalMs),
    });
  }
  return windows;
}

function msToByteOffset(ms: number): number {
  const align = blockAlign(CANONICAL_FORMAT);
  const raw = Math.round(ms * bytesPerMs(CANONICAL_FORMAT));
  return raw - (raw % align);
}

@Injectable()
export class SegmenterService {
  private readonly log = new Logger(SegmenterService.name);

  /** Splits canonical PCM into recognition-sized windows. */
  segment(pcm: Buffer, totalMs: number): Segment[] {
    const windows = planSegments(totalMs);

    if (windows.length === 1) {
      return [{ ...windows[0], audio: encodeWav(pcm), split: false }];
    }

    this.log.log(
      `📂 Long audio (${(totalMs / 1000).toFixed(1)}s), splitting into ${windows.length} segments`,
    );

    return windows.map((w) => {
      const start = msToByteOffset(w.startMs);
      // the last window takes whatever is left so no sample is dropped
      const end =
        w.index === windows.length - 1 ? pcm.length : msToByteOffset(w.endMs);
      const slice = pcm.subarray(start, end);
      this.log.debug(
        `📄 Segment ${w.index + 1}: ${(w.startMs / 1000).toFixed(1)}s - ${(w.endMs / 1000).toFixed(1)}s`,
      );
      return { ...w, audio: encodeWav(normalizeLoudness(slice)), split: true };
    });
  }
}
