import { PcmAudio, blockAlign, bytesPerMs, rms } from '../audio/wav';

export const DEFAULT_CALIBRATION_MS = 500;
const FRAME_MS = 20;
const DYNAMIC_ENERGY_RATIO = 1.5;
const MIN_ENERGY_THRESHOLD = 300;

export class CalibrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalibrationError';
  }
}

export interface CalibratedAudio extends PcmAudio {
  energyThreshold: number;
}

function alignedBytes(audio: PcmAudio, ms: number): number {
  const raw = Math.round(ms * bytesPerMs(audio.format));
  return raw - (raw % blockAlign(audio.format));
}

/**
 * Takes the quietest frame of the leading window as the noise floor and
 * silences the window's frames whose energy stays under the resulting
 * threshold. Audio after the window is passed on untouched, and the audio
 * keeps its length.
 */
export function calibrateAmbientNoise(
  audio: PcmAudio,
  windowMs = DEFAULT_CALIBRATION_MS,
): CalibratedAudio {
  const windowBytes = alignedBytes(audio, windowMs);
  if (audio.data.length < windowBytes) {
    throw new CalibrationError(
      `audio shorter than the ${windowMs}ms calibration window`,
    );
  }

  const frameBytes = Math.max(alignedBytes(audio, FRAME_MS), 2);

  let ambient = Infinity;
  for (let off = 0; off < windowBytes; off += frameBytes) {
    const end = Math.min(off + frameBytes, windowBytes);
    ambient = Math.min(ambient, rms(audio.data.subarray(off, end)));
  }
  if (!Number.isFinite(ambient)) ambient = 0;

  const energyThreshold = Math.max(
    ambient * DYNAMIC_ENERGY_RATIO,
    MIN_ENERGY_THRESHOLD,
  );

  const gated = Buffer.from(audio.data);
  for (let off = 0; off < windowBytes; off += frameBytes) {
    const end = Math.min(off + frameBytes, windowBytes);
    if (rms(gated.subarray(off, end)) < energyThreshold) {
      gated.fill(0, off, end);
    }
  }

  return { format: audio.format, data: gated, energyThreshold };
}
