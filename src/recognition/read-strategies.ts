import { AudioNormalizerService } from '../audio/audio-normalizer.service';
import { PcmAudio, decodeWav } from '../audio/wav';
import { calibrateAmbientNoise } from './calibration';

export interface ReadStrategy {
  name: string;
  read(audio: Buffer): Promise<PcmAudio>;
}

/**
 * Ways of turning segment bytes into recognizer input, most thorough first.
 * Callers walk the list and keep the first one that reads.
 */
export function buildReadStrategies(
  normalizer: AudioNormalizerService,
  calibrationMs: number,
): ReadStrategy[] {
  return [
    {
      name: 'convert',
      read: async (audio) =>
        calibrateAmbientNoise(await normalizer.normalize(audio), calibrationMs),
    },
    {
      name: 'raw',
      read: async (audio) =>
        calibrateAmbientNoise(decodeWav(audio), calibrationMs),
    },
    {
      name: 'raw-uncalibrated',
      read: async (audio) => decodeWav(audio, { lenient: true }),
    },
  ];
}
