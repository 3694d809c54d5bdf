import { Injectable, Logger } from '@nestjs/common';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DecodeError, errorMessage } from '../common/errors';
import { FfmpegCodec } from './ffmpeg.codec';
import {
  CANONICAL_FORMAT,
  PcmAudio,
  WavFormatError,
  decodeWav,
  durationMs,
  encodeWav,
  isCanonicalFormat,
  isRiffWave,
  normalizeLoudness,
} from './wav';

// anything smaller is an empty or truncated upload
export const MIN_AUDIO_BYTES = 1000;

export class NormalizedAudio implements PcmAudio {
  readonly format = CANONICAL_FORMAT;

  constructor(readonly data: Buffer) {}

  get durationMs(): number {
    return durationMs(this);
  }

  toWav(): Buffer {
    return encodeWav(this.data, this.format);
  }
}

@Injectable()
export class AudioNormalizerService {
  private readonly log = new Logger(AudioNormalizerService.name);

  constructor(private codec: FfmpegCodec) {}

  async normalize(raw: Buffer): Promise<NormalizedAudio> {
    if (raw.length < MIN_AUDIO_BYTES) {
      throw new DecodeError(
        `Audio too small or empty (${raw.length} bytes)`,
      );
    }

    const startTime = Date.now();
    const pcm = this.readCanonicalWav(raw) ?? (await this.transcode(raw));
    if (pcm.length === 0) {
      throw new DecodeError('Decoded audio contains no samples');
    }

    const audio = new NormalizedAudio(normalizeLoudness(pcm));
    this.log.log(
      `✅ Normalized ${raw.length} bytes -> ${audio.data.length} bytes PCM, ${(audio.durationMs / 1000).toFixed(1)}s (${Date.now() - startTime}ms)`,
    );
    return audio;
  }

  private readCanonicalWav(raw: Buffer): Buffer | null {
    if (!isRiffWave(raw)) return null;
    try {
      const wav = decodeWav(raw);
      return isCanonicalFormat(wav.format) ? wav.data : null;
    } catch (error) {
      if (error instanceof WavFormatError) return null;
      throw error;
    }
  }

  private async transcode(raw: Buffer): Promise<Buffer> {
    const dir = await mkdtemp(join(tmpdir(), 'voice-notes-'));
    const inputPath = join(dir, 'input');
    const outputPath = join(dir, 'output.pcm');

    try {
      await writeFile(inputPath, raw);
      await this.codec.decodeToPcm(inputPath, outputPath);
      return await readFile(outputPath);
    } catch (error) {
      this.log.warn(`⚠️ Audio conversion failed: ${errorMessage(error)}`);
      throw new DecodeError('Could not decode audio', errorMessage(error));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}
