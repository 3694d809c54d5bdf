export const WAV_HEADER_SIZE = 44;

export interface PcmFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

export interface PcmAudio {
  format: PcmFormat;
  data: Buffer;
}

// 16 kHz, mono, 16-bit: what the recognizer expects
export const CANONICAL_FORMAT: PcmFormat = {
  sampleRate: 16000,
  channels: 1,
  bitsPerSample: 16,
};

export class WavFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WavFormatError';
  }
}

export function bytesPerMs(format: PcmFormat = CANONICAL_FORMAT): number {
  return (format.sampleRate * format.channels * (format.bitsPerSample / 8)) / 1000;
}

export function blockAlign(format: PcmFormat): number {
  return format.channels * (format.bitsPerSample / 8);
}

export function durationMs(audio: PcmAudio): number {
  return Math.floor(audio.data.length / bytesPerMs(audio.format));
}

export function isCanonicalFormat(format: PcmFormat): boolean {
  return (
    format.sampleRate === CANONICAL_FORMAT.sampleRate &&
    format.channels === CANONICAL_FORMAT.channels &&
    format.bitsPerSample === CANONICAL_FORMAT.bitsPerSample
  );
}

export function encodeWav(
  pcm: Buffer,
  format: PcmFormat = CANONICAL_FORMAT,
): Buffer {
  const align = blockAlign(format);
  const header = Buffer.alloc(WAV_HEADER_SIZE);
  header.write('RIFF', 0);
  header.writeUInt32LE(WAV_HEADER_SIZE + pcm.length - 8, 4);
  header.write('WAVE', 8);
  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * align, 28);
  header.writeUInt16LE(align, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);
  header.write('data', 36);
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}

export function isRiffWave(buf: Buffer): boolean {
  return (
    buf.length >= 12 &&
    buf.toString('ascii', 0, 4) === 'RIFF' &&
    buf.toString('ascii', 8, 12) === 'WAVE'
  );
}

/**
 * Reads a PCM WAV by walking its chunk list.
 *
 * In lenient mode a data chunk whose declared size overruns the buffer
 * (streamed WAVs written with a 0xFFFFFFFF placeholder) is cut at the end of
 * the buffer, and bytes without a RIFF header are taken as headerless
 * canonical PCM, a trailing odd byte dropped. Only a buffer too short to hold
 * one sample is refused, whatever its length parity.
 */
export function decodeWav(
  buf: Buffer,
  opts: { lenient?: boolean } = {},
): PcmAudio {
  const lenient = opts.lenient ?? false;

  if (!isRiffWave(buf)) {
    const usable = buf.length - (buf.length % 2);
    if (lenient && usable > 0) {
      return { format: { ...CANONICAL_FORMAT }, data: buf.subarray(0, usable) };
    }
    throw new WavFormatError('not a RIFF/WAVE file');
  }

  let format: PcmFormat | null = null;
  let offset = 12;

  while (offset + 8 <= buf.length) {
    const id = buf.toString('ascii', offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      if (size < 16 || body + 16 > buf.length) {
        throw new WavFormatError('truncated fmt chunk');
      }
      const audioFormat = buf.readUInt16LE(body);
      // 0xfffe is WAVE_FORMAT_EXTENSIBLE, which ffmpeg writes for some layouts
      if (audioFormat !== 1 && audioFormat !== 0xfffe) {
        throw new WavFormatError(`unsupported WAV encoding ${audioFormat}`);
      }
      format = {
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
      if (format.bitsPerSample !== 16) {
        throw new WavFormatError(
          `unsupported sample width ${format.bitsPerSample} bits`,
        );
      }
      if (format.channels < 1 || format.sampleRate < 1) {
        throw new WavFormatError('invalid fmt chunk');
      }
    } else if (id === 'data') {
      if (!format) throw new WavFormatError('data chunk before fmt chunk');
      let end = body + size;
      if (end > buf.length) {
        if (!lenient) throw new WavFormatError('data chunk overruns file');
        end = buf.length;
      }
      const align = blockAlign(format);
      const usable = end - body - ((end - body) % align);
      return { format, data: buf.subarray(body, body + usable) };
    }

    // chunks are word-aligned
    offset = body + size + (size % 2);
  }

  throw new WavFormatError('no data chunk');
}

const MAX_SAMPLE = 32767;
const MIN_SAMPLE = -32768;

function clampSample(v: number): number {
  if (v > MAX_SAMPLE) return MAX_SAMPLE;
  if (v < MIN_SAMPLE) return MIN_SAMPLE;
  return v;
}

export function peakAmplitude(pcm: Buffer): number {
  let peak = 0;
  for (let i = 0; i + 1 < pcm.length; i += 2) {
    const s = Math.abs(pcm.readInt16LE(i));
    if (s > peak) peak = s;
  }
  return peak;
}

export function rms(pcm: Buffer): number {
  const samples = Math.floor(pcm.length / 2);
  if (samples === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples * 2; i += 2) {
    const s = pcm.readInt16LE(i);
    sum += s * s;
  }
  return Math.sqrt(sum / samples);
}

/**
 * Peak normalization: scales every sample so the loudest one sits
 * `headroomDb` below full scale. Silence is returned as-is.
 */
export function normalizeLoudness(pcm: Buffer, headroomDb = 0.1): Buffer {
  const peak = peakAmplitude(pcm);
  if (peak === 0) return Buffer.from(pcm);

  const target = MAX_SAMPLE * Math.pow(10, -headroomDb / 20);
  const gain = target / peak;
  const out = Buffer.alloc(pcm.length - (pcm.length % 2));
  for (let i = 0; i < out.length; i += 2) {
    out.writeInt16LE(clampSample(Math.round(pcm.readInt16LE(i) * gain)), i);
  }
  return out;
}
