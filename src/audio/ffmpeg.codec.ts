import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { execFile } from 'node:child_process';
import { CANONICAL_FORMAT } from './wav';

/**
 * Thin wrapper over the host `ffmpeg` binary. Converts any input file it can
 * read into headerless signed 16-bit little-endian PCM in the canonical
 * layout.
 */
@Injectable()
export class FfmpegCodec {
  private readonly log = new Logger(FfmpegCodec.name);
  private binaryPath: string;
  private timeoutMs: number;

  constructor(cfg: ConfigService) {
    this.binaryPath = cfg.get<string>('FFMPEG_PATH') || 'ffmpeg';
    this.timeoutMs = Number(cfg.get('FFMPEG_TIMEOUT_MS') ?? 60_000);
  }

  decodeToPcm(inputPath: string, outputPath: string): Promise<void> {
    const args = [
      '-hide_banner',
      '-nostdin',
      '-y',
      '-i', inputPath,
      '-vn',
      '-ac', String(CANONICAL_FORMAT.channels),
      '-ar', String(CANONICAL_FORMAT.sampleRate),
      '-acodec', 'pcm_s16le',
      '-f', 's16le',
      outputPath,
    ];

    this.log.debug(`🔧 ${this.binaryPath} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      execFile(
        this.binaryPath,
        args,
        { timeout: this.timeoutMs },
        (error, _stdout, stderr) => {
          if (error) {
            const msg = stderr?.slice(-300).trim() || error.message;
            reject(new Error(`ffmpeg failed: ${msg}`));
            return;
          }
          resolve();
        },
      );
    });
  }
}
