import { Injectable, Logger } from '@nestjs/common';
import {
  AudioNormalizerService,
  MIN_AUDIO_BYTES,
} from '../audio/audio-normalizer.service';
import {
  DecodeError,
  RecordingAccessError,
  RecordingBusyError,
  RecordingNotFoundError,
} from '../common/errors';
import { RedisService } from '../db/redis.service';
import { Recording } from '../db/recording.entity';
import { S3Service, artifactKey } from '../s3/s3.service';
import { buildRecordingId } from './naming';

// ids differ only by timestamp, so same-second uploads get a -2, -3... suffix
const MAX_ID_SUFFIX = 20;

@Injectable()
export class RecordingsService {
  private readonly log = new Logger(RecordingsService.name);

  constructor(
    private normalizer: AudioNormalizerService,
    private redis: RedisService,
    private s3: S3Service,
  ) {}

  /**
   * Normalizes and stores an upload. When the codec cannot read it, the
   * original bytes are kept so recognition can still try them directly.
   */
  async ingest(
    ownerId: string,
    raw: Buffer,
    subject: string | null = null,
    now: Date = new Date(),
  ): Promise<Recording> {
    if (raw.length < MIN_AUDIO_BYTES) {
      throw new DecodeError(`Audio too small or empty (${raw.length} bytes)`);
    }

    let audio: Buffer;
    let durationMs: number | null;
    let normalized: boolean;
    try {
      const pcm = await this.normalizer.normalize(raw);
      audio = pcm.toWav();
      durationMs = pcm.durationMs;
      normalized = true;
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      this.log.warn(
        `⚠️ Keeping original bytes for ${ownerId}'s upload: ${error.detail ?? error.message}`,
      );
      audio = raw;
      durationMs = null;
      normalized = false;
    }

    const recording = await this.reserve(ownerId, subject, now, durationMs, normalized);
    try {
      await this.s3.putObject(recording.audioKey, audio, 'audio/wav');
    } catch (error) {
      await this.redis.deleteRecording(recording.recordingId);
      throw error;
    }

    this.log.log(`✅ Recording stored: ${recording.recordingId} (${audio.length} bytes)`);
    return recording;
  }

  private async reserve(
    ownerId: string,
    subject: string | null,
    now: Date,
    durationMs: number | null,
    normalized: boolean,
  ): Promise<Recording> {
    const baseId = buildRecordingId(ownerId, subject, now);

    for (let n = 1; n <= MAX_ID_SUFFIX; n++) {
      const recordingId = n === 1 ? baseId : `${baseId}-${n}`;
      const recording = await this.redis.createRecording({
        recordingId,
        ownerId,
        subject: subject?.trim() || null,
        durationMs,
        normalized,
        audioKey: artifactKey(ownerId, recordingId, 'audio'),
      });
      if (recording) return recording;
      this.log.warn(`🔄 Recording id ${recordingId} is taken, trying the next suffix`);
    }
    throw new RecordingBusyError(baseId);
  }

  async findOwned(ownerId: string, recordingId: string): Promise<Recording> {
    const recording = await this.redis.getRecording(recordingId);
    if (!recording) throw new RecordingNotFoundError(recordingId);
    if (recording.ownerId !== ownerId) throw new RecordingAccessError(recordingId);
    return recording;
  }

  audioUrl(recording: Recording): Promise<string> {
    return this.s3.presignGet(recording.audioKey);
  }
}
