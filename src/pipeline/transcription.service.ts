import { Injectable, Logger } from '@nestjs/common';
import { MIN_AUDIO_BYTES } from '../audio/audio-normalizer.service';
import { Segment, SegmenterService } from '../audio/segmenter.service';
import { decodeWav, durationMs } from '../audio/wav';
import { DecodeError, errorMessage } from '../common/errors';
import { RedisService } from '../db/redis.service';
import { Recording } from '../db/recording.entity';
import { RefinedTranscript, Transcript } from '../db/transcript.entity';
import { RecognitionService } from '../recognition/recognition.service';
import { S3Service, artifactKey } from '../s3/s3.service';
import { RefinementService } from '../summary/refinement.service';
import { TranscriptFragment, isFailed } from '../transcript/fragment';
import { stitch } from '../transcript/stitcher';

export interface TranscriptionResult {
  transcript: Transcript;
  refined: RefinedTranscript;
}

@Injectable()
export class TranscriptionService {
  private readonly log = new Logger(TranscriptionService.name);

  constructor(
    private segmenter: SegmenterService,
    private recognition: RecognitionService,
    private refinement: RefinementService,
    private redis: RedisService,
    private s3: S3Service,
  ) {}

  async transcribe(
    recording: Recording,
    opts: { improve?: boolean } = {},
  ): Promise<TranscriptionResult> {
    return this.redis.withLock(recording.recordingId, async () => {
      const startTime = Date.now();
      this.log.log(`🎯 Transcribing ${recording.recordingId}`);

      const audio = await this.s3.getObjectBuffer(recording.audioKey);
      const transcript = await this.transcribeAudio(recording, audio);
      await this.s3.putObject(
        artifactKey(recording.ownerId, recording.recordingId, 'transcript'),
        transcript.text,
        'text/plain; charset=utf-8',
      );

      const failed = transcript.fragments.some(isFailed);
      const refined: RefinedTranscript =
        opts.improve === false || failed
          ? { recordingId: recording.recordingId, text: transcript.text, improved: false }
          : await this.refinement
              .improve(transcript.text)
              .then((r) => ({ recordingId: recording.recordingId, ...r }));
      await this.saveRefined(recording, refined.text);

      await this.redis.touchRecording(recording.recordingId);
      this.log.log(
        `🎉 Transcription of ${recording.recordingId} done in ${Date.now() - startTime}ms (${transcript.text.length} chars, improved: ${refined.improved})`,
      );
      return { transcript, refined };
    });
  }

  async improve(recording: Recording): Promise<RefinedTranscript> {
    return this.redis.withLock(recording.recordingId, async () => {
      const text = await this.s3.getObjectText(
        artifactKey(recording.ownerId, recording.recordingId, 'transcript'),
      );
      const refined = await this.refinement.improve(text);
      await this.saveRefined(recording, refined.text);
      return { recordingId: recording.recordingId, ...refined };
    });
  }

  /** Segments and recognizes in index order, then stitches. */
  async transcribeAudio(recording: Recording, audio: Buffer): Promise<Transcript> {
    if (audio.length < MIN_AUDIO_BYTES) {
      throw new DecodeError(`Audio too small or empty (${audio.length} bytes)`);
    }

    const segments = this.segmentsFor(recording, audio);
    const fragments: TranscriptFragment[] = [];
    for (const segment of segments) {
      if (segments.length > 1) {
        this.log.log(`🎯 Segment ${segment.index + 1}/${segments.length}`);
      }
      fragments.push(
        await this.recognition.recognize({
          index: segment.split ? segment.index : 'whole',
          audio: segment.audio,
        }),
      );
    }

    return {
      recordingId: recording.recordingId,
      ownerId: recording.ownerId,
      fragments,
      text: stitch(fragments),
      createdAt: new Date(),
    };
  }

  private segmentsFor(recording: Recording, audio: Buffer): Segment[] {
    const whole: Segment = {
      index: 0,
      startMs: 0,
      endMs: recording.durationMs ?? 0,
      audio,
      split: false,
    };
    if (!recording.normalized) return [whole];

    try {
      const wav = decodeWav(audio);
      const totalMs = recording.durationMs ?? durationMs(wav);
      return this.segmenter.segment(wav.data, totalMs);
    } catch (error) {
      this.log.warn(
        `⚠️ Stored audio for ${recording.recordingId} is unreadable, sending it whole: ${errorMessage(error)}`,
      );
      return [whole];
    }
  }

  // the text later summaries and transcript exports start from
  private async saveRefined(recording: Recording, text: string) {
    await this.s3.putObject(
      artifactKey(recording.ownerId, recording.recordingId, 'refined'),
      text,
      'text/plain; charset=utf-8',
    );
  }
}
