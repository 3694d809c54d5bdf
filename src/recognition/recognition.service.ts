import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AudioNormalizerService } from '../audio/audio-normalizer.service';
import { PcmAudio } from '../audio/wav';
import { errorMessage } from '../common/errors';
import {
  FragmentIndex,
  FragmentOutcome,
  TranscriptFragment,
} from '../transcript/fragment';
import { DEFAULT_CALIBRATION_MS } from './calibration';
import { ReadStrategy, buildReadStrategies } from './read-strategies';
import {
  RecognitionRequestError,
  RecognitionTimeoutError,
  SPEECH_PROVIDER,
  SpeechRecognitionProvider,
  UnrecognizedSpeechError,
} from './speech-provider';

export interface RecognitionPolicy {
  locale: string;
  baseDeadlineMs: number;
  deadlineStepMs: number;
  maxAttempts: number;
  backoffMs: number;
  calibrationMs: number;
}

export interface RecognizableAudio {
  index: FragmentIndex;
  audio: Buffer;
}

type ReadResult =
  | { ok: true; audio: PcmAudio; strategy: string }
  | { ok: false; detail: string };

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

@Injectable()
export class RecognitionService {
  private readonly log = new Logger(RecognitionService.name);
  readonly policy: RecognitionPolicy;
  private strategies: ReadStrategy[];

  constructor(
    @Inject(SPEECH_PROVIDER) private provider: SpeechRecognitionProvider,
    normalizer: AudioNormalizerService,
    cfg: ConfigService,
  ) {
    this.policy = {
      locale: cfg.get<string>('RECOGNITION_LOCALE') || 'pt-BR',
      baseDeadlineMs: Number(cfg.get('RECOGNITION_DEADLINE_MS') ?? 30_000),
      deadlineStepMs: Number(cfg.get('RECOGNITION_DEADLINE_STEP_MS') ?? 15_000),
      maxAttempts: Number(cfg.get('RECOGNITION_MAX_ATTEMPTS') ?? 3),
      backoffMs: Number(cfg.get('RECOGNITION_BACKOFF_MS') ?? 2_000),
      calibrationMs: Number(cfg.get('CALIBRATION_MS') ?? DEFAULT_CALIBRATION_MS),
    };
    this.strategies = buildReadStrategies(normalizer, this.policy.calibrationMs);
  }

  deadlineFor(attempt: number): number {
    return this.policy.baseDeadlineMs + attempt * this.policy.deadlineStepMs;
  }

  async recognize(segment: RecognizableAudio): Promise<TranscriptFragment> {
    const label = segment.index === 'whole' ? 'whole recording' : `segment ${segment.index + 1}`;
    const startTime = Date.now();

    const read = await this.readAudio(segment.audio);
    if (!read.ok) {
      this.log.error(`❌ Could not read ${label}: ${read.detail}`);
      return {
        index: segment.index,
        outcome: { kind: 'service_error', detail: read.detail },
      };
    }

    const outcome = await this.callWithRetry(read.audio, label);
    this.log.log(
      `${outcome.kind === 'ok' ? '✅' : '⚠️'} ${label}: ${outcome.kind} via ${read.strategy} (${Date.now() - startTime}ms)`,
    );
    return { index: segment.index, outcome };
  }

  async readAudio(audio: Buffer): Promise<ReadResult> {
    let detail = 'no read strategy configured';
    for (const strategy of this.strategies) {
      try {
        return { ok: true, audio: await strategy.read(audio), strategy: strategy.name };
      } catch (error) {
        detail = errorMessage(error);
        this.log.warn(`🔄 Read strategy "${strategy.name}" failed: ${detail}`);
      }
    }
    return { ok: false, detail };
  }

  private async callWithRetry(
    audio: PcmAudio,
    label: string,
  ): Promise<FragmentOutcome> {
    const { maxAttempts, backoffMs, locale } = this.policy;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const deadlineMs = this.deadlineFor(attempt);
      this.log.log(
        `🤖 Recognizing ${label} (attempt ${attempt + 1}/${maxAttempts}, deadline ${deadlineMs}ms)`,
      );

      try {
        const text = await this.provider.recognize({
          pcm: audio.data,
          format: audio.format,
          locale,
          deadlineMs,
        });
        return text.trim() ? { kind: 'ok', text: text.trim() } : { kind: 'empty' };
      } catch (error) {
        if (error instanceof RecognitionTimeoutError) {
          this.log.warn(`⏰ Timeout on attempt ${attempt + 1}: ${error.message}`);
          if (attempt < maxAttempts - 1) await sleep(backoffMs);
          continue;
        }
        if (error instanceof UnrecognizedSpeechError) {
          return { kind: 'unrecognized' };
        }
        if (error instanceof RecognitionRequestError) {
          return { kind: 'service_error', detail: error.message };
        }
        this.log.error(`💥 Unexpected recognition failure`, error);
        return { kind: 'service_error', detail: errorMessage(error) };
      }
    }

    return { kind: 'timeout' };
  }
}
