import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../common/errors';
import {
  RecognitionRequest,
  RecognitionRequestError,
  RecognitionTimeoutError,
  SpeechRecognitionProvider,
  UnrecognizedSpeechError,
} from './speech-provider';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

/** Pulls the top alternative of every result; null when there are none. */
export function extractTranscripts(body: unknown): string[] | null {
  const results = isRecord(body) ? body.results : undefined;
  if (!Array.isArray(results) || results.length === 0) return null;

  return results.map((r: unknown) => {
    const alternatives = isRecord(r) ? r.alternatives : undefined;
    const top: unknown = Array.isArray(alternatives) ? alternatives[0] : undefined;
    return isRecord(top) && typeof top.transcript === 'string'
      ? top.transcript
      : '';
  });
}

function isTimeout(error: unknown) {
  return (
    error instanceof Error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

/**
 * Synchronous `speech:recognize` REST call. An answer with no results is the
 * service's way of saying it did not understand the audio.
 */
@Injectable()
export class GoogleSpeechProvider implements SpeechRecognitionProvider {
  private readonly log = new Logger(GoogleSpeechProvider.name);
  private endpoint: string;
  private apiKey: string;

  constructor(cfg: ConfigService) {
    this.endpoint =
      cfg.get<string>('RECOGNITION_ENDPOINT') ||
      'https://speech.googleapis.com/v1/speech:recognize';
    this.apiKey = cfg.get<string>('RECOGNITION_API_KEY') ?? '';
    if (!this.apiKey) {
      this.log.warn('⚠️ RECOGNITION_API_KEY is not set');
    }
  }

  async recognize(req: RecognitionRequest): Promise<string> {
    const body = {
      config: {
        encoding: 'LINEAR16',
        sampleRateHertz: req.format.sampleRate,
        audioChannelCount: req.format.channels,
        languageCode: req.locale,
        enableAutomaticPunctuation: true,
      },
      audio: { content: req.pcm.toString('base64') },
    };

    let res: Response;
    try {
      res = await fetch(`${this.endpoint}?key=${encodeURIComponent(this.apiKey)}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(req.deadlineMs),
      });
    } catch (error) {
      if (isTimeout(error)) throw new RecognitionTimeoutError(req.deadlineMs);
      throw new RecognitionRequestError(
        `recognition request failed: ${errorMessage(error)}`,
      );
    }

    if (!res.ok) {
      const t = await res.text().catch(() => '');
      throw new RecognitionRequestError(
        `recognition service answered ${res.status} ${t.slice(0, 200)}`.trim(),
        res.status,
      );
    }

    let j: unknown;
    try {
      j = await res.json();
    } catch (error) {
      if (isTimeout(error)) throw new RecognitionTimeoutError(req.deadlineMs);
      throw new RecognitionRequestError(
        `unreadable recognition response: ${errorMessage(error)}`,
      );
    }

    const transcripts = extractTranscripts(j);
    if (!transcripts) throw new UnrecognizedSpeechError();

    return transcripts
      .join(' ')
      .replace(/\s+/g, ' ')
      .trim();
  }
}
